// src/kernel-core/L2/ComponentHost.ts
import type { ComponentName, ComponentRecord, ImplementationRef, InstanceHandle, PrincipalId, VersionLabel } from '../L0/Ontology.js';
import { deriveHandle, randomNonce } from '../L0/Crypto.js';
import { describeError, ErrorCode, KernelError } from '../Errors.js';
import { ComponentRegistry } from './ComponentRegistry.js';

/**
 * Per-instance state. Owned by the instance, never by an implementation,
 * so it outlives every swap.
 */
export type ComponentStorage = Map<string, unknown>;

export type InitArgs = readonly unknown[];

export interface ComponentImplementation {
    readonly ref: ImplementationRef;
    initialize?(storage: ComponentStorage, args: InitArgs): void;
    invoke(operation: string, storage: ComponentStorage, args: readonly unknown[]): unknown;
}

export interface ComponentInstance {
    readonly name: ComponentName;
    readonly handle: InstanceHandle;
    readonly storage: ComponentStorage;
}

export class ImplementationCatalog {
    private implementations: Map<ImplementationRef, ComponentImplementation> = new Map();

    public register(implementation: ComponentImplementation): void {
        if (this.implementations.has(implementation.ref)) {
            throw new KernelError(ErrorCode.ALREADY_EXISTS, `Implementation ${implementation.ref} already registered`, { implementationRef: implementation.ref });
        }
        this.implementations.set(implementation.ref, implementation);
    }

    public resolve(ref: ImplementationRef): ComponentImplementation {
        const implementation = this.implementations.get(ref);
        if (!implementation) {
            throw new KernelError(ErrorCode.NOT_FOUND, `Implementation ${ref} not registered`, { implementationRef: ref });
        }
        return implementation;
    }

    public has(ref: ImplementationRef): boolean {
        return this.implementations.has(ref);
    }

    public refs(): ImplementationRef[] {
        return [...this.implementations.keys()];
    }
}

/**
 * Component Host
 * Creates instances and routes calls through them to whatever implementation
 * the registry currently names.
 */
export class ComponentHost {
    private instances: Map<ComponentName, ComponentInstance> = new Map();

    constructor(
        private readonly registry: ComponentRegistry,
        private readonly catalog: ImplementationCatalog
    ) { }

    public async deploy(
        name: ComponentName,
        implementationRef: ImplementationRef,
        version: VersionLabel,
        initArgs: InitArgs,
        caller: PrincipalId
    ): Promise<ComponentRecord> {
        const implementation = this.catalog.resolve(implementationRef);
        if (this.registry.find(name)) {
            throw new KernelError(ErrorCode.ALREADY_EXISTS, `Component ${name} already installed`, { name });
        }

        const instance: ComponentInstance = {
            name,
            handle: deriveHandle(`${name}:${randomNonce()}`),
            storage: new Map()
        };

        try {
            implementation.initialize?.(instance.storage, initArgs);
        } catch (e: unknown) {
            throw new KernelError(
                ErrorCode.INVALID_ARGUMENT,
                `Initialization of ${name} with ${implementationRef} failed: ${describeError(e)}`,
                { reason: 'INITIALIZATION_FAILED', name, implementationRef }
            );
        }

        const record = await this.registry.install(name, instance.handle, implementationRef, version, caller);
        this.instances.set(name, instance);
        return record;
    }

    public call(name: ComponentName, operation: string, ...args: unknown[]): unknown {
        const instance = this.instance(name);
        const record = this.registry.query(name);
        const implementation = this.catalog.resolve(record.implementationRef);
        return implementation.invoke(operation, instance.storage, args);
    }

    public instance(name: ComponentName): ComponentInstance {
        const instance = this.instances.get(name);
        if (!instance) {
            throw new KernelError(ErrorCode.NOT_FOUND, `No instance hosted for ${name}`, { name });
        }
        return instance;
    }

    public hosted(): ComponentName[] {
        return [...this.instances.keys()];
    }
}

/**
 * Shared rejection for implementations that do not expose an operation.
 */
export function unknownOperation(ref: ImplementationRef, operation: string): KernelError {
    return new KernelError(ErrorCode.INVALID_ARGUMENT, `${ref} has no operation ${operation}`, { reason: 'UNKNOWN_OPERATION', implementationRef: ref, operation });
}
