// src/kernel-core/L2/ComponentRegistry.ts
import type {
    ComponentName, ComponentRecord, GovernanceEvent, ImplementationRef,
    InstanceHandle, PrincipalId, ProposalId, VersionLabel
} from '../L0/Ontology.js';
import type { Clock } from '../L0/Clock.js';
import { KeyedMutex } from '../L0/KeyedMutex.js';
import { enforce, OwnerGuard, PresenceGuard, RoleGuard } from '../L0/Guards.js';
import { Authority, RoleSet } from '../L1/Identity.js';
import { AuditLog } from '../L5/Audit.js';
import { ErrorCode, KernelError } from '../Errors.js';

/**
 * Extra context attached to a swap, recorded on its event.
 */
export interface SwapContext {
    proposalId?: ProposalId;
}

/**
 * Component Registry
 * Single source of truth for which implementation backs which named component.
 * Pure bookkeeping: it never calls the implementations it points at.
 */
export class ComponentRegistry {
    private components: Map<ComponentName, ComponentRecord> = new Map();
    private discovery: ComponentName[] = [];
    private locks = new KeyedMutex();
    private authority: Authority;

    constructor(
        owner: PrincipalId,
        private clock: Clock,
        private audit: AuditLog,
        private upgraderSet: RoleSet = new RoleSet('UPGRADER')
    ) {
        this.authority = new Authority(owner);
    }

    public get owner(): PrincipalId {
        return this.authority.owner;
    }

    /**
     * Claim a name for a new instance. A name stays claimed for the lifetime
     * of its instance, deactivated or not.
     */
    public async install(
        name: ComponentName,
        instanceHandle: InstanceHandle,
        implementationRef: ImplementationRef,
        version: VersionLabel,
        caller: PrincipalId
    ): Promise<ComponentRecord> {
        enforce(PresenceGuard({ name, instanceHandle, implementationRef, version }));

        return this.locks.runExclusive(`component:${name}`, async () => {
            const existing = this.components.get(name);
            if (existing) {
                const state = existing.active ? 'active' : 'deactivated';
                throw new KernelError(ErrorCode.ALREADY_EXISTS, `Component ${name} already installed (${state})`, { name });
            }

            const now = this.clock.now();
            const record: ComponentRecord = Object.freeze({
                name,
                instanceHandle,
                implementationRef,
                version,
                createdAt: now,
                lastUpgradedAt: null,
                active: true
            });

            await this.audit.append(this.event('COMPONENT_INSTALLED', name, caller, now, {
                instanceHandle, implementationRef, version
            }));

            this.commitInstall(record);
            return record;
        });
    }

    public async swapImplementation(
        name: ComponentName,
        newImplementationRef: ImplementationRef,
        newVersion: VersionLabel,
        caller: PrincipalId,
        context: SwapContext = {}
    ): Promise<ComponentRecord> {
        // Authority is checked before anything about the target.
        enforce(RoleGuard({ actor: caller, roles: this.upgraderSet, authority: this.authority }));
        enforce(PresenceGuard({ name, newImplementationRef, newVersion }));

        return this.locks.runExclusive(`component:${name}`, async () => {
            const current = this.require(name);
            if (!current.active) {
                throw new KernelError(ErrorCode.INVALID_STATE, `Component ${name} is inactive`, { reason: 'INACTIVE', name });
            }

            const now = this.clock.now();
            const next: ComponentRecord = Object.freeze({
                ...current,
                implementationRef: newImplementationRef,
                version: newVersion,
                lastUpgradedAt: now
            });

            await this.audit.append(this.event('IMPLEMENTATION_SWAPPED', name, caller, now, {
                implementationRef: newImplementationRef,
                version: newVersion,
                previousImplementationRef: current.implementationRef,
                previousVersion: current.version,
                proposalId: context.proposalId ?? null
            }));

            this.components.set(name, next);
            return next;
        });
    }

    /**
     * Irreversible. The instance keeps running on its last implementation.
     */
    public async deactivate(name: ComponentName, caller: PrincipalId): Promise<ComponentRecord> {
        enforce(OwnerGuard({ actor: caller, authority: this.authority, action: 'deactivate components' }));

        return this.locks.runExclusive(`component:${name}`, async () => {
            const current = this.require(name);
            if (!current.active) {
                throw new KernelError(ErrorCode.INVALID_STATE, `Component ${name} is already inactive`, { reason: 'ALREADY_INACTIVE', name });
            }

            const now = this.clock.now();
            await this.audit.append(this.event('COMPONENT_DEACTIVATED', name, caller, now, {}));

            const next: ComponentRecord = Object.freeze({ ...current, active: false });
            this.components.set(name, next);
            return next;
        });
    }

    public query(name: ComponentName): ComponentRecord {
        return this.require(name);
    }

    public find(name: ComponentName): ComponentRecord | undefined {
        return this.components.get(name);
    }

    /**
     * Names in installation order.
     */
    public list(): ComponentName[] {
        return [...this.discovery];
    }

    public records(): ComponentRecord[] {
        return this.discovery.map(name => this.require(name));
    }

    // --- Upgrader capability ---

    public async authorizeUpgrader(identity: PrincipalId, caller: PrincipalId): Promise<void> {
        enforce(OwnerGuard({ actor: caller, authority: this.authority, action: 'authorize upgraders' }));
        enforce(PresenceGuard({ identity }));

        await this.locks.runExclusive('upgraders', async () => {
            // Idempotent: a repeated grant succeeds without a second event.
            if (this.upgraderSet.has(identity)) return;

            await this.audit.append(this.event('UPGRADER_AUTHORIZED', identity, caller, this.clock.now(), {}));
            this.upgraderSet.grant(identity);
        });
    }

    public async revokeUpgrader(identity: PrincipalId, caller: PrincipalId): Promise<void> {
        enforce(OwnerGuard({ actor: caller, authority: this.authority, action: 'revoke upgraders' }));
        enforce(PresenceGuard({ identity }));

        await this.locks.runExclusive('upgraders', async () => {
            if (!this.upgraderSet.has(identity)) return;

            await this.audit.append(this.event('UPGRADER_REVOKED', identity, caller, this.clock.now(), {}));
            this.upgraderSet.revoke(identity);
        });
    }

    public isUpgrader(identity: PrincipalId): boolean {
        return this.upgraderSet.has(identity);
    }

    public upgraders(): PrincipalId[] {
        return this.upgraderSet.list();
    }

    /**
     * Replay: re-applies an already validated event without guards or audit.
     */
    public applyEvent(event: GovernanceEvent): void {
        const { kind, subject, timestamp, payload } = event;

        switch (kind) {
            case 'COMPONENT_INSTALLED':
                this.commitInstall(Object.freeze({
                    name: subject,
                    instanceHandle: String(payload.instanceHandle),
                    implementationRef: String(payload.implementationRef),
                    version: String(payload.version),
                    createdAt: timestamp,
                    lastUpgradedAt: null,
                    active: true
                }));
                return;
            case 'IMPLEMENTATION_SWAPPED':
                this.components.set(subject, Object.freeze({
                    ...this.require(subject),
                    implementationRef: String(payload.implementationRef),
                    version: String(payload.version),
                    lastUpgradedAt: timestamp
                }));
                return;
            case 'COMPONENT_DEACTIVATED':
                this.components.set(subject, Object.freeze({ ...this.require(subject), active: false }));
                return;
            case 'UPGRADER_AUTHORIZED':
                this.upgraderSet.grant(subject);
                return;
            case 'UPGRADER_REVOKED':
                this.upgraderSet.revoke(subject);
                return;
            default:
                throw new Error(`ComponentRegistry: Cannot apply ${kind}`);
        }
    }

    private commitInstall(record: ComponentRecord): void {
        this.components.set(record.name, record);
        this.discovery.push(record.name);
    }

    private require(name: ComponentName): ComponentRecord {
        const record = this.components.get(name);
        if (!record) {
            throw new KernelError(ErrorCode.NOT_FOUND, `Component ${name} not found`, { name });
        }
        return record;
    }

    private event(kind: GovernanceEvent['kind'], subject: string, actor: PrincipalId, timestamp: number, payload: GovernanceEvent['payload']): GovernanceEvent {
        return { kind, subject, actor, timestamp, payload };
    }
}
