import type { ComponentName, ImplementationRef, InstanceHandle, PrincipalId, VersionLabel } from './L0/Ontology.js';
import { proposalStatus } from './L0/Ontology.js';
import { type Clock, SystemClock } from './L0/Clock.js';
import { ReplayEngine, type ReplayReport } from './L0/Replay.js';
import { ComponentRegistry } from './L2/ComponentRegistry.js';
import { ComponentHost, ImplementationCatalog, type InitArgs } from './L2/ComponentHost.js';
import { UpgradeGovernance } from './L4/UpgradeGovernance.js';
import { AuditLog, type IEventStore } from './L5/Audit.js';
import type { ControlPlaneConfig } from './Config.js';
import { describeError } from './Errors.js';

export const INITIAL_VERSION: VersionLabel = '1.0.0';

/**
 * One module of a deployment plan. `args` sees the handles of every module
 * deployed before it plus the fixed plan context (treasuries and the like).
 */
export interface ModuleSpec {
    label: ComponentName;
    implementationRef: ImplementationRef;
    version?: VersionLabel;
    args?: (handles: Readonly<Record<string, InstanceHandle>>, context: Readonly<Record<string, string>>) => InitArgs;
}

export interface DeployedModule {
    label: ComponentName;
    instanceHandle: InstanceHandle;
    implementationRef: ImplementationRef;
    version: VersionLabel;
}

export interface DeploymentManifest {
    modules: DeployedModule[];
    handles: Record<string, InstanceHandle>;
}

export interface ControlPlaneDeps {
    clock?: Clock;
    store?: IEventStore;
    catalog?: ImplementationCatalog;
}

export interface ControlPlaneStatus {
    owner: PrincipalId;
    governanceIdentity: PrincipalId;
    timelockMs: number;
    components: number;
    activeComponents: number;
    proposals: number;
    pendingProposals: number;
    auditEntries: number;
    chainValid: boolean;
}

/**
 * Control Plane
 * Wires the audit log, registry, governance and host into one unit and owns
 * their boot sequence.
 */
export class ControlPlane {
    private constructor(
        public readonly config: ControlPlaneConfig,
        private readonly audit: AuditLog,
        private readonly registry: ComponentRegistry,
        private readonly governance: UpgradeGovernance,
        private readonly host: ComponentHost
    ) { }

    public static create(config: ControlPlaneConfig, deps: ControlPlaneDeps = {}): ControlPlane {
        const clock = deps.clock ?? new SystemClock();
        const audit = new AuditLog(deps.store);
        const registry = new ComponentRegistry(config.owner, clock, audit);
        const governance = new UpgradeGovernance(config.owner, registry, clock, audit, {
            identity: config.governanceIdentity,
            timelock: config.timelock,
            approvalQuorum: config.approvalQuorum,
            proposalTtlMs: config.proposalTtlMs
        });
        const host = new ComponentHost(registry, deps.catalog ?? new ImplementationCatalog());

        return new ControlPlane(config, audit, registry, governance, host);
    }

    /**
     * Rebuilds state from the store's history. The chain continues from the
     * persisted tip afterwards.
     */
    public static async restore(config: ControlPlaneConfig, deps: ControlPlaneDeps = {}): Promise<{ plane: ControlPlane, report: ReplayReport }> {
        const plane = ControlPlane.create(config, deps);
        const report = await new ReplayEngine().replay(plane.audit, plane.registry, plane.governance);
        return { plane, report };
    }

    public get Registry(): ComponentRegistry { return this.registry; }
    public get Governance(): UpgradeGovernance { return this.governance; }
    public get Host(): ComponentHost { return this.host; }
    public get Audit(): AuditLog { return this.audit; }

    /**
     * Grants governance the upgrader capability and seeds its roles, once,
     * against an empty audit log. Once history exists the owner's later
     * grants and revocations stand; configured roles are not re-applied.
     * Returns whether anything was seeded.
     */
    public async bootstrap(): Promise<boolean> {
        const { owner, governanceIdentity, proposers, approvers } = this.config;

        if (await this.audit.getTip() !== null) {
            console.log('[ControlPlane] History present; keeping persisted roles.');
            return false;
        }

        await this.registry.authorizeUpgrader(governanceIdentity, owner);
        for (const proposer of proposers) {
            await this.governance.addProposer(proposer, owner);
        }
        for (const approver of approvers) {
            await this.governance.addApprover(approver, owner);
        }

        console.log(`[ControlPlane] Bootstrapped. governance=${governanceIdentity} proposers=${proposers.length} approvers=${approvers.length}`);
        return true;
    }

    /**
     * Deploys a plan in order. Stops at the first failure; modules deployed
     * before it stay installed.
     */
    public async deploy(
        plan: readonly ModuleSpec[],
        context: Readonly<Record<string, string>> = {},
        caller: PrincipalId = this.config.owner
    ): Promise<DeploymentManifest> {
        const manifest: DeploymentManifest = { modules: [], handles: {} };

        for (const entry of plan) {
            const version = entry.version ?? INITIAL_VERSION;
            const args = entry.args ? entry.args({ ...manifest.handles }, context) : [];

            try {
                const record = await this.host.deploy(entry.label, entry.implementationRef, version, args, caller);
                manifest.handles[entry.label] = record.instanceHandle;
                manifest.modules.push({
                    label: entry.label,
                    instanceHandle: record.instanceHandle,
                    implementationRef: record.implementationRef,
                    version: record.version
                });
                console.log(`[ControlPlane] Deployed ${entry.label} -> ${record.instanceHandle} (${entry.implementationRef}@${version})`);
            } catch (e: unknown) {
                console.error(`[ControlPlane] Deployment halted at ${entry.label}: ${describeError(e)}`);
                throw e;
            }
        }

        return manifest;
    }

    public async status(): Promise<ControlPlaneStatus> {
        const records = this.registry.records();
        const proposals = this.governance.listProposals();
        const history = await this.audit.getHistory();

        return {
            owner: this.config.owner,
            governanceIdentity: this.governance.identity,
            timelockMs: this.governance.timelockDuration,
            components: records.length,
            activeComponents: records.filter(record => record.active).length,
            proposals: proposals.length,
            pendingProposals: proposals.filter(p => proposalStatus(p) !== 'EXECUTED').length,
            auditEntries: history.length,
            chainValid: AuditLog.verify(history)
        };
    }
}
