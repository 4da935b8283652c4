// src/kernel-core/L4/UpgradeGovernance.ts
import type {
    ComponentName, DurationMs, GovernanceEvent, ImplementationRef, PrincipalId,
    ProposalId, Timestamp, UpgradeProposal, VersionLabel
} from '../L0/Ontology.js';
import type { Clock } from '../L0/Clock.js';
import { KeyedMutex } from '../L0/KeyedMutex.js';
import { BoundsGuard, enforce, ExpiryGuard, OwnerGuard, PresenceGuard, RoleGuard, TimelockGuard } from '../L0/Guards.js';
import { Authority, RoleSet } from '../L1/Identity.js';
import { ComponentRegistry } from '../L2/ComponentRegistry.js';
import { AuditLog } from '../L5/Audit.js';
import { describeError, ErrorCode, KernelError } from '../Errors.js';

export interface TimelockPolicy {
    durationMs: DurationMs;
    minimumMs: DurationMs;
    maximumMs: DurationMs;
}

export interface GovernanceOptions {
    /** Principal this service presents to the registry when executing. */
    identity: PrincipalId;
    timelock: TimelockPolicy;
    /** Distinct approvers needed before a proposal counts as approved. */
    approvalQuorum?: number;
    /** Unset means proposals never expire. */
    proposalTtlMs?: DurationMs | null;
    proposers?: RoleSet;
    approvers?: RoleSet;
}

/**
 * Upgrade Governance
 * propose → approve → timelock → execute. Execution is the only path by which
 * governance touches the registry, and it does so as its own identity.
 */
export class UpgradeGovernance {
    private proposals: Map<ProposalId, UpgradeProposal> = new Map();
    private nextId: ProposalId = 1;
    private locks = new KeyedMutex();
    private authority: Authority;
    private timelock: DurationMs;
    private proposerSet: RoleSet;
    private approverSet: RoleSet;

    public readonly identity: PrincipalId;
    public readonly approvalQuorum: number;
    public readonly proposalTtlMs: DurationMs | null;
    private readonly bounds: { minimumMs: DurationMs, maximumMs: DurationMs };

    constructor(
        owner: PrincipalId,
        private readonly registry: ComponentRegistry,
        private clock: Clock,
        private audit: AuditLog,
        options: GovernanceOptions
    ) {
        const { timelock, approvalQuorum = 1, proposalTtlMs = null } = options;

        enforce(PresenceGuard({ identity: options.identity }));
        if (timelock.minimumMs > timelock.maximumMs) {
            throw new KernelError(ErrorCode.INVALID_ARGUMENT, `Timelock minimum ${timelock.minimumMs} exceeds maximum ${timelock.maximumMs}`);
        }
        enforce(BoundsGuard({ value: timelock.durationMs, minimum: timelock.minimumMs, maximum: timelock.maximumMs, label: 'Timelock duration' }));
        if (!Number.isInteger(approvalQuorum) || approvalQuorum < 1) {
            throw new KernelError(ErrorCode.INVALID_ARGUMENT, `Approval quorum must be a positive integer, got ${approvalQuorum}`);
        }
        if (proposalTtlMs !== null && (!Number.isInteger(proposalTtlMs) || proposalTtlMs <= 0)) {
            throw new KernelError(ErrorCode.INVALID_ARGUMENT, `Proposal lifetime must be a positive integer, got ${proposalTtlMs}`);
        }
        // A proposal must outlive its timelock or it can never execute.
        if (proposalTtlMs !== null && proposalTtlMs <= timelock.durationMs) {
            throw new KernelError(
                ErrorCode.INVALID_ARGUMENT,
                `Proposal lifetime ${proposalTtlMs} must exceed the timelock duration ${timelock.durationMs}`,
                { reason: 'OUT_OF_BOUNDS' }
            );
        }

        this.authority = new Authority(owner);
        this.identity = options.identity;
        this.timelock = timelock.durationMs;
        this.bounds = { minimumMs: timelock.minimumMs, maximumMs: timelock.maximumMs };
        this.approvalQuorum = approvalQuorum;
        this.proposalTtlMs = proposalTtlMs;
        this.proposerSet = options.proposers ?? new RoleSet('PROPOSER');
        this.approverSet = options.approvers ?? new RoleSet('APPROVER');
    }

    public get owner(): PrincipalId {
        return this.authority.owner;
    }

    public get timelockDuration(): DurationMs {
        return this.timelock;
    }

    /**
     * Target existence is checked at execution, so upgrades can be prepared
     * before the component is installed.
     */
    public async propose(
        targetComponent: ComponentName,
        newImplementationRef: ImplementationRef,
        newVersion: VersionLabel,
        description: string,
        caller: PrincipalId
    ): Promise<ProposalId> {
        enforce(RoleGuard({ actor: caller, roles: this.proposerSet }));
        enforce(PresenceGuard({ targetComponent, newImplementationRef, newVersion }));

        return this.locks.runExclusive('proposals:sequence', async () => {
            const id = this.nextId;
            const proposedAt = this.clock.now();
            const proposal: UpgradeProposal = Object.freeze({
                id,
                targetComponent,
                newImplementationRef,
                newVersion,
                description,
                proposer: caller,
                proposedAt,
                earliestExecution: proposedAt + this.timelock,
                expiresAt: this.proposalTtlMs === null ? null : proposedAt + this.proposalTtlMs,
                approvals: Object.freeze([]),
                approved: false,
                executed: false,
                executedAt: null
            });

            await this.audit.append(this.event('PROPOSAL_CREATED', id, caller, proposedAt, {
                targetComponent,
                newImplementationRef,
                newVersion,
                description,
                earliestExecution: proposal.earliestExecution,
                expiresAt: proposal.expiresAt
            }));

            this.proposals.set(id, proposal);
            this.nextId = id + 1;
            return id;
        });
    }

    public async approve(id: ProposalId, caller: PrincipalId): Promise<UpgradeProposal> {
        enforce(RoleGuard({ actor: caller, roles: this.approverSet }));

        return this.locks.runExclusive(`proposal:${id}`, async () => {
            const current = this.require(id);
            const now = this.clock.now();

            if (current.executed) {
                throw new KernelError(ErrorCode.INVALID_STATE, `Proposal ${id} already executed`, { reason: 'ALREADY_EXECUTED', proposalId: id });
            }
            enforce(ExpiryGuard({ expiresAt: current.expiresAt, now }));

            // Re-approval by the same approver changes nothing.
            if (current.approvals.includes(caller)) return current;

            const approvals = Object.freeze([...current.approvals, caller]);
            const approved = approvals.length >= this.approvalQuorum;

            await this.audit.append(this.event('PROPOSAL_APPROVED', id, caller, now, {
                approvals: approvals.length,
                approved
            }));

            const next: UpgradeProposal = Object.freeze({ ...current, approvals, approved });
            this.proposals.set(id, next);
            return next;
        });
    }

    /**
     * The proposal lock is held across the registry call, so concurrent
     * executions of one proposal produce exactly one swap.
     */
    public async execute(id: ProposalId, caller: PrincipalId): Promise<UpgradeProposal> {
        enforce(RoleGuard({ actor: caller, roles: this.approverSet }));

        return this.locks.runExclusive(`proposal:${id}`, async () => {
            const pending = this.require(id);
            const now = this.clock.now();

            if (pending.executed) {
                throw new KernelError(ErrorCode.INVALID_STATE, `Proposal ${id} already executed`, { reason: 'ALREADY_EXECUTED', proposalId: id });
            }
            if (!pending.approved) {
                throw new KernelError(ErrorCode.INVALID_STATE, `Proposal ${id} is not approved`, { reason: 'NOT_APPROVED', proposalId: id });
            }
            enforce(ExpiryGuard({ expiresAt: pending.expiresAt, now }));
            enforce(TimelockGuard({ earliestExecution: pending.earliestExecution, now }));

            // Mark first; roll back if the registry refuses.
            const executed: UpgradeProposal = Object.freeze({ ...pending, executed: true, executedAt: now });
            this.proposals.set(id, executed);

            try {
                await this.registry.swapImplementation(
                    pending.targetComponent,
                    pending.newImplementationRef,
                    pending.newVersion,
                    this.identity,
                    { proposalId: id }
                );
            } catch (e: unknown) {
                this.proposals.set(id, pending);
                await this.recordAbort(pending, caller, now, e);
                throw e;
            }

            try {
                await this.audit.append(this.event('PROPOSAL_EXECUTED', id, caller, now, {
                    targetComponent: pending.targetComponent,
                    newImplementationRef: pending.newImplementationRef,
                    newVersion: pending.newVersion
                }));
            } catch (e: unknown) {
                // The swap is applied and its event carries the proposal id, which replay treats as execution.
                console.warn(`[UpgradeGovernance] Proposal ${id} executed but its execution record was not stored: ${describeError(e)}`);
            }

            return executed;
        });
    }

    public async setTimelockDuration(duration: DurationMs, caller: PrincipalId): Promise<void> {
        enforce(OwnerGuard({ actor: caller, authority: this.authority, action: 'set the timelock' }));
        enforce(BoundsGuard({ value: duration, minimum: this.bounds.minimumMs, maximum: this.maximumTimelock(), label: 'Timelock duration' }));

        await this.locks.runExclusive('config:timelock', async () => {
            await this.audit.append(this.event('TIMELOCK_UPDATED', 'timelock', caller, this.clock.now(), {
                durationMs: duration,
                previousDurationMs: this.timelock
            }));
            this.timelock = duration;
        });
    }

    // --- Role management ---

    public async addProposer(identity: PrincipalId, caller: PrincipalId): Promise<void> {
        await this.changeRole(this.proposerSet, 'PROPOSER_ADDED', identity, caller);
    }

    public async removeProposer(identity: PrincipalId, caller: PrincipalId): Promise<void> {
        await this.changeRole(this.proposerSet, 'PROPOSER_REMOVED', identity, caller);
    }

    public async addApprover(identity: PrincipalId, caller: PrincipalId): Promise<void> {
        await this.changeRole(this.approverSet, 'APPROVER_ADDED', identity, caller);
    }

    public async removeApprover(identity: PrincipalId, caller: PrincipalId): Promise<void> {
        await this.changeRole(this.approverSet, 'APPROVER_REMOVED', identity, caller);
    }

    public isProposer(identity: PrincipalId): boolean {
        return this.proposerSet.has(identity);
    }

    public isApprover(identity: PrincipalId): boolean {
        return this.approverSet.has(identity);
    }

    public proposers(): PrincipalId[] {
        return this.proposerSet.list();
    }

    public approvers(): PrincipalId[] {
        return this.approverSet.list();
    }

    // --- Reads ---

    public getProposal(id: ProposalId): UpgradeProposal {
        return this.require(id);
    }

    public listProposals(): UpgradeProposal[] {
        return [...this.proposals.values()].sort((a, b) => a.id - b.id);
    }

    /**
     * Replay: re-applies an already validated event without guards or audit.
     */
    public applyEvent(event: GovernanceEvent): void {
        const { kind, subject, actor, timestamp, payload } = event;

        switch (kind) {
            case 'PROPOSAL_CREATED': {
                const id = Number(subject);
                this.proposals.set(id, Object.freeze({
                    id,
                    targetComponent: String(payload.targetComponent),
                    newImplementationRef: String(payload.newImplementationRef),
                    newVersion: String(payload.newVersion),
                    description: String(payload.description),
                    proposer: actor,
                    proposedAt: timestamp,
                    earliestExecution: Number(payload.earliestExecution),
                    expiresAt: payload.expiresAt === null ? null : Number(payload.expiresAt),
                    approvals: Object.freeze([]),
                    approved: false,
                    executed: false,
                    executedAt: null
                }));
                this.nextId = Math.max(this.nextId, id + 1);
                return;
            }
            case 'PROPOSAL_APPROVED': {
                const current = this.require(Number(subject));
                this.proposals.set(current.id, Object.freeze({
                    ...current,
                    approvals: Object.freeze([...current.approvals, actor]),
                    approved: payload.approved === true
                }));
                return;
            }
            case 'PROPOSAL_EXECUTED':
                this.markExecuted(Number(subject), timestamp);
                return;
            case 'TIMELOCK_UPDATED':
                this.timelock = Number(payload.durationMs);
                return;
            case 'PROPOSER_ADDED':
                this.proposerSet.grant(subject);
                return;
            case 'PROPOSER_REMOVED':
                this.proposerSet.revoke(subject);
                return;
            case 'APPROVER_ADDED':
                this.approverSet.grant(subject);
                return;
            case 'APPROVER_REMOVED':
                this.approverSet.revoke(subject);
                return;
            default:
                throw new Error(`UpgradeGovernance: Cannot apply ${kind}`);
        }
    }

    /**
     * Replay: a swap that carries a proposal id is proof of execution even if
     * the PROPOSAL_EXECUTED record never made it to the store.
     */
    public markExecuted(id: ProposalId, at: Timestamp): void {
        const current = this.require(id);
        if (current.executed) return;
        this.proposals.set(id, Object.freeze({ ...current, executed: true, executedAt: at }));
    }

    private async changeRole(
        roles: RoleSet,
        kind: 'PROPOSER_ADDED' | 'PROPOSER_REMOVED' | 'APPROVER_ADDED' | 'APPROVER_REMOVED',
        identity: PrincipalId,
        caller: PrincipalId
    ): Promise<void> {
        enforce(OwnerGuard({ actor: caller, authority: this.authority, action: `manage ${roles.role} role` }));
        enforce(PresenceGuard({ identity }));

        const adding = kind.endsWith('_ADDED');
        await this.locks.runExclusive(`roles:${roles.role}`, async () => {
            if (roles.has(identity) === adding) return;

            await this.audit.append(this.event(kind, identity, caller, this.clock.now(), {}));
            if (adding) roles.grant(identity);
            else roles.revoke(identity);
        });
    }

    private async recordAbort(proposal: UpgradeProposal, caller: PrincipalId, at: Timestamp, cause: unknown): Promise<void> {
        const reason = describeError(cause);
        console.warn(`[UpgradeGovernance] Execution of proposal ${proposal.id} rolled back: ${reason}`);
        try {
            await this.audit.append(this.event('PROPOSAL_EXECUTED', proposal.id, caller, at, {
                targetComponent: proposal.targetComponent,
                newImplementationRef: proposal.newImplementationRef,
                newVersion: proposal.newVersion
            }), 'ABORTED', reason);
        } catch (auditError: unknown) {
            // The caller still receives the original failure.
            console.error(`[UpgradeGovernance] Could not record aborted execution of proposal ${proposal.id}:`, auditError);
        }
    }

    /**
     * With expiry on, the timelock stays strictly below the proposal lifetime.
     */
    private maximumTimelock(): DurationMs {
        if (this.proposalTtlMs === null) return this.bounds.maximumMs;
        return Math.min(this.bounds.maximumMs, this.proposalTtlMs - 1);
    }

    private require(id: ProposalId): UpgradeProposal {
        const proposal = this.proposals.get(id);
        if (!proposal) {
            throw new KernelError(ErrorCode.NOT_FOUND, `Proposal ${id} not found`, { proposalId: id });
        }
        return proposal;
    }

    private event(kind: GovernanceEvent['kind'], subject: string | number, actor: PrincipalId, timestamp: Timestamp, payload: GovernanceEvent['payload']): GovernanceEvent {
        return { kind, subject: String(subject), actor, timestamp, payload };
    }
}
