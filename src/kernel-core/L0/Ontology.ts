/**
 * CONTROL PLANE ONTOLOGY
 * The primitives shared by the registry, governance and host layers.
 */

// --- 1. Principal ---
// A pre-authenticated caller identity handed to every operation.
export type PrincipalId = string;

// --- 2. Component ---
export type ComponentName = string;
export type InstanceHandle = string;
export type ImplementationRef = string;
export type VersionLabel = string;

/**
 * Milliseconds on the injected clock.
 */
export type Timestamp = number;
export type DurationMs = number;

export interface ComponentRecord {
    readonly name: ComponentName;
    readonly instanceHandle: InstanceHandle;
    readonly implementationRef: ImplementationRef;
    readonly version: VersionLabel;
    readonly createdAt: Timestamp;
    readonly lastUpgradedAt: Timestamp | null;
    readonly active: boolean;
}

// --- 3. Proposal ---
export type ProposalId = number;
export type ProposalStatus = 'PROPOSED' | 'APPROVED' | 'EXECUTED';

export interface UpgradeProposal {
    readonly id: ProposalId;
    readonly targetComponent: ComponentName;
    readonly newImplementationRef: ImplementationRef;
    readonly newVersion: VersionLabel;
    readonly description: string;
    readonly proposer: PrincipalId;
    readonly proposedAt: Timestamp;
    readonly earliestExecution: Timestamp;
    readonly expiresAt: Timestamp | null;
    readonly approvals: readonly PrincipalId[];
    readonly approved: boolean;
    readonly executed: boolean;
    readonly executedAt: Timestamp | null;
}

export function proposalStatus(p: UpgradeProposal): ProposalStatus {
    if (p.executed) return 'EXECUTED';
    if (p.approved) return 'APPROVED';
    return 'PROPOSED';
}

// --- 4. Events ---
export type EventKind =
    | 'COMPONENT_INSTALLED'
    | 'IMPLEMENTATION_SWAPPED'
    | 'COMPONENT_DEACTIVATED'
    | 'UPGRADER_AUTHORIZED'
    | 'UPGRADER_REVOKED'
    | 'PROPOSAL_CREATED'
    | 'PROPOSAL_APPROVED'
    | 'PROPOSAL_EXECUTED'
    | 'TIMELOCK_UPDATED'
    | 'PROPOSER_ADDED'
    | 'PROPOSER_REMOVED'
    | 'APPROVER_ADDED'
    | 'APPROVER_REMOVED';

export type EventPayload = Record<string, string | number | boolean | null>;

/**
 * Emitted for every successful mutation.
 * `subject` is the component name or the proposal id.
 */
export interface GovernanceEvent {
    kind: EventKind;
    subject: string;
    actor: PrincipalId;
    timestamp: Timestamp;
    payload: EventPayload;
}
