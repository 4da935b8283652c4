// src/kernel-core/L0/Guards.ts
import type { Authority, RoleSet } from '../L1/Identity.js';
import type { DurationMs, PrincipalId, Timestamp } from './Ontology.js';
import { ErrorCode, KernelError, type ErrorMetadata } from '../Errors.js';

// --- Guard Pattern ---
export interface GuardResult {
    ok: boolean;
    code?: ErrorCode;
    violation?: string;
    details?: ErrorMetadata;
}

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, msg: string, details?: ErrorMetadata): GuardResult => ({ ok: false, code, violation: msg, ...(details ? { details } : {}) });

/**
 * Throws the guard's rejection as a KernelError.
 */
export function enforce(result: GuardResult): void {
    if (result.ok) return;
    throw new KernelError(
        result.code ?? ErrorCode.INVALID_STATE,
        result.violation ?? 'Guard rejected operation',
        result.details
    );
}

// --- Concrete Guards ---

// 1. Role (caller ∈ roles, or the owning authority when one is given)
export const RoleGuard: Guard<{
    actor: PrincipalId,
    roles: RoleSet,
    authority?: Authority
}> = ({ actor, roles, authority }) => {
    const permitted = authority ? authority.permits(actor, roles) : roles.has(actor);
    if (!permitted) {
        return FAIL(ErrorCode.UNAUTHORIZED, `Authority Violation: ${actor} does not hold role ${roles.role}`, { actor, role: roles.role });
    }
    return OK;
};

// 2. Owner-only administration
export const OwnerGuard: Guard<{ actor: PrincipalId, authority: Authority, action: string }> = ({ actor, authority, action }) => {
    if (!authority.isOwner(actor)) {
        return FAIL(ErrorCode.UNAUTHORIZED, `Authority Violation: only the owning authority may ${action}`, { actor });
    }
    return OK;
};

// 3. Required fields (non-empty strings)
export const PresenceGuard: Guard<Record<string, string>> = (fields) => {
    const missing = Object.entries(fields)
        .filter(([, value]) => value.trim().length === 0)
        .map(([key]) => key);

    if (missing.length > 0) {
        return FAIL(ErrorCode.INVALID_ARGUMENT, `Missing required field(s): ${missing.join(', ')}`, { fields: missing.join(',') });
    }
    return OK;
};

// 4. Timelock (deliberation latency)
export const TimelockGuard: Guard<{ earliestExecution: Timestamp, now: Timestamp }> = ({ earliestExecution, now }) => {
    if (now < earliestExecution) {
        const remaining = earliestExecution - now;
        return FAIL(
            ErrorCode.INVALID_STATE,
            `Timelock not elapsed: ${remaining}ms remaining`,
            { reason: 'TIMELOCK_PENDING', retryAfterMs: remaining }
        );
    }
    return OK;
};

// 5. Expiry (opt-in proposal lifetime)
export const ExpiryGuard: Guard<{ expiresAt: Timestamp | null, now: Timestamp }> = ({ expiresAt, now }) => {
    if (expiresAt !== null && now >= expiresAt) {
        return FAIL(ErrorCode.INVALID_STATE, `Proposal expired at ${expiresAt}`, { reason: 'EXPIRED' });
    }
    return OK;
};

// 6. Bounds (configured duration window)
export const BoundsGuard: Guard<{ value: DurationMs, minimum: DurationMs, maximum: DurationMs, label: string }> = ({ value, minimum, maximum, label }) => {
    if (!Number.isInteger(value) || value < minimum || value > maximum) {
        return FAIL(
            ErrorCode.INVALID_ARGUMENT,
            `${label} ${value} outside [${minimum}, ${maximum}]`,
            { reason: 'OUT_OF_BOUNDS', minimum, maximum }
        );
    }
    return OK;
};
