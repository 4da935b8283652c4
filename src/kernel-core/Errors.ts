/**
 * Control Plane Error Taxonomy
 * Every rejected operation surfaces one of these codes, never a generic failure.
 */

export enum ErrorCode {
    // I. Authority
    UNAUTHORIZED = 'UNAUTHORIZED',

    // II. Addressing
    NOT_FOUND = 'NOT_FOUND',
    ALREADY_EXISTS = 'ALREADY_EXISTS',

    // III. Input
    INVALID_ARGUMENT = 'INVALID_ARGUMENT',

    // IV. Lifecycle
    INVALID_STATE = 'INVALID_STATE',

    // V. Infrastructure
    INTEGRITY_BREACH = 'INTEGRITY_BREACH',
    CONFIG_INVALID = 'CONFIG_INVALID',
}

/**
 * Finer-grained reasons carried in `metadata.reason`.
 * Callers use them to tell "try again later" from "will never succeed".
 */
export type RejectionReason =
    | 'INACTIVE'
    | 'ALREADY_INACTIVE'
    | 'ALREADY_EXECUTED'
    | 'NOT_APPROVED'
    | 'TIMELOCK_PENDING'
    | 'EXPIRED'
    | 'OUT_OF_BOUNDS'
    | 'INITIALIZATION_FAILED'
    | 'UNKNOWN_OPERATION';

export interface ErrorMetadata {
    reason?: RejectionReason;
    retryAfterMs?: number;
    [key: string]: unknown;
}

export class KernelError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata: ErrorMetadata = {}
    ) {
        super(`[Registry:${code}] ${message}`);
        this.name = 'KernelError';
    }

    public get reason(): RejectionReason | undefined {
        return this.metadata.reason;
    }
}

export function isKernelError(e: unknown): e is KernelError {
    return e instanceof KernelError;
}

/**
 * Only an unelapsed timelock resolves itself with time.
 */
export function isRetryable(e: unknown): boolean {
    return isKernelError(e) && e.code === ErrorCode.INVALID_STATE && e.reason === 'TIMELOCK_PENDING';
}

export function describeError(e: unknown): string {
    if (e instanceof Error) return e.message;
    return String(e);
}
