// src/kernel-core/Config.ts
import { z } from 'zod';
import { DAY, HOUR, SECOND } from './L0/Clock.js';
import { ErrorCode, KernelError } from './Errors.js';

const principal = z.string().trim().min(1);
const durationMs = z.number().int().nonnegative();

export const ControlPlaneConfigSchema = z.object({
    owner: principal,
    governanceIdentity: principal.default('governance'),
    timelock: z.object({
        durationMs: durationMs.default(DAY),
        minimumMs: durationMs.default(HOUR),
        maximumMs: durationMs.default(30 * DAY)
    }).default({}),
    approvalQuorum: z.number().int().min(1).default(1),
    proposalTtlMs: z.number().int().positive().nullable().default(null),
    proposers: z.array(principal).default([]),
    approvers: z.array(principal).default([]),
    databasePath: z.string().min(1).default('registry.db'),
    port: z.number().int().min(0).max(65535).default(3000)
}).superRefine((config, ctx) => {
    const { durationMs, minimumMs, maximumMs } = config.timelock;
    if (minimumMs > durationMs) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['timelock', 'minimumMs'], message: `must not exceed duration ${durationMs}` });
    }
    if (durationMs > maximumMs) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['timelock', 'durationMs'], message: `must not exceed maximum ${maximumMs}` });
    }
    if (config.proposalTtlMs !== null && config.proposalTtlMs <= durationMs) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['proposalTtlMs'], message: `must exceed timelock duration ${durationMs}` });
    }
});

export type ControlPlaneConfigInput = z.input<typeof ControlPlaneConfigSchema>;
export type ControlPlaneConfig = z.output<typeof ControlPlaneConfigSchema>;

export function parseConfig(input: unknown): ControlPlaneConfig {
    const result = ControlPlaneConfigSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new KernelError(ErrorCode.CONFIG_INVALID, `Invalid configuration: ${issues.join('; ')}`, { issues });
    }
    return result.data;
}

// Env values are strings; numbers stay strings when malformed so the schema reports them.
const seconds = (value: string | undefined): number | string | undefined => {
    if (value === undefined || value.trim() === '') return undefined;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed * SECOND : value;
};

const integer = (value: string | undefined): number | string | undefined => {
    if (value === undefined || value.trim() === '') return undefined;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : value;
};

const list = (value: string | undefined): string[] | undefined => {
    if (value === undefined) return undefined;
    return value.split(',').map(entry => entry.trim()).filter(entry => entry.length > 0);
};

/**
 * Reads the control plane configuration from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ControlPlaneConfig {
    return parseConfig({
        owner: env.REGISTRY_OWNER,
        governanceIdentity: env.GOVERNANCE_IDENTITY || undefined,
        timelock: {
            durationMs: seconds(env.UPGRADE_TIMELOCK_SECONDS),
            minimumMs: seconds(env.UPGRADE_TIMELOCK_MIN_SECONDS),
            maximumMs: seconds(env.UPGRADE_TIMELOCK_MAX_SECONDS)
        },
        approvalQuorum: integer(env.UPGRADE_APPROVAL_QUORUM),
        proposalTtlMs: seconds(env.UPGRADE_PROPOSAL_TTL_SECONDS) ?? null,
        proposers: list(env.GOVERNANCE_PROPOSERS),
        approvers: list(env.GOVERNANCE_APPROVERS),
        databasePath: env.REGISTRY_DB_PATH || undefined,
        port: integer(env.PORT)
    });
}
