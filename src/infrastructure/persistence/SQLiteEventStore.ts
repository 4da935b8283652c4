import Database from 'better-sqlite3';
import { z } from 'zod';
import type { IEventStore, Evidence } from '../../kernel-core/L5/Audit.js';
import { ErrorCode, KernelError } from '../../kernel-core/Errors.js';

const EVENT_KINDS = [
    'COMPONENT_INSTALLED',
    'IMPLEMENTATION_SWAPPED',
    'COMPONENT_DEACTIVATED',
    'UPGRADER_AUTHORIZED',
    'UPGRADER_REVOKED',
    'PROPOSAL_CREATED',
    'PROPOSAL_APPROVED',
    'PROPOSAL_EXECUTED',
    'TIMELOCK_UPDATED',
    'PROPOSER_ADDED',
    'PROPOSER_REMOVED',
    'APPROVER_ADDED',
    'APPROVER_REMOVED'
] as const;

const PayloadSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

const RowSchema = z.object({
    sequence: z.number().int(),
    evidenceId: z.string(),
    previousEvidenceId: z.string(),
    kind: z.enum(EVENT_KINDS),
    subject: z.string(),
    actor: z.string(),
    timestamp: z.number(),
    payload: z.string(),
    status: z.enum(['SUCCESS', 'ABORTED']),
    reason: z.string().nullable()
});

type AuditRow = z.infer<typeof RowSchema>;

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'registry.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS audit_log (
                sequence INTEGER PRIMARY KEY,
                evidenceId TEXT UNIQUE NOT NULL,
                previousEvidenceId TEXT NOT NULL,
                kind TEXT NOT NULL,
                subject TEXT NOT NULL,
                actor TEXT NOT NULL,
                timestamp INTEGER NOT NULL,
                payload TEXT NOT NULL,
                status TEXT NOT NULL,
                reason TEXT
            )
        `);
    }

    async append(evidence: Evidence): Promise<void> {
        const stmt = this.db.prepare(`
            INSERT INTO audit_log (
                sequence, evidenceId, previousEvidenceId, kind, subject, actor, timestamp, payload, status, reason
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?, ?, ?
            )
        `);

        const { event } = evidence;
        stmt.run(
            evidence.sequence,
            evidence.evidenceId,
            evidence.previousEvidenceId,
            event.kind,
            event.subject,
            event.actor,
            event.timestamp,
            JSON.stringify(event.payload),
            evidence.status,
            evidence.reason ?? null
        );
    }

    async getHistory(): Promise<Evidence[]> {
        const rows = this.db.prepare('SELECT * FROM audit_log ORDER BY sequence ASC').all();
        return rows.map(row => this.mapRowToEvidence(row));
    }

    async getLatest(): Promise<Evidence | null> {
        const row = this.db.prepare('SELECT * FROM audit_log ORDER BY sequence DESC LIMIT 1').get();

        if (row === undefined) return null;
        return this.mapRowToEvidence(row);
    }

    private mapRowToEvidence(raw: unknown): Evidence {
        const parsed = RowSchema.safeParse(raw);
        if (!parsed.success) {
            throw new KernelError(ErrorCode.INTEGRITY_BREACH, `Malformed audit row: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
        }
        const row: AuditRow = parsed.data;

        return {
            evidenceId: row.evidenceId,
            previousEvidenceId: row.previousEvidenceId,
            sequence: row.sequence,
            event: {
                kind: row.kind,
                subject: row.subject,
                actor: row.actor,
                timestamp: row.timestamp,
                payload: PayloadSchema.parse(JSON.parse(row.payload))
            },
            status: row.status,
            ...(row.reason !== null ? { reason: row.reason } : {})
        };
    }

    public close() {
        this.db.close();
    }
}
