// src/kernel-core/L5/Audit.ts
import { hash, canonicalize } from '../L0/Crypto.js';
import type { GovernanceEvent } from '../L0/Ontology.js';
import { KeyedMutex } from '../L0/KeyedMutex.js';

export type EvidenceStatus = 'SUCCESS' | 'ABORTED';

/**
 * Event Store Port
 * Append-only persistence for the audit chain.
 */
export interface IEventStore {
    append(evidence: Evidence): Promise<void>;
    getHistory(): Promise<Evidence[]>;
    getLatest(): Promise<Evidence | null>;
}

// --- Evidence (the institutional truth substrate) ---
export interface Evidence {
    evidenceId: string; // The identifying hash
    previousEvidenceId: string; // Chain linkage
    sequence: number;
    event: GovernanceEvent;
    status: EvidenceStatus;
    reason?: string;
}

export type AuditListener = (evidence: Evidence) => void;

export const GENESIS_HASH = '0000000000000000000000000000000000000000000000000000000000000000';

export class AuditLog {
    private localChain: Evidence[] = [];
    private listeners: Set<AuditListener> = new Set();
    private writer = new KeyedMutex();

    constructor(private store?: IEventStore) { }

    public async append(
        event: GovernanceEvent,
        status: EvidenceStatus = 'SUCCESS',
        reason?: string
    ): Promise<Evidence> {
        // Appends from independent entities still share one chain tip.
        return this.writer.runExclusive('chain', () => this.link(event, status, reason));
    }

    private async link(event: GovernanceEvent, status: EvidenceStatus, reason?: string): Promise<Evidence> {
        const latest = await this.getTip();

        const previousHash = latest ? latest.evidenceId : GENESIS_HASH;
        const sequence = latest ? latest.sequence + 1 : 0;

        const evidence: Evidence = {
            evidenceId: AuditLog.calculateHash(previousHash, sequence, event, status, reason),
            previousEvidenceId: previousHash,
            sequence,
            event,
            status,
            ...(reason ? { reason } : {})
        };

        // Immutability Law
        Object.freeze(evidence.event.payload);
        Object.freeze(evidence.event);
        Object.freeze(evidence);

        if (this.store) {
            await this.store.append(evidence);
        }

        this.localChain.push(evidence);
        this.notify(evidence);
        return evidence;
    }

    /**
     * Observability hook for external audit tooling. Returns an unsubscribe function.
     */
    public subscribe(listener: AuditListener): () => void {
        this.listeners.add(listener);
        return () => { this.listeners.delete(listener); };
    }

    public async getHistory(): Promise<Evidence[]> {
        if (this.store) {
            return await this.store.getHistory();
        }
        return [...this.localChain];
    }

    // Historical Legitimacy
    public async verifyChain(): Promise<boolean> {
        return AuditLog.verify(await this.getHistory());
    }

    public static verify(history: readonly Evidence[]): boolean {
        let prev = GENESIS_HASH;

        for (const [index, entry] of history.entries()) {
            // 1. Linkage Check
            if (entry.previousEvidenceId !== prev || entry.sequence !== index) return false;

            // 2. Hash Check
            const h = AuditLog.calculateHash(prev, entry.sequence, entry.event, entry.status, entry.reason);
            if (h !== entry.evidenceId) return false;

            prev = entry.evidenceId;
        }
        return true;
    }

    public async getTip(): Promise<Evidence | null> {
        const local = this.localChain[this.localChain.length - 1];
        if (local) return local;
        if (this.store) return await this.store.getLatest();
        return null;
    }

    private notify(evidence: Evidence): void {
        for (const listener of this.listeners) {
            try {
                listener(evidence);
            } catch (e: unknown) {
                console.warn(`[AuditLog] Listener failed on ${evidence.event.kind}:`, e);
            }
        }
    }

    private static calculateHash(prevHash: string, sequence: number, event: GovernanceEvent, status: EvidenceStatus, reason?: string): string {
        // Canonical Evidence Tuple
        // [PreviousHash, Sequence, EventHash, Status, ReasonHash]
        const canonical: [string, number, string, string, string] = [
            prevHash,
            sequence,
            hash(canonicalize(event)),
            status,
            hash(reason ?? '')
        ];

        return hash(canonicalize(canonical));
    }
}
