import type { Evidence } from '../L5/Audit.js';
import { AuditLog } from '../L5/Audit.js';
import type { ComponentRegistry } from '../L2/ComponentRegistry.js';
import type { UpgradeGovernance } from '../L4/UpgradeGovernance.js';
import { describeError, ErrorCode, KernelError } from '../Errors.js';

export interface ReplayReport {
    applied: number;
    skipped: number;
    tip: string | null;
}

const REGISTRY_EVENTS = new Set<string>([
    'COMPONENT_INSTALLED',
    'IMPLEMENTATION_SWAPPED',
    'COMPONENT_DEACTIVATED',
    'UPGRADER_AUTHORIZED',
    'UPGRADER_REVOKED'
]);

export class ReplayEngine {
    /**
     * Replays the audit history onto a fresh registry and governance pair.
     * Entries were validated when first written, so guards are bypassed.
     */
    public async replay(log: AuditLog, registry: ComponentRegistry, governance: UpgradeGovernance): Promise<ReplayReport> {
        const history = await log.getHistory();

        console.log(`[ReplayEngine] Starting replay of ${history.length} events...`);

        if (!AuditLog.verify(history)) {
            throw new KernelError(ErrorCode.INTEGRITY_BREACH, 'Audit chain failed verification; refusing to replay');
        }

        let applied = 0;
        let skipped = 0;

        for (const entry of history) {
            // Aborted entries are evidence only
            if (entry.status !== 'SUCCESS') {
                skipped++;
                continue;
            }

            try {
                this.apply(entry, registry, governance);
            } catch (e: unknown) {
                throw new KernelError(
                    ErrorCode.INTEGRITY_BREACH,
                    `Replay Failure at #${entry.sequence} (${entry.event.kind}): ${describeError(e)}`,
                    { sequence: entry.sequence }
                );
            }
            applied++;
        }

        const tip = history[history.length - 1]?.evidenceId ?? null;
        console.log(`[ReplayEngine] Replay complete. applied=${applied} skipped=${skipped}`);
        return { applied, skipped, tip };
    }

    private apply(entry: Evidence, registry: ComponentRegistry, governance: UpgradeGovernance): void {
        const { event } = entry;

        if (!REGISTRY_EVENTS.has(event.kind)) {
            governance.applyEvent(event);
            return;
        }

        registry.applyEvent(event);

        const { proposalId } = event.payload;
        if (event.kind === 'IMPLEMENTATION_SWAPPED' && typeof proposalId === 'number') {
            governance.markExecuted(proposalId, event.timestamp);
        }
    }
}
