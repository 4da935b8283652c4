import { describe, test, expect, beforeEach } from '@jest/globals';
import { ComponentRegistry } from '../ComponentRegistry.js';
import { ManualClock } from '../../L0/Clock.js';
import { AuditLog } from '../../L5/Audit.js';
import type { Evidence, IEventStore } from '../../L5/Audit.js';
import { ErrorCode } from '../../Errors.js';

const OWNER = 'owner';
const DEPLOYER = 'deployer';
const UPGRADER = 'upgrader';
const STRANGER = 'stranger';

describe('Component Registry', () => {
    let clock: ManualClock;
    let audit: AuditLog;
    let registry: ComponentRegistry;

    beforeEach(() => {
        clock = new ManualClock(1_000);
        audit = new AuditLog();
        registry = new ComponentRegistry(OWNER, clock, audit);
    });

    describe('Install', () => {
        test('records a fresh active component', async () => {
            const record = await registry.install('X', '0xh1', 'impl1', '1.0.0', DEPLOYER);

            expect(record).toEqual({
                name: 'X',
                instanceHandle: '0xh1',
                implementationRef: 'impl1',
                version: '1.0.0',
                createdAt: 1_000,
                lastUpgradedAt: null,
                active: true
            });
            expect(registry.query('X')).toEqual(record);
        });

        test('emits COMPONENT_INSTALLED with the caller as actor', async () => {
            await registry.install('X', '0xh1', 'impl1', '1.0.0', DEPLOYER);

            const history = await audit.getHistory();
            expect(history).toHaveLength(1);
            expect(history[0]?.event).toEqual({
                kind: 'COMPONENT_INSTALLED',
                subject: 'X',
                actor: DEPLOYER,
                timestamp: 1_000,
                payload: { instanceHandle: '0xh1', implementationRef: 'impl1', version: '1.0.0' }
            });
        });

        test('a second install of the same name fails with ALREADY_EXISTS', async () => {
            await registry.install('X', '0xh1', 'impl1', '1.0.0', DEPLOYER);

            await expect(registry.install('X', '0xh2', 'impl1', '1.0.0', DEPLOYER))
                .rejects.toMatchObject({ code: ErrorCode.ALREADY_EXISTS });
            expect(registry.query('X').instanceHandle).toBe('0xh1');
        });

        test('a deactivated name stays claimed', async () => {
            await registry.install('X', '0xh1', 'impl1', '1.0.0', DEPLOYER);
            await registry.deactivate('X', OWNER);

            await expect(registry.install('X', '0xh2', 'impl1', '1.0.0', DEPLOYER))
                .rejects.toMatchObject({ code: ErrorCode.ALREADY_EXISTS });
        });

        test('empty fields are INVALID_ARGUMENT', async () => {
            await expect(registry.install('', '0xh1', 'impl1', '1.0.0', DEPLOYER))
                .rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
            await expect(registry.install('X', '0xh1', ' ', '1.0.0', DEPLOYER))
                .rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
            expect(registry.list()).toEqual([]);
        });

        test('concurrent installs of one name admit exactly one', async () => {
            const results = await Promise.allSettled([
                registry.install('X', '0xh1', 'impl1', '1.0.0', DEPLOYER),
                registry.install('X', '0xh2', 'impl1', '1.0.0', DEPLOYER)
            ]);

            expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected']);
            expect(registry.list()).toEqual(['X']);
        });
    });

    describe('List & Query', () => {
        test('List returns names in installation order', async () => {
            await registry.install('A', '0xa', 'impl1', '1.0.0', DEPLOYER);
            await registry.install('B', '0xb', 'impl1', '1.0.0', DEPLOYER);
            await registry.install('C', '0xc', 'impl1', '1.0.0', DEPLOYER);

            registry.query('C');
            registry.query('A');

            expect(registry.list()).toEqual(['A', 'B', 'C']);
        });

        test('Query of an unknown name is NOT_FOUND', () => {
            expect(() => registry.query('missing')).toThrow(/Component missing not found/);
        });

        test('List returns a copy', async () => {
            await registry.install('A', '0xa', 'impl1', '1.0.0', DEPLOYER);
            registry.list().push('B');
            expect(registry.list()).toEqual(['A']);
        });
    });

    describe('SwapImplementation', () => {
        beforeEach(async () => {
            await registry.install('X', '0xh1', 'impl1', '1.0.0', DEPLOYER);
            await registry.authorizeUpgrader(UPGRADER, OWNER);
        });

        test('round trip keeps the instance handle', async () => {
            clock.advance(500);
            await registry.swapImplementation('X', 'impl2', '2.0.0', UPGRADER);

            const record = registry.query('X');
            expect(record.implementationRef).toBe('impl2');
            expect(record.version).toBe('2.0.0');
            expect(record.instanceHandle).toBe('0xh1');
            expect(record.createdAt).toBe(1_000);
            expect(record.lastUpgradedAt).toBe(1_500);
        });

        test('the owning authority may swap without being an upgrader', async () => {
            await registry.swapImplementation('X', 'impl2', '2.0.0', OWNER);
            expect(registry.query('X').version).toBe('2.0.0');
        });

        test('emits the previous and new implementation', async () => {
            await registry.swapImplementation('X', 'impl2', '2.0.0', UPGRADER, { proposalId: 7 });

            const tip = await audit.getTip();
            expect(tip?.event.kind).toBe('IMPLEMENTATION_SWAPPED');
            expect(tip?.event.payload).toEqual({
                implementationRef: 'impl2',
                version: '2.0.0',
                previousImplementationRef: 'impl1',
                previousVersion: '1.0.0',
                proposalId: 7
            });
        });

        test('unauthorized callers are rejected regardless of target validity', async () => {
            await expect(registry.swapImplementation('X', 'impl2', '2.0.0', STRANGER))
                .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });
            await expect(registry.swapImplementation('missing', 'impl2', '2.0.0', STRANGER))
                .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });
            await expect(registry.swapImplementation('X', '', '', STRANGER))
                .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });

            expect(registry.query('X').implementationRef).toBe('impl1');
        });

        test('unknown components are NOT_FOUND', async () => {
            await expect(registry.swapImplementation('missing', 'impl2', '2.0.0', UPGRADER))
                .rejects.toMatchObject({ code: ErrorCode.NOT_FOUND });
        });

        test('inactive components are INVALID_STATE', async () => {
            await registry.deactivate('X', OWNER);

            await expect(registry.swapImplementation('X', 'impl2', '2.0.0', UPGRADER))
                .rejects.toMatchObject({ code: ErrorCode.INVALID_STATE, metadata: { reason: 'INACTIVE' } });
            expect(registry.query('X').implementationRef).toBe('impl1');
        });

        test('records are replaced, never edited', async () => {
            const before = registry.query('X');
            await registry.swapImplementation('X', 'impl2', '2.0.0', UPGRADER);

            expect(before.implementationRef).toBe('impl1');
            expect(Object.isFrozen(registry.query('X'))).toBe(true);
        });
    });

    describe('Deactivate', () => {
        beforeEach(async () => {
            await registry.install('X', '0xh1', 'impl1', '1.0.0', DEPLOYER);
        });

        test('only the owning authority may deactivate', async () => {
            await expect(registry.deactivate('X', DEPLOYER))
                .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });
            expect(registry.query('X').active).toBe(true);
        });

        test('deactivation keeps the record and implementation', async () => {
            const record = await registry.deactivate('X', OWNER);

            expect(record.active).toBe(false);
            expect(record.implementationRef).toBe('impl1');
            expect(registry.list()).toEqual(['X']);
        });

        test('deactivating twice is INVALID_STATE', async () => {
            await registry.deactivate('X', OWNER);

            await expect(registry.deactivate('X', OWNER))
                .rejects.toMatchObject({ code: ErrorCode.INVALID_STATE, metadata: { reason: 'ALREADY_INACTIVE' } });
        });

        test('unknown components are NOT_FOUND', async () => {
            await expect(registry.deactivate('missing', OWNER))
                .rejects.toMatchObject({ code: ErrorCode.NOT_FOUND });
        });
    });

    describe('Upgrader capability', () => {
        test('AuthorizeUpgrader is idempotent', async () => {
            await registry.authorizeUpgrader(UPGRADER, OWNER);
            await registry.authorizeUpgrader(UPGRADER, OWNER);

            expect(registry.upgraders()).toEqual([UPGRADER]);
            const kinds = (await audit.getHistory()).map(e => e.event.kind);
            expect(kinds).toEqual(['UPGRADER_AUTHORIZED']);
        });

        test('revocation removes the capability', async () => {
            await registry.install('X', '0xh1', 'impl1', '1.0.0', DEPLOYER);
            await registry.authorizeUpgrader(UPGRADER, OWNER);
            await registry.revokeUpgrader(UPGRADER, OWNER);

            expect(registry.isUpgrader(UPGRADER)).toBe(false);
            await expect(registry.swapImplementation('X', 'impl2', '2.0.0', UPGRADER))
                .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });
        });

        test('revoking a non-member succeeds without an event', async () => {
            await registry.revokeUpgrader(STRANGER, OWNER);
            expect(await audit.getHistory()).toEqual([]);
        });

        test('only the owning authority manages upgraders', async () => {
            await expect(registry.authorizeUpgrader(STRANGER, STRANGER))
                .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });

            await registry.authorizeUpgrader(UPGRADER, OWNER);
            await expect(registry.revokeUpgrader(UPGRADER, UPGRADER))
                .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });
            expect(registry.isUpgrader(STRANGER)).toBe(false);
        });
    });

    describe('Audit coupling', () => {
        test('a failed audit append leaves the registry untouched', async () => {
            const brokenStore: IEventStore = {
                append: async (_evidence: Evidence) => { throw new Error('disk full'); },
                getHistory: async () => [],
                getLatest: async () => null
            };
            const broken = new ComponentRegistry(OWNER, clock, new AuditLog(brokenStore));

            await expect(broken.install('X', '0xh1', 'impl1', '1.0.0', DEPLOYER)).rejects.toThrow('disk full');
            expect(broken.find('X')).toBeUndefined();
            expect(broken.list()).toEqual([]);
        });
    });
});
