import { describe, test, expect, beforeAll, afterAll } from '@jest/globals';
import type { Server } from 'http';
import { z } from 'zod';
import { PRINCIPAL_HEADER, RegistryServer, statusFor } from '../Server.js';
import { ControlPlane } from '../../kernel-core/Kernel.js';
import { parseConfig } from '../../kernel-core/Config.js';
import { DAY, HOUR, ManualClock } from '../../kernel-core/L0/Clock.js';
import { ErrorCode } from '../../kernel-core/Errors.js';

const OWNER = 'owner';
const PROPOSER = 'proposer';
const APPROVER = 'approver';

describe('Registry Server', () => {
    const clock = new ManualClock(1_000);
    let server: Server;
    let baseUrl: string;

    const call = async (method: string, route: string, principal: string | null, body?: unknown) => {
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (principal !== null) headers[PRINCIPAL_HEADER] = principal;

        const res = await fetch(`${baseUrl}${route}`, {
            method,
            headers,
            ...(body === undefined ? {} : { body: typeof body === 'string' ? body : JSON.stringify(body) })
        });
        const json: unknown = await res.json();
        return { status: res.status, json };
    };

    beforeAll(async () => {
        const config = parseConfig({ owner: OWNER, proposers: [PROPOSER], approvers: [APPROVER], port: 0 });
        const plane = ControlPlane.create(config, { clock });
        await plane.bootstrap();

        server = await new RegistryServer(plane).listen(0);
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterAll(async () => {
        await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    });

    test('maps error codes to status codes', () => {
        expect([
            ErrorCode.UNAUTHORIZED,
            ErrorCode.NOT_FOUND,
            ErrorCode.ALREADY_EXISTS,
            ErrorCode.INVALID_ARGUMENT,
            ErrorCode.INVALID_STATE,
            ErrorCode.INTEGRITY_BREACH
        ].map(statusFor)).toEqual([403, 404, 409, 400, 409, 500]);
    });

    test('requests without a principal are rejected', async () => {
        const res = await call('GET', '/api/components', null);
        expect(res.status).toBe(403);
        expect(res.json).toEqual({
            ok: false,
            error: { code: 'UNAUTHORIZED', message: '[Registry:UNAUTHORIZED] Missing x-principal-id header', metadata: {} }
        });
    });

    test('install, query and list', async () => {
        const created = await call('POST', '/api/components', 'deployer', {
            name: 'AssetRegistry', instanceHandle: '0xasset', implementationRef: 'impl1', version: '1.0.0'
        });
        const record = {
            name: 'AssetRegistry',
            instanceHandle: '0xasset',
            implementationRef: 'impl1',
            version: '1.0.0',
            createdAt: 1_000,
            lastUpgradedAt: null,
            active: true
        };
        expect(created.status).toBe(201);
        expect(created.json).toEqual({ ok: true, data: record });

        const queried = await call('GET', '/api/components/AssetRegistry', 'reader');
        expect(queried.json).toEqual({ ok: true, data: record });

        const listed = await call('GET', '/api/components', 'reader');
        expect(listed.json).toEqual({ ok: true, data: { names: ['AssetRegistry'], records: [record] } });
    });

    test('duplicate installs are 409', async () => {
        const res = await call('POST', '/api/components', 'deployer', {
            name: 'AssetRegistry', instanceHandle: '0xother', implementationRef: 'impl1', version: '1.0.0'
        });
        expect(res.status).toBe(409);
        expect(res.json).toMatchObject({ ok: false, error: { code: 'ALREADY_EXISTS' } });
    });

    test('invalid bodies are 400', async () => {
        const missing = await call('POST', '/api/components', 'deployer', { name: 'Half' });
        expect(missing.status).toBe(400);
        expect(missing.json).toMatchObject({ error: { code: 'INVALID_ARGUMENT' } });

        const malformed = await call('POST', '/api/components', 'deployer', '{not json');
        expect(malformed.status).toBe(400);
        expect(malformed.json).toMatchObject({ error: { message: expect.stringMatching(/Malformed request body/) } });
    });

    test('unknown components are 404', async () => {
        const res = await call('GET', '/api/components/Nope', 'reader');
        expect(res.status).toBe(404);
    });

    test('direct swaps need the upgrader capability', async () => {
        const denied = await call('POST', '/api/components/AssetRegistry/swap', 'mallory', { implementationRef: 'impl9', version: '9.9.9' });
        expect(denied.status).toBe(403);

        const granted = await call('PUT', '/api/upgraders/ops', OWNER);
        expect(granted.json).toEqual({ ok: true, data: ['governance', 'ops'] });

        const swapped = await call('POST', '/api/components/AssetRegistry/swap', 'ops', { implementationRef: 'impl1b', version: '1.0.1' });
        expect(swapped.status).toBe(200);
        expect(swapped.json).toMatchObject({ data: { version: '1.0.1', implementationRef: 'impl1b' } });

        const revoked = await call('DELETE', '/api/upgraders/ops', OWNER);
        expect(revoked.json).toEqual({ ok: true, data: ['governance'] });
    });

    test('the governed upgrade flow over HTTP', async () => {
        const proposed = await call('POST', '/api/proposals', PROPOSER, {
            targetComponent: 'AssetRegistry', newImplementationRef: 'impl2', newVersion: '1.1.0', description: 'Fix rounding'
        });
        expect(proposed.status).toBe(201);
        expect(proposed.json).toMatchObject({ data: { id: 1, earliestExecution: 1_000 + DAY, approved: false } });
        const id = 1;

        const approved = await call('POST', `/api/proposals/${id}/approve`, APPROVER);
        expect(approved.json).toMatchObject({ data: { approved: true, approvals: [APPROVER] } });

        clock.advance(23 * HOUR);
        const early = await call('POST', `/api/proposals/${id}/execute`, APPROVER);
        expect(early.status).toBe(409);
        expect(early.json).toMatchObject({ error: { code: 'INVALID_STATE', metadata: { reason: 'TIMELOCK_PENDING', retryAfterMs: HOUR } } });

        clock.advance(HOUR);
        const executed = await call('POST', `/api/proposals/${id}/execute`, APPROVER);
        expect(executed.status).toBe(200);
        expect(executed.json).toMatchObject({ data: { executed: true, executedAt: 1_000 + DAY } });

        const record = await call('GET', '/api/components/AssetRegistry', 'reader');
        expect(record.json).toMatchObject({ data: { version: '1.1.0', implementationRef: 'impl2', instanceHandle: '0xasset' } });

        const again = await call('POST', `/api/proposals/${id}/execute`, APPROVER);
        expect(again.status).toBe(409);
        expect(again.json).toMatchObject({ error: { metadata: { reason: 'ALREADY_EXECUTED' } } });
    });

    test('proposal ids must be positive integers', async () => {
        const res = await call('GET', '/api/proposals/abc', 'reader');
        expect(res.status).toBe(400);
    });

    test('governance administration', async () => {
        const forbidden = await call('PUT', '/api/governance/timelock', PROPOSER, { durationMs: 2 * HOUR });
        expect(forbidden.status).toBe(403);

        const outOfBounds = await call('PUT', '/api/governance/timelock', OWNER, { durationMs: 60 * DAY });
        expect(outOfBounds.status).toBe(400);
        expect(outOfBounds.json).toMatchObject({ error: { metadata: { reason: 'OUT_OF_BOUNDS' } } });

        const updated = await call('PUT', '/api/governance/timelock', OWNER, { durationMs: 2 * HOUR });
        expect(updated.json).toEqual({ ok: true, data: { durationMs: 2 * HOUR } });

        const approvers = await call('PUT', '/api/governance/approvers/carol', OWNER);
        expect(approvers.json).toEqual({ ok: true, data: [APPROVER, 'carol'] });
        const removed = await call('DELETE', '/api/governance/approvers/carol', OWNER);
        expect(removed.json).toEqual({ ok: true, data: [APPROVER] });

        const proposers = await call('DELETE', `/api/governance/proposers/${PROPOSER}`, OWNER);
        expect(proposers.json).toEqual({ ok: true, data: [] });
        const restored = await call('PUT', `/api/governance/proposers/${PROPOSER}`, OWNER);
        expect(restored.json).toEqual({ ok: true, data: [PROPOSER] });
    });

    test('deactivation is owner only', async () => {
        const denied = await call('POST', '/api/components/AssetRegistry/deactivate', PROPOSER);
        expect(denied.status).toBe(403);

        const done = await call('POST', '/api/components/AssetRegistry/deactivate', OWNER);
        expect(done.json).toMatchObject({ data: { active: false } });
    });

    test('audit and status reflect every mutation', async () => {
        const audit = await call('GET', '/api/audit', 'reader');
        const history = z.object({ data: z.array(z.object({ event: z.object({ kind: z.string() }) })) }).parse(audit.json);
        const kinds = history.data.map(e => e.event.kind);
        expect(kinds.slice(0, 4)).toEqual(['UPGRADER_AUTHORIZED', 'PROPOSER_ADDED', 'APPROVER_ADDED', 'COMPONENT_INSTALLED']);

        const status = await call('GET', '/api/status', 'reader');
        expect(status.json).toMatchObject({ data: {
            components: 1,
            activeComponents: 0,
            proposals: 1,
            pendingProposals: 0,
            auditEntries: kinds.length,
            chainValid: true,
            timelockMs: 2 * HOUR
        } });
    });
});
