import express from 'express';
import type { ErrorRequestHandler, Request, RequestHandler, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server as HttpServer } from 'http';
import { z } from 'zod';
import type { ControlPlane } from '../kernel-core/Kernel.js';
import type { PrincipalId } from '../kernel-core/L0/Ontology.js';
import { ErrorCode, isKernelError, KernelError } from '../kernel-core/Errors.js';

export const PRINCIPAL_HEADER = 'x-principal-id';

const nonEmpty = z.string().trim().min(1);

const InstallBody = z.object({
    name: nonEmpty,
    instanceHandle: nonEmpty,
    implementationRef: nonEmpty,
    version: nonEmpty
});

const SwapBody = z.object({
    implementationRef: nonEmpty,
    version: nonEmpty
});

const ProposeBody = z.object({
    targetComponent: nonEmpty,
    newImplementationRef: nonEmpty,
    newVersion: nonEmpty,
    description: z.string().default('')
});

const TimelockBody = z.object({
    durationMs: z.number().int()
});

const ProposalIdParam = z.coerce.number().int().positive();

type Handler = (req: Request, principal: PrincipalId) => Promise<unknown> | unknown;

export function statusFor(code: ErrorCode): number {
    switch (code) {
        case ErrorCode.UNAUTHORIZED: return 403;
        case ErrorCode.NOT_FOUND: return 404;
        case ErrorCode.ALREADY_EXISTS: return 409;
        case ErrorCode.INVALID_ARGUMENT: return 400;
        case ErrorCode.INVALID_STATE: return 409;
        default: return 500;
    }
}

function parse<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`);
        throw new KernelError(ErrorCode.INVALID_ARGUMENT, `Invalid request: ${issues.join('; ')}`);
    }
    return result.data;
}

function param(req: Request, key: string): string {
    const value = req.params[key];
    if (value === undefined || value.length === 0) {
        throw new KernelError(ErrorCode.INVALID_ARGUMENT, `Missing path parameter ${key}`);
    }
    return value;
}

/**
 * Registry Server
 * HTTP surface over a control plane. Callers are pre-authenticated upstream
 * and identified by the principal header.
 */
export class RegistryServer {
    private app: express.Express;

    constructor(private readonly plane: ControlPlane) {
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());

        this.setupRoutes();
        this.app.use(this.onError);
    }

    public get App(): express.Express {
        return this.app;
    }

    public listen(port: number = this.plane.config.port): Promise<HttpServer> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(port, () => {
                console.log(`[RegistryServer] Listening on port ${port}`);
                resolve(server);
            });
            server.once('error', reject);
        });
    }

    private setupRoutes() {
        const registry = this.plane.Registry;
        const governance = this.plane.Governance;

        // --- Components ---
        this.app.get('/api/components', this.route(() => ({
            names: registry.list(),
            records: registry.records()
        })));

        this.app.get('/api/components/:name', this.route(req => registry.query(param(req, 'name'))));

        this.app.post('/api/components', this.route((req, principal) => {
            const body = parse(InstallBody, req.body);
            return registry.install(body.name, body.instanceHandle, body.implementationRef, body.version, principal);
        }, 201));

        this.app.post('/api/components/:name/swap', this.route((req, principal) => {
            const body = parse(SwapBody, req.body);
            return registry.swapImplementation(param(req, 'name'), body.implementationRef, body.version, principal);
        }));

        this.app.post('/api/components/:name/deactivate', this.route((req, principal) =>
            registry.deactivate(param(req, 'name'), principal)));

        // --- Upgraders ---
        this.app.get('/api/upgraders', this.route(() => registry.upgraders()));

        this.app.put('/api/upgraders/:identity', this.route(async (req, principal) => {
            await registry.authorizeUpgrader(param(req, 'identity'), principal);
            return registry.upgraders();
        }));

        this.app.delete('/api/upgraders/:identity', this.route(async (req, principal) => {
            await registry.revokeUpgrader(param(req, 'identity'), principal);
            return registry.upgraders();
        }));

        // --- Proposals ---
        this.app.get('/api/proposals', this.route(() => governance.listProposals()));

        this.app.get('/api/proposals/:id', this.route(req =>
            governance.getProposal(parse(ProposalIdParam, param(req, 'id')))));

        this.app.post('/api/proposals', this.route(async (req, principal) => {
            const body = parse(ProposeBody, req.body);
            const id = await governance.propose(body.targetComponent, body.newImplementationRef, body.newVersion, body.description, principal);
            return governance.getProposal(id);
        }, 201));

        this.app.post('/api/proposals/:id/approve', this.route((req, principal) =>
            governance.approve(parse(ProposalIdParam, param(req, 'id')), principal)));

        this.app.post('/api/proposals/:id/execute', this.route((req, principal) =>
            governance.execute(parse(ProposalIdParam, param(req, 'id')), principal)));

        // --- Governance administration ---
        this.app.put('/api/governance/timelock', this.route(async (req, principal) => {
            const body = parse(TimelockBody, req.body);
            await governance.setTimelockDuration(body.durationMs, principal);
            return { durationMs: governance.timelockDuration };
        }));

        this.app.put('/api/governance/proposers/:identity', this.route(async (req, principal) => {
            await governance.addProposer(param(req, 'identity'), principal);
            return governance.proposers();
        }));

        this.app.delete('/api/governance/proposers/:identity', this.route(async (req, principal) => {
            await governance.removeProposer(param(req, 'identity'), principal);
            return governance.proposers();
        }));

        this.app.put('/api/governance/approvers/:identity', this.route(async (req, principal) => {
            await governance.addApprover(param(req, 'identity'), principal);
            return governance.approvers();
        }));

        this.app.delete('/api/governance/approvers/:identity', this.route(async (req, principal) => {
            await governance.removeApprover(param(req, 'identity'), principal);
            return governance.approvers();
        }));

        // --- Audit & status ---
        this.app.get('/api/audit', this.route(() => this.plane.Audit.getHistory()));

        this.app.get('/api/status', this.route(() => this.plane.status()));
    }

    private route(handler: Handler, successStatus: number = 200): RequestHandler {
        return (req, res) => {
            const run = async () => {
                const principal = req.header(PRINCIPAL_HEADER)?.trim();
                if (!principal) {
                    throw new KernelError(ErrorCode.UNAUTHORIZED, `Missing ${PRINCIPAL_HEADER} header`);
                }
                const data = await handler(req, principal);
                res.status(successStatus).json({ ok: true, data });
            };
            run().catch((e: unknown) => this.fail(req, res, e));
        };
    }

    private fail(req: Request, res: Response, e: unknown) {
        if (isKernelError(e)) {
            const status = statusFor(e.code);
            console.log(`[RegistryServer] ${req.method} ${req.originalUrl} -> ${status} ${e.code}`);
            res.status(status).json({ ok: false, error: { code: e.code, message: e.message, metadata: e.metadata } });
            return;
        }

        console.error(`[RegistryServer] ${req.method} ${req.originalUrl} failed:`, e);
        res.status(500).json({ ok: false, error: { code: 'INTERNAL', message: 'Internal error', metadata: {} } });
    }

    // Body parser failures arrive here.
    private onError: ErrorRequestHandler = (err: unknown, req, res, next) => {
        if (res.headersSent) {
            next(err);
            return;
        }
        const message = err instanceof Error ? err.message : String(err);
        this.fail(req, res, new KernelError(ErrorCode.INVALID_ARGUMENT, `Malformed request body: ${message}`));
    };
}
