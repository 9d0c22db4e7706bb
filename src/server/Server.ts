import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server } from 'http';
import { configFromEnv } from '../kernel-core/Config.js';
import type { KernelConfig } from '../kernel-core/Config.js';
import { ConstraintViolation, DependencyCycle, ErrorCode, InvalidProposal, KernelError } from '../kernel-core/Errors.js';
import { Gatekeeper } from '../kernel-core/Gatekeeper.js';
import { AuditLog, toWire } from '../kernel-core/L5/Audit.js';
import type { IEventStore } from '../kernel-core/L5/Audit.js';
import { Orchestrator } from '../kernel-core/L6/Orchestrator.js';
import type { EnforcementMode } from '../kernel-core/L0/Ontology.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';

const MODES: readonly EnforcementMode[] = ['observe', 'advise', 'enforce'];

function parseMode(value: unknown): EnforcementMode | undefined {
    if (value === undefined) return undefined;
    const mode = MODES.find(m => m === value);
    if (!mode) {
        throw new InvalidProposal(`mode must be one of ${MODES.join(', ')}`, [`mode: ${String(value)}`]);
    }
    return mode;
}

// body-parser rejects unparseable JSON with a SyntaxError tagged 'entity.parse.failed'
function isMalformedBody(err: unknown): err is SyntaxError {
    return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

function parseSeq(value: unknown, fallback: number): number {
    if (typeof value !== 'string') return fallback;
    const n = Number.parseInt(value, 10);
    return Number.isInteger(n) && n > 0 ? n : fallback;
}

export class GatekeeperServer {
    private app: express.Express;
    private gatekeeper: Gatekeeper;
    private orchestrator: Orchestrator;
    private server?: Server;

    constructor(private config: KernelConfig, store?: IEventStore) {
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());

        const audit = new AuditLog(store);
        this.gatekeeper = new Gatekeeper(config, audit);
        this.orchestrator = new Orchestrator(config, this.gatekeeper);

        this.setupRoutes();
    }

    public get App() { return this.app; }

    public listen(port: number = 3000): Promise<Server> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(port, () => {
                const address = server.address();
                const bound = address !== null && typeof address === 'object' ? address.port : port;
                console.log(`[GatekeeperServer] Listening on port ${bound} (mode: ${this.config.mode})`);
                resolve(server);
            });
            server.on('error', reject);
            this.server = server;
        });
    }

    public close(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (!this.server) return resolve();
            this.server.close(err => (err ? reject(err) : resolve()));
        });
    }

    private setupRoutes() {
        this.app.post('/proposals/check', async (req: Request, res: Response, next: NextFunction) => {
            try {
                const mode = parseMode(req.body?.mode) ?? this.config.mode;
                const decision = await this.gatekeeper.checkProposal(req.body?.proposal, mode);
                res.json(decision);
            } catch (e: unknown) {
                next(e);
            }
        });

        this.app.post('/proposals/coordinate', async (req: Request, res: Response, next: NextFunction) => {
            try {
                const proposals: unknown = req.body?.proposals;
                if (!Array.isArray(proposals)) {
                    throw new InvalidProposal('Body must contain a proposals array');
                }
                const mode = parseMode(req.body?.mode);
                const decisions = await this.orchestrator.coordinate(proposals, mode ? { mode } : {});
                res.json(decisions);
            } catch (e: unknown) {
                next(e);
            }
        });

        this.app.post('/decisions/:decisionId/acknowledge', async (req: Request, res: Response, next: NextFunction) => {
            try {
                const approver: unknown = req.body?.approver;
                if (typeof approver !== 'string' || approver.length === 0) {
                    res.status(400).json({ error: 'approver is required' });
                    return;
                }
                const note: unknown = req.body?.note;
                const decisionId = req.params['decisionId'] ?? '';
                const ack = await this.gatekeeper.acknowledge(decisionId, approver, typeof note === 'string' ? note : undefined);
                res.json(ack);
            } catch (e: unknown) {
                next(e);
            }
        });

        this.app.get('/audit', async (req: Request, res: Response, next: NextFunction) => {
            try {
                const from = parseSeq(req.query['from'], 1);
                const to = parseSeq(req.query['to'], Number.MAX_SAFE_INTEGER);
                const records = await this.gatekeeper.Audit.rangeQuery(from, to);
                res.json(records.map(toWire));
            } catch (e: unknown) {
                next(e);
            }
        });

        this.app.get('/audit/verify', async (_req: Request, res: Response, next: NextFunction) => {
            try {
                const verification = await this.gatekeeper.Audit.verify();
                res.status(verification.valid ? 200 : 409).json(verification);
            } catch (e: unknown) {
                next(e);
            }
        });

        this.app.get('/metrics', (_req: Request, res: Response) => {
            res.json(this.orchestrator.metrics());
        });

        this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
            if (isMalformedBody(err)) {
                res.status(400).json({ error: `Malformed JSON body: ${err.message}`, code: ErrorCode.INVALID_PROPOSAL, issues: [] });
                return;
            }
            if (err instanceof ConstraintViolation) {
                res.status(422).json({ error: err.message, code: err.code, decision: err.decision });
                return;
            }
            if (err instanceof InvalidProposal) {
                res.status(400).json({ error: err.message, code: err.code, issues: err.issues });
                return;
            }
            if (err instanceof DependencyCycle) {
                res.status(409).json({ error: err.message, code: err.code, cycle: err.cycle });
                return;
            }
            if (err instanceof KernelError) {
                const status = err.code === ErrorCode.DECISION_NOT_FOUND ? 404 : 409;
                res.status(status).json({ error: err.message, code: err.code });
                return;
            }
            const message = err instanceof Error ? err.message : String(err);
            console.error('[GatekeeperServer] Unhandled error:', message);
            res.status(500).json({ error: message });
        });
    }
}

// Start if run directly
if (require.main === module) {
    const server = new GatekeeperServer(configFromEnv(), new SQLiteEventStore(process.env['KERNEL_AUDIT_DB'] ?? 'kernel-audit.db'));
    server.listen(Number(process.env['PORT'] ?? 3000)).catch((e: unknown) => {
        console.error('[GatekeeperServer] Failed to start:', e);
        process.exit(1);
    });
}
