import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import type { ZodTypeAny, output } from 'zod';
import type { LabelKernel } from '../kernel-core/Kernel.js';
import { ErrorCode, InvalidRequestError, isLabelError } from '../kernel-core/Errors.js';
import { GroupSchema, ObjectSchema, PageSchema } from './Schemas.js';

export interface LabelServerOptions {
    port?: number;
    host?: string;
    logRequests?: boolean;
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
    [ErrorCode.NOT_FOUND]: 404,
    [ErrorCode.IDENTIFIER_CONFLICT]: 409,
    [ErrorCode.INVALID_REQUEST]: 422,
    [ErrorCode.PRECONDITION_VIOLATED]: 500,
    [ErrorCode.CONSTRAINT_VIOLATION]: 500,
};

function parse<S extends ZodTypeAny>(schema: S, value: unknown): output<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new InvalidRequestError('Request validation failed', result.error.issues);
    }
    return result.data;
}

function sortedNumbers(ids: Iterable<number>): number[] {
    return Array.from(ids).sort((a, b) => a - b);
}

export class LabelServer {
    private app: express.Express;
    private server: Server | null = null;
    private port: number;
    private host: string;
    private logRequests: boolean;

    constructor(private kernel: LabelKernel, options: LabelServerOptions = {}) {
        this.port = options.port ?? 8000;
        this.host = options.host ?? 'localhost';
        this.logRequests = options.logRequests ?? true;

        this.app = express();
        this.app.use(cors());
        this.app.use(express.json());
        this.setupRoutes();
        this.app.use(this.handleError);
    }

    /** Resolves once listening; port 0 picks a free port. */
    public start(): Promise<AddressInfo> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(this.port, this.host);
            server.once('error', reject);
            server.once('listening', () => {
                const address = server.address();
                if (address === null || typeof address === 'string') {
                    reject(new Error(`LabelServer: unexpected listen address ${String(address)}`));
                    return;
                }
                this.server = server;
                console.log(`[LabelServer] Listening on ${address.address}:${address.port}`);
                resolve(address);
            });
        });
    }

    public stop(): Promise<void> {
        const server = this.server;
        if (!server) return Promise.resolve();
        return new Promise((resolve, reject) => {
            server.close(err => {
                if (err) {
                    reject(err);
                    return;
                }
                this.server = null;
                resolve();
            });
        });
    }

    private setupRoutes() {
        if (this.logRequests) {
            this.app.use((req, res, next) => {
                console.log(`[LabelServer] ${req.method} ${req.url}`);
                next();
            });
        }

        // --- Groups ---
        this.app.get('/group', (req, res) => {
            res.json(this.kernel.listGroups(parse(PageSchema, req.query)));
        });

        this.app.get('/group/:name/ids', (req, res) => {
            res.json(sortedNumbers(this.kernel.groupIds(req.params.name)));
        });

        this.app.get('/group/:name', (req, res) => {
            res.json(this.kernel.describeGroup(req.params.name));
        });

        this.app.post('/group', (req, res) => {
            res.json(this.kernel.saveGroup(parse(GroupSchema, req.body)));
        });

        this.app.delete('/group/:name', (req, res) => {
            this.kernel.removeGroup(req.params.name);
            res.json(null);
        });

        // --- Objects ---
        this.app.get('/object', (req, res) => {
            res.json(this.kernel.listObjects(parse(PageSchema, req.query)));
        });

        this.app.get('/object/:uuid/ids', (req, res) => {
            res.json(sortedNumbers(this.kernel.objectIds(req.params.uuid)));
        });

        this.app.get('/object/:uuid/values', (req, res) => {
            res.json(Array.from(this.kernel.objectValues(req.params.uuid)));
        });

        this.app.get('/object/:uuid', (req, res) => {
            res.json(this.kernel.describeObject(req.params.uuid));
        });

        this.app.post('/object', (req, res) => {
            res.json(this.kernel.labelObject(parse(ObjectSchema, req.body)));
        });

        this.app.delete('/object/:uuid', (req, res) => {
            this.kernel.removeObject(req.params.uuid);
            res.json(null);
        });
    }

    private handleError = (err: unknown, req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            next(err);
            return;
        }
        if (isLabelError(err)) {
            const status = STATUS_BY_CODE[err.code];
            if (status >= 500) console.error(`[LabelServer] ${req.method} ${req.url} failed:`, err.message);
            res.status(status).json({ error: err.message, code: err.code, detail: err.metadata });
            return;
        }
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: 'Malformed JSON body' });
            return;
        }
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[LabelServer] ${req.method} ${req.url} failed:`, message);
        res.status(500).json({ error: message });
    };
}
