/**
 * In-process fake tool server behind the Transport interface
 *
 * Lines the client writes are parsed and dispatched to per-method handlers.
 * A handler returns the reply to send, or undefined to stay silent so a test
 * can answer later (or never) through `respond` / `sendLine`.
 */

import _ from 'lodash';
import { BrokenPipeError, SpawnError } from '../../src/backend/errors.js';
import { parseMessage } from '../../src/backend/protocol.js';
import type { Transport, TransportFactory, TransportHandlers, TransportSpawnOptions } from '../../src/backend/process-transport.js';
import { JsonRpcErrorCode, type JsonRpcErrorObject } from '../../src/types/protocol.js';

export type FakeReply = { result: unknown } | { error: JsonRpcErrorObject };

export interface RecordedRequest {
    id:     string | number
    method: string
    params: Record<string, unknown>
}

export type FakeRequestHandler = (params: Record<string, unknown>, request: RecordedRequest) => FakeReply | undefined | Promise<FakeReply | undefined>;

export type FakeToolHandler = (args: Record<string, unknown>) => unknown;

function toParams(params: Record<string, unknown> | unknown[] | undefined): Record<string, unknown> {
    return params === undefined || Array.isArray(params) ? {} : params;
}

export class FakeToolServer implements Transport {
    readonly pid: number;
    /** Every line written by the client, in order */
    readonly written: string[] = [];
    readonly requests: RecordedRequest[] = [];
    readonly notifications: { method: string, params: Record<string, unknown> }[] = [];
    /** Replies the client sent to requests this server initiated */
    readonly clientReplies: unknown[] = [];
    terminateCalls = 0;
    tools: unknown[];

    private running = true;
    private readonly handlers = new Map<string, FakeRequestHandler>();
    private readonly toolHandlers = new Map<string, FakeToolHandler>();

    constructor(readonly spawnOptions: TransportSpawnOptions, private readonly transportHandlers: TransportHandlers, tools: unknown[] = []) {
        this.pid = 4000 + Math.floor(Math.random() * 1000);
        this.tools = tools;

        this.handle('initialize', () => ({
            result: {
                protocolVersion: '2024-11-05',
                capabilities:    { tools: {} },
                serverInfo:      { name: 'fake-tool-server', version: '1.0.0' },
            },
        }));
        this.handle('tools/list', () => ({ result: { tools: this.tools } }));
        this.handle('tools/call', (params) => {
            const name = _.isString(params.name) ? params.name : '';
            const toolHandler = this.toolHandlers.get(name);
            if(!toolHandler) {
                return { error: { code: JsonRpcErrorCode.InvalidParams, message: `Unknown tool: ${name}` } };
            }
            const args = _.isPlainObject(params.arguments) && _.isObject(params.arguments) ? { ...params.arguments } : {};
            return { result: toolHandler(args) };
        });
        this.handle('shutdown', () => ({ result: {} }));
    }

    get alive(): boolean {
        return this.running;
    }

    /** Replace the handler for a method */
    handle(method: string, handler: FakeRequestHandler): this {
        this.handlers.set(method, handler);
        return this;
    }

    /** Register what `tools/call` returns for a tool */
    tool(name: string, handler: FakeToolHandler): this {
        this.toolHandlers.set(name, handler);
        return this;
    }

    /** Never answer this method */
    silence(method: string): this {
        return this.handle(method, () => undefined);
    }

    async writeLine(text: string): Promise<void> {
        if(!this.running) {
            throw new BrokenPipeError('process is not accepting input');
        }
        this.written.push(text);

        const incoming = parseMessage(text);
        switch(incoming.kind) {
            case 'notification':
                this.notifications.push({ method: incoming.message.method, params: toParams(incoming.message.params) });
                break;
            case 'response':
                this.clientReplies.push(incoming.message);
                break;
            case 'request':
                this.dispatch({
                    id:     incoming.message.id,
                    method: incoming.message.method,
                    params: toParams(incoming.message.params),
                });
                break;
        }
    }

    /** Requests with the given method, in arrival order */
    requestsFor(method: string): RecordedRequest[] {
        return _.filter(this.requests, { method });
    }

    respond(id: string | number, result: unknown): void {
        this.sendLine(JSON.stringify({ jsonrpc: '2.0', id, result }));
    }

    respondError(id: string | number, error: JsonRpcErrorObject): void {
        this.sendLine(JSON.stringify({ jsonrpc: '2.0', id, error }));
    }

    /** Deliver a raw stdout line to the client */
    sendLine(line: string): void {
        this.transportHandlers.onLine(line);
    }

    /** Simulate the process dying on its own */
    exit(code: number | null = 1, signal: NodeJS.Signals | null = null): void {
        if(!this.running) {
            return;
        }
        this.running = false;
        this.transportHandlers.onExit?.(code, signal);
    }

    async terminate(_timeoutMs: number): Promise<void> {
        this.terminateCalls++;
        this.exit(null, 'SIGTERM');
    }

    private dispatch(request: RecordedRequest): void {
        this.requests.push(request);
        const handler = this.handlers.get(request.method);
        if(!handler) {
            setImmediate(() => this.reply(request, {
                error: { code: JsonRpcErrorCode.MethodNotFound, message: `Method not found: ${request.method}` },
            }));
            return;
        }

        // Replies go out on a later turn, the way a real process answers
        setImmediate(() => {
            void Promise.resolve(handler(request.params, request)).then((reply) => {
                if(reply) {
                    this.reply(request, reply);
                }
            });
        });
    }

    private reply(request: RecordedRequest, reply: FakeReply): void {
        if(!this.running) {
            return;
        }
        if('error' in reply) {
            this.respondError(request.id, reply.error);
        } else {
            this.respond(request.id, reply.result);
        }
    }
}

export interface FakeTransportFactoryOptions {
    tools?:      unknown[]
    /** Runs on every new server before the client sees it */
    setup?:      (server: FakeToolServer) => void
    /** Makes every spawn fail */
    spawnError?: string
    /** Spawning finishes only once this settles */
    spawnGate?:  Promise<void>
}

export interface FakeTransportFactory {
    factory: TransportFactory
    servers: FakeToolServer[]
    /** The most recently spawned server */
    last:    () => FakeToolServer
}

export function createFakeTransportFactory(options: FakeTransportFactoryOptions = {}): FakeTransportFactory {
    const servers: FakeToolServer[] = [];

    const factory: TransportFactory = async (spawnOptions, handlers) => {
        await options.spawnGate;
        if(options.spawnError !== undefined) {
            throw new SpawnError(spawnOptions.command, options.spawnError);
        }
        const server = new FakeToolServer(spawnOptions, handlers, _.cloneDeep(options.tools ?? []));
        options.setup?.(server);
        servers.push(server);
        return server;
    };

    return {
        factory,
        servers,
        last: () => {
            const server = _.last(servers);
            if(!server) {
                throw new Error('No fake tool server has been spawned');
            }
            return server;
        },
    };
}
