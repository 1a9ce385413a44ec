/**
 * Tool Server Client
 *
 * The one entry point collaborators use. Composes the registry, a transport
 * per server and a request correlator per server into:
 * - startServer: spawn, `initialize` handshake, tool discovery, ready
 * - stopServer: best-effort `shutdown`, terminate, forget
 * - listTools / callTool / getStatus / getInfo / listServers
 * - shutdownAll: stop everything, collecting failures
 *
 * Per-server lifecycle: starting -> ready | error, ready -> stopped | error.
 */

import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { buildProcessEnv } from '../utils/env.js';
import { ToolServerConfigSchema, type ToolServerConfig, type ToolServerConfigInput } from '../types/config.js';
import { ListToolsResultSchema, ToolSchema, type Tool } from '../types/protocol.js';
import { ServerStatus, type ServerInfo } from '../types/server.js';
import { ServerRegistry } from './server-registry.js';
import { RequestCorrelator } from './request-correlator.js';
import { spawnProcessTransport, type Transport, type TransportFactory } from './process-transport.js';
import {
    BrokenPipeError,
    DiscoveryTimeoutError,
    InitializationTimeoutError,
    ProcessExitedError,
    RemoteError,
    RequestTimeoutError,
    ServerNotReadyError,
    ToolCallError,
    UnknownServerError
} from './errors.js';

export const DEFAULT_PROTOCOL_VERSION = '2024-11-05';

export interface ClientInfo {
    name:    string
    version: string
}

export interface ToolServerClientOptions {
    registry?:           ServerRegistry
    transportFactory?:   TransportFactory
    clientInfo?:         ClientInfo
    protocolVersion?:    string
    /** How long stopServer waits for a `shutdown` reply (default 2000) */
    shutdownTimeoutMs?:  number
    /** Grace period before SIGKILL, and again after it (default 3000) */
    terminateTimeoutMs?: number
}

export interface StartServerOptions {
    projectName?: string
}

export interface StopServerOptions {
    shutdownTimeoutMs?:  number
    terminateTimeoutMs?: number
}

export interface CallToolOptions {
    /** Defaults to the server's configured request timeout */
    timeoutMs?: number
}

export interface ShutdownAllResult {
    stopped: string[]
    failed:  { serverId: string, error: string }[]
}

interface ServerContext {
    serverId:     string
    config:       Readonly<ToolServerConfig>
    correlator:   RequestCorrelator
    transport?:   Transport
    stopping:     boolean
    stopPromise?: Promise<void>
}

function errorMessage(error: unknown): string {
    return _.isError(error) ? error.message : String(error);
}

/**
 * Manages tool server processes and the calls made to them
 */
export class ToolServerClient {
    readonly registry: ServerRegistry;
    private readonly contexts = new Map<string, ServerContext>();
    private readonly transportFactory: TransportFactory;
    private readonly clientInfo: ClientInfo;
    private readonly protocolVersion: string;
    private readonly shutdownTimeoutMs: number;
    private readonly terminateTimeoutMs: number;

    constructor(options: ToolServerClientOptions = {}) {
        this.registry = options.registry ?? new ServerRegistry();
        this.transportFactory = options.transportFactory ?? spawnProcessTransport;
        this.clientInfo = options.clientInfo ?? { name: 'tool-server-client', version: '0.1.0' };
        this.protocolVersion = options.protocolVersion ?? DEFAULT_PROTOCOL_VERSION;
        this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 2000;
        this.terminateTimeoutMs = options.terminateTimeoutMs ?? 3000;
    }

    /**
     * Start a server, complete the handshake and discover its tools.
     *
     * @returns the new server id; the server is `ready`
     * @throws SpawnError, InitializationTimeoutError, DiscoveryTimeoutError, or
     *         whatever else broke the handshake. The process is terminated and
     *         the server left in `error` before the error is rethrown.
     */
    async startServer(configInput: ToolServerConfigInput, options: StartServerOptions = {}): Promise<string> {
        const config: Readonly<ToolServerConfig> = Object.freeze(ToolServerConfigSchema.parse(configInput));
        const serverId = this.registry.register(config.name, options.projectName);
        const context: ServerContext = {
            serverId,
            config,
            correlator: new RequestCorrelator(serverId),
            stopping:   false,
        };
        this.contexts.set(serverId, context);

        logger.info({ serverId, name: config.name, command: config.command }, 'Starting tool server');

        try {
            context.transport = await this.transportFactory(
                {
                    command: [...config.command],
                    env:     buildProcessEnv(config.env),
                    cwd:     config.cwd,
                    label:   config.name,
                },
                {
                    onLine:   line => context.correlator.handleLine(line),
                    onStderr: (line) => {
                        logger.debug({ serverId, stream: 'stderr' }, line);
                    },
                    onExit: (code, signal) => {
                        this.handleExit(context, code, signal);
                    },
                }
            );
            context.correlator.attach(context.transport);

            if(context.transport.pid !== undefined) {
                this.registry.setPid(serverId, context.transport.pid);
            }

            await this.initialize(context);
            const tools = await this.discoverTools(context);

            this.registry.setTools(serverId, tools);
            this.registry.setStatus(serverId, ServerStatus.READY);
            logger.info({ serverId, name: config.name, toolCount: tools.length }, 'Tool server ready');

            return serverId;
        } catch (error) {
            await this.failStart(context, error);
            throw error;
        }
    }

    /**
     * Stop a server and forget it. Concurrent calls for the same id share one
     * stop; any call after it has finished fails with UnknownServerError.
     */
    async stopServer(serverId: string, options: StopServerOptions = {}): Promise<void> {
        const context = this.requireContext(serverId);
        context.stopPromise ??= this.runStop(context, options);
        return context.stopPromise;
    }

    /**
     * Tools recorded during discovery. Never touches the process.
     */
    listTools(serverId: string): Tool[] {
        return this.registry.getTools(serverId);
    }

    /**
     * Invoke a tool on a ready server.
     *
     * @returns the `result` payload of the `tools/call` response
     * @throws ServerNotReadyError without writing anything if the server is not `ready`
     * @throws ToolCallError when the server answers with a JSON-RPC error
     */
    async callTool(serverId: string, toolName: string, args: Record<string, unknown> = {}, options: CallToolOptions = {}): Promise<unknown> {
        const context = this.requireContext(serverId);
        const info = this.registry.get(serverId);
        if(info.status !== ServerStatus.READY || context.stopping) {
            throw new ServerNotReadyError(serverId, context.stopping ? 'stopping' : info.status);
        }

        const timeoutMs = options.timeoutMs ?? context.config.requestTimeoutMs;
        logger.debug({ serverId, toolName, timeoutMs }, 'Calling tool');

        try {
            return await context.correlator.request('tools/call', { name: toolName, arguments: args }, timeoutMs);
        } catch (error) {
            if(error instanceof RemoteError) {
                throw new ToolCallError(toolName, error);
            }
            if(error instanceof BrokenPipeError) {
                this.markFailed(context, error.message);
            }
            throw error;
        }
    }

    getStatus(serverId: string): ServerStatus {
        return this.registry.get(serverId).status;
    }

    getInfo(serverId: string): ServerInfo {
        return this.registry.get(serverId);
    }

    listServers(status?: ServerStatus): ServerInfo[] {
        return status === undefined ? this.registry.listAll() : this.registry.listByStatus(status);
    }

    /**
     * Stop every known server. Individual failures are collected, not thrown.
     */
    async shutdownAll(): Promise<ShutdownAllResult> {
        const serverIds = Array.from(this.contexts.keys());
        logger.info({ serverCount: serverIds.length }, 'Stopping all tool servers');

        const stopped: string[] = [];
        const failed: ShutdownAllResult['failed'] = [];

        await Promise.all(_.map(serverIds, async (serverId) => {
            try {
                await this.stopServer(serverId);
                stopped.push(serverId);
            } catch (error) {
                const message = errorMessage(error);
                failed.push({ serverId, error: message });
                logger.error({ serverId, error: message }, 'Failed to stop tool server during shutdownAll');
            }
        }));

        if(failed.length > 0) {
            logger.warn({ stopped: stopped.length, failed }, 'Finished stopping tool servers with some failures');
        } else {
            logger.info({ stopped: stopped.length }, 'Stopped all tool servers');
        }

        return { stopped, failed };
    }

    private async initialize(context: ServerContext): Promise<void> {
        const { serverId, config, correlator } = context;
        try {
            const result = await correlator.request('initialize', {
                protocolVersion: this.protocolVersion,
                capabilities:    {},
                clientInfo:      this.clientInfo,
            }, config.initTimeoutMs);
            logger.debug({ serverId, result }, 'Tool server initialized');
        } catch (error) {
            if(error instanceof RequestTimeoutError) {
                throw new InitializationTimeoutError(config.initTimeoutMs, serverId);
            }
            throw error;
        }

        await correlator.notify('notifications/initialized');
    }

    /**
     * Collect `tools/list` pages until the server stops returning a cursor.
     * Entries that are not valid tool descriptors are skipped.
     */
    private async discoverTools(context: ServerContext): Promise<Tool[]> {
        const { serverId, config, correlator } = context;
        const tools: Tool[] = [];
        const seenCursors = new Set<string>();
        let cursor: string | undefined;

        do {
            let raw: unknown;
            try {
                raw = await correlator.request('tools/list', cursor === undefined ? {} : { cursor }, config.requestTimeoutMs);
            } catch (error) {
                if(error instanceof RequestTimeoutError) {
                    throw new DiscoveryTimeoutError(config.requestTimeoutMs, serverId);
                }
                throw error;
            }

            const page = ListToolsResultSchema.safeParse(raw);
            if(!page.success) {
                logger.warn({ serverId, error: page.error.message }, 'Unexpected tools/list result, treating as empty');
                break;
            }

            for(const entry of page.data.tools) {
                const tool = ToolSchema.safeParse(entry);
                if(tool.success) {
                    tools.push(tool.data);
                } else {
                    logger.warn({ serverId, entry, error: tool.error.message }, 'Skipping invalid tool descriptor');
                }
            }

            cursor = page.data.nextCursor;
            if(cursor !== undefined) {
                if(seenCursors.has(cursor)) {
                    logger.warn({ serverId, cursor }, 'tools/list returned a repeated cursor, stopping discovery');
                    break;
                }
                seenCursors.add(cursor);
            }
        } while(cursor !== undefined);

        return _.uniqBy(tools, 'name');
    }

    private async failStart(context: ServerContext, error: unknown): Promise<void> {
        const { serverId } = context;
        const message = errorMessage(error);
        logger.error({ serverId, name: context.config.name, error: message }, 'Failed to start tool server');

        context.correlator.rejectAll(new ProcessExitedError(null, null, serverId));
        if(context.transport) {
            try {
                await context.transport.terminate(this.terminateTimeoutMs);
            } catch (terminateError) {
                logger.error({ serverId, error: errorMessage(terminateError) }, 'Failed to terminate tool server after start failure');
            }
        }

        if(this.registry.has(serverId)) {
            this.registry.setStatus(serverId, ServerStatus.ERROR, message);
        }
    }

    private async runStop(context: ServerContext, options: StopServerOptions): Promise<void> {
        const { serverId } = context;
        const shutdownTimeoutMs = options.shutdownTimeoutMs ?? this.shutdownTimeoutMs;
        const terminateTimeoutMs = options.terminateTimeoutMs ?? this.terminateTimeoutMs;
        const wasReady = this.registry.has(serverId) && this.registry.get(serverId).status === ServerStatus.READY;

        context.stopping = true;
        logger.info({ serverId, name: context.config.name }, 'Stopping tool server');

        try {
            if(wasReady && context.transport?.alive) {
                try {
                    await context.correlator.request('shutdown', {}, shutdownTimeoutMs);
                } catch (error) {
                    logger.debug({ serverId, error: errorMessage(error) }, 'Graceful shutdown request failed, terminating anyway');
                }
            }
        } finally {
            try {
                await context.transport?.terminate(terminateTimeoutMs);
            } finally {
                context.correlator.rejectAll(new ProcessExitedError(null, 'SIGTERM', serverId));
                if(this.registry.has(serverId)) {
                    this.registry.setStatus(serverId, ServerStatus.STOPPED);
                    this.registry.remove(serverId);
                }
                this.contexts.delete(serverId);
            }
        }

        logger.info({ serverId }, 'Tool server stopped');
    }

    /**
     * The process went away. Waiters learn about it now; a server that was
     * not being stopped is marked as failed.
     */
    private handleExit(context: ServerContext, code: number | null, signal: NodeJS.Signals | null): void {
        const { serverId } = context;
        context.correlator.rejectAll(new ProcessExitedError(code, signal, serverId));

        if(context.stopping) {
            return;
        }

        logger.warn({ serverId, code, signal }, 'Tool server exited unexpectedly');
        this.markFailed(context, `Process exited unexpectedly (code=${String(code)}, signal=${String(signal)})`);
    }

    private markFailed(context: ServerContext, message: string): void {
        const { serverId } = context;
        if(context.stopping || !this.registry.has(serverId)) {
            return;
        }
        const { status } = this.registry.get(serverId);
        if(status === ServerStatus.READY || status === ServerStatus.STARTING) {
            this.registry.setStatus(serverId, ServerStatus.ERROR, message);
        }
    }

    private requireContext(serverId: string): ServerContext {
        const context = this.contexts.get(serverId);
        if(!context) {
            throw new UnknownServerError(serverId);
        }
        return context;
    }
}

export default ToolServerClient;
