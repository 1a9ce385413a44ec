/**
 * Tool server backend
 *
 * This module is responsible for:
 * - Keeping records of every known tool server
 * - Launching tool servers as stdio subprocesses
 * - Correlating JSON-RPC requests with their responses
 * - Discovering tools and invoking them
 */

export { ServerRegistry } from './server-registry.js';
export { ProcessTransport, spawnProcessTransport } from './process-transport.js';
export type { LineSink, SpawnFunction, Transport, TransportFactory, TransportHandlers, TransportSpawnOptions } from './process-transport.js';
export { RequestCorrelator } from './request-correlator.js';
export { buildNotification, buildRequest, normalizeId, parseMessage, serialize } from './protocol.js';
export { ToolServerClient, DEFAULT_PROTOCOL_VERSION } from './tool-server-client.js';
export type {
    CallToolOptions,
    ClientInfo,
    ShutdownAllResult,
    StartServerOptions,
    StopServerOptions,
    ToolServerClientOptions
} from './tool-server-client.js';
export { BUILTIN_TEMPLATES, buildConfig, listTemplates, resolveTemplates } from './server-templates.js';
export type { BuildConfigOptions, TemplateSummary, ToolServerOverrides } from './server-templates.js';
export { ToolServerActions } from './tool-server-actions.js';
export type { CallToolAction, ServerStatusResult, StartServerAction } from './tool-server-actions.js';
export * from './errors.js';
