/**
 * Error types raised by the tool server client
 */

export enum ToolServerErrorCode {
    SPAWN_FAILED = 'SPAWN_FAILED',
    INITIALIZATION_TIMEOUT = 'INITIALIZATION_TIMEOUT',
    DISCOVERY_TIMEOUT = 'DISCOVERY_TIMEOUT',
    BROKEN_PIPE = 'BROKEN_PIPE',
    REQUEST_TIMEOUT = 'REQUEST_TIMEOUT',
    UNKNOWN_SERVER = 'UNKNOWN_SERVER',
    SERVER_NOT_READY = 'SERVER_NOT_READY',
    TOOL_CALL_FAILED = 'TOOL_CALL_FAILED',
    REMOTE_ERROR = 'REMOTE_ERROR',
    MALFORMED_MESSAGE = 'MALFORMED_MESSAGE',
    PROCESS_EXITED = 'PROCESS_EXITED',
    UNKNOWN_TEMPLATE = 'UNKNOWN_TEMPLATE'
}

export class ToolServerError extends Error {
    readonly code:      ToolServerErrorCode;
    readonly serverId?: string;

    constructor(message: string, code: ToolServerErrorCode, options?: { serverId?: string, cause?: unknown }) {
        super(message, options?.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'ToolServerError';
        this.code = code;
        this.serverId = options?.serverId;
    }
}

export class SpawnError extends ToolServerError {
    constructor(readonly command: string[], reason: string, options?: { serverId?: string, cause?: unknown }) {
        super(`Failed to spawn tool server "${command.join(' ')}": ${reason}`, ToolServerErrorCode.SPAWN_FAILED, options);
        this.name = 'SpawnError';
    }
}

export class RequestTimeoutError extends ToolServerError {
    constructor(readonly method: string, readonly timeoutMs: number, serverId?: string) {
        super(`Request "${method}" timed out after ${timeoutMs}ms`, ToolServerErrorCode.REQUEST_TIMEOUT, { serverId });
        this.name = 'RequestTimeoutError';
    }
}

export class InitializationTimeoutError extends ToolServerError {
    constructor(readonly timeoutMs: number, serverId?: string) {
        super(`Initialization timed out after ${timeoutMs}ms`, ToolServerErrorCode.INITIALIZATION_TIMEOUT, { serverId });
        this.name = 'InitializationTimeoutError';
    }
}

export class DiscoveryTimeoutError extends ToolServerError {
    constructor(readonly timeoutMs: number, serverId?: string) {
        super(`Tool discovery timed out after ${timeoutMs}ms`, ToolServerErrorCode.DISCOVERY_TIMEOUT, { serverId });
        this.name = 'DiscoveryTimeoutError';
    }
}

export class BrokenPipeError extends ToolServerError {
    constructor(reason: string, options?: { serverId?: string, cause?: unknown }) {
        super(`Broken pipe writing to tool server: ${reason}`, ToolServerErrorCode.BROKEN_PIPE, options);
        this.name = 'BrokenPipeError';
    }
}

export class ProcessExitedError extends ToolServerError {
    constructor(readonly exitCode: number | null, readonly signal: NodeJS.Signals | null, serverId?: string) {
        super(`Tool server process exited (code=${String(exitCode)}, signal=${String(signal)})`, ToolServerErrorCode.PROCESS_EXITED, { serverId });
        this.name = 'ProcessExitedError';
    }
}

export class UnknownServerError extends ToolServerError {
    constructor(serverId: string) {
        super(`Unknown tool server: ${serverId}`, ToolServerErrorCode.UNKNOWN_SERVER, { serverId });
        this.name = 'UnknownServerError';
    }
}

export class ServerNotReadyError extends ToolServerError {
    constructor(serverId: string, readonly status: string) {
        super(`Tool server ${serverId} is not ready (status=${status})`, ToolServerErrorCode.SERVER_NOT_READY, { serverId });
        this.name = 'ServerNotReadyError';
    }
}

/**
 * The server answered a request with a JSON-RPC error object
 */
export class RemoteError extends ToolServerError {
    constructor(
        readonly method: string,
        readonly rpcCode: number,
        readonly rpcMessage: string,
        readonly data?: unknown,
        serverId?: string
    ) {
        super(`Request "${method}" failed: ${rpcMessage} (code ${rpcCode})`, ToolServerErrorCode.REMOTE_ERROR, { serverId });
        this.name = 'RemoteError';
    }
}

export class ToolCallError extends ToolServerError {
    readonly rpcCode:    number;
    readonly rpcMessage: string;
    readonly data?:      unknown;

    constructor(readonly toolName: string, remote: RemoteError) {
        super(`Tool call failed for ${toolName}: ${remote.rpcMessage} (code ${remote.rpcCode})`, ToolServerErrorCode.TOOL_CALL_FAILED, {
            serverId: remote.serverId,
            cause:    remote,
        });
        this.name = 'ToolCallError';
        this.rpcCode = remote.rpcCode;
        this.rpcMessage = remote.rpcMessage;
        this.data = remote.data;
    }
}

export class MalformedMessageError extends ToolServerError {
    constructor(reason: string, readonly raw: string) {
        super(`Malformed message: ${reason}`, ToolServerErrorCode.MALFORMED_MESSAGE);
        this.name = 'MalformedMessageError';
    }
}

export class UnknownTemplateError extends ToolServerError {
    constructor(readonly template: string) {
        super(`Unknown tool server template: ${template}`, ToolServerErrorCode.UNKNOWN_TEMPLATE);
        this.name = 'UnknownTemplateError';
    }
}
