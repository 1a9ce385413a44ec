/**
 * Request Correlator
 *
 * Turns a line-oriented transport into request/response calls for a single
 * tool server. Every outgoing request gets the next integer id; the response
 * reader hands incoming lines to `handleLine`, which settles the waiter that
 * owns the matching id. Responses may arrive in any order.
 *
 * Id allocation, registration of the pending entry and the write itself all
 * happen in one synchronous block, so two concurrent callers can neither
 * share an id nor interleave bytes on the wire.
 */

import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { MAX_TIMER_DELAY_MS, isValidTimeout } from '../utils/timeout.js';
import { JsonRpcErrorCode, type IncomingMessage, type JsonRpcNotification, type JsonRpcResponse, type JsonRpcServerRequest } from '../types/protocol.js';
import type { LineSink } from './process-transport.js';
import { buildError, buildNotification, buildRequest, buildResult, normalizeId, parseMessage, serialize } from './protocol.js';
import { BrokenPipeError, RemoteError, RequestTimeoutError } from './errors.js';

interface PendingRequest {
    id:             number
    method:         string
    resolve:        (result: unknown) => void
    reject:         (error: Error) => void
    timeoutHandle?: NodeJS.Timeout
}

export class RequestCorrelator {
    private nextId = 1;
    private readonly pending = new Map<number, PendingRequest>();
    private sink?: LineSink;

    constructor(private readonly serverId: string) {}

    /**
     * Bind the sink outgoing lines are written to
     */
    attach(sink: LineSink): void {
        this.sink = sink;
    }

    get pendingCount(): number {
        return this.pending.size;
    }

    /**
     * Send a request and wait for its response.
     *
     * Without `timeoutMs` the wait ends only on a response or `rejectAll`.
     *
     * @returns the response's `result` payload
     * @throws RequestTimeoutError when no response arrives in time
     * @throws RemoteError when the server answers with a JSON-RPC error
     * @throws BrokenPipeError when the request cannot be written
     * @throws RangeError, before anything is written, when `timeoutMs` is not
     *         an integer from 1 to 2147483647
     */
    request(method: string, params: Record<string, unknown> = {}, timeoutMs?: number): Promise<unknown> {
        if(timeoutMs !== undefined && !isValidTimeout(timeoutMs)) {
            return Promise.reject(new RangeError(`Invalid timeout for "${method}": ${String(timeoutMs)}ms (expected an integer from 1 to ${MAX_TIMER_DELAY_MS})`));
        }

        const sink = this.sink;
        if(!sink) {
            return Promise.reject(new BrokenPipeError('no transport attached', { serverId: this.serverId }));
        }

        return new Promise<unknown>((resolve, reject) => {
            const id = this.nextId++;
            const entry: PendingRequest = {
                id,
                method,
                resolve: (result: unknown) => {
                    clearTimeout(entry.timeoutHandle);
                    resolve(result);
                },
                reject: (error: Error) => {
                    clearTimeout(entry.timeoutHandle);
                    reject(error);
                },
            };

            if(timeoutMs !== undefined) {
                entry.timeoutHandle = setTimeout(() => {
                    // Only this request's entry goes; a late response will find nothing
                    if(this.pending.get(id) === entry) {
                        this.pending.delete(id);
                    }
                    logger.warn({ serverId: this.serverId, id, method, timeoutMs }, 'Request timed out');
                    reject(new RequestTimeoutError(method, timeoutMs, this.serverId));
                }, timeoutMs);
            }

            this.pending.set(id, entry);

            const line = serialize(buildRequest(id, method, params));
            logger.debug({ serverId: this.serverId, id, method }, 'Sending request');

            sink.writeLine(line).catch((error: unknown) => {
                if(this.pending.get(id) !== entry) {
                    return;
                }
                this.pending.delete(id);
                entry.reject(error instanceof BrokenPipeError
                    ? error
                    : new BrokenPipeError(_.isError(error) ? error.message : String(error), { serverId: this.serverId, cause: error }));
            });
        });
    }

    /**
     * Send a notification; nothing is awaited besides the write
     */
    async notify(method: string, params?: Record<string, unknown>): Promise<void> {
        if(!this.sink) {
            throw new BrokenPipeError('no transport attached', { serverId: this.serverId });
        }
        logger.debug({ serverId: this.serverId, method }, 'Sending notification');
        await this.sink.writeLine(serialize(buildNotification(method, params)));
    }

    /**
     * Feed one raw stdout line. Never throws: malformed lines, notifications
     * and responses nobody waits for are logged and dropped.
     */
    handleLine(raw: string): void {
        const line = _.trim(raw);
        if(line.length === 0) {
            return;
        }

        const incoming = this.parse(line);
        if(!incoming) {
            return;
        }

        switch(incoming.kind) {
            case 'response':
                this.settle(incoming.message);
                break;
            case 'notification':
                this.handleNotification(incoming.message);
                break;
            case 'request':
                this.answerServerRequest(incoming.message);
                break;
        }
    }

    /**
     * Fail every outstanding request, e.g. when the process has gone away
     */
    rejectAll(error: Error): void {
        if(this.pending.size === 0) {
            return;
        }

        const entries = Array.from(this.pending.values());
        this.pending.clear();

        logger.warn({ serverId: this.serverId, pendingRequests: entries.length, error: error.message }, 'Rejecting outstanding requests');
        for(const entry of entries) {
            entry.reject(error);
        }
    }

    private parse(line: string): IncomingMessage | undefined {
        try {
            return parseMessage(line);
        } catch (error) {
            const reason = _.isError(error) ? error.message : String(error);
            logger.warn({ serverId: this.serverId, error: reason, line }, 'Dropping malformed message from tool server');
            return undefined;
        }
    }

    private settle(response: JsonRpcResponse): void {
        const id = normalizeId(response.id);
        const entry = id === undefined ? undefined : this.pending.get(id);

        if(id === undefined || !entry) {
            logger.debug({ serverId: this.serverId, id: response.id }, 'Discarding response with no pending request');
            return;
        }

        this.pending.delete(id);

        if(response.error) {
            logger.debug({ serverId: this.serverId, id, method: entry.method, code: response.error.code }, 'Received error response');
            entry.reject(new RemoteError(entry.method, response.error.code, response.error.message, response.error.data, this.serverId));
            return;
        }

        logger.debug({ serverId: this.serverId, id, method: entry.method }, 'Received response');
        entry.resolve(response.result);
    }

    private handleNotification(notification: JsonRpcNotification): void {
        logger.debug({ serverId: this.serverId, method: notification.method }, 'Notification from tool server');
    }

    /**
     * Servers may send their own requests. `ping` gets an empty result;
     * everything else is reported as an unknown method.
     */
    private answerServerRequest(request: JsonRpcServerRequest): void {
        const reply = request.method === 'ping'
            ? buildResult(request.id, {})
            : buildError(request.id, {
                code:    JsonRpcErrorCode.MethodNotFound,
                message: `Method not found: ${request.method}`,
            });

        logger.debug({ serverId: this.serverId, id: request.id, method: request.method }, 'Answering server request');

        this.sink?.writeLine(serialize(reply)).catch((error: unknown) => {
            logger.warn({ serverId: this.serverId, method: request.method, error: _.isError(error) ? error.message : String(error) }, 'Failed to answer server request');
        });
    }
}

export default RequestCorrelator;
