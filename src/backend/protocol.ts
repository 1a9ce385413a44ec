/**
 * JSON-RPC 2.0 envelope building and incoming line classification
 */

import _ from 'lodash';
import type { ZodError } from 'zod';
import {
    JSONRPC_VERSION,
    JsonRpcNotificationSchema,
    JsonRpcResponseSchema,
    JsonRpcServerRequestSchema,
    type IncomingMessage,
    type JsonRpcErrorObject,
    type JsonRpcId,
    type JsonRpcOutgoingNotification,
    type JsonRpcOutgoingResponse,
    type JsonRpcRequest
} from '../types/protocol.js';
import { MalformedMessageError } from './errors.js';

export function buildRequest(id: number, method: string, params: Record<string, unknown> = {}): JsonRpcRequest {
    return { jsonrpc: JSONRPC_VERSION, id, method, params };
}

export function buildNotification(method: string, params?: Record<string, unknown>): JsonRpcOutgoingNotification {
    return params === undefined
        ? { jsonrpc: JSONRPC_VERSION, method }
        : { jsonrpc: JSONRPC_VERSION, method, params };
}

export function buildResult(id: string | number, result: unknown): JsonRpcOutgoingResponse {
    return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function buildError(id: string | number, error: JsonRpcErrorObject): JsonRpcOutgoingResponse {
    return { jsonrpc: JSONRPC_VERSION, id, error };
}

/**
 * Compact single-line JSON. JSON.stringify escapes newlines inside strings,
 * so the output never spans more than one line.
 */
export function serialize(envelope: JsonRpcRequest | JsonRpcOutgoingNotification | JsonRpcOutgoingResponse): string {
    return JSON.stringify(envelope);
}

/**
 * Map a response id onto the numeric ids this client issues. Numeric strings
 * are accepted since some servers echo ids back as strings.
 */
export function normalizeId(id: JsonRpcId): number | undefined {
    if(_.isNumber(id)) {
        return Number.isInteger(id) ? id : undefined;
    }
    if(_.isString(id) && /^-?\d+$/.test(id)) {
        return Number(id);
    }
    return undefined;
}

function describeZodError(error: ZodError): string {
    return _.join(_.map(error.issues, issue => (issue.path.length > 0 ? `${_.join(issue.path, '.')}: ${issue.message}` : issue.message)), ', ');
}

/**
 * Parse and classify one line read from a server.
 *
 * @throws MalformedMessageError when the line is not a valid JSON-RPC 2.0 message
 */
export function parseMessage(raw: string): IncomingMessage {
    let payload: unknown;
    try {
        payload = JSON.parse(raw);
    } catch (error) {
        throw new MalformedMessageError(`invalid JSON (${_.isError(error) ? error.message : String(error)})`, raw);
    }

    if(!_.isPlainObject(payload)) {
        throw new MalformedMessageError('message is not a JSON object', raw);
    }

    const hasMethod = _.has(payload, 'method');
    const id: unknown = _.get(payload, 'id');
    const hasId = id !== undefined && id !== null;

    if(hasMethod && hasId) {
        const parsed = JsonRpcServerRequestSchema.safeParse(payload);
        if(!parsed.success) {
            throw new MalformedMessageError(describeZodError(parsed.error), raw);
        }
        return { kind: 'request', message: parsed.data };
    }

    if(hasMethod) {
        const parsed = JsonRpcNotificationSchema.safeParse(payload);
        if(!parsed.success) {
            throw new MalformedMessageError(describeZodError(parsed.error), raw);
        }
        return { kind: 'notification', message: parsed.data };
    }

    const parsed = JsonRpcResponseSchema.safeParse(payload);
    if(!parsed.success) {
        throw new MalformedMessageError(describeZodError(parsed.error), raw);
    }
    return { kind: 'response', message: parsed.data };
}
