/**
 * JSON-RPC 2.0 wire types for talking to tool servers over stdio
 *
 * Every message on the wire is a single line of JSON. Outgoing requests always
 * carry a numeric id; incoming lines may be responses, notifications, or
 * requests initiated by the server (e.g. `ping`).
 */

import { z } from 'zod';

export const JSONRPC_VERSION = '2.0';

/**
 * Standard JSON-RPC 2.0 error codes
 */
export enum JsonRpcErrorCode {
    ParseError = -32700,
    InvalidRequest = -32600,
    MethodNotFound = -32601,
    InvalidParams = -32602,
    InternalError = -32603
}

export const JsonRpcIdSchema = z.union([z.number(), z.string(), z.null()]);

export const JsonRpcErrorObjectSchema = z.object({
    code:    z.number().int(),
    message: z.string(),
    data:    z.unknown().optional(),
});

const ParamsSchema = z.union([z.record(z.string(), z.unknown()), z.array(z.unknown())]).optional();

export const JsonRpcResponseSchema = z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id:      JsonRpcIdSchema,
    result:  z.unknown().optional(),
    error:   JsonRpcErrorObjectSchema.nullable().optional(),
}).superRefine((message, ctx) => {
    const hasResult = 'result' in message;
    const hasError = message.error !== undefined && message.error !== null;
    if(hasResult === hasError) {
        ctx.addIssue({
            code:    z.ZodIssueCode.custom,
            message: 'Response must carry exactly one of "result" or "error"',
        });
    }
});

export const JsonRpcNotificationSchema = z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    method:  z.string(),
    params:  ParamsSchema,
});

export const JsonRpcServerRequestSchema = JsonRpcNotificationSchema.extend({
    id: z.union([z.number(), z.string()]),
});

export type JsonRpcId = z.infer<typeof JsonRpcIdSchema>;
export type JsonRpcErrorObject = z.infer<typeof JsonRpcErrorObjectSchema>;
export type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>;
export type JsonRpcNotification = z.infer<typeof JsonRpcNotificationSchema>;
export type JsonRpcServerRequest = z.infer<typeof JsonRpcServerRequestSchema>;

export interface JsonRpcRequest {
    jsonrpc: typeof JSONRPC_VERSION
    id:      number
    method:  string
    params:  Record<string, unknown>
}

export interface JsonRpcOutgoingNotification {
    jsonrpc: typeof JSONRPC_VERSION
    method:  string
    params?: Record<string, unknown>
}

export interface JsonRpcOutgoingResponse {
    jsonrpc: typeof JSONRPC_VERSION
    id:      string | number
    result?: unknown
    error?:  JsonRpcErrorObject
}

/**
 * Classified incoming line
 */
export type IncomingMessage
    = | { kind: 'response', message: JsonRpcResponse }
      | { kind: 'notification', message: JsonRpcNotification }
      | { kind: 'request', message: JsonRpcServerRequest };

/**
 * Input schema of a tool. Only `type: 'object'` schemas are accepted; any
 * other JSON-Schema keywords are kept as-is.
 */
export const ToolInputSchemaSchema = z.object({
    type:       z.literal('object'),
    properties: z.record(z.string(), z.unknown()).optional(),
    required:   z.array(z.string()).optional(),
}).passthrough();

export const ToolSchema = z.object({
    name:        z.string().min(1),
    description: z.string().optional().default(''),
    inputSchema: ToolInputSchemaSchema,
});

export const ListToolsResultSchema = z.object({
    tools:      z.array(z.unknown()),
    nextCursor: z.string().optional(),
});

export type ToolInputSchema = z.infer<typeof ToolInputSchemaSchema>;
export type Tool = z.infer<typeof ToolSchema>;
export type ListToolsResult = z.infer<typeof ListToolsResultSchema>;
