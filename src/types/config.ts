/**
 * Configuration type definitions for tool servers
 */

import { z } from 'zod';
import { MAX_TIMER_DELAY_MS } from '../utils/timeout.js';

export const DEFAULT_INIT_TIMEOUT_MS = 15000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 20000;

/**
 * A single tool server launched over stdio.
 *
 * `env` values may reference host variables as `${VAR}`; they are expanded at
 * spawn time, not at parse time.
 */
export const ToolServerConfigSchema = z.object({
    name:             z.string().min(1, 'Server name cannot be empty'),
    description:      z.string().optional(),
    command:          z.array(z.string())
        .min(1, 'Command cannot be empty')
        .refine(command => (command[0] ?? '').length > 0, 'Executable cannot be empty'),
    env:              z.record(z.string(), z.string()).default({}),
    cwd:              z.string().optional(),
    initTimeoutMs:    z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(DEFAULT_INIT_TIMEOUT_MS),
    requestTimeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(DEFAULT_REQUEST_TIMEOUT_MS),
});

/**
 * Entry of the `toolServers` map in the config file. The map key doubles as
 * the server name when `name` is omitted.
 */
export const ToolServerTemplateSchema = ToolServerConfigSchema.extend({
    name: z.string().min(1).optional(),
});

export const ToolServersConfigSchema = z.object({
    toolServers: z.record(z.string(), ToolServerTemplateSchema).default({}),
});

export type ToolServerConfig = z.infer<typeof ToolServerConfigSchema>;
export type ToolServerConfigInput = z.input<typeof ToolServerConfigSchema>;
export type ToolServerTemplate = z.infer<typeof ToolServerTemplateSchema>;
export type ToolServersConfig = z.infer<typeof ToolServersConfigSchema>;
