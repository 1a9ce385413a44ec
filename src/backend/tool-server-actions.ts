/**
 * Action adapters over the client facade
 *
 * Collaborators drive tool servers through these calls and get plain objects
 * back, ready to be serialized or shown.
 */

import type { ToolServerTemplate } from '../types/config.js';
import type { Tool } from '../types/protocol.js';
import type { ServerInfo, ServerStatus } from '../types/server.js';
import { buildConfig, type ToolServerOverrides } from './server-templates.js';
import type { ToolServerClient } from './tool-server-client.js';

export interface StartServerAction {
    template:     string
    root?:        string
    overrides?:   ToolServerOverrides
    projectName?: string
}

export interface CallToolAction {
    serverId:   string
    toolName:   string
    arguments?: Record<string, unknown>
    timeoutMs?: number
}

export type ServerStatusResult
    = | { serverId: string, status: ServerStatus }
      | { servers: ServerInfo[] };

export class ToolServerActions {
    constructor(
        private readonly client: ToolServerClient,
        private readonly templates: Record<string, ToolServerTemplate> = {}
    ) {}

    async startServer(action: StartServerAction): Promise<{ serverId: string, info: ServerInfo }> {
        const config = buildConfig(action.template, {
            root:      action.root,
            overrides: action.overrides,
            templates: this.templates,
        });
        const serverId = await this.client.startServer(config, { projectName: action.projectName });
        return { serverId, info: this.client.getInfo(serverId) };
    }

    async stopServer({ serverId }: { serverId: string }): Promise<{ serverId: string, stopped: true }> {
        await this.client.stopServer(serverId);
        return { serverId, stopped: true };
    }

    listTools({ serverId }: { serverId: string }): { serverId: string, tools: Tool[] } {
        return { serverId, tools: this.client.listTools(serverId) };
    }

    async callTool(action: CallToolAction): Promise<{ serverId: string, tool: string, result: unknown }> {
        const result = await this.client.callTool(action.serverId, action.toolName, action.arguments ?? {}, { timeoutMs: action.timeoutMs });
        return { serverId: action.serverId, tool: action.toolName, result };
    }

    /**
     * Status of one server, or a summary of all of them
     */
    serverStatus({ serverId }: { serverId?: string } = {}): ServerStatusResult {
        if(serverId !== undefined && serverId.length > 0) {
            return { serverId, status: this.client.getStatus(serverId) };
        }
        return { servers: this.client.listServers() };
    }
}

export default ToolServerActions;
