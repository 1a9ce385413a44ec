/**
 * Server Registry
 *
 * In-memory bookkeeping of every known tool server: identity, status, pid,
 * discovered tools and last error. No process or I/O knowledge lives here.
 *
 * Each method runs to completion before any other code can observe the map,
 * so a method body is its own critical section. Readers always get deep
 * copies; the only way to change a record is through the setters.
 */

import { randomUUID } from 'node:crypto';
import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { ServerStatus, type ServerInfo } from '../types/server.js';
import type { Tool } from '../types/protocol.js';
import { UnknownServerError } from './errors.js';

export class ServerRegistry {
    private servers = new Map<string, ServerInfo>();
    private readonly createId: () => string;
    /** Only kept for an injected id source; random UUIDs do not repeat */
    private readonly issuedIds?: Set<string>;

    constructor(createId?: () => string) {
        this.createId = createId ?? randomUUID;
        if(createId) {
            this.issuedIds = new Set<string>();
        }
    }

    /**
     * Mint a fresh server id and record the server in `starting` status
     */
    register(name: string, projectName?: string): string {
        let serverId = this.createId();
        if(this.issuedIds) {
            while(this.issuedIds.has(serverId)) {
                serverId = this.createId();
            }
            this.issuedIds.add(serverId);
        }

        const info: ServerInfo = {
            serverId,
            name,
            status:    ServerStatus.STARTING,
            tools:     [],
            createdAt: Date.now(),
        };
        if(projectName !== undefined) {
            info.projectName = projectName;
        }

        this.servers.set(serverId, info);
        logger.info({ serverId, name }, 'Tool server registered');
        return serverId;
    }

    /**
     * Update status. The error message is replaced, or cleared when omitted.
     */
    setStatus(serverId: string, status: ServerStatus, errorMessage?: string): void {
        const info = this.require(serverId);
        info.status = status;
        if(errorMessage === undefined) {
            delete info.errorMessage;
            logger.info({ serverId, status }, 'Tool server status changed');
        } else {
            info.errorMessage = errorMessage;
            logger.error({ serverId, status, error: errorMessage }, 'Tool server status changed');
        }
    }

    setPid(serverId: string, pid: number): void {
        this.require(serverId).pid = pid;
        logger.debug({ serverId, pid }, 'Tool server pid recorded');
    }

    setTools(serverId: string, tools: Tool[]): void {
        this.require(serverId).tools = _.cloneDeep(tools);
        logger.info({ serverId, toolCount: tools.length }, 'Tool server tools discovered');
    }

    has(serverId: string): boolean {
        return this.servers.has(serverId);
    }

    get(serverId: string): ServerInfo {
        return _.cloneDeep(this.require(serverId));
    }

    getTools(serverId: string): Tool[] {
        return _.cloneDeep(this.require(serverId).tools);
    }

    listAll(): ServerInfo[] {
        return _.cloneDeep(Array.from(this.servers.values()));
    }

    listByStatus(status: ServerStatus): ServerInfo[] {
        return _.cloneDeep(_.filter(Array.from(this.servers.values()), { status }));
    }

    listByProject(projectName: string): ServerInfo[] {
        return _.cloneDeep(_.filter(Array.from(this.servers.values()), { projectName }));
    }

    /**
     * Forget a server. Its id is never handed out again.
     */
    remove(serverId: string): void {
        if(this.servers.delete(serverId)) {
            logger.info({ serverId }, 'Tool server removed from registry');
        }
    }

    private require(serverId: string): ServerInfo {
        const info = this.servers.get(serverId);
        if(!info) {
            throw new UnknownServerError(serverId);
        }
        return info;
    }
}

export default ServerRegistry;
