/**
 * Runtime state of a tool server as tracked by the registry
 */

import type { Tool } from './protocol.js';

export enum ServerStatus {
    STARTING = 'starting',
    READY = 'ready',
    ERROR = 'error',
    STOPPED = 'stopped'
}

export interface ServerInfo {
    serverId:      string
    name:          string
    projectName?:  string
    status:        ServerStatus
    pid?:          number
    tools:         Tool[]
    errorMessage?: string
    /** Epoch milliseconds */
    createdAt:     number
}
