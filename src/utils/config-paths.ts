/**
 * Configuration file path utilities
 * Provides cross-platform paths for user config files
 */

import envPaths from 'env-paths';
import { makeDirectory } from 'make-dir';
import { join } from 'node:path';

// suffix: '' removes the default '-nodejs' suffix
const paths = envPaths('tool-server-client', { suffix: '' });

/**
 * Directory holding tool-servers.json.
 * TOOL_SERVERS_CONFIG_DIR overrides the platform default.
 */
export function getConfigDir(): string {
    return process.env.TOOL_SERVERS_CONFIG_DIR ?? paths.config;
}

export function getToolServersConfigPath(): string {
    return join(getConfigDir(), 'tool-servers.json');
}

/**
 * Ensure the config directory exists
 */
export async function ensureConfigDir(): Promise<string> {
    return makeDirectory(getConfigDir());
}
