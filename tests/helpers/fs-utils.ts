/**
 * File system test helpers
 * Temporary directories and files for config loading tests
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomBytes } from 'node:crypto';
import _ from 'lodash';

const cleanupRegistry: string[] = [];

/**
 * Create a uniquely named directory under the OS temp dir.
 * Call `cleanup()` in afterEach to remove it.
 */
export async function createTempDir(prefix = 'tool-server-test'): Promise<string> {
    const dir = join(tmpdir(), `${prefix}-${randomBytes(8).toString('hex')}`);
    await mkdir(dir, { recursive: true });
    cleanupRegistry.push(dir);
    return dir;
}

/**
 * Write a file into `directory`; objects are written as JSON
 *
 * @example
 * ```typescript
 * const path = await writeTempFile(dir, 'tool-servers.json', { toolServers: {} });
 * ```
 */
export async function writeTempFile(directory: string, filename: string, content: string | Record<string, unknown>): Promise<string> {
    const filePath = join(directory, filename);
    await writeFile(filePath, _.isString(content) ? content : JSON.stringify(content, null, 2), 'utf-8');
    return filePath;
}

/**
 * Remove every temporary directory created so far
 */
export async function cleanup(): Promise<void> {
    const paths = cleanupRegistry.splice(0);
    await Promise.all(_.map(paths, async path => rm(path, { recursive: true, force: true })));
}
