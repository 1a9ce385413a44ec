/**
 * Shared Configuration Loading Utility
 *
 * Generic JSON config loading with zod validation, an optional pre-validation
 * transform, and error messages that name the offending path.
 */

import { access, constants, readFile } from 'node:fs/promises';
import type { ZodType, ZodTypeDef } from 'zod';
import { ZodError } from 'zod';
import _ from 'lodash';
import { dynamicLogger as logger } from './silent-logger.js';
import { ToolServersConfigSchema, type ToolServersConfig } from '../types/config.js';
import { getToolServersConfigPath } from './config-paths.js';

export interface LoadJsonConfigOptions<T> {
    /** Path to the configuration file */
    path: string

    schema: ZodType<T, ZodTypeDef, unknown>

    /** Applied after parsing but before validation */
    transform?: (data: unknown) => unknown

    /** Value returned when the file does not exist; without it a missing file is an error */
    defaultValue?: unknown
}

async function fileExists(path: string): Promise<boolean> {
    try {
        await access(path, constants.F_OK);
        return true;
    } catch{
        return false;
    }
}

function formatZodError(error: ZodError, path: string): Error {
    const errorMessages = _.map(
        error.issues,
        issue => `${_.join(issue.path, '.')}: ${issue.message}`
    );
    return new Error(`Invalid configuration in ${path}: ${errorMessages.join(', ')}`);
}

/**
 * Load and validate a JSON configuration file
 *
 * @throws Error if the file is missing (and no default was given), is invalid JSON, or fails validation
 *
 * @example
 * ```typescript
 * const config = await loadJsonConfig({
 *   path: '/path/to/tool-servers.json',
 *   schema: ToolServersConfigSchema,
 *   defaultValue: { toolServers: {} }
 * });
 * ```
 */
export async function loadJsonConfig<T>(options: LoadJsonConfigOptions<T>): Promise<T> {
    const { path, schema, transform, defaultValue } = options;

    let data: unknown;
    if(await fileExists(path)) {
        const content = await readFile(path, 'utf-8');
        try {
            data = JSON.parse(content);
        } catch (error) {
            throw new Error(
                `Invalid JSON in config file ${path}: ${_.isError(error) ? error.message : String(error)}`
            );
        }
    } else if(defaultValue !== undefined) {
        logger.debug({ path }, 'Config file not found, using default value');
        data = _.cloneDeep(defaultValue);
    } else {
        throw new Error(`Config file not found: ${path}`);
    }

    try {
        return schema.parse(transform ? transform(data) : data);
    } catch (error) {
        if(error instanceof ZodError) {
            logger.error({ error: error.issues, configPath: path }, 'Invalid configuration file');
            throw formatZodError(error, path);
        }
        throw error;
    }
}

/**
 * Load tool-servers.json. A missing file yields an empty set of templates.
 */
export async function loadToolServersConfig(path = getToolServersConfigPath()): Promise<ToolServersConfig> {
    return loadJsonConfig({
        path,
        schema:       ToolServersConfigSchema,
        defaultValue: { toolServers: {} },
    });
}
