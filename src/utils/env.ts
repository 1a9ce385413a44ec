/**
 * `${VAR}` expansion against the host environment
 */

import _ from 'lodash';
import { dynamicLogger as logger } from './silent-logger.js';

const VARIABLE_PATTERN = /\$\{([^}]+)\}/g;

/**
 * Replace every `${VAR}` in `value` with the variable's value in `source`.
 * Unset variables are left as written.
 */
export function expandString(value: string, source: NodeJS.ProcessEnv = process.env): string {
    return _.replace(value, VARIABLE_PATTERN, (match: string, varName: string) => {
        const replacement = source[varName];
        if(replacement === undefined) {
            logger.warn({ varName }, 'Environment variable not found, leaving unreplaced');
            return match;
        }
        return replacement;
    });
}

export function expandEnv(env: Record<string, string>, source: NodeJS.ProcessEnv = process.env): Record<string, string> {
    return _.mapValues(env, value => expandString(value, source));
}

/**
 * Host environment overlaid with the expanded overrides, with unset host
 * entries dropped so the result can be handed to `spawn`.
 */
export function buildProcessEnv(overrides: Record<string, string>, source: NodeJS.ProcessEnv = process.env): Record<string, string> {
    const inherited = _.pickBy(source, (value): value is string => value !== undefined);
    return {
        ...inherited,
        ...expandEnv(overrides, source),
    };
}
