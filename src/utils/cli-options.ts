/**
 * Argument parsers for the tool-servers CLI
 */

import { InvalidArgumentError } from 'commander';
import _ from 'lodash';
import { MAX_TIMER_DELAY_MS, isValidTimeout } from './timeout.js';

/**
 * commander option parser for `--timeout <ms>`
 *
 * @throws InvalidArgumentError unless the value is a whole number of
 *         milliseconds a timer can hold
 */
export function parseTimeoutOption(value: string): number {
    const trimmed = _.trim(value);
    const timeoutMs = /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
    if(!isValidTimeout(timeoutMs)) {
        throw new InvalidArgumentError(`Expected a whole number of milliseconds from 1 to ${MAX_TIMER_DELAY_MS}.`);
    }
    return timeoutMs;
}

/**
 * Parse the optional JSON argument object of `call`
 */
export function parseToolArguments(json: string | undefined): Record<string, unknown> {
    if(json === undefined || _.trim(json).length === 0) {
        return {};
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (error) {
        throw new Error(`Tool arguments are not valid JSON: ${_.isError(error) ? error.message : String(error)}`);
    }
    if(!_.isPlainObject(parsed) || !_.isObject(parsed)) {
        throw new Error('Tool arguments must be a JSON object');
    }
    return { ...parsed };
}
