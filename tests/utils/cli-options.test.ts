/**
 * Tests for the CLI argument parsers
 */

import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseTimeoutOption, parseToolArguments } from '../../src/utils/cli-options.js';

describe('parseTimeoutOption', () => {
    it('parses whole milliseconds', () => {
        expect(parseTimeoutOption('250')).toBe(250);
        expect(parseTimeoutOption(' 42 ')).toBe(42);
        expect(parseTimeoutOption('2147483647')).toBe(2147483647);
    });

    it.each(['abc', '', '0', '-5', '1.5', '10ms', '3000000000'])('rejects %j', (value) => {
        expect(() => parseTimeoutOption(value)).toThrow(InvalidArgumentError);
    });

    it('explains the accepted range', () => {
        expect(() => parseTimeoutOption('abc')).toThrow('Expected a whole number of milliseconds from 1 to 2147483647.');
    });
});

describe('parseToolArguments', () => {
    it('treats a missing or blank argument as no arguments', () => {
        expect(parseToolArguments(undefined)).toEqual({});
        expect(parseToolArguments('   ')).toEqual({});
    });

    it('parses a JSON object', () => {
        expect(parseToolArguments('{"text":"hello","count":2}')).toEqual({ text: 'hello', count: 2 });
    });

    it('rejects invalid JSON', () => {
        expect(() => parseToolArguments('{text')).toThrow(/^Tool arguments are not valid JSON: /);
    });

    it('rejects JSON that is not an object', () => {
        expect(() => parseToolArguments('[1,2]')).toThrow('Tool arguments must be a JSON object');
        expect(() => parseToolArguments('"text"')).toThrow('Tool arguments must be a JSON object');
    });
});
