/**
 * Tests for named server templates and buildConfig
 */

import { describe, it, expect } from 'vitest';
import _ from 'lodash';
import { BUILTIN_TEMPLATES, buildConfig, listTemplates, resolveTemplates } from '../../src/backend/server-templates.js';
import { UnknownTemplateError } from '../../src/backend/errors.js';
import { ToolServersConfigSchema, type ToolServerTemplate } from '../../src/types/config.js';

function userTemplates(raw: Record<string, unknown>): Record<string, ToolServerTemplate> {
    return ToolServersConfigSchema.parse({ toolServers: raw }).toolServers;
}

describe('buildConfig', () => {
    it('builds the filesystem template with defaults', () => {
        expect(buildConfig('filesystem')).toEqual({
            name:             'filesystem',
            description:      'Local filesystem operations',
            command:          ['npx', '-y', '@modelcontextprotocol/server-filesystem'],
            env:              {},
            initTimeoutMs:    15000,
            requestTimeoutMs: 20000,
        });
    });

    it('sets cwd and the allowed directory for filesystem when a root is given', () => {
        const config = buildConfig('filesystem', { root: '/srv/project' });

        expect(config.cwd).toBe('/srv/project');
        expect(config.command).toEqual(['npx', '-y', '@modelcontextprotocol/server-filesystem', '/srv/project']);
    });

    it('ignores root for other templates', () => {
        const config = buildConfig('postgresql', { root: '/srv/project' });

        expect(config.cwd).toBeUndefined();
        expect(config.command).toEqual(['npx', '-y', '@modelcontextprotocol/server-postgres']);
    });

    it('keeps ${VAR} references unexpanded', () => {
        expect(buildConfig('airtable').env).toEqual({
            AIRTABLE_API_KEY: '${AIRTABLE_API_KEY}',
            AIRTABLE_BASE_ID: '${AIRTABLE_BASE_ID}',
        });
    });

    it('applies overrides to known fields only', () => {
        const overrides = { requestTimeoutMs: 500, description: 'Scratch database', unknownField: 'ignored' };
        const config = buildConfig('postgresql', { overrides });

        expect(config.requestTimeoutMs).toBe(500);
        expect(config.description).toBe('Scratch database');
        expect(_.has(config, 'unknownField')).toBe(false);
    });

    it('never changes the built-in template', () => {
        buildConfig('filesystem', { root: '/tmp/a', overrides: { env: { A: '1' } } });

        expect(BUILTIN_TEMPLATES.filesystem?.command).toEqual(['npx', '-y', '@modelcontextprotocol/server-filesystem']);
        expect(BUILTIN_TEMPLATES.filesystem?.env).toBeUndefined();
        expect(BUILTIN_TEMPLATES.filesystem?.cwd).toBeUndefined();
    });

    it('rejects overrides that make the config invalid', () => {
        expect(() => buildConfig('filesystem', { overrides: { command: [] } })).toThrow();
    });

    it('throws UnknownTemplateError for unknown names', () => {
        expect(() => buildConfig('mongodb')).toThrow(UnknownTemplateError);
        expect(() => buildConfig('toString')).toThrow(UnknownTemplateError);
    });

    it('prefers a configured template over the built-in of the same name', () => {
        const templates = userTemplates({
            filesystem: { command: ['node', 'local-fs.js'] },
            local:      { name: 'local-tools', command: ['node', 'tools.js'], env: { TOKEN: '${TOKEN}' } },
        });

        expect(buildConfig('filesystem', { templates }).command).toEqual(['node', 'local-fs.js']);
        expect(buildConfig('filesystem', { templates }).name).toBe('filesystem');
        expect(buildConfig('local', { templates })).toEqual({
            name:             'local-tools',
            command:          ['node', 'tools.js'],
            env:              { TOKEN: '${TOKEN}' },
            initTimeoutMs:    15000,
            requestTimeoutMs: 20000,
        });
    });
});

describe('listTemplates', () => {
    it('lists built-ins and configured templates sorted by name', () => {
        const templates = userTemplates({ local: { command: ['node', 'tools.js'], description: 'Local tools' } });
        const summaries = listTemplates(templates);

        expect(_.map(summaries, 'template')).toEqual(['airtable', 'filesystem', 'local', 'postgresql']);
        expect(_.find(summaries, { template: 'local' })).toEqual({
            template:    'local',
            name:        'local',
            description: 'Local tools',
            command:     ['node', 'tools.js'],
            source:      'config',
        });
        expect(_.find(summaries, { template: 'airtable' })?.source).toBe('builtin');
    });
});

describe('resolveTemplates', () => {
    it('uses the map key as the name of configured templates without one', () => {
        const resolved = resolveTemplates(userTemplates({ scratch: { command: ['node'] } }));
        expect(resolved.scratch?.name).toBe('scratch');
    });
});
