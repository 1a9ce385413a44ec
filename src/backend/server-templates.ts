/**
 * Named tool server configurations
 *
 * Built-in templates launch the reference servers through `npx -y`. Entries
 * from tool-servers.json are layered on top and win on name clashes.
 */

import _ from 'lodash';
import {
    ToolServerConfigSchema,
    type ToolServerConfig,
    type ToolServerConfigInput,
    type ToolServerTemplate
} from '../types/config.js';
import { UnknownTemplateError } from './errors.js';

export const BUILTIN_TEMPLATES: Readonly<Record<string, ToolServerConfigInput>> = Object.freeze({
    filesystem: {
        name:        'filesystem',
        description: 'Local filesystem operations',
        command:     ['npx', '-y', '@modelcontextprotocol/server-filesystem'],
    },
    airtable: {
        name:        'airtable',
        description: 'Airtable operations',
        command:     ['npx', '-y', '@modelcontextprotocol/server-airtable'],
        env:         {
            AIRTABLE_API_KEY: '${AIRTABLE_API_KEY}',
            AIRTABLE_BASE_ID: '${AIRTABLE_BASE_ID}',
        },
    },
    postgresql: {
        name:        'postgresql',
        description: 'PostgreSQL operations',
        command:     ['npx', '-y', '@modelcontextprotocol/server-postgres'],
        env:         {
            POSTGRES_URL: '${POSTGRES_URL}',
        },
    },
});

/** Fields an override may replace */
const OVERRIDABLE_FIELDS = ['name', 'description', 'command', 'env', 'cwd', 'initTimeoutMs', 'requestTimeoutMs'] as const;

export type ToolServerOverrides = Partial<ToolServerConfigInput>;

export interface BuildConfigOptions {
    /** Working directory for `filesystem`, also passed to it as the allowed directory */
    root?:      string
    overrides?: ToolServerOverrides
    /** User templates, keyed by template name */
    templates?: Record<string, ToolServerTemplate>
}

export interface TemplateSummary {
    template:     string
    name:         string
    description?: string
    command:      string[]
    source:       'builtin' | 'config'
}

/**
 * Every template, user entries replacing built-ins of the same name
 */
export function resolveTemplates(templates: Record<string, ToolServerTemplate> = {}): Record<string, ToolServerConfigInput> {
    const fromConfig = _.mapValues(templates, (template, key): ToolServerConfigInput => ({
        ...template,
        name: template.name ?? key,
    }));
    return { ...BUILTIN_TEMPLATES, ...fromConfig };
}

export function listTemplates(templates: Record<string, ToolServerTemplate> = {}): TemplateSummary[] {
    const resolved = resolveTemplates(templates);
    return _.map(_.sortBy(_.keys(resolved)), (key): TemplateSummary => {
        const config = resolved[key];
        return {
            template:    key,
            name:        config?.name ?? key,
            description: config?.description,
            command:     config ? [...config.command] : [],
            source:      _.has(templates, key) ? 'config' : 'builtin',
        };
    });
}

/**
 * Build a validated config from a template name.
 *
 * `${VAR}` references in `env` are kept; they are expanded at spawn time.
 *
 * @throws UnknownTemplateError when no template has that name
 * @throws ZodError when the resulting config is invalid
 */
export function buildConfig(template: string, options: BuildConfigOptions = {}): ToolServerConfig {
    const resolved = resolveTemplates(options.templates);
    if(!_.has(resolved, template)) {
        throw new UnknownTemplateError(template);
    }
    const base = _.cloneDeep(resolved[template]);
    if(!base) {
        throw new UnknownTemplateError(template);
    }

    if(template === 'filesystem' && options.root !== undefined && options.root.length > 0) {
        base.cwd = options.root;
        base.command = [...base.command, options.root];
    }

    const overrides = _.pick(options.overrides ?? {}, OVERRIDABLE_FIELDS);
    return ToolServerConfigSchema.parse({ ...base, ..._.cloneDeep(overrides) });
}
