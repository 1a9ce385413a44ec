/**
 * Tool Servers CLI Entry Point
 *
 * Modes:
 * - templates: List built-in and configured server templates
 * - tools <template>: Start a server from a template and print its tools
 * - call <template> <tool> [json]: Start a server, call one tool, print the result
 * - validate: Validate the configuration file
 * - config-path: Show the configuration directory path
 */

import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import _ from 'lodash';
import { ToolServerClient } from './backend/tool-server-client.js';
import { ToolServerActions } from './backend/tool-server-actions.js';
import { buildConfig, listTemplates } from './backend/server-templates.js';
import { loadToolServersConfig } from './utils/config-loader.js';
import { parseTimeoutOption, parseToolArguments } from './utils/cli-options.js';

interface PackageJson {
    version:     string
    description: string
}

interface StartOptions {
    root?:    string
    project?: string
}

const packageJson = JSON.parse(await readFile(fileURLToPath(new URL('../package.json', import.meta.url)), 'utf-8')) as PackageJson;

/**
 * Start one server from a template, run `body` against it, and always stop it
 */
async function withServer<T>(template: string, options: StartOptions, body: (actions: ToolServerActions, serverId: string) => Promise<T>): Promise<T> {
    const config = await loadToolServersConfig();
    const client = new ToolServerClient({ clientInfo: { name: 'tool-servers-cli', version: packageJson.version } });
    const actions = new ToolServerActions(client, config.toolServers);

    const stopOnSignal = (): void => {
        void client.shutdownAll().finally(() => process.exit(130));
    };
    process.once('SIGINT', stopOnSignal);

    try {
        const { serverId } = await actions.startServer({ template, root: options.root, projectName: options.project });
        return await body(actions, serverId);
    } finally {
        process.removeListener('SIGINT', stopOnSignal);
        await client.shutdownAll();
    }
}

const program = new Command();

program
    .name('tool-servers')
    .description(packageJson.description)
    .version(packageJson.version);

program
    .command('templates')
    .description('List built-in and configured tool server templates')
    .action(async () => {
        const config = await loadToolServersConfig();
        // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
        console.log('\nTool server templates:\n');
        for(const summary of listTemplates(config.toolServers)) {
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log(`  ${summary.template}${summary.source === 'config' ? ' (configured)' : ''}`);
            if(summary.description) {
                // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
                console.log(`    ${summary.description}`);
            }
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log(`    Command: ${summary.command.join(' ')}`);
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log();
        }
    });

program
    .command('tools')
    .description('Start a tool server and list the tools it offers')
    .argument('<template>', 'Template to start')
    .option('-r, --root <dir>', 'Root directory for servers that take one')
    .option('-p, --project <name>', 'Project the server belongs to')
    .action(async (template: string, options: StartOptions) => {
        const tools = await withServer(template, options, async (actions, serverId) => actions.listTools({ serverId }).tools);

        if(tools.length === 0) {
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log('No tools offered.');
            return;
        }
        for(const tool of tools) {
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log(`  ${tool.name}`);
            if(tool.description) {
                // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
                console.log(`    ${tool.description}`);
            }
        }
    });

program
    .command('call')
    .description('Start a tool server, call one tool and print the result as JSON')
    .argument('<template>', 'Template to start')
    .argument('<tool>', 'Tool name')
    .argument('[json]', 'Tool arguments as a JSON object')
    .option('-r, --root <dir>', 'Root directory for servers that take one')
    .option('-p, --project <name>', 'Project the server belongs to')
    .option('-t, --timeout <ms>', 'Request timeout in milliseconds', parseTimeoutOption)
    .action(async (template: string, toolName: string, json: string | undefined, options: StartOptions & { timeout?: number }) => {
        const args = parseToolArguments(json);
        const { result } = await withServer(template, options, async (actions, serverId) => actions.callTool({
            serverId,
            toolName,
            arguments: args,
            timeoutMs: options.timeout,
        }));
        // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
        console.log(JSON.stringify(result, null, 2));
    });

program
    .command('validate')
    .description('Validate the configuration file')
    .action(async () => {
        try {
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log('Validating configuration file...');

            const config = await loadToolServersConfig();
            for(const template of _.keys(config.toolServers)) {
                buildConfig(template, { templates: config.toolServers });
                // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
                console.log(`✓ ${template}`);
            }

            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log('\nConfiguration is valid.');
        } catch (error) {
            // eslint-disable-next-line no-console -- CLI error message to stderr is appropriate
            console.error('\nValidation failed:', _.isError(error) ? error.message : String(error));
            throw error;
        }
    });

program
    .command('config-path')
    .description('Show the configuration directory path')
    .option('-v, --verbose', 'Show the config file path as well')
    .action(async (options: { verbose?: boolean }) => {
        const { ensureConfigDir, getToolServersConfigPath } = await import('./utils/config-paths.js');
        const configDir = await ensureConfigDir();

        if(options.verbose) {
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log(`  Config directory: ${configDir}`);
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log(`  Tool servers:     ${getToolServersConfigPath()}`);
        } else {
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log(configDir);
        }
    });

await program.parseAsync();
