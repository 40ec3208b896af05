/**
 * Program definition
 * Global options and subcommand registration, separate from cli.ts so
 * tests can parse argument lists without spawning a process.
 */

import { Command, Option } from 'commander';
import { createConfigCommand } from './commands/config.js';
import { createDownloadCommand } from './commands/download.js';
import { createListBuildsCommand } from './commands/list-builds.js';
import { runSetup } from './commands/setup.js';
import { createCommandLogger, getGlobalOptions, handleCommandError } from './commands/shared.js';
import { ConfigStore, DEFAULT_ACCESS_TOKEN_URL, DEFAULT_ENDPOINT_URL } from './utils/config.js';
import { VERSION } from './version.js';

export function createProgram(): Command {
    const program = new Command();

    program
        .name('sidefx-web')
        .description('CLI for the SideFX Web API')
        .version(VERSION)
        // global options go before the subcommand, so list-builds owns --version
        .enablePositionalOptions()
        .addOption(
            new Option('--access-token-url <url>', 'URL for the SideFX OAuth application token')
                .env('SIDEFX_ACCESS_TOKEN_URL')
                .default(DEFAULT_ACCESS_TOKEN_URL)
        )
        .addOption(
            new Option('--endpoint-url <url>', 'URL for the SideFX Web API endpoint')
                .env('SIDEFX_ENDPOINT_URL')
                .default(DEFAULT_ENDPOINT_URL)
        )
        .option('--debug', 'Enable DEBUG output')
        .option('-s, --setup', 'Setup configuration for SideFX Web API');

    program.addCommand(createDownloadCommand());
    program.addCommand(createListBuildsCommand());
    program.addCommand(createConfigCommand());

    // `sidefx-web --setup` with no subcommand
    program.action(async (_opts: unknown, command: Command) => {
        if (!getGlobalOptions(command).setup) {
            command.help();
        }

        const logger = createCommandLogger(command);
        try {
            await runSetup(new ConfigStore({ logger }), logger);
        } catch (error) {
            handleCommandError(error, logger, 'Setup');
        }
    });

    return program;
}
