/**
 * List Builds CLI Command
 * sidefx-web list-builds <product> [--version V] [--platform P] [--only-production]
 */

import { Argument, Command, Option } from 'commander';
import { PLATFORMS, PRODUCTS, type DailyBuild } from '../api/DownloadApi.js';
import { printTable } from '../utils/formatter.js';
import { createCommandLogger, createContext, handleCommandError, unwrapResult } from './shared.js';

interface ListBuildsOptions {
    version?: string;
    platform?: string;
    onlyProduction?: boolean;
    json?: boolean;
}

function cell(value: string | number | undefined): string {
    return value === undefined ? '-' : String(value);
}

export function printBuilds(builds: DailyBuild[], asJson: boolean): void {
    if (asJson) {
        for (const build of builds) {
            console.log(JSON.stringify(build));
        }
        return;
    }

    printTable(
        ['Version', 'Build', 'Platform', 'Date', 'Release', 'Status'],
        builds.map((b) => [
            cell(b.version),
            cell(b.build),
            cell(b.platform),
            cell(b.date),
            cell(b.release),
            cell(b.status),
        ])
    );
}

export function createListBuildsCommand(): Command {
    return new Command('list-builds')
        .description('List SideFX products available for download')
        .addArgument(new Argument('<product>', 'Product to list').choices(PRODUCTS))
        .option('--version <version>', 'The major version of Houdini, e.g. 16.5, 17.0')
        .addOption(
            new Option('--platform <platform>', 'The operating system to install Houdini on').choices(PLATFORMS)
        )
        .option('--only-production', 'Only return the production builds')
        .option('--json', 'Print one JSON document per build')
        .action(async (product: string, opts: ListBuildsOptions, command: Command) => {
            const logger = createCommandLogger(command);
            try {
                const { client } = await createContext(command, logger);
                const result = await client.download.getDailyBuildsList(
                    product,
                    opts.version,
                    opts.platform,
                    opts.onlyProduction
                );
                const builds = unwrapResult(result, logger);

                if (builds.length === 0 && !opts.json) {
                    logger.info(`No builds found for ${product}`);
                    return;
                }

                printBuilds(builds, opts.json === true);
            } catch (error) {
                handleCommandError(error, logger, 'Listing builds');
            }
        });
}
