/**
 * Download CLI Command
 * sidefx-web download <product> <version> <build> <platform>
 */

import { Argument, Command } from 'commander';
import ora from 'ora';
import * as path from 'path';
import { PLATFORMS, PRODUCTS } from '../api/DownloadApi.js';
import { formatProgress } from '../utils/formatter.js';
import { createCommandLogger, createContext, handleCommandError, unwrapResult } from './shared.js';

interface DownloadOptions {
    outputDir: string;
}

export function createDownloadCommand(): Command {
    return new Command('download')
        .description('Download a SideFX product')
        .addArgument(new Argument('<product>', 'Product to download').choices(PRODUCTS))
        .argument('<version>', 'The major version of Houdini, e.g. 16.5, 17.0')
        .argument('<build>', 'A build number, e.g. 382, or "production" for the latest production build')
        .addArgument(new Argument('<platform>', 'The operating system to install Houdini on').choices(PLATFORMS))
        .option('-o, --output-dir <dir>', 'Directory to save the file in', '.')
        .action(
            async (
                product: string,
                version: string,
                build: string,
                platform: string,
                opts: DownloadOptions,
                command: Command
            ) => {
                const logger = createCommandLogger(command);
                try {
                    const { client } = await createContext(command, logger);
                    const result = await client.download.getDailyBuildDownload(product, version, build, platform);
                    const info = unwrapResult(result, logger);
                    logger.debug(JSON.stringify(info));

                    const label = `Downloading ${info.filename}`;
                    const spinner = ora(label).start();
                    try {
                        const destination = await client.downloadBuild(
                            info,
                            path.resolve(opts.outputDir),
                            (received, total) => {
                                spinner.text = `${label} ${formatProgress(received, total)}`;
                            }
                        );
                        spinner.succeed(`Saved ${destination}`);
                    } catch (error) {
                        spinner.fail(label);
                        throw error;
                    }
                } catch (error) {
                    handleCommandError(error, logger, 'Download');
                }
            }
        );
}
