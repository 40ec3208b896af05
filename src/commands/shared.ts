/**
 * Shared command utilities
 * Common helpers used across all CLI command modules
 */

import type { Command } from 'commander';
import { SideFxClient } from '../client/SideFxClient.js';
import { describeFailure, type RpcResult } from '../client/HttpClient.js';
import { ConfigStore, type Credentials } from '../utils/config.js';
import { ConfigMissingError, TokenRequestError, errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { runSetup, type Prompt } from './setup.js';

export type GlobalOptions = {
    accessTokenUrl: string;
    endpointUrl: string;
    debug?: boolean;
    setup?: boolean;
};

export interface CommandContext {
    logger: Logger;
    store: ConfigStore;
    client: SideFxClient;
}

export function getGlobalOptions(command: Command): GlobalOptions {
    return command.optsWithGlobals<GlobalOptions>();
}

export function createCommandLogger(command: Command): Logger {
    return createLogger({ debug: getGlobalOptions(command).debug === true });
}

/**
 * Load credentials, prompting for them when the config file is missing.
 */
export async function resolveCredentials(store: ConfigStore, logger: Logger, prompt?: Prompt): Promise<Credentials> {
    try {
        return store.loadCredentials();
    } catch (error) {
        if (!(error instanceof ConfigMissingError)) throw error;
        logger.debug(error.message);
        return runSetup(store, logger, prompt);
    }
}

/**
 * Creates an authenticated SideFxClient from the global options and the
 * saved configuration. Runs setup first when --setup was given.
 */
export async function createContext(command: Command, logger: Logger): Promise<CommandContext> {
    const opts = getGlobalOptions(command);
    const store = new ConfigStore({ logger });

    if (opts.setup) {
        await runSetup(store, logger);
    }

    const credentials = await resolveCredentials(store, logger);
    const client = new SideFxClient({
        ...credentials,
        accessTokenUrl: opts.accessTokenUrl,
        endpointUrl: opts.endpointUrl,
        configStore: store,
        logger,
    });

    return { logger, store, client };
}

/**
 * Report a failed command and exit with code 1
 */
export function handleCommandError(error: unknown, logger: Logger, action: string): never {
    if (error instanceof TokenRequestError) {
        logger.error(`ERROR: ${error.message}`);
    } else {
        logger.error(`${action} failed: ${errorMessage(error)}`);
    }
    process.exit(1);
}

/**
 * Return the data of a successful RPC result, or report the failure and
 * exit with code 1
 */
export function unwrapResult<T>(result: RpcResult<T>, logger: Logger): T {
    if (result.ok) return result.data;

    logger.error(`API call failed: ${describeFailure(result)}`);
    if (result.kind === 'http' && result.body) {
        logger.debug(result.body);
    }
    process.exit(1);
}
