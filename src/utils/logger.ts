/**
 * Logger utility
 * Chalk-based colored console output. Each command builds its own logger
 * from the global flags and hands it to the components it creates.
 *
 * Status lines (info, success, warn, error, dim, debug) go to stderr.
 * Only command results (header, kv, and what commands print themselves)
 * go to stdout, so `list-builds --json | jq` sees JSON alone.
 */

import chalk from 'chalk';

export interface Logger {
    readonly debugEnabled: boolean;
    info(msg: string): void;
    success(msg: string): void;
    warn(msg: string): void;
    error(msg: string): void;
    debug(msg: string): void;
    dim(msg: string): void;
    header(title: string): void;
    kv(key: string, value: string | number | boolean): void;
}

export interface LoggerOptions {
    debug?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const debugEnabled = options.debug === true;

    return {
        debugEnabled,
        info: (msg) => console.error(chalk.blue('ℹ'), msg),
        success: (msg) => console.error(chalk.green('✔'), msg),
        warn: (msg) => console.error(chalk.yellow('⚠'), msg),
        error: (msg) => console.error(chalk.red('✖'), msg),
        debug: (msg) => {
            if (debugEnabled) console.error(chalk.dim('DEBUG'), chalk.dim(msg));
        },
        dim: (msg) => console.error(chalk.dim(msg)),

        header: (title) => {
            console.log();
            console.log(chalk.bold.underline(title));
            console.log();
        },

        kv: (key, value) => {
            console.log(`  ${chalk.dim(key + ':')} ${value}`);
        },
    };
}

const MASK = '••••••';
const MIN_REVEAL_LENGTH = 8;

/**
 * Mask a secret down to its last four characters. Secrets shorter than
 * eight characters are masked entirely.
 */
export function maskSecret(secret: string): string {
    if (secret.length < MIN_REVEAL_LENGTH) return MASK;
    return MASK + secret.slice(-4);
}

/** Logger that discards everything, for library callers that pass none */
export const silentLogger: Logger = {
    debugEnabled: false,
    info: () => {},
    success: () => {},
    warn: () => {},
    error: () => {},
    debug: () => {},
    dim: () => {},
    header: () => {},
    kv: () => {},
};
