/**
 * Interactive setup
 * Prompts for API credentials and saves them to config.ini
 */

import * as readline from 'readline';
import chalk from 'chalk';
import { CREDENTIALS_HELP_URL, type ConfigStore, type Credentials } from '../utils/config.js';
import { SetupAbortedError } from '../utils/errors.js';
import { maskSecret, type Logger } from '../utils/logger.js';

/** Resolves with the answer, or with `defaultValue` when the answer is blank */
export type Prompt = (question: string, defaultValue?: string) => Promise<string>;

/**
 * Prompt over a readline interface. Every pending or later question
 * rejects with SetupAbortedError once the interface closes, which is what
 * happens when stdin reaches EOF.
 */
export function readlinePrompt(rl: readline.Interface): Prompt {
    let closed = false;
    rl.once('close', () => {
        closed = true;
    });

    return (prompt, defaultValue) =>
        new Promise((resolve, reject) => {
            if (closed) {
                reject(new SetupAbortedError());
                return;
            }
            const onClose = () => reject(new SetupAbortedError());
            rl.once('close', onClose);

            const display = defaultValue ? `${prompt} ${chalk.dim(`(${defaultValue})`)} ` : `${prompt} `;
            rl.question(display, (answer) => {
                rl.off('close', onClose);
                resolve(answer.trim() || defaultValue || '');
            });
        });
}

/**
 * Ask for Client ID and Client Secret Key and overwrite the config file.
 * Existing credentials are offered as defaults, the secret masked.
 */
export async function runSetup(store: ConfigStore, logger: Logger, prompt?: Prompt): Promise<Credentials> {
    logger.info('Credentials are needed in order to use the SideFX Web API.');
    logger.dim(`  Detailed instructions available at ${CREDENTIALS_HELP_URL}`);

    const existing = store.readSavedCredentials();
    let rl: readline.Interface | undefined;
    let question: Prompt;
    if (prompt) {
        question = prompt;
    } else {
        // prompts on stderr keep stdout for command results
        rl = readline.createInterface({ input: process.stdin, output: process.stderr });
        question = readlinePrompt(rl);
    }

    let clientId: string;
    let answeredSecret: string;
    try {
        clientId = await question('Enter your Client ID:', existing?.clientId);
        answeredSecret = await question(
            'Enter your Client Secret Key:',
            existing?.clientSecret ? maskSecret(existing.clientSecret) : undefined
        );
    } finally {
        rl?.close();
    }

    // If the masked default was accepted, keep the original
    const clientSecret =
        answeredSecret.startsWith('••••••') && existing?.clientSecret ? existing.clientSecret : answeredSecret;

    if (!clientId || !clientSecret) {
        throw new Error('Client ID and Client Secret Key are required');
    }

    logger.debug(`Set Client ID to ${clientId}`);
    logger.debug(`Set Client Secret Key to ${maskSecret(clientSecret)}`);

    const credentials = { clientId, clientSecret };
    store.saveCredentials(credentials);
    logger.success(`Configuration saved to ${store.filePath}`);
    return credentials;
}
