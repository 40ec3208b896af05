/**
 * Config CLI Commands
 * sidefx-web config show | path
 */

import { Command } from 'commander';
import { ConfigStore } from '../utils/config.js';
import { formatDate } from '../utils/formatter.js';
import { maskSecret } from '../utils/logger.js';
import { isTokenValid } from '../auth/TokenManager.js';
import { createCommandLogger, handleCommandError } from './shared.js';

export function createConfigCommand(): Command {
    const config = new Command('config').description('Inspect the sidefx-web configuration');

    // ── config show ──────────────────────────────────
    config
        .command('show')
        .description('Display current configuration (secrets masked)')
        .action((_opts: unknown, command: Command) => {
            const logger = createCommandLogger(command);
            try {
                const store = new ConfigStore({ logger });
                const saved = store.readSavedCredentials();

                if (!saved) {
                    logger.warn('No configuration found. Run: sidefx-web --setup');
                    return;
                }

                logger.header('SideFX Web API Configuration');
                logger.kv('Config File', store.filePath);
                console.log();
                logger.kv('Client ID', saved.clientId ?? '-');
                logger.kv('Client Secret Key', saved.clientSecret ? maskSecret(saved.clientSecret) : '-');

                const token = store.readCachedToken();
                if (token) {
                    logger.kv('Token Expires', formatDate(token.expiresAt * 1000));
                    logger.kv('Expired', isTokenValid(token) ? 'No' : 'Yes');
                } else {
                    logger.kv('Cached Token', 'none');
                }
            } catch (error) {
                handleCommandError(error, logger, 'Reading configuration');
            }
        });

    // ── config path ──────────────────────────────────
    config
        .command('path')
        .description('Print the config file path')
        .action(() => {
            console.log(new ConfigStore().filePath);
        });

    return config;
}
