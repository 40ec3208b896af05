/**
 * Config utility
 *
 * Credential resolution (highest priority wins):
 * 1. Environment variables (SIDEFX_CLIENT_ID + SIDEFX_CLIENT_SECRET)
 * 2. Global config file (~/.config/sidefx-web/config.ini)
 * 3. Project-local .env (cwd fallback, feeds layer 1)
 *
 * The config file is INI with an [Auth] section for credentials and a
 * [Cache] section for the last access token. It is owned by a single CLI
 * process at a time: there is no locking, and two concurrent invocations
 * refreshing a token may overwrite each other's [Cache] section.
 *
 * Values are parsed with `ini`, where an unquoted `;` or `#` starts a
 * comment. Values this store writes are escaped and read back intact, but a
 * hand-written or foreign file holding such a character unescaped is read
 * up to that character only.
 */

import { config as dotenvConfig } from 'dotenv';
import ini from 'ini';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigKeyError, ConfigMissingError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

export const DEFAULT_ACCESS_TOKEN_URL = 'https://www.sidefx.com/oauth2/application_token';
export const DEFAULT_ENDPOINT_URL = 'https://www.sidefx.com/api/';
export const CREDENTIALS_HELP_URL = 'https://www.sidefx.com/docs/api/credentials/index.html';

const CONFIG_DIR_PATH = ['.config', 'sidefx-web'];
const CONFIG_FILE_NAME = 'config.ini';

const AUTH_SECTION = 'Auth';
const CACHE_SECTION = 'Cache';

// ── Paths ───────────────────────────────────────────

/**
 * Get config directory path (~/.config/sidefx-web/)
 */
export function getConfigDir(): string {
    return path.join(process.env.HOME || process.env.USERPROFILE || '/tmp', ...CONFIG_DIR_PATH);
}

export function getConfigFilePath(): string {
    return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

/**
 * Load a project-local .env without overriding variables already set
 */
export function loadDotenv(cwd: string = process.cwd()): void {
    const envPath = path.resolve(cwd, '.env');
    if (fs.existsSync(envPath)) {
        dotenvConfig({ path: envPath, override: false });
    }
}

// ── Types ───────────────────────────────────────────

export interface Credentials {
    clientId: string;
    clientSecret: string;
}

export interface CachedToken {
    accessToken: string;
    /** Unix timestamp in seconds */
    expiresAt: number;
}

/** Section name → key → value, as stored in the INI file */
export type ConfigSections = Record<string, Record<string, string>>;

export interface ConfigStoreOptions {
    filePath?: string;
    logger?: Logger;
}

// ── Store ───────────────────────────────────────────

export class ConfigStore {
    readonly filePath: string;
    private readonly logger: Logger;

    constructor(options: ConfigStoreOptions = {}) {
        this.filePath = options.filePath ?? getConfigFilePath();
        this.logger = options.logger ?? silentLogger;
    }

    exists(): boolean {
        return fs.existsSync(this.filePath);
    }

    read(): ConfigSections {
        if (!this.exists()) {
            throw new ConfigMissingError(this.filePath);
        }
        const parsed: unknown = ini.parse(fs.readFileSync(this.filePath, 'utf8'));
        return toSections(parsed);
    }

    write(sections: ConfigSections): void {
        const dir = path.dirname(this.filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
        }
        fs.writeFileSync(this.filePath, ini.stringify(sections, { whitespace: true }), { mode: 0o600 });
        this.logger.debug('Saved config file.');
    }

    loadCredentials(): Credentials {
        const envId = process.env.SIDEFX_CLIENT_ID;
        const envSecret = process.env.SIDEFX_CLIENT_SECRET;
        if (envId && envSecret) {
            return { clientId: envId, clientSecret: envSecret };
        }

        const auth = this.read()[AUTH_SECTION] ?? {};
        return {
            clientId: this.require(auth, 'client_id'),
            clientSecret: this.require(auth, 'client_secret_key'),
        };
    }

    /**
     * Credentials as saved in the file, ignoring the environment
     */
    readSavedCredentials(): Partial<Credentials> | null {
        if (!this.exists()) return null;

        const auth = this.read()[AUTH_SECTION] ?? {};
        return {
            clientId: auth.client_id || undefined,
            clientSecret: auth.client_secret_key || undefined,
        };
    }

    /**
     * Replace the file with fresh credentials. Any cached token belonged
     * to the previous credentials and is dropped.
     */
    saveCredentials(credentials: Credentials): void {
        this.write({
            [AUTH_SECTION]: {
                client_id: credentials.clientId,
                client_secret_key: credentials.clientSecret,
            },
        });
    }

    readCachedToken(): CachedToken | null {
        if (!this.exists()) return null;

        const cache = this.read()[CACHE_SECTION];
        const accessToken = cache?.access_token;
        const expiry = cache?.access_token_expiry;
        if (!accessToken || !expiry) return null;

        const expiresAt = Number(expiry);
        if (!Number.isFinite(expiresAt)) return null;

        return { accessToken, expiresAt };
    }

    saveCachedToken(token: CachedToken): void {
        const sections = this.exists() ? this.read() : {};
        sections[CACHE_SECTION] = {
            access_token: token.accessToken,
            access_token_expiry: String(token.expiresAt),
        };
        this.write(sections);
    }

    private require(section: Record<string, string>, key: string): string {
        const value = section[key];
        if (!value) {
            throw new ConfigKeyError(AUTH_SECTION, key, this.filePath);
        }
        return value;
    }
}

function toSections(parsed: unknown): ConfigSections {
    const sections: ConfigSections = {};
    if (!parsed || typeof parsed !== 'object') return sections;

    for (const [name, body] of Object.entries(parsed)) {
        if (!body || typeof body !== 'object') continue;
        const entries: Record<string, string> = {};
        for (const [key, value] of Object.entries(body)) {
            entries[key] = String(value);
        }
        sections[name] = entries;
    }
    return sections;
}
