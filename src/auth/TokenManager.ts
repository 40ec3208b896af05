/**
 * Token Manager
 * Manages token lifecycle: cache lookup, client-credentials fetch, persistence
 */

import type { TokenStore, CachedToken } from './TokenStore.js';
import { ClientCredentialsFlow, type TokenSource } from './ClientCredentialsFlow.js';
import { maskSecret, silentLogger, type Logger } from '../utils/logger.js';

export interface TokenManagerConfig {
    clientId: string;
    clientSecret: string;
    accessTokenUrl?: string;
    store: TokenStore;
    logger?: Logger;
    flow?: TokenSource;
}

export interface AuthStatus {
    cached: boolean;
    expiresAt?: Date;
    isExpired?: boolean;
}

/**
 * A token is usable while its expiry has not passed
 */
export function isTokenValid(token: CachedToken, nowSeconds: number = Date.now() / 1000): boolean {
    return token.expiresAt >= nowSeconds;
}

export class TokenManager {
    private readonly config: TokenManagerConfig;
    private readonly flow: TokenSource;
    private readonly store: TokenStore;
    private readonly logger: Logger;
    private cachedToken: CachedToken | null = null;

    constructor(config: TokenManagerConfig) {
        this.config = config;
        this.store = config.store;
        this.logger = config.logger ?? silentLogger;
        this.flow =
            config.flow ??
            new ClientCredentialsFlow({
                clientId: config.clientId,
                clientSecret: config.clientSecret,
                accessTokenUrl: config.accessTokenUrl,
            });
    }

    /**
     * Return the cached token while it is valid, otherwise fetch and
     * persist a new one. Nothing is written when the fetch fails.
     */
    async ensureToken(): Promise<CachedToken> {
        const cached = await this.getCachedToken();

        this.logger.debug(`Access Token URL: ${this.flow.accessTokenUrl}`);
        this.logger.debug(`Client ID: ${this.config.clientId}`);
        this.logger.debug(`Client Secret Key: ${maskSecret(this.config.clientSecret)}`);
        this.logger.debug(`Cached Access Token: ${cached?.accessToken ?? 'none'}`);
        this.logger.debug(`Cached Access Token Expiry: ${cached?.expiresAt ?? 'none'}`);

        if (cached && isTokenValid(cached)) {
            return cached;
        }

        this.logger.info('Fetching a new token.');
        const token = await this.flow.requestToken();
        await this.store.save(token);
        this.cachedToken = token;

        this.logger.debug(`Access Token: ${token.accessToken}`);
        this.logger.debug(`Access Token Expiry Time: ${token.expiresAt}`);

        return token;
    }

    async getAccessToken(): Promise<string> {
        const token = await this.ensureToken();
        return token.accessToken;
    }

    async getStatus(): Promise<AuthStatus> {
        const token = await this.getCachedToken();

        if (!token) {
            return { cached: false };
        }

        return {
            cached: true,
            expiresAt: new Date(token.expiresAt * 1000),
            isExpired: !isTokenValid(token),
        };
    }

    private async getCachedToken(): Promise<CachedToken | null> {
        if (this.cachedToken) {
            return this.cachedToken;
        }

        this.cachedToken = await this.store.load();
        return this.cachedToken;
    }
}
