/**
 * SideFX Client
 * Main facade wiring config, token cache, RPC transport and the APIs
 */

import * as path from 'path';
import { TokenManager, ConfigTokenStore, type AuthStatus, type TokenStore } from '../auth/index.js';
import { HttpClient } from './HttpClient.js';
import { DownloadApi, type BuildDownload } from '../api/DownloadApi.js';
import { ConfigStore, type Credentials } from '../utils/config.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface SideFxClientConfig extends Credentials {
    accessTokenUrl?: string;
    endpointUrl?: string;
    configStore?: ConfigStore;
    tokenStore?: TokenStore;
    logger?: Logger;
}

export class SideFxClient {
    private readonly tokenManager: TokenManager;
    private readonly httpClient: HttpClient;

    // API clients
    public readonly download: DownloadApi;

    constructor(config: SideFxClientConfig) {
        const logger = config.logger ?? silentLogger;
        const store = config.tokenStore ?? new ConfigTokenStore(config.configStore ?? new ConfigStore({ logger }));

        this.tokenManager = new TokenManager({
            clientId: config.clientId,
            clientSecret: config.clientSecret,
            accessTokenUrl: config.accessTokenUrl,
            store,
            logger,
        });

        this.httpClient = new HttpClient({
            endpointUrl: config.endpointUrl,
            tokenManager: this.tokenManager,
            logger,
        });

        this.download = new DownloadApi(this.httpClient);
    }

    // ── Auth ──────────────────────────────────────────

    async getAuthStatus(): Promise<AuthStatus> {
        return this.tokenManager.getStatus();
    }

    async getAccessToken(): Promise<string> {
        return this.tokenManager.getAccessToken();
    }

    // ── Convenience ───────────────────────────────────

    /**
     * Save a resolved build into `directory`. Only the base name of the
     * server-supplied filename is used. Resolves with the written path.
     */
    async downloadBuild(
        info: BuildDownload,
        directory: string,
        onProgress?: (received: number, total: number | undefined) => void
    ): Promise<string> {
        const destination = path.join(directory, path.basename(info.filename));
        await this.httpClient.download(info.download_url, destination, onProgress);
        return destination;
    }
}
