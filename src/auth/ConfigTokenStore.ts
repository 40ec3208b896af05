/**
 * Config Token Store
 * Persists the access token in the [Cache] section of config.ini
 */

import type { ConfigStore } from '../utils/config.js';
import type { TokenStore, CachedToken } from './TokenStore.js';

export class ConfigTokenStore implements TokenStore {
    constructor(private readonly config: ConfigStore) {}

    async load(): Promise<CachedToken | null> {
        return this.config.readCachedToken();
    }

    async save(token: CachedToken): Promise<void> {
        this.config.saveCachedToken(token);
    }
}
