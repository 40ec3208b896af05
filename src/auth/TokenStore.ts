/**
 * Token Storage Interface
 */

import type { CachedToken } from '../utils/config.js';

export type { CachedToken };

export interface TokenStore {
    load(): Promise<CachedToken | null>;
    save(token: CachedToken): Promise<void>;
}
