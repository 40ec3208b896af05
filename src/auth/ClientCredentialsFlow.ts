/**
 * Client Credentials Flow
 * OAuth2 application token for the SideFX Web API
 */

import axios from 'axios';
import { z } from 'zod';
import type { CachedToken } from './TokenStore.js';
import { TokenRequestError, errorMessage } from '../utils/errors.js';
import { DEFAULT_ACCESS_TOKEN_URL } from '../utils/config.js';

// Token is treated as expired 2 seconds early
const EXPIRY_MARGIN_SECONDS = 2;

const TokenResponseSchema = z
    .object({
        access_token: z.string().min(1),
        expires_in: z.number(),
        token_type: z.string().optional(),
        scope: z.string().optional(),
    })
    .passthrough();

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

export interface ClientCredentialsConfig {
    clientId: string;
    clientSecret: string;
    accessTokenUrl?: string;
}

/**
 * Anything that can mint a fresh token
 */
export interface TokenSource {
    readonly accessTokenUrl: string;
    requestToken(): Promise<CachedToken>;
}

export class ClientCredentialsFlow implements TokenSource {
    private readonly config: ClientCredentialsConfig;
    readonly accessTokenUrl: string;

    constructor(config: ClientCredentialsConfig) {
        this.config = config;
        this.accessTokenUrl = config.accessTokenUrl || DEFAULT_ACCESS_TOKEN_URL;
    }

    basicAuthorization(): string {
        const encoded = Buffer.from(`${this.config.clientId}:${this.config.clientSecret}`).toString('base64');
        return `Basic ${encoded}`;
    }

    /**
     * Request a new application token. Makes exactly one HTTP call.
     */
    async requestToken(): Promise<CachedToken> {
        const response = await axios
            .post<unknown>(this.accessTokenUrl, undefined, {
                headers: { Authorization: this.basicAuthorization() },
                validateStatus: () => true,
            })
            .catch((error: unknown) => {
                throw new TokenRequestError(errorMessage(error));
            });

        if (response.status !== 200) {
            throw new TokenRequestError(response.statusText, response.status);
        }

        const parsed = TokenResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new TokenRequestError(`Unexpected token response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
        }

        return {
            accessToken: parsed.data.access_token,
            expiresAt: Date.now() / 1000 - EXPIRY_MARGIN_SECONDS + parsed.data.expires_in,
        };
    }
}
