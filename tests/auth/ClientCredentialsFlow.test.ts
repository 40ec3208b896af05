/**
 * Tests for ClientCredentialsFlow
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { ClientCredentialsFlow } from '../../src/auth/ClientCredentialsFlow.js';
import { TokenRequestError } from '../../src/utils/errors.js';
import { DEFAULT_ACCESS_TOKEN_URL } from '../../src/utils/config.js';
import { startServer, unreachableUrl, type TestServer } from '../helpers/server.js';

describe('ClientCredentialsFlow', () => {
    const credentials = { clientId: 'test-id', clientSecret: 'test-secret' };
    let server: TestServer | undefined;

    afterEach(async () => {
        vi.restoreAllMocks();
        await server?.close();
        server = undefined;
    });

    it('should default to the SideFX token URL', () => {
        const flow = new ClientCredentialsFlow(credentials);
        expect(flow.accessTokenUrl).toBe(DEFAULT_ACCESS_TOKEN_URL);
    });

    it('should build a Basic authorization header from id and secret', () => {
        const flow = new ClientCredentialsFlow(credentials);
        expect(flow.basicAuthorization()).toBe('Basic dGVzdC1pZDp0ZXN0LXNlY3JldA==');
    });

    it('should POST with Basic auth and compute expiry with a 2 second margin', async () => {
        server = await startServer(() => ({ status: 200, body: { access_token: 'T', expires_in: 100 } }));
        vi.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);

        const flow = new ClientCredentialsFlow({ ...credentials, accessTokenUrl: `${server.url}/oauth2/application_token` });
        const token = await flow.requestToken();

        expect(token).toEqual({ accessToken: 'T', expiresAt: 1_700_000_098 });
        expect(server.requests).toHaveLength(1);
        expect(server.requests[0].method).toBe('POST');
        expect(server.requests[0].url).toBe('/oauth2/application_token');
        expect(server.requests[0].headers.authorization).toBe('Basic dGVzdC1pZDp0ZXN0LXNlY3JldA==');
    });

    it('should reject with the status and reason on a non-200 response', async () => {
        server = await startServer(() => ({ status: 403, body: { error: 'invalid_client' } }));
        const flow = new ClientCredentialsFlow({ ...credentials, accessTokenUrl: server.url });

        const error = await flow.requestToken().catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TokenRequestError);
        if (error instanceof TokenRequestError) {
            expect(error.status).toBe(403);
            expect(error.message).toBe('403 Forbidden');
        }
    });

    it('should reject a body without access_token', async () => {
        server = await startServer(() => ({ status: 200, body: { expires_in: 100 } }));
        const flow = new ClientCredentialsFlow({ ...credentials, accessTokenUrl: server.url });

        const error = await flow.requestToken().catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TokenRequestError);
        if (error instanceof TokenRequestError) {
            expect(error.status).toBeUndefined();
        }
    });

    it('should reject without a status when the endpoint is unreachable', async () => {
        const flow = new ClientCredentialsFlow({ ...credentials, accessTokenUrl: await unreachableUrl() });

        const error = await flow.requestToken().catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TokenRequestError);
        if (error instanceof TokenRequestError) {
            expect(error.status).toBeUndefined();
        }
    });
});
