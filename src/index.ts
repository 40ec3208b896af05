/**
 * sidefx-web Library Barrel Export
 */

// Client
export { SideFxClient, type SideFxClientConfig } from './client/SideFxClient.js';
export {
    HttpClient,
    encodeEnvelope,
    describeFailure,
    type HttpClientConfig,
    type RpcResult,
    type RpcFailure,
    type RpcValue,
} from './client/HttpClient.js';

// Auth
export {
    TokenManager,
    isTokenValid,
    ClientCredentialsFlow,
    ConfigTokenStore,
    type TokenManagerConfig,
    type AuthStatus,
    type ClientCredentialsConfig,
    type TokenStore,
    type CachedToken,
} from './auth/index.js';

// APIs
export {
    DownloadApi,
    PRODUCTS,
    PLATFORMS,
    type Product,
    type Platform,
    type DailyBuild,
    type BuildDownload,
} from './api/DownloadApi.js';

// Utils
export {
    ConfigStore,
    DEFAULT_ACCESS_TOKEN_URL,
    DEFAULT_ENDPOINT_URL,
    type Credentials,
    type ConfigStoreOptions,
} from './utils/config.js';
export { createLogger, type Logger, type LoggerOptions } from './utils/logger.js';
export { ConfigMissingError, ConfigKeyError, TokenRequestError, DownloadError, SetupAbortedError } from './utils/errors.js';
