export { ClientCredentialsFlow, type ClientCredentialsConfig, type TokenResponse, type TokenSource } from './ClientCredentialsFlow.js';
export { TokenManager, isTokenValid, type TokenManagerConfig, type AuthStatus } from './TokenManager.js';
export { ConfigTokenStore } from './ConfigTokenStore.js';
export type { TokenStore, CachedToken } from './TokenStore.js';
