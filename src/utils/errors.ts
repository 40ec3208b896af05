/**
 * Error utilities
 * Error classes and shared error formatting for the CLI
 */

import { AxiosError } from 'axios';

/**
 * Raised when the config file does not exist yet.
 * The command layer catches this and runs interactive setup.
 */
export class ConfigMissingError extends Error {
    constructor(public readonly configPath: string) {
        super(`Config file not found: ${configPath}`);
        this.name = 'ConfigMissingError';
    }
}

export class ConfigKeyError extends Error {
    constructor(
        public readonly section: string,
        public readonly key: string,
        public readonly configPath: string
    ) {
        super(`Missing "${key}" in section [${section}] of ${configPath}. Run: sidefx-web --setup`);
        this.name = 'ConfigKeyError';
    }
}

/**
 * The token endpoint refused the credentials or could not be reached.
 * `status` is undefined when no HTTP response was received.
 */
export class TokenRequestError extends Error {
    constructor(
        public readonly reason: string,
        public readonly status?: number
    ) {
        super(status === undefined ? reason : `${status} ${reason}`);
        this.name = 'TokenRequestError';
    }
}

export class DownloadError extends Error {
    constructor(
        public readonly url: string,
        message: string
    ) {
        super(`Download of ${url} failed: ${message}`);
        this.name = 'DownloadError';
    }
}

/** Input ended before setup received every answer */
export class SetupAbortedError extends Error {
    constructor() {
        super('Setup aborted: input ended before credentials were entered');
        this.name = 'SetupAbortedError';
    }
}

/**
 * Extracts a human-readable message from an unknown error value.
 * For AxiosErrors, prefers the API response body (which often contains
 * a more descriptive message than the generic HTTP status).
 */
export function errorMessage(error: unknown): string {
    if (error instanceof AxiosError && error.response) {
        const data: unknown = error.response.data;
        if (typeof data === 'string' && data.length > 0) return data;
        if (data && typeof data === 'object' && 'message' in data) return String(data.message);
        return `HTTP ${error.response.status || 'unknown'}`;
    }
    return error instanceof Error ? error.message : String(error);
}
