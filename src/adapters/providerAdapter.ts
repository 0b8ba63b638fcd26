/**
 * Provider Adapter Interface
 *
 * The contract every external uptime provider (Uptrends, Site24x7) must
 * implement. The orchestrator and the reconciler only ever talk to this
 * interface; nothing outside src/adapters branches on provider name.
 */

import axios, { AxiosResponse } from 'axios';
import { CheckResult, ProviderName, RegionCode } from '../types';

// ============================================================================
// ERRORS
// ============================================================================

export type ProviderOperation =
    | 'createMonitor'
    | 'updateMonitorStatus'
    | 'deleteMonitor'
    | 'getLatestCheck'
    | 'refreshToken';

/**
 * Structured failure of a remote provider call. Logged by callers, never
 * surfaced to HTTP clients.
 */
export class ProviderError extends Error {
    constructor(
        public readonly provider: ProviderName,
        public readonly operation: ProviderOperation,
        message: string,
        public readonly statusCode?: number,
        public readonly responseBody?: string
    ) {
        super(`[${provider}] ${operation} failed: ${message}`);
        this.name = 'ProviderError';
    }
}

// ============================================================================
// PROVIDER CLIENT INTERFACE
// ============================================================================

export interface ProviderClient {
    /**
     * The provider this client talks to.
     */
    readonly provider: ProviderName;

    /**
     * Create a remote HTTPS monitor. Returns the provider's monitor id.
     */
    createMonitor(url: string, displayName: string, regions: RegionCode[]): Promise<string>;

    updateMonitorStatus(externalId: string, active: boolean): Promise<void>;

    deleteMonitor(externalId: string): Promise<void>;

    /**
     * Latest check seen from the region's checkpoints. `null` means the
     * provider has checks, but none from that region.
     */
    getLatestCheck(externalId: string, region: RegionCode): Promise<CheckResult | null>;

    /**
     * Stop the client's rate limiter ticker.
     */
    close(): void;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Shorten a response body for error messages and logs.
 */
export function describeBody(data: unknown, maxLength = 500): string {
    const text = typeof data === 'string' ? data : JSON.stringify(data ?? null);
    return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

/**
 * Throw a ProviderError unless the response status is one of `accepted`.
 */
export function expectStatus(
    provider: ProviderName,
    operation: ProviderOperation,
    response: AxiosResponse<unknown>,
    accepted: number[]
): void {
    if (!accepted.includes(response.status)) {
        const body = describeBody(response.data);
        throw new ProviderError(provider, operation, `unexpected status ${response.status}: ${body}`, response.status, body);
    }
}

/**
 * Prefix `https://` when the URL carries no scheme.
 */
export function ensureHttpsUrl(url: string): string {
    return /^https?:\/\//i.test(url) ? url : `https://${url}`;
}

/**
 * Normalize anything thrown during a provider call into a ProviderError.
 */
export function toProviderError(provider: ProviderName, operation: ProviderOperation, err: unknown): ProviderError {
    if (err instanceof ProviderError) return err;
    if (axios.isAxiosError(err)) {
        return new ProviderError(provider, operation, err.message, err.response?.status);
    }
    return new ProviderError(provider, operation, err instanceof Error ? err.message : String(err));
}
