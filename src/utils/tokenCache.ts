/**
 * OAuth Token Cache
 *
 * Single-flight access token cache. Callers that arrive while a refresh is
 * in flight share that refresh instead of starting their own.
 *
 *   valid ──(expiry)──> expired ──(get)──> refreshing ──(ok)──> valid
 *                                              └──(error)──> expired
 */

export type TokenState = 'valid' | 'refreshing' | 'expired';

export interface IssuedToken {
    accessToken: string;
    expiresInSeconds: number;
}

interface TokenCacheOptions {
    refresh: () => Promise<IssuedToken>;
    /** Subtracted from the issuer's lifetime so tokens are replaced early. */
    safetyMarginSeconds?: number;
    now?: () => number;
}

export class TokenCache {
    private token: string | null = null;
    private expiresAt = 0;
    private inflight: Promise<string> | null = null;
    private readonly refreshToken: () => Promise<IssuedToken>;
    private readonly safetyMarginMs: number;
    private readonly now: () => number;

    constructor(options: TokenCacheOptions) {
        this.refreshToken = options.refresh;
        this.safetyMarginMs = (options.safetyMarginSeconds ?? 600) * 1000;
        this.now = options.now ?? Date.now;
    }

    getState(): TokenState {
        if (this.inflight) return 'refreshing';
        if (this.token && this.now() < this.expiresAt) return 'valid';
        return 'expired';
    }

    async get(): Promise<string> {
        if (this.token && this.now() < this.expiresAt) {
            return this.token;
        }
        if (!this.inflight) {
            this.inflight = this.refresh().finally(() => {
                this.inflight = null;
            });
        }
        return this.inflight;
    }

    /** Drop the cached token, e.g. after the API rejects it. */
    invalidate(): void {
        this.token = null;
        this.expiresAt = 0;
    }

    private async refresh(): Promise<string> {
        const issued = await this.refreshToken();
        const lifetimeMs = Math.max(issued.expiresInSeconds * 1000 - this.safetyMarginMs, 0);
        this.token = issued.accessToken;
        this.expiresAt = this.now() + lifetimeMs;
        return issued.accessToken;
    }
}
