/**
 * Site24x7 Provider Adapter
 *
 * Implements ProviderClient for the Site24x7 REST API.
 * Base URL: https://www.site24x7.com/api
 * Auth: Zoho OAuth refresh-token flow, access token cached by TokenCache
 *
 * API Mapping:
 *   Create:       POST   /monitors
 *   Pause/Resume: PUT    /monitors/{id}   (suspend_alert)
 *   Delete:       DELETE /monitors/{id}
 *   Checks:       GET    /reports/log_reports/{id}
 */

import axios, { AxiosInstance } from 'axios';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { Site24x7Settings } from '../config';
import { logger } from '../services/observabilityService';
import { RegionResolver } from '../services/regionResolver';
import { CheckResult, ProviderName, RegionCode } from '../types';
import { TickRateLimiter } from '../utils/rateLimiter';
import { parseProviderTimestamp } from '../utils/time';
import { IssuedToken, TokenCache } from '../utils/tokenCache';
import {
    ProviderClient,
    ProviderError,
    ProviderOperation,
    describeBody,
    ensureHttpsUrl,
    expectStatus,
    toProviderError,
} from './providerAdapter';

const REQUEST_TIMEOUT_MS = 30_000;
const TICK_INTERVAL_MS = 500;           // 2 requests/second
const REPORT_WINDOW_MINUTES = 15;
const REPORT_TIMEZONE = 'Asia/Shanghai';
const REPORT_TIME_FORMAT = "yyyy-MM-dd'T'HH:mm:ssZZZ";

// Account-level profiles every monitor is attached to
const MONITOR_DEFAULTS = {
    check_frequency: '5',
    timeout: 15,
    http_method: 'G',
    notification_profile_id: '567462000000029001',
    threshold_profile_id: '567462000000029007',
    user_group_ids: ['567462000000025009'],
    use_ipv6: false,
    match_case: false,
    user_agent: 'Mozilla Firefox',
    use_name_server: false,
} as const;

// ── Response shapes ──────────────────────────────────────────────────

const tokenResponseSchema = z.object({
    access_token: z.string().min(1),
    expires_in: z.coerce.number().positive(),
});

const envelopeSchema = z.object({
    code: z.number(),
    message: z.string().optional(),
});

const createMonitorResponseSchema = envelopeSchema.extend({
    data: z.object({ monitor_id: z.string().min(1) }).optional(),
});

const logReportResponseSchema = envelopeSchema.extend({
    data: z
        .object({
            report: z
                .array(
                    z.object({
                        collection_time: z.string().optional(),
                        availability: z.string().optional(),
                        response_code: z.string().optional(),
                        response_time: z.string().optional(),
                        reason: z.string().optional(),
                    })
                )
                .optional(),
        })
        .optional(),
});

type LogEntry = NonNullable<NonNullable<z.infer<typeof logReportResponseSchema>['data']>['report']>[number];

/** "-" and blanks mean "no value" in Site24x7 reports. */
function parseReportNumber(value: string | undefined): number {
    if (!value || value === '-') return 0;
    const parsed = parseInt(value, 10);
    return Number.isNaN(parsed) ? 0 : parsed;
}

export interface Site24x7AdapterOptions {
    settings: Site24x7Settings;
    regionResolver: RegionResolver;
    http?: AxiosInstance;
    limiter?: TickRateLimiter;
    clock?: () => Date;
}

export class Site24x7Adapter implements ProviderClient {
    readonly provider = ProviderName.SITE24X7;

    private readonly settings: Site24x7Settings;
    private readonly http: AxiosInstance;
    private readonly limiter: TickRateLimiter;
    private readonly regionResolver: RegionResolver;
    private readonly clock: () => Date;
    private readonly tokens: TokenCache;

    constructor(options: Site24x7AdapterOptions) {
        this.settings = options.settings;
        this.regionResolver = options.regionResolver;
        this.clock = options.clock ?? (() => new Date());
        this.limiter = options.limiter ?? new TickRateLimiter({ name: ProviderName.SITE24X7, intervalMs: TICK_INTERVAL_MS });
        this.http = options.http ?? axios.create({
            baseURL: options.settings.baseUrl,
            headers: {
                'Content-Type': 'application/json',
                'Accept': 'application/json; version=2.0',
            },
            timeout: REQUEST_TIMEOUT_MS,
            validateStatus: () => true,
        });
        this.tokens = new TokenCache({
            refresh: () => this.requestAccessToken(),
            safetyMarginSeconds: 600,
            now: () => this.clock().getTime(),
        });
    }

    // ── AUTH ───────────────────────────────────────────────────────────

    private async requestAccessToken(): Promise<IssuedToken> {
        const form = new URLSearchParams({
            client_id: this.settings.clientId,
            client_secret: this.settings.clientSecret,
            refresh_token: this.settings.refreshToken,
            grant_type: 'refresh_token',
        });

        try {
            const response = await this.http.post<unknown>(`${this.settings.accountsUrl}/oauth/v2/token`, form, {
                headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            });
            expectStatus(this.provider, 'refreshToken', response, [200]);

            const parsed = tokenResponseSchema.safeParse(response.data);
            if (!parsed.success) {
                throw new ProviderError(this.provider, 'refreshToken', `no access token in response: ${describeBody(response.data)}`, response.status);
            }

            logger.info('[SITE24X7] Access token refreshed', { expiresIn: parsed.data.expires_in });
            return { accessToken: parsed.data.access_token, expiresInSeconds: parsed.data.expires_in };
        } catch (err) {
            throw toProviderError(this.provider, 'refreshToken', err);
        }
    }

    private async authHeaders(): Promise<Record<string, string>> {
        const token = await this.tokens.get();
        return { Authorization: `Zoho-oauthtoken ${token}` };
    }

    /** A 401 means the cached token was revoked or rotated; the next call refreshes. */
    private failure(operation: ProviderOperation, err: unknown): ProviderError {
        const error = toProviderError(this.provider, operation, err);
        if (error.statusCode === 401) {
            logger.warn('[SITE24X7] Access token rejected, dropping cached token', { operation });
            this.tokens.invalidate();
        }
        return error;
    }

    // ── MONITOR LIFECYCLE ──────────────────────────────────────────────

    /**
     * Site24x7 takes one location profile; only the first region is used.
     */
    async createMonitor(url: string, displayName: string, regions: RegionCode[]): Promise<string> {
        if (!url) {
            throw new ProviderError(this.provider, 'createMonitor', 'url is required');
        }
        const region = regions[0] ?? this.regionResolver.defaultRegion;

        try {
            const headers = await this.authHeaders();
            await this.limiter.acquire();
            const response = await this.http.post<unknown>('/monitors', {
                ...MONITOR_DEFAULTS,
                display_name: `Monitor - ${displayName}`,
                type: 'URL',
                website: ensureHttpsUrl(url),
                location_profile_id: this.regionResolver.locationIdFor(this.provider, region),
            }, { headers });
            expectStatus(this.provider, 'createMonitor', response, [200, 201]);

            const parsed = createMonitorResponseSchema.safeParse(response.data);
            if (!parsed.success || parsed.data.code !== 0 || !parsed.data.data) {
                throw new ProviderError(this.provider, 'createMonitor', `rejected: ${describeBody(response.data)}`, response.status);
            }

            logger.info('[SITE24X7] Monitor created', { monitorId: parsed.data.data.monitor_id, url, region });
            return parsed.data.data.monitor_id;
        } catch (err) {
            throw this.failure('createMonitor', err);
        }
    }

    async updateMonitorStatus(externalId: string, active: boolean): Promise<void> {
        try {
            const headers = await this.authHeaders();
            await this.limiter.acquire();
            const response = await this.http.put<unknown>(`/monitors/${encodeURIComponent(externalId)}`, {
                monitor_id: externalId,
                suspend_alert: !active,
            }, { headers });
            expectStatus(this.provider, 'updateMonitorStatus', response, [200, 201]);

            const parsed = envelopeSchema.safeParse(response.data);
            if (parsed.success && parsed.data.code !== 0) {
                throw new ProviderError(this.provider, 'updateMonitorStatus', parsed.data.message ?? `code ${parsed.data.code}`, response.status);
            }

            logger.info('[SITE24X7] Monitor status updated', { monitorId: externalId, active });
        } catch (err) {
            throw this.failure('updateMonitorStatus', err);
        }
    }

    async deleteMonitor(externalId: string): Promise<void> {
        try {
            const headers = await this.authHeaders();
            await this.limiter.acquire();
            const response = await this.http.delete<unknown>(`/monitors/${encodeURIComponent(externalId)}`, { headers });
            expectStatus(this.provider, 'deleteMonitor', response, [200, 201, 204]);
            logger.info('[SITE24X7] Monitor deleted', { monitorId: externalId });
        } catch (err) {
            throw this.failure('deleteMonitor', err);
        }
    }

    // ── CHECK RESULTS ──────────────────────────────────────────────────

    /**
     * Log reports are not split by location, so `region` does not filter.
     */
    async getLatestCheck(externalId: string, region: RegionCode): Promise<CheckResult | null> {
        const end = DateTime.fromJSDate(this.clock()).setZone(REPORT_TIMEZONE);
        const start = end.minus({ minutes: REPORT_WINDOW_MINUTES });

        let entry: LogEntry | undefined;
        try {
            const headers = await this.authHeaders();
            await this.limiter.acquire();
            const response = await this.http.get<unknown>(`/reports/log_reports/${encodeURIComponent(externalId)}`, {
                headers,
                params: {
                    start_date: start.toFormat(REPORT_TIME_FORMAT),
                    end_date: end.toFormat(REPORT_TIME_FORMAT),
                },
            });
            expectStatus(this.provider, 'getLatestCheck', response, [200]);

            const parsed = logReportResponseSchema.safeParse(response.data);
            if (!parsed.success) {
                throw new ProviderError(this.provider, 'getLatestCheck', `malformed log report: ${parsed.error.message}`, response.status);
            }
            if (parsed.data.code !== 0) {
                throw new ProviderError(this.provider, 'getLatestCheck', parsed.data.message ?? `code ${parsed.data.code}`, response.status);
            }
            entry = parsed.data.data?.report?.[0];
        } catch (err) {
            throw this.failure('getLatestCheck', err);
        }

        if (!entry) {
            throw new ProviderError(this.provider, 'getLatestCheck', `no log entries for monitor ${externalId}`);
        }

        logger.debug('[SITE24X7] Latest log entry', { monitorId: externalId, region, collectionTime: entry.collection_time });

        const responseTime = parseReportNumber(entry.response_time);
        return {
            statusCode: parseReportNumber(entry.response_code),
            totalTimeMs: responseTime,
            errorCode: 0,
            errorDescription: entry.reason ?? '',
            available: entry.availability === '1',
            checkedAt: parseProviderTimestamp(entry.collection_time, this.clock),
        };
    }

    close(): void {
        this.limiter.stop();
    }
}
