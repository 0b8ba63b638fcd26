/**
 * Uptrends Provider Adapter
 *
 * Implements ProviderClient for the Uptrends v4 API.
 * Base URL: https://api.uptrends.com/v4
 * Auth: HTTP Basic (API username + key)
 *
 * API Mapping:
 *   Create:       POST   /Monitor
 *   Pause/Resume: PATCH  /Monitor/{guid}
 *   Delete:       DELETE /Monitor/{guid}
 *   Checks:       GET    /MonitorCheck/Monitor/{guid}
 *   Checkpoints:  GET    /CheckpointRegion/{regionId}/Checkpoint
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { UptrendsSettings } from '../config';
import { logger } from '../services/observabilityService';
import { RegionResolver } from '../services/regionResolver';
import { CheckResult, ProviderName, RegionCode } from '../types';
import { TickRateLimiter } from '../utils/rateLimiter';
import { parseProviderTimestamp } from '../utils/time';
import {
    ProviderClient,
    ProviderError,
    describeBody,
    ensureHttpsUrl,
    expectStatus,
    toProviderError,
} from './providerAdapter';

const REQUEST_TIMEOUT_MS = 10_000;
const TICK_INTERVAL_MS = 1000;          // 1 request/second
const CHECKPOINT_CACHE_TTL_MS = 60 * 60 * 1000;

// ── Response shapes ──────────────────────────────────────────────────

const createMonitorResponseSchema = z.object({
    MonitorGuid: z.string().min(1),
});

const checkpointListSchema = z.array(
    z.object({ CheckpointId: z.number() })
);

const monitorCheckListSchema = z.object({
    Data: z
        .array(
            z.object({
                Attributes: z.object({
                    ServerId: z.number(),
                    HttpStatusCode: z.number().nullish(),
                    TotalTime: z.number().nullish(),
                    ErrorCode: z.number().nullish(),
                    ErrorDescription: z.string().nullish(),
                    ErrorLevel: z.string().nullish(),
                    Timestamp: z.string().nullish(),
                }),
            })
        )
        .nullish(),
});

type MonitorCheckAttributes = NonNullable<z.infer<typeof monitorCheckListSchema>['Data']>[number]['Attributes'];

export interface UptrendsAdapterOptions {
    settings: UptrendsSettings;
    regionResolver: RegionResolver;
    http?: AxiosInstance;
    limiter?: TickRateLimiter;
    clock?: () => Date;
}

export class UptrendsAdapter implements ProviderClient {
    readonly provider = ProviderName.UPTRENDS;

    private readonly http: AxiosInstance;
    private readonly limiter: TickRateLimiter;
    private readonly regionResolver: RegionResolver;
    private readonly clock: () => Date;
    private readonly checkpointCache = new Map<RegionCode, { ids: Set<number>; fetchedAt: number }>();

    constructor(options: UptrendsAdapterOptions) {
        this.regionResolver = options.regionResolver;
        this.clock = options.clock ?? (() => new Date());
        this.limiter = options.limiter ?? new TickRateLimiter({ name: ProviderName.UPTRENDS, intervalMs: TICK_INTERVAL_MS });
        this.http = options.http ?? axios.create({
            baseURL: options.settings.baseUrl,
            auth: {
                username: options.settings.username,
                password: options.settings.apiKey,
            },
            headers: {
                'Content-Type': 'application/json',
                'Accept': 'application/json',
            },
            timeout: REQUEST_TIMEOUT_MS,
            // Status codes are checked per operation
            validateStatus: () => true,
        });
    }

    // ── MONITOR LIFECYCLE ──────────────────────────────────────────────

    async createMonitor(url: string, displayName: string, regions: RegionCode[]): Promise<string> {
        const regionIds = regions.map(region => Number(this.regionResolver.locationIdFor(this.provider, region)));

        try {
            await this.limiter.acquire();
            const response = await this.http.post<unknown>('/Monitor', {
                MonitorType: 'Https',
                Url: ensureHttpsUrl(url),
                SelectedCheckpoints: {
                    Checkpoints: [],
                    Regions: regionIds,
                    ExcludeLocations: [],
                },
                UsePrimaryCheckpointsOnly: false,
                Name: displayName,
            });
            expectStatus(this.provider, 'createMonitor', response, [200, 201]);

            const parsed = createMonitorResponseSchema.safeParse(response.data);
            if (!parsed.success) {
                throw new ProviderError(this.provider, 'createMonitor', `response has no MonitorGuid: ${describeBody(response.data)}`, response.status);
            }

            logger.info('[UPTRENDS] Monitor created', { monitorGuid: parsed.data.MonitorGuid, url, regions });
            return parsed.data.MonitorGuid;
        } catch (err) {
            throw toProviderError(this.provider, 'createMonitor', err);
        }
    }

    async updateMonitorStatus(externalId: string, active: boolean): Promise<void> {
        try {
            await this.limiter.acquire();
            const response = await this.http.patch<unknown>(`/Monitor/${encodeURIComponent(externalId)}`, { IsActive: active });
            expectStatus(this.provider, 'updateMonitorStatus', response, [200, 204]);
            logger.info('[UPTRENDS] Monitor status updated', { monitorGuid: externalId, active });
        } catch (err) {
            throw toProviderError(this.provider, 'updateMonitorStatus', err);
        }
    }

    async deleteMonitor(externalId: string): Promise<void> {
        try {
            await this.limiter.acquire();
            const response = await this.http.delete<unknown>(`/Monitor/${encodeURIComponent(externalId)}`);
            expectStatus(this.provider, 'deleteMonitor', response, [200, 204]);
            logger.info('[UPTRENDS] Monitor deleted', { monitorGuid: externalId });
        } catch (err) {
            throw toProviderError(this.provider, 'deleteMonitor', err);
        }
    }

    // ── CHECK RESULTS ──────────────────────────────────────────────────

    async getLatestCheck(externalId: string, region: RegionCode): Promise<CheckResult | null> {
        const checkpointIds = await this.getCheckpointIds(region);

        let checks: MonitorCheckAttributes[];
        try {
            await this.limiter.acquire();
            const response = await this.http.get<unknown>(`/MonitorCheck/Monitor/${encodeURIComponent(externalId)}`, {
                params: { Sorting: 'Descending', Take: 10, PresetPeriod: 'Last2Hours' },
            });
            expectStatus(this.provider, 'getLatestCheck', response, [200]);

            const parsed = monitorCheckListSchema.safeParse(response.data);
            if (!parsed.success) {
                throw new ProviderError(this.provider, 'getLatestCheck', `malformed check list: ${parsed.error.message}`, response.status);
            }
            checks = (parsed.data.Data ?? []).map(entry => entry.Attributes);
        } catch (err) {
            throw toProviderError(this.provider, 'getLatestCheck', err);
        }

        if (checks.length === 0) {
            throw new ProviderError(this.provider, 'getLatestCheck', `no check results for monitor ${externalId}`);
        }

        // ServerId 1970 belongs to checkpoint 197
        const match = checkpointIds
            ? checks.find(check => checkpointIds.has(Math.floor(check.ServerId / 10)))
            : checks[0];

        if (!match) {
            // The caller moves on to the fallback region; without one there is nothing left to try
            if (this.regionResolver.resolve(this.provider, region).fallbackRegions.length > 0) {
                logger.debug('[UPTRENDS] No check from region checkpoints', { monitorGuid: externalId, region, checks: checks.length });
                return null;
            }
            throw new ProviderError(this.provider, 'getLatestCheck', `no check from ${region} checkpoints for monitor ${externalId}`);
        }

        return this.toCheckResult(match);
    }

    close(): void {
        this.limiter.stop();
    }

    // ── INTERNALS ──────────────────────────────────────────────────────

    /**
     * Checkpoint ids of a region, or null when they cannot be loaded
     * (results are then used unfiltered).
     */
    private async getCheckpointIds(region: RegionCode): Promise<Set<number> | null> {
        const cached = this.checkpointCache.get(region);
        if (cached && this.clock().getTime() - cached.fetchedAt < CHECKPOINT_CACHE_TTL_MS) {
            return cached.ids;
        }

        const regionId = this.regionResolver.locationIdFor(this.provider, region);
        try {
            await this.limiter.acquire();
            const response = await this.http.get<unknown>(`/CheckpointRegion/${regionId}/Checkpoint`);
            expectStatus(this.provider, 'getLatestCheck', response, [200]);

            const parsed = checkpointListSchema.safeParse(response.data);
            if (!parsed.success) {
                throw new ProviderError(this.provider, 'getLatestCheck', `malformed checkpoint list: ${describeBody(response.data)}`);
            }

            const ids = new Set(parsed.data.map(checkpoint => checkpoint.CheckpointId));
            if (ids.size === 0) return null;

            this.checkpointCache.set(region, { ids, fetchedAt: this.clock().getTime() });
            return ids;
        } catch (err) {
            logger.warn('[UPTRENDS] Could not load region checkpoints, results will not be filtered', {
                region,
                regionId,
                error: err instanceof Error ? err.message : String(err),
            });
            return null;
        }
    }

    private toCheckResult(check: MonitorCheckAttributes): CheckResult {
        const totalTime = Math.round(check.TotalTime ?? 0);
        return {
            statusCode: check.HttpStatusCode ?? 0,
            totalTimeMs: totalTime,
            errorCode: check.ErrorCode ?? 0,
            errorDescription: check.ErrorDescription ?? '',
            available: check.ErrorLevel === 'NoError' || check.ErrorLevel === 'Warning',
            checkedAt: parseProviderTimestamp(check.Timestamp, this.clock),
        };
    }
}
