/**
 * Status Reconciler Worker
 *
 * Periodically pulls the latest provider check for every monitored domain,
 * persists it and hands the observation to the notification dispatchers.
 *
 * Rules:
 *   - Only active domains with an active remote registration are polled,
 *     and only once their interval has elapsed since the last check
 *   - Providers are asked in priority order; within a provider the
 *     registration's submitted regions are tried in order
 *   - A domain that yields no result is skipped; nothing synthetic is written
 *   - One failing domain never aborts the pass
 *   - A tick that finds the previous pass still running is skipped
 */

import { ProviderClient } from '../adapters/providerAdapter';
import { ProviderRegistry } from '../adapters/providerRegistry';
import { DomainRepository, RegistrationRepository } from '../repositories/types';
import { CheckResult, Clock, Domain, MonitorRegistration, RegistrationState } from '../types';
import { minutesToMs } from '../utils/time';
import { NotificationDispatcher } from './notificationDispatcher';
import { logger } from './observabilityService';
import { isDomainAvailable } from './suppressionPolicy';

// ============================================================================
// TYPES
// ============================================================================

export interface ReconcilePassSummary {
    checked: number;
    notDue: number;
    updated: number;
    transitions: number;
    skipped: number;
    failed: number;
    durationMs: number;
}

export interface ReconcilerStatus {
    isRunning: boolean;
    passInProgress: boolean;
    lastRunAt: Date | null;
    lastError: string | null;
    lastPass: ReconcilePassSummary | null;
}

export type DomainOutcome =
    | { outcome: 'updated'; transitioned: boolean; domain: Domain }
    | { outcome: 'skipped' };

export interface StatusReconcilerOptions {
    domains: DomainRepository;
    registrations: RegistrationRepository;
    providers: ProviderRegistry;
    dispatchers: NotificationDispatcher[];
    intervalMs: number;
    notifyOnStatus?: boolean;
    clock?: Clock;
}

/**
 * Never checked, or `lastCheck + interval` is not after `now`.
 */
export function isDomainDue(domain: Pick<Domain, 'lastCheck' | 'interval'>, now: Date): boolean {
    if (!domain.lastCheck) return true;
    return domain.lastCheck.getTime() + minutesToMs(domain.interval) <= now.getTime();
}

// ============================================================================
// RECONCILER
// ============================================================================

export class StatusReconciler {
    private readonly domains: DomainRepository;
    private readonly registrations: RegistrationRepository;
    private readonly providers: ProviderRegistry;
    private readonly dispatchers: NotificationDispatcher[];
    private readonly intervalMs: number;
    private readonly notifyOnStatus: boolean;
    private readonly clock: Clock;

    private timer: NodeJS.Timeout | null = null;
    private currentPass: Promise<ReconcilePassSummary> | null = null;
    private status: Omit<ReconcilerStatus, 'isRunning' | 'passInProgress'> = {
        lastRunAt: null,
        lastError: null,
        lastPass: null,
    };

    constructor(options: StatusReconcilerOptions) {
        this.domains = options.domains;
        this.registrations = options.registrations;
        this.providers = options.providers;
        this.dispatchers = options.dispatchers;
        this.intervalMs = options.intervalMs;
        this.notifyOnStatus = options.notifyOnStatus ?? false;
        this.clock = options.clock ?? (() => new Date());
    }

    // ------------------------------------------------------------------------
    // Lifecycle
    // ------------------------------------------------------------------------

    start(): void {
        if (this.timer) {
            logger.warn('[RECONCILER] Worker already running');
            return;
        }

        this.timer = setInterval(() => this.tick(), this.intervalMs);
        logger.info('[RECONCILER] Started', { intervalMs: this.intervalMs, providers: this.providers.size });
    }

    /**
     * Stop ticking and wait for a pass in progress to finish.
     */
    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        if (this.currentPass) {
            logger.info('[RECONCILER] Waiting for the running pass to finish');
            await this.currentPass.catch(() => undefined);
        }
        logger.info('[RECONCILER] Stopped');
    }

    getStatus(): ReconcilerStatus {
        return {
            ...this.status,
            isRunning: this.timer !== null,
            passInProgress: this.currentPass !== null,
        };
    }

    // ------------------------------------------------------------------------
    // Passes
    // ------------------------------------------------------------------------

    private tick(): void {
        if (this.currentPass) {
            logger.debug('[RECONCILER] Previous pass still running, skipping tick');
            return;
        }
        this.runPass().catch(err => {
            logger.error('[RECONCILER] Pass failed', err instanceof Error ? err : undefined);
        });
    }

    /**
     * Run one pass. Returns null when a pass is already running.
     */
    async runPass(): Promise<ReconcilePassSummary | null> {
        if (this.currentPass) return null;

        const pass = this.executePass();
        this.currentPass = pass;
        try {
            return await pass;
        } finally {
            this.currentPass = null;
        }
    }

    private async executePass(): Promise<ReconcilePassSummary> {
        const startedAt = Date.now();
        const now = this.clock();
        const summary: ReconcilePassSummary = {
            checked: 0,
            notDue: 0,
            updated: 0,
            transitions: 0,
            skipped: 0,
            failed: 0,
            durationMs: 0,
        };

        let monitored: Domain[];
        try {
            monitored = await this.domains.listMonitored();
        } catch (err) {
            this.status.lastRunAt = now;
            this.status.lastError = err instanceof Error ? err.message : String(err);
            throw err;
        }

        for (const domain of monitored) {
            if (!isDomainDue(domain, now)) {
                summary.notDue++;
                continue;
            }

            summary.checked++;
            try {
                const result = await this.reconcileDomain(domain);
                if (result.outcome === 'skipped') {
                    summary.skipped++;
                } else {
                    summary.updated++;
                    if (result.transitioned) summary.transitions++;
                }
            } catch (err) {
                summary.failed++;
                logger.error('[RECONCILER] Domain reconciliation failed', err instanceof Error ? err : undefined, {
                    domainId: domain.id,
                    domain: domain.name,
                });
            }
        }

        summary.durationMs = Date.now() - startedAt;
        this.status.lastRunAt = now;
        this.status.lastError = null;
        this.status.lastPass = summary;

        logger.info('[RECONCILER] Pass complete', { ...summary });
        return summary;
    }

    /**
     * Fetch, persist and dispatch for one domain.
     */
    async reconcileDomain(domain: Domain): Promise<DomainOutcome> {
        const live = await this.registrations.listLiveByDomain(domain.id);
        const result = await this.latestCheck(domain, live);

        if (!result) {
            logger.warn('[RECONCILER] No check result from any provider, skipping', {
                domainId: domain.id,
                domain: domain.name,
                region: domain.region,
            });
            return { outcome: 'skipped' };
        }

        const previouslyAvailable = isDomainAvailable(domain);
        await this.domains.updateStatus(domain.id, result);

        const updated: Domain = {
            ...domain,
            lastStatus: result.statusCode,
            errorCode: result.errorCode,
            errorDescription: result.errorDescription,
            totalTime: result.totalTimeMs,
            lastCheck: result.checkedAt,
        };
        const available = isDomainAvailable(updated);
        const transitioned = previouslyAvailable !== available;

        if (transitioned) {
            logger.info('[RECONCILER] Availability changed', {
                domainId: domain.id,
                domain: domain.name,
                from: previouslyAvailable,
                to: available,
            });
        }

        if (!available || transitioned || this.notifyOnStatus) {
            await this.dispatch(updated, transitioned);
        }

        return { outcome: 'updated', transitioned, domain: updated };
    }

    private async latestCheck(domain: Domain, live: MonitorRegistration[]): Promise<CheckResult | null> {
        for (const client of this.providers.list()) {
            const registration = live.find(
                candidate =>
                    candidate.provider === client.provider &&
                    candidate.state === RegistrationState.ACTIVE &&
                    candidate.externalId !== null
            );
            if (!registration) continue;

            const result = await this.checkWithProvider(client, domain, registration);
            if (result) return result;
        }
        return null;
    }

    /**
     * Tries each submitted region in order. An error abandons this provider.
     */
    private async checkWithProvider(
        client: ProviderClient,
        domain: Domain,
        registration: MonitorRegistration
    ): Promise<CheckResult | null> {
        const externalId = registration.externalId;
        if (!externalId) return null;

        const regions = registration.regions.length > 0 ? registration.regions : [domain.region];
        try {
            for (const region of regions) {
                const result = await client.getLatestCheck(externalId, region);
                if (result) return result;
            }
        } catch (err) {
            logger.warn('[RECONCILER] Provider check failed, trying next provider', {
                domainId: domain.id,
                provider: client.provider,
                externalId,
                error: err instanceof Error ? err.message : String(err),
            });
        }
        return null;
    }

    private async dispatch(domain: Domain, transitioned: boolean): Promise<void> {
        for (const dispatcher of this.dispatchers) {
            try {
                await dispatcher.dispatch(domain, transitioned);
            } catch (err) {
                logger.error('[RECONCILER] Notification dispatch failed', err instanceof Error ? err : undefined, {
                    domainId: domain.id,
                    channelType: dispatcher.channelType,
                });
            }
        }
    }
}
