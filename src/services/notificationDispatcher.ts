/**
 * Notification Dispatcher
 *
 * One instance per channel type. Fans a domain observation out to every
 * channel config of the owning user, asks the SuppressionPolicy about each
 * one, sends through the channel and records successful sends.
 *
 * A dispatch runs as one critical section on the instance mutex: the cache
 * is evicted, the in-process last-sent value is read, configs are served,
 * and the cache is updated after the first successful send.
 */

import { ChannelSender } from '../adapters/channelSender';
import { ChannelConfigRepository, NotificationHistoryRepository } from '../repositories/types';
import { ChannelType, Clock, Domain, NotificationType } from '../types';
import { Mutex } from '../utils/mutex';
import { formatDomainAlert } from './messageFormatter';
import { logger } from './observabilityService';
import {
    SuppressionCache,
    SuppressionPolicy,
    SuppressionReason,
    determineNotificationType,
} from './suppressionPolicy';

// ============================================================================
// TYPES
// ============================================================================

export interface DispatchSummary {
    channelType: ChannelType;
    type: NotificationType;
    sent: number[];
    suppressed: { configId: number; reason: SuppressionReason }[];
    failed: { configId: number; error: string }[];
}

export interface NotificationDispatcherOptions {
    sender: ChannelSender;
    channelConfigs: ChannelConfigRepository;
    history: NotificationHistoryRepository;
    policy?: SuppressionPolicy;
    cache?: SuppressionCache;
    clock?: Clock;
}

// ============================================================================
// DISPATCHER
// ============================================================================

export class NotificationDispatcher {
    readonly channelType: ChannelType;

    private readonly sender: ChannelSender;
    private readonly channelConfigs: ChannelConfigRepository;
    private readonly history: NotificationHistoryRepository;
    private readonly policy: SuppressionPolicy;
    private readonly cache: SuppressionCache;
    private readonly clock: Clock;
    private readonly mutex = new Mutex();

    constructor(options: NotificationDispatcherOptions) {
        this.sender = options.sender;
        this.channelType = options.sender.channelType;
        this.channelConfigs = options.channelConfigs;
        this.history = options.history;
        this.policy = options.policy ?? new SuppressionPolicy(options.history);
        this.cache = options.cache ?? new SuppressionCache();
        this.clock = options.clock ?? (() => new Date());
    }

    /**
     * Notify every config of the domain's owner. Per-config send failures
     * are logged and reported in the summary; they never throw.
     */
    dispatch(domain: Domain, transitioned: boolean): Promise<DispatchSummary> {
        return this.mutex.runExclusive(() => this.dispatchLocked(domain, transitioned));
    }

    private async dispatchLocked(domain: Domain, transitioned: boolean): Promise<DispatchSummary> {
        const now = this.clock();
        const type = determineNotificationType(domain, transitioned);
        const summary: DispatchSummary = {
            channelType: this.channelType,
            type,
            sent: [],
            suppressed: [],
            failed: [],
        };

        this.cache.evict(now);
        const lastSentInProcess = this.cache.get(domain.id, type);

        const configs = await this.channelConfigs.listByUser(domain.userId, this.channelType);
        if (configs.length === 0) return summary;

        const message = formatDomainAlert(domain, type);

        for (const config of configs) {
            const decision = await this.policy.evaluate({ domain, type, config, now, lastSentInProcess });
            if (!decision.send) {
                summary.suppressed.push({ configId: config.id, reason: decision.reason });
                logger.debug('[DISPATCH] Notification suppressed', {
                    channelType: this.channelType,
                    domainId: domain.id,
                    channelConfigId: config.id,
                    type,
                    reason: decision.reason,
                });
                continue;
            }

            try {
                await this.sender.send(config.address, message);
            } catch (err) {
                const error = err instanceof Error ? err.message : String(err);
                summary.failed.push({ configId: config.id, error });
                logger.error('[DISPATCH] Notification send failed', err instanceof Error ? err : undefined, {
                    channelType: this.channelType,
                    domainId: domain.id,
                    domain: domain.name,
                    channelConfigId: config.id,
                    type,
                });
                continue;
            }

            summary.sent.push(config.id);
            this.cache.set(domain.id, type, now);

            try {
                await this.history.append({
                    domainId: domain.id,
                    channelType: this.channelType,
                    channelConfigId: config.id,
                    statusCode: domain.lastStatus,
                    errorCode: domain.errorCode,
                    errorDescription: domain.errorDescription,
                    notificationType: type,
                    notifiedAt: now,
                });
            } catch (err) {
                logger.error('[DISPATCH] Failed to record notification history', err instanceof Error ? err : undefined, {
                    channelType: this.channelType,
                    domainId: domain.id,
                    channelConfigId: config.id,
                    type,
                });
            }
        }

        if (summary.sent.length > 0 || summary.failed.length > 0) {
            logger.info('[DISPATCH] Notifications processed', {
                channelType: this.channelType,
                domainId: domain.id,
                type,
                sent: summary.sent.length,
                suppressed: summary.suppressed.length,
                failed: summary.failed.length,
            });
        }

        return summary;
    }

    close(): void {
        this.sender.close?.();
    }
}
