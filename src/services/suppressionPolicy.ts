/**
 * Suppression Policy
 *
 * Decides whether one (domain, notification type, channel config) tuple may
 * be sent now. Two layers are consulted:
 *   - an in-process cache keyed by (domain, type), shared by every config of
 *     a channel type, which absorbs fan-out floods within one pass
 *   - persisted notification history keyed per channel config, which
 *     survives restarts
 *
 * The policy never writes; the dispatcher records a send only after the
 * channel accepted it.
 */

import { ChannelConfig, Domain, NotificationType } from '../types';
import { NotificationHistoryReader } from '../repositories/types';
import { minutesToMs } from '../utils/time';
import { logger } from './observabilityService';

// ============================================================================
// CONSTANTS
// ============================================================================

const MIN_WINDOW_MINUTES = 2;

// Cache entries older than this can no longer suppress anything
export const SUPPRESSION_CACHE_MAX_AGE_MS = 2 * 60 * 60 * 1000;

// ============================================================================
// TYPES
// ============================================================================

export type SuppressionReason =
    | 'config_inactive'
    | 'region_filtered'
    | 'preference_disabled'
    | 'recently_sent_in_process'
    | 'recently_sent_to_channel';

export type SuppressionDecision =
    | { send: true }
    | { send: false; reason: SuppressionReason };

export interface SuppressionInput {
    domain: Domain;
    type: NotificationType;
    config: ChannelConfig;
    now: Date;
    /** Last in-process send for (domain, type), read once at dispatch start. */
    lastSentInProcess?: Date;
}

// ============================================================================
// PURE HELPERS
// ============================================================================

/**
 * Window length for a domain's poll interval. Transitions re-alert at half
 * the interval, routine status at the full interval, never below 2 minutes.
 */
export function suppressionWindowMs(intervalMinutes: number, type: NotificationType): number {
    const base = type === NotificationType.STATUS ? intervalMinutes : intervalMinutes / 2;
    return minutesToMs(Math.max(base, MIN_WINDOW_MINUTES));
}

/**
 * A domain is available once it has been checked and its last status is
 * in [200, 400).
 */
export function isDomainAvailable(domain: Pick<Domain, 'lastCheck' | 'lastStatus'>): boolean {
    return domain.lastCheck !== null && domain.lastStatus >= 200 && domain.lastStatus < 400;
}

export function determineNotificationType(
    domain: Pick<Domain, 'lastCheck' | 'lastStatus'>,
    transitioned: boolean
): NotificationType {
    if (!isDomainAvailable(domain)) return NotificationType.DOWN;
    return transitioned ? NotificationType.UP : NotificationType.STATUS;
}

function withinWindow(last: Date, now: Date, windowMs: number): boolean {
    return now.getTime() - last.getTime() < windowMs;
}

// ============================================================================
// IN-PROCESS CACHE
// ============================================================================

/**
 * Last-sent timestamps per (domain, type). Not synchronized on its own;
 * the dispatcher serializes access through its mutex.
 */
export class SuppressionCache {
    private readonly entries = new Map<string, Date>();

    constructor(private readonly maxAgeMs: number = SUPPRESSION_CACHE_MAX_AGE_MS) {}

    private key(domainId: number, type: NotificationType): string {
        return `${domainId}:${type}`;
    }

    get(domainId: number, type: NotificationType): Date | undefined {
        return this.entries.get(this.key(domainId, type));
    }

    set(domainId: number, type: NotificationType, sentAt: Date): void {
        this.entries.set(this.key(domainId, type), sentAt);
    }

    /** Drop entries older than the max age. Returns how many were dropped. */
    evict(now: Date): number {
        let evicted = 0;
        for (const [key, sentAt] of this.entries) {
            if (now.getTime() - sentAt.getTime() > this.maxAgeMs) {
                this.entries.delete(key);
                evicted++;
            }
        }
        return evicted;
    }

    get size(): number {
        return this.entries.size;
    }
}

// ============================================================================
// POLICY
// ============================================================================

export class SuppressionPolicy {
    constructor(private readonly history: NotificationHistoryReader) {}

    /**
     * Checks run cheapest first: config state, region filter, preference
     * flags, in-process cache, then persisted history.
     */
    async evaluate(input: SuppressionInput): Promise<SuppressionDecision> {
        const { domain, type, config, now, lastSentInProcess } = input;

        if (!config.active) {
            return { send: false, reason: 'config_inactive' };
        }

        if (config.monitorRegions.length > 0) {
            const region = domain.region.toUpperCase();
            if (!config.monitorRegions.some(candidate => candidate.toUpperCase() === region)) {
                return { send: false, reason: 'region_filtered' };
            }
        }

        if (
            (type === NotificationType.DOWN && !config.notifyOnDown) ||
            (type === NotificationType.UP && !config.notifyOnUp)
        ) {
            return { send: false, reason: 'preference_disabled' };
        }

        const windowMs = suppressionWindowMs(domain.interval, type);

        if (lastSentInProcess && withinWindow(lastSentInProcess, now, windowMs)) {
            return { send: false, reason: 'recently_sent_in_process' };
        }

        const lastSentToChannel = await this.readHistory(domain.id, config, type);
        if (lastSentToChannel && withinWindow(lastSentToChannel, now, windowMs)) {
            return { send: false, reason: 'recently_sent_to_channel' };
        }

        return { send: true };
    }

    async shouldSend(input: SuppressionInput): Promise<boolean> {
        const decision = await this.evaluate(input);
        return decision.send;
    }

    private async readHistory(domainId: number, config: ChannelConfig, type: NotificationType): Promise<Date | null> {
        try {
            return await this.history.lastNotifiedAt(domainId, config.channelType, config.id, type);
        } catch (err) {
            // Treated as no history; the in-process layer still applies
            logger.warn('[DISPATCH] Notification history lookup failed', {
                domainId,
                channelType: config.channelType,
                channelConfigId: config.id,
                type,
                error: err instanceof Error ? err.message : String(err),
            });
            return null;
        }
    }
}
