/**
 * Provider Registry
 *
 * The only place that maps configuration to provider client instances.
 * Clients are listed in priority order: the reconciler asks them in this
 * order and the first usable check wins.
 */

import { AppConfig } from '../config';
import { logger } from '../services/observabilityService';
import { RegionResolver } from '../services/regionResolver';
import { ProviderName } from '../types';
import { ProviderClient } from './providerAdapter';
import { Site24x7Adapter } from './site24x7Adapter';
import { UptrendsAdapter } from './uptrendsAdapter';

export const PROVIDER_PRIORITY: ProviderName[] = [ProviderName.UPTRENDS, ProviderName.SITE24X7];

export class ProviderRegistry {
    private readonly clients: ProviderClient[];

    constructor(clients: ProviderClient[]) {
        this.clients = [...clients].sort(
            (a, b) => PROVIDER_PRIORITY.indexOf(a.provider) - PROVIDER_PRIORITY.indexOf(b.provider)
        );
    }

    list(): ProviderClient[] {
        return [...this.clients];
    }

    get(provider: ProviderName): ProviderClient | undefined {
        return this.clients.find(client => client.provider === provider);
    }

    get size(): number {
        return this.clients.length;
    }

    closeAll(): void {
        for (const client of this.clients) {
            client.close();
        }
    }
}

/**
 * Build clients for every provider whose credentials are configured.
 */
export function createProviderRegistry(config: AppConfig, regionResolver: RegionResolver): ProviderRegistry {
    const clients: ProviderClient[] = [];

    if (config.uptrends) {
        clients.push(new UptrendsAdapter({ settings: config.uptrends, regionResolver }));
    } else {
        logger.info('[ProviderRegistry] Skipping uptrends: credentials not configured');
    }

    if (config.site24x7) {
        clients.push(new Site24x7Adapter({ settings: config.site24x7, regionResolver }));
    } else {
        logger.info('[ProviderRegistry] Skipping site24x7: credentials not configured');
    }

    if (clients.length === 0) {
        logger.warn('[ProviderRegistry] No monitoring provider configured; domains will not be monitored');
    }

    return new ProviderRegistry(clients);
}
