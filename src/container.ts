/**
 * Service container.
 *
 * Builds every long-lived component once, from configuration and the shared
 * connections, in dependency order:
 *   gateways -> repositories -> queue -> orchestrator -> dispatchers
 *   -> reconciler -> services
 */

import Redis from 'ioredis';
import { Pool } from 'pg';
import { ChannelSender } from './adapters/channelSender';
import { EmailChannel, createResendTransport } from './adapters/emailChannel';
import { ProviderRegistry, createProviderRegistry } from './adapters/providerRegistry';
import { TelegramChannel } from './adapters/telegramChannel';
import { AppConfig } from './config';
import { PgChannelConfigRepository } from './repositories/pgChannelConfigRepository';
import { PgDomainRepository } from './repositories/pgDomainRepository';
import { PgNotificationHistoryRepository } from './repositories/pgNotificationHistoryRepository';
import { PgRegistrationRepository } from './repositories/pgRegistrationRepository';
import { DomainRepository, RegistrationRepository } from './repositories/types';
import { ChannelConfigService } from './services/channelConfigService';
import { DomainService } from './services/domainService';
import { MonitorOrchestrator } from './services/monitorOrchestrator';
import { MonitorQueue, createMonitorQueue } from './services/monitorQueue';
import { NotificationDispatcher } from './services/notificationDispatcher';
import { logger } from './services/observabilityService';
import { RegionResolver } from './services/regionResolver';
import { StatusReconciler } from './services/statusReconciler';
import { ChannelType } from './types';

export interface Container {
    config: AppConfig;
    pool: Pool;
    redis: Redis | null;
    regionResolver: RegionResolver;
    providers: ProviderRegistry;
    domains: DomainRepository;
    registrations: RegistrationRepository;
    queue: MonitorQueue;
    orchestrator: MonitorOrchestrator;
    dispatchers: NotificationDispatcher[];
    reconciler: StatusReconciler;
    domainService: DomainService;
    channelConfigService: ChannelConfigService;
}

export function buildContainer(config: AppConfig, pool: Pool, redis: Redis | null): Container {
    const regionResolver = new RegionResolver();
    const providers = createProviderRegistry(config, regionResolver);

    const domains = new PgDomainRepository(pool);
    const registrations = new PgRegistrationRepository(pool);
    const channelConfigs = new PgChannelConfigRepository(pool);
    const history = new PgNotificationHistoryRepository(pool);

    const queue = createMonitorQueue({
        redisUrl: config.redisUrl,
        concurrency: config.monitorQueueConcurrency,
        delayMs: config.monitorCreateDelayMs,
    });

    const orchestrator = new MonitorOrchestrator({ domains, registrations, providers, regionResolver, queue });

    const senders: Partial<Record<ChannelType, ChannelSender>> = {};
    const senderList: ChannelSender[] = [];
    if (config.telegram) {
        const telegram = new TelegramChannel({
            botToken: config.telegram.botToken,
            apiUrl: config.telegram.apiUrl,
            onChatMigrated: async (oldChatId, newChatId) => {
                const updated = await channelConfigs.replaceAddress(ChannelType.TELEGRAM, oldChatId, newChatId);
                logger.info('[TELEGRAM] Stored chat id migrated', { oldChatId, newChatId, updated });
            },
        });
        senders[ChannelType.TELEGRAM] = telegram;
        senderList.push(telegram);
    } else {
        logger.info('[CHANNELS] Skipping telegram: TELEGRAM_BOT_TOKEN not configured');
    }
    if (config.email) {
        const email = new EmailChannel({
            from: config.email.from,
            transport: createResendTransport(config.email.apiKey),
        });
        senders[ChannelType.EMAIL] = email;
        senderList.push(email);
    } else {
        logger.info('[CHANNELS] Skipping email: RESEND_API_KEY not configured');
    }

    const dispatchers = senderList.map(
        sender => new NotificationDispatcher({ sender, channelConfigs, history })
    );

    const reconciler = new StatusReconciler({
        domains,
        registrations,
        providers,
        dispatchers,
        intervalMs: config.reconcileIntervalMs,
        notifyOnStatus: config.notifyOnStatus,
    });

    const domainService = new DomainService({
        domains,
        orchestrator,
        regionResolver,
        defaultDomainLimit: config.defaultDomainLimit,
    });

    const channelConfigService = new ChannelConfigService({ channelConfigs, regionResolver, senders });

    return {
        config,
        pool,
        redis,
        regionResolver,
        providers,
        domains,
        registrations,
        queue,
        orchestrator,
        dispatchers,
        reconciler,
        domainService,
        channelConfigService,
    };
}
