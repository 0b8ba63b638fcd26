/**
 * Channel Config Service
 *
 * CRUD for a user's notification endpoints, per channel type, plus test
 * sends through the live channel sender.
 */

import { z } from 'zod';
import { ChannelSender } from '../adapters/channelSender';
import { ChannelConfigRepository, UniqueViolationError } from '../repositories/types';
import { ChannelConfig, ChannelConfigInput, ChannelConfigPatch, ChannelType, Clock, RegionCode } from '../types';
import { AppError } from '../utils/appError';
import { formatTestMessage } from './messageFormatter';
import { logger } from './observabilityService';
import { RegionResolver } from './regionResolver';

const emailAddress = z.string().email();
const telegramChatId = z.string().regex(/^-?\d+$|^@[A-Za-z0-9_]{5,}$/);

export interface ChannelConfigServiceOptions {
    channelConfigs: ChannelConfigRepository;
    regionResolver: RegionResolver;
    /** Senders for configured channels only. */
    senders: Partial<Record<ChannelType, ChannelSender>>;
    clock?: Clock;
}

export class ChannelConfigService {
    private readonly channelConfigs: ChannelConfigRepository;
    private readonly regionResolver: RegionResolver;
    private readonly senders: Partial<Record<ChannelType, ChannelSender>>;
    private readonly clock: Clock;

    constructor(options: ChannelConfigServiceOptions) {
        this.channelConfigs = options.channelConfigs;
        this.regionResolver = options.regionResolver;
        this.senders = options.senders;
        this.clock = options.clock ?? (() => new Date());
    }

    list(userId: number, channelType: ChannelType): Promise<ChannelConfig[]> {
        return this.channelConfigs.listByUser(userId, channelType);
    }

    async create(userId: number, channelType: ChannelType, input: ChannelConfigInput): Promise<ChannelConfig> {
        const normalized: ChannelConfigInput = {
            ...input,
            address: this.requireAddress(channelType, input.address),
            monitorRegions: input.monitorRegions ? this.requireRegions(input.monitorRegions) : [],
        };

        try {
            const created = await this.channelConfigs.create(userId, channelType, normalized);
            logger.info('[CHANNELS] Channel config created', { userId, channelType, channelConfigId: created.id });
            return created;
        } catch (err) {
            if (err instanceof UniqueViolationError) {
                throw new AppError(`This ${channelType} address is already configured`, 409);
            }
            throw err;
        }
    }

    async update(userId: number, channelType: ChannelType, id: number, patch: ChannelConfigPatch): Promise<ChannelConfig> {
        const normalized: ChannelConfigPatch = { ...patch };
        if (patch.address !== undefined) {
            normalized.address = this.requireAddress(channelType, patch.address);
        }
        if (patch.monitorRegions !== undefined) {
            normalized.monitorRegions = this.requireRegions(patch.monitorRegions);
        }

        let updated: ChannelConfig | null;
        try {
            updated = await this.channelConfigs.update(userId, channelType, id, normalized);
        } catch (err) {
            if (err instanceof UniqueViolationError) {
                throw new AppError(`This ${channelType} address is already configured`, 409);
            }
            throw err;
        }
        if (!updated) {
            throw new AppError('Channel config not found', 404);
        }

        logger.info('[CHANNELS] Channel config updated', { userId, channelType, channelConfigId: id });
        return updated;
    }

    async remove(userId: number, channelType: ChannelType, id: number): Promise<void> {
        const removed = await this.channelConfigs.delete(userId, channelType, id);
        if (!removed) {
            throw new AppError('Channel config not found', 404);
        }
        logger.info('[CHANNELS] Channel config removed', { userId, channelType, channelConfigId: id });
    }

    /**
     * Send the test template to one config. Goes straight to the sender:
     * test sends are neither suppressed nor recorded.
     */
    async sendTest(userId: number, channelType: ChannelType, id: number): Promise<void> {
        const config = await this.channelConfigs.findByIdForUser(userId, channelType, id);
        if (!config) {
            throw new AppError('Channel config not found', 404);
        }
        if (!config.active) {
            throw new AppError('Channel config is inactive', 400);
        }

        const sender = this.senders[channelType];
        if (!sender) {
            throw new AppError(`The ${channelType} channel is not configured on this server`, 503);
        }

        try {
            await sender.send(config.address, formatTestMessage(config, this.clock()));
        } catch (err) {
            logger.error('[CHANNELS] Test notification failed', err instanceof Error ? err : undefined, {
                userId,
                channelType,
                channelConfigId: id,
            });
            throw new AppError('Test notification could not be delivered', 502);
        }

        logger.info('[CHANNELS] Test notification sent', { userId, channelType, channelConfigId: id });
    }

    private requireAddress(channelType: ChannelType, input: string): string {
        const address = input.trim();
        const schema = channelType === ChannelType.EMAIL ? emailAddress : telegramChatId;
        if (!schema.safeParse(address).success) {
            throw new AppError(
                channelType === ChannelType.EMAIL ? `Invalid email address: ${input}` : `Invalid Telegram chat id: ${input}`,
                400
            );
        }
        return channelType === ChannelType.EMAIL ? address.toLowerCase() : address;
    }

    private requireRegions(input: string[]): RegionCode[] {
        const regions: RegionCode[] = [];
        for (const raw of input) {
            const region = this.regionResolver.normalize(raw);
            if (!region) {
                throw new AppError(`Unknown region: ${raw}`, 400);
            }
            if (!regions.includes(region)) regions.push(region);
        }
        return regions;
    }
}
