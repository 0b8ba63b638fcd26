/**
 * Telegram Channel
 *
 * Sends plain-text messages through the Bot API (`sendMessage`).
 * Groups that Telegram upgraded to supergroups answer 400 with the new chat
 * id; the stored address is rewritten and the message is resent once.
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { logger } from '../services/observabilityService';
import { ChannelType, FormattedMessage } from '../types';
import { TickRateLimiter } from '../utils/rateLimiter';
import { describeBody } from './providerAdapter';
import { ChannelSendError, ChannelSender } from './channelSender';

const REQUEST_TIMEOUT_MS = 10_000;
const TICK_INTERVAL_MS = 500;

const migrationErrorSchema = z.object({
    description: z.string(),
    parameters: z.object({
        migrate_to_chat_id: z.union([z.number(), z.string()]),
    }),
});

export type ChatMigrationHandler = (oldChatId: string, newChatId: string) => Promise<void>;

export interface TelegramChannelOptions {
    botToken: string;
    apiUrl: string;
    onChatMigrated?: ChatMigrationHandler;
    http?: AxiosInstance;
    limiter?: TickRateLimiter;
}

export class TelegramChannel implements ChannelSender {
    readonly channelType = ChannelType.TELEGRAM;

    private readonly http: AxiosInstance;
    private readonly limiter: TickRateLimiter;
    private readonly sendPath: string;
    private readonly onChatMigrated?: ChatMigrationHandler;

    constructor(options: TelegramChannelOptions) {
        this.sendPath = `/bot${options.botToken}/sendMessage`;
        this.onChatMigrated = options.onChatMigrated;
        this.limiter = options.limiter ?? new TickRateLimiter({ name: 'telegram', intervalMs: TICK_INTERVAL_MS });
        this.http = options.http ?? axios.create({
            baseURL: options.apiUrl,
            headers: { 'Content-Type': 'application/json' },
            timeout: REQUEST_TIMEOUT_MS,
            validateStatus: () => true,
        });
    }

    async send(chatId: string, message: FormattedMessage): Promise<void> {
        await this.sendText(chatId, message.text, true);
    }

    close(): void {
        this.limiter.stop();
    }

    private async sendText(chatId: string, text: string, allowMigration: boolean): Promise<void> {
        await this.limiter.acquire();

        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.post<unknown>(this.sendPath, { chat_id: chatId, text });
        } catch (err) {
            throw new ChannelSendError(this.channelType, chatId, err instanceof Error ? err.message : String(err));
        }

        if (response.status === 200) return;

        const newChatId = response.status === 400 ? this.migratedChatId(response.data) : null;
        if (newChatId && allowMigration) {
            logger.info('[TELEGRAM] Group migrated to supergroup', { oldChatId: chatId, newChatId });
            if (this.onChatMigrated) {
                try {
                    await this.onChatMigrated(chatId, newChatId);
                } catch (err) {
                    logger.error('[TELEGRAM] Failed to store migrated chat id', err instanceof Error ? err : undefined, { oldChatId: chatId, newChatId });
                }
            }
            return this.sendText(newChatId, text, false);
        }

        throw new ChannelSendError(this.channelType, chatId, `status ${response.status}: ${describeBody(response.data)}`, response.status);
    }

    private migratedChatId(body: unknown): string | null {
        const parsed = migrationErrorSchema.safeParse(body);
        if (!parsed.success || !parsed.data.description.includes('upgraded to a supergroup')) {
            return null;
        }
        const id = String(parsed.data.parameters.migrate_to_chat_id);
        return id && id !== '0' ? id : null;
    }
}
