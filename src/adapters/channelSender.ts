/**
 * Channel Sender Interface
 *
 * One implementation per notification channel type. A sender only moves a
 * formatted message to an address; suppression and history belong to the
 * NotificationDispatcher.
 */

import { ChannelType, FormattedMessage } from '../types';

export interface ChannelSender {
    readonly channelType: ChannelType;

    /**
     * Deliver one message. Rejects when the channel refused it.
     */
    send(address: string, message: FormattedMessage): Promise<void>;

    close?(): void;
}

export class ChannelSendError extends Error {
    constructor(
        public readonly channelType: ChannelType,
        public readonly address: string,
        message: string,
        public readonly statusCode?: number
    ) {
        super(`[${channelType}] send to ${address} failed: ${message}`);
        this.name = 'ChannelSendError';
    }
}
