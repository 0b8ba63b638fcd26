/**
 * Email Channel (Resend)
 */

import { Resend } from 'resend';
import { ChannelType, FormattedMessage } from '../types';
import { ChannelSendError, ChannelSender } from './channelSender';

export interface EmailPayload {
    from: string;
    to: string;
    subject: string;
    html: string;
    text: string;
}

/**
 * The slice of the Resend client this channel needs.
 */
export interface EmailTransport {
    send(payload: EmailPayload): Promise<{ error: { message: string } | null }>;
}

export function createResendTransport(apiKey: string): EmailTransport {
    const resend = new Resend(apiKey);
    return {
        async send(payload) {
            const { error } = await resend.emails.send(payload);
            return { error: error ? { message: error.message } : null };
        },
    };
}

export interface EmailChannelOptions {
    from: string;
    transport: EmailTransport;
}

export class EmailChannel implements ChannelSender {
    readonly channelType = ChannelType.EMAIL;

    private readonly from: string;
    private readonly transport: EmailTransport;

    constructor(options: EmailChannelOptions) {
        this.from = options.from;
        this.transport = options.transport;
    }

    async send(address: string, message: FormattedMessage): Promise<void> {
        let result: { error: { message: string } | null };
        try {
            result = await this.transport.send({
                from: this.from,
                to: address,
                subject: message.subject,
                html: message.html,
                text: message.text,
            });
        } catch (err) {
            throw new ChannelSendError(this.channelType, address, err instanceof Error ? err.message : String(err));
        }

        if (result.error) {
            throw new ChannelSendError(this.channelType, address, result.error.message);
        }
    }
}
