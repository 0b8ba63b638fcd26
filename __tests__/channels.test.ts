import { ChannelSendError } from '../src/adapters/channelSender';
import { EmailChannel, EmailPayload } from '../src/adapters/emailChannel';
import { TelegramChannel } from '../src/adapters/telegramChannel';
import { ChannelType } from '../src/types';
import { TickRateLimiter } from '../src/utils/rateLimiter';
import { FakeRoute, createFakeHttp } from './helpers/fakeHttp';

jest.mock('../src/services/observabilityService', () => ({
    logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() }
}));

const message = { subject: '[DOWN] example.com', text: 'plain body', html: '<p>body</p>' };

describe('TelegramChannel', () => {
    const channels: TelegramChannel[] = [];

    function build(route: FakeRoute, onChatMigrated?: (oldChatId: string, newChatId: string) => Promise<void>) {
        const { http, requests } = createFakeHttp(route);
        const channel = new TelegramChannel({
            botToken: 'test-token',
            apiUrl: 'https://telegram.example.test',
            http,
            limiter: new TickRateLimiter({ name: 'telegram-test', intervalMs: 1 }),
            onChatMigrated,
        });
        channels.push(channel);
        return { channel, requests };
    }

    afterEach(() => {
        channels.splice(0).forEach(channel => channel.close());
    });

    it('posts the text body to sendMessage', async () => {
        const { channel, requests } = build(() => ({ status: 200, data: { ok: true } }));

        await channel.send('-1001', message);

        expect(requests).toEqual([
            expect.objectContaining({
                method: 'POST',
                url: '/bottest-token/sendMessage',
                body: { chat_id: '-1001', text: 'plain body' },
            }),
        ]);
    });

    it('stores the migrated chat id and resends once', async () => {
        const migrated = jest.fn().mockResolvedValue(undefined);
        const { channel, requests } = build(request => {
            const body = request.body;
            if (typeof body === 'object' && body !== null && 'chat_id' in body && body.chat_id === '-100') {
                return {
                    status: 400,
                    data: {
                        ok: false,
                        description: 'Bad Request: group chat was upgraded to a supergroup chat',
                        parameters: { migrate_to_chat_id: -1009876 },
                    },
                };
            }
            return { status: 200, data: { ok: true } };
        }, migrated);

        await channel.send('-100', message);

        expect(migrated).toHaveBeenCalledWith('-100', '-1009876');
        expect(requests.map(request => request.body)).toEqual([
            { chat_id: '-100', text: 'plain body' },
            { chat_id: '-1009876', text: 'plain body' },
        ]);
    });

    it('does not follow a second migration', async () => {
        const { channel, requests } = build(() => ({
            status: 400,
            data: {
                ok: false,
                description: 'Bad Request: group chat was upgraded to a supergroup chat',
                parameters: { migrate_to_chat_id: -1009876 },
            },
        }));

        await expect(channel.send('-100', message)).rejects.toBeInstanceOf(ChannelSendError);
        expect(requests).toHaveLength(2);
    });

    it('still resends when storing the new id fails', async () => {
        const migrated = jest.fn().mockRejectedValue(new Error('db down'));
        let calls = 0;
        const { channel } = build(() => {
            calls++;
            return calls === 1
                ? {
                    status: 400,
                    data: {
                        description: 'Bad Request: group chat was upgraded to a supergroup chat',
                        parameters: { migrate_to_chat_id: '-1009876' },
                    },
                }
                : { status: 200, data: { ok: true } };
        }, migrated);

        await expect(channel.send('-100', message)).resolves.toBeUndefined();
        expect(calls).toBe(2);
    });

    it('reports other failures with their status', async () => {
        const { channel } = build(() => ({ status: 403, data: { ok: false, description: 'Forbidden: bot was blocked by the user' } }));

        await expect(channel.send('-1001', message)).rejects.toMatchObject({
            channelType: ChannelType.TELEGRAM,
            address: '-1001',
            statusCode: 403,
        });
    });
});

describe('EmailChannel', () => {
    it('sends subject, html and text from the configured sender', async () => {
        const payloads: EmailPayload[] = [];
        const channel = new EmailChannel({
            from: 'Domain Monitor <alerts@example.com>',
            transport: {
                async send(payload) {
                    payloads.push(payload);
                    return { error: null };
                },
            },
        });

        await channel.send('ops@example.com', message);

        expect(payloads).toEqual([
            {
                from: 'Domain Monitor <alerts@example.com>',
                to: 'ops@example.com',
                subject: '[DOWN] example.com',
                html: '<p>body</p>',
                text: 'plain body',
            },
        ]);
    });

    it('turns a transport error result into a ChannelSendError', async () => {
        const channel = new EmailChannel({
            from: 'alerts@example.com',
            transport: { send: async () => ({ error: { message: 'domain not verified' } }) },
        });

        await expect(channel.send('ops@example.com', message)).rejects.toThrow(
            '[email] send to ops@example.com failed: domain not verified'
        );
    });

    it('wraps a thrown transport error', async () => {
        const channel = new EmailChannel({
            from: 'alerts@example.com',
            transport: { send: async () => { throw new Error('socket hang up'); } },
        });

        await expect(channel.send('ops@example.com', message)).rejects.toBeInstanceOf(ChannelSendError);
    });
});
