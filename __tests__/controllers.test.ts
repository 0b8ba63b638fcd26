import { createChannelConfigController } from '../src/controllers/channelConfigController';
import { createDomainController } from '../src/controllers/domainController';
import { ChannelType } from '../src/types';

jest.mock('../src/services/observabilityService', () => ({
    logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() }
}));

function mockResponse() {
    return {
        status: jest.fn().mockReturnThis(),
        json: jest.fn(),
    };
}

const user = { userContext: { userId: 1 } };

describe('Domain controller', () => {
    const domainService = {
        addDomain: jest.fn(),
        addDomainsBatch: jest.fn(),
        updateDomain: jest.fn(),
        deleteDomain: jest.fn(),
    };
    const controller = createDomainController(domainService as any);

    beforeEach(() => {
        jest.clearAllMocks();
    });

    it('answers 201 when a batch added at least one domain', async () => {
        const result = { success: [{ name: 'a.com', region: 'CN', id: 3 }], failed: [], added: 1, total: 1 };
        domainService.addDomainsBatch.mockResolvedValue(result);
        const res = mockResponse();

        await controller.addDomainsBatch({ ...user, body: { domains: [{ name: 'a.com', region: 'CN' }], interval: 30 } } as any, res as any);

        expect(domainService.addDomainsBatch).toHaveBeenCalledWith(1, [{ name: 'a.com', region: 'CN' }], 30);
        expect(res.status).toHaveBeenCalledWith(201);
        expect(res.json).toHaveBeenCalledWith({ success: true, data: result });
    });

    it('answers 200 when a batch added nothing', async () => {
        domainService.addDomainsBatch.mockResolvedValue({ success: [], failed: [{ name: 'bad', region: 'CN', reason: 'invalid domain name' }], added: 0, total: 1 });
        const res = mockResponse();

        await controller.addDomainsBatch({ ...user, body: { domains: [{ name: 'bad', region: 'CN' }] } } as any, res as any);

        expect(res.status).toHaveBeenCalledWith(200);
    });

    it('rejects a body that skipped validation', async () => {
        await expect(controller.addDomain({ ...user, body: { region: 'CN' } } as any, mockResponse() as any)).rejects.toMatchObject({
            statusCode: 400,
            message: 'Invalid request: Required',
        });
        expect(domainService.addDomain).not.toHaveBeenCalled();
    });

    it('parses the id route parameter', async () => {
        domainService.deleteDomain.mockResolvedValue(undefined);
        const res = mockResponse();

        await controller.deleteDomain({ ...user, params: { id: '5' } } as any, res as any);

        expect(domainService.deleteDomain).toHaveBeenCalledWith(1, 5);
        expect(res.json).toHaveBeenCalledWith({ success: true, data: { id: 5 } });

        await expect(controller.updateDomain({ ...user, params: { id: 'abc' }, body: { active: true } } as any, res as any))
            .rejects.toMatchObject({ statusCode: 400 });
    });
});

describe('Channel config controller', () => {
    const channelConfigService = {
        create: jest.fn(),
        sendTest: jest.fn(),
    };
    const controller = createChannelConfigController(channelConfigService as any);

    beforeEach(() => {
        jest.clearAllMocks();
    });

    it('creates a config for the channel type in the route', async () => {
        channelConfigService.create.mockResolvedValue({ id: 9 });
        const res = mockResponse();

        await controller.create({ ...user, params: { type: 'email' }, body: { address: 'ops@example.com' } } as any, res as any);

        expect(channelConfigService.create).toHaveBeenCalledWith(1, ChannelType.EMAIL, { address: 'ops@example.com' });
        expect(res.status).toHaveBeenCalledWith(201);
    });

    it('reports a delivered test send', async () => {
        channelConfigService.sendTest.mockResolvedValue(undefined);
        const res = mockResponse();

        await controller.sendTest({ ...user, params: { type: 'telegram', id: '2' } } as any, res as any);

        expect(channelConfigService.sendTest).toHaveBeenCalledWith(1, ChannelType.TELEGRAM, 2);
        expect(res.json).toHaveBeenCalledWith({ success: true, data: { sent: true } });
    });
});
