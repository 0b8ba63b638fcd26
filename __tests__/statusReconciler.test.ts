import { ProviderRegistry } from '../src/adapters/providerRegistry';
import { NotificationDispatcher } from '../src/services/notificationDispatcher';
import { isDomainDue, StatusReconciler } from '../src/services/statusReconciler';
import { ChannelType, Domain, NotificationType, ProviderName } from '../src/types';
import {
    FakeProvider,
    FakeSender,
    InMemoryChannelConfigRepository,
    InMemoryDomainRepository,
    InMemoryHistoryRepository,
    InMemoryRegistrationRepository,
    makeCheck,
} from './helpers/fakes';

jest.mock('../src/services/observabilityService', () => ({
    logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() }
}));

const NOW = new Date('2025-03-01T10:30:00Z');

describe('isDomainDue', () => {
    it('is due when never checked', () => {
        expect(isDomainDue({ lastCheck: null, interval: 20 }, NOW)).toBe(true);
    });

    it('is due once the interval has fully elapsed', () => {
        expect(isDomainDue({ lastCheck: new Date('2025-03-01T10:10:00Z'), interval: 20 }, NOW)).toBe(true);
        expect(isDomainDue({ lastCheck: new Date('2025-03-01T10:15:00Z'), interval: 20 }, NOW)).toBe(false);
    });
});

describe('StatusReconciler', () => {
    let registrations: InMemoryRegistrationRepository;
    let domains: InMemoryDomainRepository;
    let uptrends: FakeProvider;
    let site24x7: FakeProvider;
    let dispatcher: NotificationDispatcher;
    let dispatchSpy: jest.SpyInstance;

    function createReconciler(notifyOnStatus = false): StatusReconciler {
        return new StatusReconciler({
            domains,
            registrations,
            providers: new ProviderRegistry([uptrends, site24x7]),
            dispatchers: [dispatcher],
            intervalMs: 60_000,
            notifyOnStatus,
            clock: () => NOW,
        });
    }

    beforeEach(() => {
        registrations = new InMemoryRegistrationRepository();
        domains = new InMemoryDomainRepository(registrations);
        uptrends = new FakeProvider(ProviderName.UPTRENDS);
        site24x7 = new FakeProvider(ProviderName.SITE24X7);
        dispatcher = new NotificationDispatcher({
            sender: new FakeSender(),
            channelConfigs: new InMemoryChannelConfigRepository(),
            history: new InMemoryHistoryRepository(),
        });
        dispatchSpy = jest.spyOn(dispatcher, 'dispatch').mockResolvedValue({
            channelType: ChannelType.TELEGRAM,
            type: NotificationType.DOWN,
            sent: [],
            suppressed: [],
            failed: [],
        });
    });

    function seedMonitored(overrides: Partial<Domain> = {}): number {
        const domain = domains.seed(overrides);
        registrations.seed(domain.id, ProviderName.UPTRENDS, `u-${domain.id}`);
        registrations.seed(domain.id, ProviderName.SITE24X7, `s-${domain.id}`);
        return domain.id;
    }

    it('checks only due domains and stores the first provider result', async () => {
        const due = seedMonitored();
        seedMonitored({ lastCheck: new Date('2025-03-01T10:15:00Z') });
        const check = makeCheck();
        uptrends.checks.set(`u-${due}|CN`, check);

        const summary = await createReconciler().runPass();

        expect(summary).toMatchObject({ checked: 1, notDue: 1, updated: 1, transitions: 0, skipped: 0, failed: 0 });
        expect(domains.statusUpdates).toEqual([{ id: due, result: check }]);
        expect(site24x7.checkCalls).toEqual([]);
        expect(dispatchSpy).not.toHaveBeenCalled();
    });

    it('tries the submitted regions of a registration in order', async () => {
        const domain = domains.seed({ region: 'TH' });
        registrations.seed(domain.id, ProviderName.UPTRENDS, 'u-1', { regions: ['TH', 'VN'] });
        uptrends.checks.set('u-1|VN', makeCheck());

        await createReconciler().runPass();

        expect(uptrends.checkCalls).toEqual([
            { externalId: 'u-1', region: 'TH' },
            { externalId: 'u-1', region: 'VN' },
        ]);
        expect(domains.statusUpdates).toHaveLength(1);
    });

    it('moves to the next provider after an error and dispatches a transition', async () => {
        const id = seedMonitored();
        uptrends.checks.set(`u-${id}|CN`, new Error('HTTP 500'));
        site24x7.checks.set(`s-${id}|CN`, makeCheck({ statusCode: 503, available: false }));

        const summary = await createReconciler().runPass();

        expect(summary).toMatchObject({ updated: 1, transitions: 1 });
        expect(dispatchSpy).toHaveBeenCalledTimes(1);
        expect(dispatchSpy).toHaveBeenCalledWith(expect.objectContaining({ id, lastStatus: 503 }), true);
    });

    it('skips a domain no provider has a result for', async () => {
        seedMonitored();

        const summary = await createReconciler().runPass();

        expect(summary).toMatchObject({ checked: 1, updated: 0, skipped: 1 });
        expect(domains.statusUpdates).toEqual([]);
        expect(dispatchSpy).not.toHaveBeenCalled();
    });

    it('keeps notifying while a domain stays down', async () => {
        const id = seedMonitored({ lastStatus: 500 });
        uptrends.checks.set(`u-${id}|CN`, makeCheck({ statusCode: 502, available: false }));

        await createReconciler().runPass();

        expect(dispatchSpy).toHaveBeenCalledWith(expect.objectContaining({ id, lastStatus: 502 }), false);
    });

    it('sends steady status when status notifications are enabled', async () => {
        const id = seedMonitored();
        uptrends.checks.set(`u-${id}|CN`, makeCheck());

        await createReconciler(true).runPass();

        expect(dispatchSpy).toHaveBeenCalledWith(expect.objectContaining({ id, lastStatus: 200 }), false);
    });

    it('isolates a failing domain from the rest of the pass', async () => {
        const first = seedMonitored();
        const second = seedMonitored();
        uptrends.checks.set(`u-${first}|CN`, makeCheck());
        uptrends.checks.set(`u-${second}|CN`, makeCheck());
        jest.spyOn(domains, 'updateStatus').mockRejectedValueOnce(new Error('deadlock detected'));

        const summary = await createReconciler().runPass();

        expect(summary).toMatchObject({ checked: 2, updated: 1, failed: 1 });
    });

    it('does not count a dispatch failure against the domain', async () => {
        const id = seedMonitored();
        uptrends.checks.set(`u-${id}|CN`, makeCheck({ statusCode: 500, available: false }));
        dispatchSpy.mockRejectedValueOnce(new Error('database unavailable'));

        const summary = await createReconciler().runPass();

        expect(summary).toMatchObject({ updated: 1, failed: 0 });
    });

    it('refuses to overlap passes', async () => {
        const reconciler = createReconciler();

        const first = reconciler.runPass();
        await expect(reconciler.runPass()).resolves.toBeNull();
        await expect(first).resolves.toMatchObject({ checked: 0 });
    });

    it('records a failed listing in its status', async () => {
        domains.listMonitoredError = new Error('connection refused');
        const reconciler = createReconciler();

        await expect(reconciler.runPass()).rejects.toThrow('connection refused');
        expect(reconciler.getStatus()).toMatchObject({ lastRunAt: NOW, lastError: 'connection refused', lastPass: null });
    });

    describe('lifecycle', () => {
        beforeEach(() => {
            jest.useFakeTimers();
        });

        afterEach(() => {
            jest.useRealTimers();
        });

        it('runs a pass every interval until stopped', async () => {
            const id = seedMonitored();
            uptrends.checks.set(`u-${id}|CN`, makeCheck());
            const reconciler = createReconciler();

            reconciler.start();
            expect(reconciler.getStatus().isRunning).toBe(true);

            await jest.advanceTimersByTimeAsync(60_000);
            expect(domains.statusUpdates).toHaveLength(1);

            await reconciler.stop();
            expect(reconciler.getStatus()).toMatchObject({ isRunning: false, passInProgress: false });
        });
    });
});
