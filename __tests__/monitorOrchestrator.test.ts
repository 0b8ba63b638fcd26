import { ProviderRegistry } from '../src/adapters/providerRegistry';
import { MonitorOrchestrator, monitorDisplayName, monitorUrl } from '../src/services/monitorOrchestrator';
import { RegionResolver } from '../src/services/regionResolver';
import { ProviderName, RegistrationState } from '../src/types';
import {
    FakeProvider,
    InMemoryDomainRepository,
    InMemoryRegistrationRepository,
    RecordingQueue,
} from './helpers/fakes';

jest.mock('../src/services/observabilityService', () => ({
    logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() }
}));

describe('MonitorOrchestrator', () => {
    let registrations: InMemoryRegistrationRepository;
    let domains: InMemoryDomainRepository;
    let uptrends: FakeProvider;
    let site24x7: FakeProvider;
    let queue: RecordingQueue;
    let orchestrator: MonitorOrchestrator;

    beforeEach(() => {
        registrations = new InMemoryRegistrationRepository();
        domains = new InMemoryDomainRepository(registrations);
        uptrends = new FakeProvider(ProviderName.UPTRENDS);
        site24x7 = new FakeProvider(ProviderName.SITE24X7);
        queue = new RecordingQueue();
        orchestrator = new MonitorOrchestrator({
            domains,
            registrations,
            providers: new ProviderRegistry([site24x7, uptrends]),
            regionResolver: new RegionResolver(),
            queue,
        });
    });

    it('builds the monitor URL and display name from the hostname', () => {
        expect(monitorUrl({ name: 'example.com' })).toBe('https://example.com');
        expect(monitorDisplayName({ name: 'example.com' })).toBe('Domain Check - example.com');
    });

    describe('scheduling', () => {
        it('queues creation and region changes', async () => {
            const domain = domains.seed();

            await orchestrator.onDomainCreated(domain);
            await orchestrator.onRegionChanged(domain, 'CN', 'TH');

            expect(queue.jobs).toEqual([
                { kind: 'create', domainId: domain.id },
                { kind: 'recreate', domainId: domain.id },
            ]);
        });

        it('does not fail the caller when the queue rejects', async () => {
            queue.enqueueError = new Error('Monitor queue full (1000 jobs pending)');

            await expect(orchestrator.onDomainCreated(domains.seed())).resolves.toBeUndefined();
        });
    });

    describe('processJob', () => {
        it('creates a monitor on every provider with primary and fallback regions', async () => {
            const domain = domains.seed({ region: 'TH' });

            await orchestrator.processJob({ kind: 'create', domainId: domain.id });

            expect(uptrends.created).toEqual([
                { url: 'https://example.com', displayName: 'Domain Check - example.com', regions: ['TH', 'VN'], externalId: 'uptrends-1' },
            ]);
            expect(site24x7.created).toEqual([
                { url: 'https://example.com', displayName: 'Domain Check - example.com', regions: ['TH'], externalId: 'site24x7-1' },
            ]);
            expect(registrations.rows.map(row => [row.provider, row.externalId, row.state])).toEqual([
                [ProviderName.UPTRENDS, 'uptrends-1', RegistrationState.ACTIVE],
                [ProviderName.SITE24X7, 'site24x7-1', RegistrationState.ACTIVE],
            ]);
        });

        it('records a pending registration for a provider that failed', async () => {
            site24x7.createError = new Error('503 from provider');
            const domain = domains.seed();

            await orchestrator.processJob({ kind: 'create', domainId: domain.id });

            expect(registrations.rows.map(row => [row.provider, row.externalId, row.state])).toEqual([
                [ProviderName.UPTRENDS, 'uptrends-1', RegistrationState.ACTIVE],
                [ProviderName.SITE24X7, null, RegistrationState.PENDING],
            ]);
        });

        it('deletes every created remote monitor when persisting fails', async () => {
            registrations.saveError = new Error('serialization failure');
            const domain = domains.seed();

            await expect(orchestrator.processJob({ kind: 'create', domainId: domain.id })).rejects.toThrow('serialization failure');

            const createdIds = [...uptrends.created, ...site24x7.created].map(entry => entry.externalId);
            expect([...uptrends.deleted, ...site24x7.deleted].sort()).toEqual(createdIds.sort());
            expect(registrations.rows).toEqual([]);
        });

        it('continues compensating past a failed delete', async () => {
            registrations.saveError = new Error('serialization failure');
            uptrends.deleteError = new Error('timeout');
            const domain = domains.seed();

            await expect(orchestrator.processJob({ kind: 'create', domainId: domain.id })).rejects.toThrow('serialization failure');

            expect(site24x7.deleted).toEqual(['site24x7-1']);
        });

        it('only compensates providers that actually created a monitor', async () => {
            registrations.saveError = new Error('serialization failure');
            site24x7.createError = new Error('503 from provider');
            const domain = domains.seed();

            await expect(orchestrator.processJob({ kind: 'create', domainId: domain.id })).rejects.toThrow();

            expect(uptrends.deleted).toEqual(['uptrends-1']);
            expect(site24x7.deleted).toEqual([]);
        });

        it('skips creation when live registrations already exist', async () => {
            const domain = domains.seed();
            registrations.seed(domain.id, ProviderName.UPTRENDS, 'existing');

            await orchestrator.processJob({ kind: 'create', domainId: domain.id });

            expect(uptrends.created).toEqual([]);
            expect(site24x7.created).toEqual([]);
        });

        it('releases the old monitors before recreating', async () => {
            const domain = domains.seed({ region: 'KR' });
            const old = registrations.seed(domain.id, ProviderName.UPTRENDS, 'old-guid');

            await orchestrator.processJob({ kind: 'recreate', domainId: domain.id });

            expect(uptrends.deleted).toEqual(['old-guid']);
            expect(old.state).toBe(RegistrationState.DELETED);
            expect(uptrends.created[0]?.regions).toEqual(['KR', 'JP']);
            expect((await registrations.listLiveByDomain(domain.id)).map(row => row.externalId)).toEqual([
                'uptrends-1',
                'site24x7-1',
            ]);
        });

        it('runs a recreate queued behind an in-flight create once that create is saved', async () => {
            const domain = domains.seed({ region: 'TH' });
            let openGate: () => void = () => undefined;
            uptrends.createGate = new Promise<void>(resolve => { openGate = resolve; });

            const create = orchestrator.processJob({ kind: 'create', domainId: domain.id });
            await new Promise(resolve => setImmediate(resolve));
            domains.rows.set(domain.id, { ...domain, region: 'JP' });
            const recreate = orchestrator.processJob({ kind: 'recreate', domainId: domain.id });
            openGate();

            const results = await Promise.allSettled([create, recreate]);

            expect(results.map(result => result.status)).toEqual(['fulfilled', 'fulfilled']);
            expect(uptrends.created.map(entry => entry.regions)).toEqual([['TH', 'VN'], ['JP']]);
            expect(uptrends.deleted).toEqual(['uptrends-1']);
            expect(site24x7.deleted).toEqual(['site24x7-1']);
            expect((await registrations.listLiveByDomain(domain.id)).map(row => [row.provider, row.externalId, row.regions])).toEqual([
                [ProviderName.UPTRENDS, 'uptrends-2', ['JP']],
                [ProviderName.SITE24X7, 'site24x7-2', ['JP']],
            ]);
        });

        it('does nothing for a domain that no longer exists', async () => {
            await orchestrator.processJob({ kind: 'create', domainId: 404 });

            expect(uptrends.created).toEqual([]);
        });

        it('pauses the new monitors when the domain is inactive', async () => {
            const domain = domains.seed({ active: false });

            await orchestrator.processJob({ kind: 'create', domainId: domain.id });

            expect(uptrends.statusUpdates).toEqual([{ externalId: 'uptrends-1', active: false }]);
            expect(site24x7.statusUpdates).toEqual([{ externalId: 'site24x7-1', active: false }]);
        });

        it('releases the new monitors when the domain was deleted meanwhile', async () => {
            const domain = domains.seed();
            jest.spyOn(domains, 'findById').mockResolvedValueOnce(domain).mockResolvedValueOnce(null);

            await orchestrator.processJob({ kind: 'create', domainId: domain.id });

            expect(uptrends.deleted).toEqual(['uptrends-1']);
            expect(site24x7.deleted).toEqual(['site24x7-1']);
            expect(registrations.rows.every(row => row.state === RegistrationState.DELETED)).toBe(true);
        });
    });

    describe('onDomainDeleted', () => {
        it('deletes remote monitors independently and keeps failures as orphans', async () => {
            const domain = domains.seed();
            const kept = registrations.seed(domain.id, ProviderName.UPTRENDS, 'guid-1');
            const orphan = registrations.seed(domain.id, ProviderName.SITE24X7, 'm-1');
            const pending = registrations.seed(domain.id, ProviderName.SITE24X7, null);
            site24x7.deleteError = new Error('401 Unauthorized');

            await expect(orchestrator.onDomainDeleted(domain)).resolves.toEqual({ deleted: 2, orphaned: 1 });

            expect(uptrends.deleted).toEqual(['guid-1']);
            expect(kept.state).toBe(RegistrationState.DELETED);
            expect(pending.state).toBe(RegistrationState.DELETED);
            expect(orphan.state).toBe(RegistrationState.ORPHANED_PENDING_DELETE);
        });

        it('orphans a registration whose provider is no longer configured', async () => {
            const only = new MonitorOrchestrator({
                domains,
                registrations,
                providers: new ProviderRegistry([uptrends]),
                regionResolver: new RegionResolver(),
                queue,
            });
            const domain = domains.seed();
            const row = registrations.seed(domain.id, ProviderName.SITE24X7, 'm-1');

            await expect(only.onDomainDeleted(domain)).resolves.toEqual({ deleted: 0, orphaned: 1 });
            expect(row.state).toBe(RegistrationState.ORPHANED_PENDING_DELETE);
        });
    });

    describe('onActiveChanged', () => {
        it('pushes the flag to every live monitor and tolerates failures', async () => {
            const domain = domains.seed();
            registrations.seed(domain.id, ProviderName.UPTRENDS, 'guid-1');
            registrations.seed(domain.id, ProviderName.SITE24X7, 'm-1');
            uptrends.updateError = new Error('timeout');

            await expect(orchestrator.onActiveChanged(domain, false)).resolves.toBeUndefined();

            expect(site24x7.statusUpdates).toEqual([{ externalId: 'm-1', active: false }]);
        });

        it('skips registrations without a remote id', async () => {
            const domain = domains.seed();
            registrations.seed(domain.id, ProviderName.UPTRENDS, null);

            await orchestrator.onActiveChanged(domain, true);

            expect(uptrends.statusUpdates).toEqual([]);
        });
    });
});
