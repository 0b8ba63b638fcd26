import { ProviderRegistry } from '../src/adapters/providerRegistry';
import { DomainService, normalizeHostname } from '../src/services/domainService';
import { MonitorOrchestrator } from '../src/services/monitorOrchestrator';
import { RegionResolver } from '../src/services/regionResolver';
import { ProviderName } from '../src/types';
import {
    FakeProvider,
    InMemoryDomainRepository,
    InMemoryRegistrationRepository,
    RecordingQueue,
} from './helpers/fakes';

jest.mock('../src/services/observabilityService', () => ({
    logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() }
}));

describe('normalizeHostname', () => {
    it('strips scheme, path, port and trailing dot', () => {
        expect(normalizeHostname('https://Example.com/path?x=1')).toBe('example.com');
        expect(normalizeHostname('  shop.example.co.uk:8443 ')).toBe('shop.example.co.uk');
        expect(normalizeHostname('example.com.')).toBe('example.com');
    });

    it('rejects names that are not hostnames', () => {
        expect(normalizeHostname('localhost')).toBeNull();
        expect(normalizeHostname('bad_name.com')).toBeNull();
        expect(normalizeHostname('-example.com')).toBeNull();
        expect(normalizeHostname('')).toBeNull();
    });
});

describe('DomainService', () => {
    let registrations: InMemoryRegistrationRepository;
    let domains: InMemoryDomainRepository;
    let uptrends: FakeProvider;
    let queue: RecordingQueue;
    let orchestrator: MonitorOrchestrator;
    let service: DomainService;

    beforeEach(() => {
        registrations = new InMemoryRegistrationRepository();
        domains = new InMemoryDomainRepository(registrations);
        uptrends = new FakeProvider(ProviderName.UPTRENDS);
        queue = new RecordingQueue();
        const regionResolver = new RegionResolver();
        orchestrator = new MonitorOrchestrator({
            domains,
            registrations,
            providers: new ProviderRegistry([uptrends]),
            regionResolver,
            queue,
        });
        service = new DomainService({ domains, orchestrator, regionResolver, defaultDomainLimit: 10 });
    });

    describe('addDomain', () => {
        it('stores the normalized domain with defaults and queues its monitors', async () => {
            const domain = await service.addDomain(1, { name: 'https://Example.com/' });

            expect(domain).toMatchObject({ userId: 1, name: 'example.com', region: 'CN', interval: 20, active: true });
            expect(queue.jobs).toEqual([{ kind: 'create', domainId: domain.id }]);
            expect(uptrends.created).toEqual([]);
        });

        it('accepts region aliases', async () => {
            const domain = await service.addDomain(1, { name: 'example.com', region: 'thailand', interval: 60 });

            expect(domain).toMatchObject({ region: 'TH', interval: 60 });
        });

        it('rejects invalid input', async () => {
            await expect(service.addDomain(1, { name: 'nope' })).rejects.toMatchObject({
                statusCode: 400,
                message: 'Invalid domain name: nope',
            });
            await expect(service.addDomain(1, { name: 'example.com', region: 'XX' })).rejects.toMatchObject({
                statusCode: 400,
                message: 'Unknown region: XX',
            });
            await expect(service.addDomain(1, { name: 'example.com', interval: 15 })).rejects.toMatchObject({
                statusCode: 400,
                message: 'Interval must be one of 10, 20, 30, 60, 120',
            });
        });

        it('enforces the per-user limit', async () => {
            domains.limits.set(1, 1);
            domains.seed();

            await expect(service.addDomain(1, { name: 'other.com' })).rejects.toMatchObject({
                statusCode: 403,
                message: 'Domain limit reached (1)',
            });
        });

        it('answers a duplicate name and region with a conflict', async () => {
            domains.seed();

            await expect(service.addDomain(1, { name: 'EXAMPLE.com', region: 'CN' })).rejects.toMatchObject({
                statusCode: 409,
                message: 'Domain example.com already exists in region CN',
            });
        });
    });

    describe('addDomainsBatch', () => {
        it('adds valid items and reports a reason for each rejected one', async () => {
            domains.seed();

            const result = await service.addDomainsBatch(1, [
                { name: 'good.com', region: 'vn' },
                { name: 'bad', region: 'CN' },
                { name: 'x.com', region: 'ZZ' },
                { name: 'Example.com', region: 'CN' },
                { name: 'GOOD.com', region: 'Vietnam' },
            ]);

            expect(result).toEqual({
                success: [{ name: 'good.com', region: 'VN', id: 2 }],
                failed: [
                    { name: 'bad', region: 'CN', reason: 'invalid domain name' },
                    { name: 'x.com', region: 'ZZ', reason: 'invalid region' },
                    { name: 'Example.com', region: 'CN', reason: 'duplicate domain' },
                    { name: 'GOOD.com', region: 'Vietnam', reason: 'duplicate domain' },
                ],
                added: 1,
                total: 5,
            });
            expect(queue.jobs).toEqual([{ kind: 'create', domainId: 2 }]);
        });

        it('stops adding once the limit is reached', async () => {
            domains.limits.set(1, 2);
            domains.seed();

            const result = await service.addDomainsBatch(1, [
                { name: 'a.com', region: 'CN' },
                { name: 'b.com', region: 'CN' },
            ]);

            expect(result.added).toBe(1);
            expect(result.failed).toEqual([{ name: 'b.com', region: 'CN', reason: 'domain limit reached (2)' }]);
        });

        it('isolates a storage failure to its item', async () => {
            domains.createError = new Error('connection reset');

            const result = await service.addDomainsBatch(1, [{ name: 'a.com', region: 'CN' }]);

            expect(result.failed).toEqual([{ name: 'a.com', region: 'CN', reason: 'failed to save domain' }]);
        });

        it('rejects empty and oversized batches', async () => {
            await expect(service.addDomainsBatch(1, [])).rejects.toMatchObject({ statusCode: 400 });

            const tooMany = Array.from({ length: 101 }, (_, i) => ({ name: `d${i}.com`, region: 'CN' }));
            await expect(service.addDomainsBatch(1, tooMany)).rejects.toMatchObject({
                statusCode: 400,
                message: 'At most 100 domains per batch',
            });
        });
    });

    describe('updateDomain', () => {
        it('queues recreation when the region changes', async () => {
            const domain = domains.seed();

            const updated = await service.updateDomain(1, domain.id, { region: 'th', active: false });

            expect(updated.region).toBe('TH');
            expect(queue.jobs).toEqual([{ kind: 'recreate', domainId: domain.id }]);
            expect(uptrends.statusUpdates).toEqual([]);
        });

        it('pushes an active change to existing monitors', async () => {
            const domain = domains.seed();
            registrations.seed(domain.id, ProviderName.UPTRENDS, 'u-1');

            await service.updateDomain(1, domain.id, { active: false });

            expect(uptrends.statusUpdates).toEqual([{ externalId: 'u-1', active: false }]);
            expect(queue.jobs).toEqual([]);
        });

        it('leaves providers alone for an interval change', async () => {
            const domain = domains.seed();
            registrations.seed(domain.id, ProviderName.UPTRENDS, 'u-1');

            const updated = await service.updateDomain(1, domain.id, { interval: 60 });

            expect(updated.interval).toBe(60);
            expect(uptrends.statusUpdates).toEqual([]);
            expect(queue.jobs).toEqual([]);
        });

        it('rejects empty patches and unknown domains', async () => {
            const other = domains.seed({ userId: 2 });

            await expect(service.updateDomain(1, other.id, {})).rejects.toMatchObject({ statusCode: 400 });
            await expect(service.updateDomain(1, other.id, { active: true })).rejects.toMatchObject({
                statusCode: 404,
                message: 'Domain not found',
            });
        });
    });

    it('sets the active flag on every domain that changes', async () => {
        const first = domains.seed();
        domains.seed({ name: 'second.com' });
        domains.seed({ name: 'paused.com', active: false });
        registrations.seed(first.id, ProviderName.UPTRENDS, 'u-1');

        await expect(service.setActiveForAll(1, false)).resolves.toEqual({ updated: 2 });
        expect(uptrends.statusUpdates).toEqual([{ externalId: 'u-1', active: false }]);
    });

    describe('deletion', () => {
        it('releases remote monitors and removes the domain', async () => {
            const domain = domains.seed();
            registrations.seed(domain.id, ProviderName.UPTRENDS, 'u-1');

            await service.deleteDomain(1, domain.id);

            expect(uptrends.deleted).toEqual(['u-1']);
            expect(domains.rows.size).toBe(0);
            expect(registrations.rows).toEqual([]);
        });

        it('keeps an orphaned registration after the domain is gone', async () => {
            const domain = domains.seed();
            registrations.seed(domain.id, ProviderName.UPTRENDS, 'u-1');
            uptrends.deleteError = new Error('timeout');

            await service.deleteDomain(1, domain.id);

            expect(domains.rows.size).toBe(0);
            expect(registrations.rows.map(row => row.state)).toEqual(['orphaned_pending_delete']);
        });

        it('answers 404 for a domain of another user', async () => {
            const other = domains.seed({ userId: 2 });

            await expect(service.deleteDomain(1, other.id)).rejects.toMatchObject({ statusCode: 404 });
            expect(domains.rows.size).toBe(1);
        });

        it('reports missing ids and release failures in a batch', async () => {
            const first = domains.seed();
            const second = domains.seed({ name: 'second.com' });
            jest.spyOn(orchestrator, 'onDomainDeleted').mockResolvedValueOnce({ deleted: 0, orphaned: 0 })
                .mockRejectedValueOnce(new Error('database unavailable'));

            const result = await service.deleteDomainsBatch(1, [first.id, second.id, 99, first.id]);

            expect(result).toEqual({
                deletedCount: 1,
                deleted: [first.id],
                failed: [
                    { id: second.id, reason: 'failed to release monitors' },
                    { id: 99, reason: 'domain not found' },
                ],
            });
            expect(domains.rows.has(second.id)).toBe(true);
        });

        it('deletes every domain of the user', async () => {
            domains.seed();
            domains.seed({ name: 'second.com' });
            domains.seed({ name: 'foreign.com', userId: 2 });

            const result = await service.deleteAllDomains(1);

            expect(result.deletedCount).toBe(2);
            expect([...domains.rows.values()].map(domain => domain.name)).toEqual(['foreign.com']);
        });
    });
});
