import { Site24x7Adapter } from '../src/adapters/site24x7Adapter';
import { RegionResolver } from '../src/services/regionResolver';
import { TickRateLimiter } from '../src/utils/rateLimiter';
import { FakeRoute, RecordedRequest, createFakeHttp } from './helpers/fakeHttp';

jest.mock('../src/services/observabilityService', () => ({
    logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() }
}));

const settings = {
    baseUrl: 'https://site24x7.example.test/api',
    accountsUrl: 'https://accounts.example.test',
    clientId: 'test-client',
    clientSecret: 'test-secret',
    refreshToken: 'test-refresh',
};

const TOKEN_URL = 'https://accounts.example.test/oauth/v2/token';

describe('Site24x7Adapter', () => {
    const adapters: Site24x7Adapter[] = [];

    function build(route: FakeRoute) {
        let issued = 0;
        const { http, requests } = createFakeHttp(request => {
            if (request.url === TOKEN_URL) {
                issued++;
                return { status: 200, data: { access_token: `token-${issued}`, expires_in: 3600 } };
            }
            return route(request);
        });
        const adapter = new Site24x7Adapter({
            settings,
            regionResolver: new RegionResolver(),
            http,
            limiter: new TickRateLimiter({ name: 'site24x7-test', intervalMs: 1 }),
            clock: () => new Date('2025-03-01T10:30:00Z'),
        });
        adapters.push(adapter);
        return { adapter, requests };
    }

    function apiRequests(requests: RecordedRequest[]): RecordedRequest[] {
        return requests.filter(request => request.url !== TOKEN_URL);
    }

    afterEach(() => {
        adapters.splice(0).forEach(adapter => adapter.close());
    });

    it('refreshes the OAuth token once and reuses it', async () => {
        const { adapter, requests } = build(() => ({ status: 200, data: { code: 0 } }));

        await adapter.updateMonitorStatus('m-1', true);
        await adapter.deleteMonitor('m-1');

        const tokenRequests = requests.filter(request => request.url === TOKEN_URL);
        expect(tokenRequests).toHaveLength(1);
        expect(tokenRequests[0]?.body).toBe(
            'client_id=test-client&client_secret=test-secret&refresh_token=test-refresh&grant_type=refresh_token'
        );
        for (const request of apiRequests(requests)) {
            expect(request.headers.Authorization).toBe('Zoho-oauthtoken token-1');
        }
    });

    it('fetches a fresh token after the API rejects the cached one', async () => {
        let calls = 0;
        const { adapter, requests } = build(() => {
            calls++;
            return calls === 1 ? { status: 401, data: { code: 1, message: 'invalid oauth token' } } : { status: 200, data: { code: 0 } };
        });

        await expect(adapter.deleteMonitor('m-1')).rejects.toMatchObject({ statusCode: 401 });
        await adapter.updateMonitorStatus('m-1', false);

        expect(requests.filter(request => request.url === TOKEN_URL)).toHaveLength(2);
        expect(apiRequests(requests).map(request => request.headers.Authorization)).toEqual([
            'Zoho-oauthtoken token-1',
            'Zoho-oauthtoken token-2',
        ]);
    });

    it('keeps the cached token when a call fails for another reason', async () => {
        let calls = 0;
        const { adapter, requests } = build(() => {
            calls++;
            return calls === 1 ? { status: 500, data: 'upstream error' } : { status: 200, data: { code: 0 } };
        });

        await expect(adapter.deleteMonitor('m-1')).rejects.toMatchObject({ statusCode: 500 });
        await adapter.deleteMonitor('m-1');

        expect(requests.filter(request => request.url === TOKEN_URL)).toHaveLength(1);
    });

    it('creates a URL monitor in the first submitted region', async () => {
        const { adapter, requests } = build(() => ({ status: 201, data: { code: 0, data: { monitor_id: 'm-1' } } }));

        await expect(adapter.createMonitor('example.com', 'Domain Check - example.com', ['VN', 'TH'])).resolves.toBe('m-1');

        const [create] = apiRequests(requests);
        expect(create?.url).toBe('/monitors');
        expect(create?.body).toMatchObject({
            display_name: 'Monitor - Domain Check - example.com',
            type: 'URL',
            website: 'https://example.com',
            location_profile_id: '567462000000029021',
            check_frequency: '5',
        });
    });

    it('treats a non-zero envelope code as a failed create', async () => {
        const { adapter } = build(() => ({ status: 200, data: { code: 1101, message: 'Invalid' } }));

        await expect(adapter.createMonitor('example.com', 'x', ['CN'])).rejects.toThrow(
            '[site24x7] createMonitor failed: rejected: {"code":1101,"message":"Invalid"}'
        );
    });

    it('suspends alerts to pause a monitor', async () => {
        const { adapter, requests } = build(() => ({ status: 200, data: { code: 0 } }));

        await adapter.updateMonitorStatus('m-1', false);

        const [update] = apiRequests(requests);
        expect(update?.method).toBe('PUT');
        expect(update?.url).toBe('/monitors/m-1');
        expect(update?.body).toEqual({ monitor_id: 'm-1', suspend_alert: true });
    });

    it('reads the newest log report entry over the last 15 minutes', async () => {
        const { adapter, requests } = build(() => ({
            status: 200,
            data: {
                code: 0,
                data: {
                    report: [
                        {
                            collection_time: '2025-03-01T18:29:00+08:00',
                            availability: '0',
                            response_code: '-',
                            response_time: '15000',
                            reason: 'Connection timed out',
                        },
                    ],
                },
            },
        }));

        await expect(adapter.getLatestCheck('m-1', 'CN')).resolves.toEqual({
            statusCode: 0,
            totalTimeMs: 15000,
            errorCode: 0,
            errorDescription: 'Connection timed out',
            available: false,
            checkedAt: new Date('2025-03-01T10:29:00Z'),
        });

        const [report] = apiRequests(requests);
        expect(report?.url).toBe('/reports/log_reports/m-1');
        expect(report?.params).toEqual({
            start_date: '2025-03-01T18:15:00+0800',
            end_date: '2025-03-01T18:30:00+0800',
        });
    });

    it('fails when the report is empty', async () => {
        const { adapter } = build(() => ({ status: 200, data: { code: 0, data: { report: [] } } }));

        await expect(adapter.getLatestCheck('m-1', 'CN')).rejects.toThrow(
            '[site24x7] getLatestCheck failed: no log entries for monitor m-1'
        );
    });

    it('keeps the HTTP status of a rejected call', async () => {
        const { adapter } = build(() => ({ status: 401, data: { code: 401, message: 'Unauthorized' } }));

        await expect(adapter.deleteMonitor('m-1')).rejects.toMatchObject({
            provider: 'site24x7',
            operation: 'deleteMonitor',
            statusCode: 401,
        });
    });
});
