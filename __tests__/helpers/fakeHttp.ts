/**
 * axios instance whose adapter answers from a routing function instead of
 * the network.
 */

import axios, { AxiosInstance, InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
    method: string;
    url: string;
    body: unknown;
    params: unknown;
    headers: Record<string, unknown>;
}

export interface FakeReply {
    status: number;
    data?: unknown;
}

export type FakeRoute = (request: RecordedRequest) => FakeReply;

function parseBody(data: unknown): unknown {
    if (typeof data === 'string' && /^[[{]/.test(data)) {
        return JSON.parse(data);
    }
    return data;
}

export function createFakeHttp(route: FakeRoute): { http: AxiosInstance; requests: RecordedRequest[] } {
    const requests: RecordedRequest[] = [];

    const http = axios.create({
        validateStatus: () => true,
        adapter: async (config: InternalAxiosRequestConfig) => {
            const request: RecordedRequest = {
                method: (config.method ?? 'get').toUpperCase(),
                url: config.url ?? '',
                body: parseBody(config.data),
                params: config.params,
                headers: config.headers.toJSON(),
            };
            requests.push(request);

            const reply = route(request);
            return {
                data: reply.data ?? '',
                status: reply.status,
                statusText: String(reply.status),
                headers: {},
                config,
            };
        },
    });

    return { http, requests };
}
