/**
 * In-process axios instance: requests go to a handler instead of the network
 */

import axios, { AxiosError, AxiosInstance, InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
    method: string | undefined;
    url: string | undefined;
    params: unknown;
    data: unknown;
}

export type FakeHandler = (request: RecordedRequest) => { status: number; data: unknown };

export function createFakeAxios(handler: FakeHandler): { client: AxiosInstance; requests: RecordedRequest[] } {
    const requests: RecordedRequest[] = [];

    const client = axios.create({
        adapter: async (config: InternalAxiosRequestConfig) => {
            const request: RecordedRequest = {
                method: config.method,
                url: config.url,
                params: config.params,
                data: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
            };
            requests.push(request);

            const { status, data } = handler(request);
            const response = { data, status, statusText: String(status), headers: {}, config };
            if (status >= 400) {
                throw new AxiosError(
                    `Request failed with status code ${status}`,
                    AxiosError.ERR_BAD_REQUEST,
                    config,
                    undefined,
                    response
                );
            }
            return response;
        },
    });

    return { client, requests };
}
