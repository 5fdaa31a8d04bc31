import axios, { AxiosInstance } from 'axios';

export interface HttpClientOptions {
    baseURL: string;
    timeoutMs: number;
}

export type HttpClient = Pick<AxiosInstance, 'get'>;

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
    return axios.create({
        baseURL: options.baseURL,
        timeout: options.timeoutMs,
        headers: { 'Accept': 'application/json' }
    });
}
