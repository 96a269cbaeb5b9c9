/**
 * Page Fetcher
 *
 * Network access for retrievers. Retrievers depend on the PageFetcher interface so tests can
 * serve pages from memory.
 */

import type { AxiosInstance } from 'axios';
import type { NetworkParameters } from '../../config/appConfig.js';
import { createHttpClient, parseProxyUrl } from '../../config/httpClient.js';
import { fixedDelayWithJitter, retryWithBackoff } from '../../utils/retry.js';

export interface PageFetcher {
    fetchText(url: string): Promise<string>;
    fetchBinary(url: string): Promise<Buffer>;
}

export interface FetchOptions {
    /** Sent as the Referer header */
    referrer?: string;
}

/**
 * HTTP GET with the configured user agent, proxy and retry policy
 */
export class AxiosPageFetcher implements PageFetcher {
    private readonly network: NetworkParameters;
    private readonly httpClient: AxiosInstance;

    constructor(network: NetworkParameters, options: FetchOptions = {}) {
        this.network = network;
        this.httpClient = createHttpClient({
            timeout: network.fetchTimeoutMs,
            proxy: parseProxyUrl(network.proxyUrl),
            headers: {
                'User-Agent': network.userAgent,
                ...(options.referrer !== undefined ? { Referer: options.referrer } : {}),
            },
        });
    }

    private withRetry<T>(url: string, operation: () => Promise<T>): Promise<T> {
        return retryWithBackoff(
            operation,
            {
                maxAttempts: this.network.retryCount,
                getDelay: fixedDelayWithJitter(this.network.retryWaitFixedMs),
                maxDelay: Math.max(this.network.retryWaitFixedMs * 3, 1),
            },
            `GET ${url}`
        );
    }

    fetchText(url: string): Promise<string> {
        return this.withRetry(url, async () => {
            const response = await this.httpClient.get<string>(url, { responseType: 'text' });
            return response.data;
        });
    }

    fetchBinary(url: string): Promise<Buffer> {
        return this.withRetry(url, async () => {
            const response = await this.httpClient.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
            return Buffer.from(response.data);
        });
    }
}
