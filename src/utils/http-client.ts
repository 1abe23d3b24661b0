import type { PageFetcher } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse {
    status: number;
    body: string;
}

/**
 * Transport failure. Status is 0 for network errors and timeouts.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Minimal page client. Requests are never retried: any failure halts the crawl.
 */
export class HttpClient implements PageFetcher {
    private requestCount = 0;
    private readonly defaultTimeout: number;
    private readonly userAgent: string;

    constructor(options?: { timeout?: number; version?: string }) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '1.0.0';
        this.userAgent = `pokedex-etl/${version}`;
    }

    /**
     * GET a URL and return its body as text.
     */
    async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const { headers = {}, timeout = this.defaultTimeout } = options;

        this.requestCount++;

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        let response: Response;
        let body: string;
        try {
            response = await fetch(url, {
                method: 'GET',
                headers: { 'User-Agent': this.userAgent, ...headers },
                signal: controller.signal,
            });
            body = await response.text();
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0);
            }
            throw new HttpError(
                `Network error: ${error instanceof Error ? error.message : String(error)}`,
                0
            );
        } finally {
            clearTimeout(timeoutId);
        }

        if (!response.ok) {
            throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, body);
        }

        getLogger().debug({ url, status: response.status, bytes: body.length }, 'Fetched page');
        return { status: response.status, body };
    }

    async fetchPage(url: string): Promise<string> {
        const response = await this.get(url, { headers: { Accept: 'text/html' } });
        return response.body;
    }

    /**
     * Number of requests issued by this client.
     */
    getRequestCount(): number {
        return this.requestCount;
    }

    resetCounts(): void {
        this.requestCount = 0;
    }
}

/**
 * Create a new HTTP client.
 */
export function createHttpClient(options?: { timeout?: number; version?: string }): HttpClient {
    return new HttpClient(options);
}
