import nodeFetch, { type RequestInit, type Response } from 'node-fetch';
import type { BridgeConfig } from './config.js';
import { silentLogger, type Logger } from './logger.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface OnshapeApiClientOptions {
    fetch?: FetchLike;
    logger?: Logger;
}

/** A non-2xx answer from the service, or a request that never got one. */
export class OnshapeApiError extends Error {
    constructor(
        message: string,
        readonly method: HttpMethod,
        readonly url: string,
        readonly status?: number,
        readonly statusText?: string,
        readonly body?: string,
    ) {
        super(message);
        this.name = 'OnshapeApiError';
    }

    /** Rate limiting and server-side failures; everything else will fail the same way again. */
    get retryable(): boolean {
        return this.status === undefined || this.status === 429 || this.status >= 500;
    }
}

export class OnshapeApiClient {
    private readonly fetch: FetchLike;
    private readonly logger: Logger;
    private readonly authHeader?: string;

    constructor(
        private readonly config: Pick<BridgeConfig, 'apiUrl' | 'accessKey' | 'secretKey' | 'requestTimeoutMs'>,
        options: OnshapeApiClientOptions = {},
    ) {
        this.fetch = options.fetch ?? nodeFetch;
        this.logger = options.logger ?? silentLogger;
        if (config.accessKey && config.secretKey) {
            this.authHeader = 'Basic ' + Buffer.from(`${config.accessKey}:${config.secretKey}`).toString('base64');
        } else {
            this.logger.warn('Onshape API keys not set; set ONSHAPE_ACCESS_KEY and ONSHAPE_SECRET_KEY. Requests will be rejected.');
        }
    }

    async request(method: HttpMethod, path: string, body?: unknown, queryParams?: URLSearchParams): Promise<unknown> {
        const url = `${this.config.apiUrl}${path}${queryParams ? `?${queryParams.toString()}` : ''}`;
        const headers: Record<string, string> = {
            'accept': 'application/json;charset=UTF-8; qs=0.09',
            'Content-Type': 'application/json;charset=UTF-8; qs=0.09',
        };
        if (this.authHeader) {
            headers['Authorization'] = this.authHeader;
        }

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);
        const options: RequestInit = { method, headers, signal: controller.signal };
        if (body !== undefined) {
            options.body = JSON.stringify(body);
        }

        this.logger.debug(`${method} ${url}`);
        let response: Response;
        try {
            response = await this.fetch(url, options);
        } catch (error) {
            const reason = controller.signal.aborted
                ? `timed out after ${this.config.requestTimeoutMs} ms`
                : String(error);
            this.logger.error(`Error during Onshape API request to ${url}: ${reason}`);
            throw new OnshapeApiError(`Onshape API request failed: ${reason}`, method, url);
        } finally {
            clearTimeout(timer);
        }

        const text = await response.text();
        if (!response.ok) {
            this.logger.error(`Onshape API Error: ${response.status} ${response.statusText} for ${method} ${url}`);
            throw new OnshapeApiError(
                `Onshape API Error: ${response.status} ${response.statusText} - ${text}`,
                method,
                url,
                response.status,
                response.statusText,
                text,
            );
        }
        // Some endpoints answer 200 with no body.
        return text ? JSON.parse(text) : {};
    }

    get(path: string, queryParams?: URLSearchParams): Promise<unknown> {
        return this.request('GET', path, undefined, queryParams);
    }

    post(path: string, body: unknown, queryParams?: URLSearchParams): Promise<unknown> {
        return this.request('POST', path, body, queryParams);
    }

    delete(path: string): Promise<unknown> {
        return this.request('DELETE', path);
    }
}
