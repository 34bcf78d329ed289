/**
 * HttpClient - explicitly owned HTTP handle shared by every pipeline stage
 */

import fetch from 'node-fetch';
import { logger } from '../utils/logger';
import { NetworkError, toError } from '../utils/errors';

export interface HttpClient {
    /**
     * GET a URL and return the whole body
     * Rejects with NetworkError on transport failure, deadline or non-2xx status.
     */
    get(url: string): Promise<Buffer>;
}

export interface HttpClientOptions {
    /** Per-request deadline in milliseconds */
    timeout?: number;
    userAgent?: string;
}

export class NodeFetchHttpClient implements HttpClient {
    private readonly timeout: number;
    private readonly userAgent: string;
    private readonly activeRequests = new Set<AbortController>();
    private closed = false;

    constructor(options: HttpClientOptions = {}) {
        this.timeout = options.timeout ?? 60000;
        this.userAgent = options.userAgent ?? 'instance-sync/1.0';
    }

    async get(url: string): Promise<Buffer> {
        if (this.closed) {
            throw new NetworkError('HTTP client is closed', url);
        }

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeout);
        this.activeRequests.add(controller);

        try {
            const response = await fetch(url, {
                headers: { 'User-Agent': this.userAgent },
                signal: controller.signal,
            });

            if (!response.ok) {
                throw new NetworkError(`HTTP ${response.status} ${response.statusText}`, url, response.status);
            }

            return Buffer.from(await response.arrayBuffer());
        } catch (error) {
            if (error instanceof NetworkError) {
                throw error;
            }
            const err = toError(error);
            if (err.name === 'AbortError') {
                throw new NetworkError(
                    this.closed ? 'Request aborted' : `Request timed out after ${this.timeout}ms`,
                    url,
                    undefined,
                    err,
                );
            }
            throw new NetworkError(err.message, url, undefined, err);
        } finally {
            clearTimeout(timer);
            this.activeRequests.delete(controller);
        }
    }

    /**
     * Abort in-flight requests and refuse new ones
     */
    close(): void {
        this.closed = true;
        if (this.activeRequests.size > 0) {
            logger.debug('Aborting in-flight requests', { count: this.activeRequests.size });
        }
        for (const controller of this.activeRequests) {
            controller.abort();
        }
        this.activeRequests.clear();
    }
}
