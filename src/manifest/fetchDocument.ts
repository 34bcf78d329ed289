import { HttpClient } from '../download/HttpClient';
import { isRetryable } from '../utils/errors';
import { retryWithBackoff } from '../utils/retryHelper';

export interface DocumentFetchOptions {
    retries?: number;
    retryBaseDelay?: number;
}

/**
 * GET a text document, retrying transient network failures
 */
export async function fetchDocument(
    client: HttpClient,
    url: string,
    options: DocumentFetchOptions = {},
): Promise<string> {
    const body = await retryWithBackoff(() => client.get(url), {
        maxRetries: options.retries ?? 2,
        baseDelay: options.retryBaseDelay ?? 500,
        operationName: `GET ${url}`,
        shouldRetry: isRetryable,
    });
    return body.toString('utf-8');
}
