/**
 * BoundedDownloader - runs download tasks with at most N requests in flight
 * Each task ends in exactly one DownloadResult; a failing task never cancels
 * or delays its siblings, and run() settles only once every task is terminal.
 */

import { EventEmitter } from 'events';
import { HttpClient } from '../HttpClient';
import { ContentStore } from '../../storage/ContentStore';
import { FileManager } from '../../utils/FileManager';
import { isRetryable, toError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { retryWithBackoff } from '../../utils/retryHelper';
import {
    DownloadEvent,
    DownloadEventHandler,
    DownloadResult,
    DownloadTask,
    DownloaderStats,
} from './types';

export interface BoundedDownloaderOptions {
    client: HttpClient;
    store: ContentStore;
    files?: FileManager;
    /** Extra attempts after a retryable failure */
    retries?: number;
    retryBaseDelay?: number;
}

export class BoundedDownloader extends EventEmitter {
    private readonly client: HttpClient;
    private readonly store: ContentStore;
    private readonly files: FileManager;
    private readonly retries: number;
    private readonly retryBaseDelay: number;
    private eventHandlers: DownloadEventHandler[] = [];

    private active = 0;
    private queued = 0;
    private peakActive = 0;
    private completed = 0;
    private failed = 0;

    constructor(options: BoundedDownloaderOptions) {
        super();
        this.client = options.client;
        this.store = options.store;
        this.files = options.files ?? new FileManager();
        this.retries = options.retries ?? 2;
        this.retryBaseDelay = options.retryBaseDelay ?? 500;
    }

    /**
     * Add event handler
     */
    onDownloadEvent(handler: DownloadEventHandler): void {
        this.eventHandlers.push(handler);
    }

    private emitEvent(type: DownloadEvent['type'], taskId: string, data?: Record<string, unknown>): void {
        const event: DownloadEvent = {
            type,
            taskId,
            timestamp: new Date(),
            data,
        };

        // A throwing listener must not end the task or its worker
        try {
            this.emit(type, event);
        } catch (error) {
            this.reportListenerError(event, error);
        }
        for (const handler of this.eventHandlers) {
            try {
                handler(event);
            } catch (error) {
                this.reportListenerError(event, error);
            }
        }
    }

    private reportListenerError(event: DownloadEvent, error: unknown): void {
        logger.warn('Download event listener threw', {
            type: event.type,
            taskId: event.taskId,
            error: toError(error).message,
        });
    }

    async run(tasks: Iterable<DownloadTask>, concurrency: number): Promise<DownloadResult[]> {
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
        }

        const queue = this.dedupe(tasks);
        const results: DownloadResult[] = [];
        this.queued += queue.length;

        logger.info('Download run started', { tasks: queue.length, concurrency });

        // Each worker pulls the next task only after its current one is terminal
        const worker = async (): Promise<void> => {
            let task: DownloadTask | undefined;
            while ((task = queue.shift()) !== undefined) {
                this.queued--;
                results.push(await this.execute(task));
            }
        };

        const workerCount = Math.min(concurrency, queue.length);
        await Promise.all(Array.from({ length: workerCount }, () => worker()));

        logger.info('Download run finished', {
            succeeded: results.filter((r) => r.success).length,
            failed: results.filter((r) => !r.success).length,
        });

        return results;
    }

    getStats(): DownloaderStats {
        return {
            active: this.active,
            queued: this.queued,
            peakActive: this.peakActive,
            completed: this.completed,
            failed: this.failed,
        };
    }

    /**
     * Drop tasks that target a destination already claimed earlier in the batch
     */
    private dedupe(tasks: Iterable<DownloadTask>): DownloadTask[] {
        const seen = new Set<string>();
        const unique: DownloadTask[] = [];
        for (const task of tasks) {
            if (seen.has(task.destinationPath)) {
                logger.debug('Duplicate download task dropped', { taskId: task.id });
                continue;
            }
            seen.add(task.destinationPath);
            unique.push(task);
        }
        return unique;
    }

    private async execute(task: DownloadTask): Promise<DownloadResult> {
        this.active++;
        this.peakActive = Math.max(this.peakActive, this.active);
        this.emitEvent('task:started', task.id, { kind: task.kind, sourceUrl: task.sourceUrl });

        let attempts = 0;
        let result: DownloadResult;

        try {
            const bytes = await retryWithBackoff(
                () => {
                    attempts++;
                    return this.client.get(task.sourceUrl);
                },
                {
                    maxRetries: this.retries,
                    baseDelay: this.retryBaseDelay,
                    operationName: `Download ${task.id}`,
                    shouldRetry: isRetryable,
                },
            );

            await this.publish(task, bytes);
            result = { task, success: true, attempts, bytes: bytes.length };
        } catch (error) {
            result = { task, success: false, attempts, error: toError(error) };
        } finally {
            this.active--;
        }

        if (result.success) {
            this.completed++;
            logger.debug('Downloaded', { taskId: task.id, bytes: result.bytes });
            this.emitEvent('task:completed', task.id, { bytes: result.bytes, attempts });
        } else {
            this.failed++;
            logger.warn('Download failed', { taskId: task.id, url: task.sourceUrl, error: result.error.message });
            this.emitEvent('task:failed', task.id, { error: result.error.message, attempts });
        }

        return result;
    }

    private async publish(task: DownloadTask, bytes: Buffer): Promise<void> {
        if (task.hash !== undefined) {
            await this.store.put(task.hash, bytes);
        } else {
            await this.files.writeAtomic(task.destinationPath, bytes);
        }
    }
}
