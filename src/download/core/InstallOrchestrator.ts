/**
 * InstallOrchestrator - main coordinator for installing or updating an instance
 *
 * manifest -> asset index -> library filter -> missing-content plan -> bounded download
 *
 * Manifest and asset index failures abort the run. Individual asset, library
 * and client downloads are isolated and only show up in the InstallReport.
 */

import { EventEmitter } from 'events';
import path from 'path';
import { HttpClient } from '../HttpClient';
import { BoundedDownloader } from './BoundedDownloader';
import { ContentStore } from '../../storage/ContentStore';
import { AssetIndexFetcher } from '../../manifest/AssetIndexFetcher';
import { ManifestResolver } from '../../manifest/ManifestResolver';
import { applicable } from '../../manifest/LibraryFilter';
import { AssetIndex, LibraryEntry, VersionManifest } from '../../manifest/schema';
import { FileManager } from '../../utils/FileManager';
import { logger } from '../../utils/logger';
import {
    DownloadResult,
    DownloadTask,
    InstallFailure,
    InstallReport,
    InstallStage,
    InstallStageEvent,
} from './types';

export const DEFAULT_CONCURRENCY = 5;
export const CLIENT_JAR = 'client.jar';

export interface InstanceLayout {
    root: string;
    assetsDir: string;
    indexesDir: string;
    objectsDir: string;
    librariesDir: string;
    clientJar: string;
}

export function instanceLayout(instanceDir: string): InstanceLayout {
    const assetsDir = path.join(instanceDir, 'assets');
    return {
        root: instanceDir,
        assetsDir,
        indexesDir: path.join(assetsDir, 'indexes'),
        objectsDir: path.join(assetsDir, 'objects'),
        librariesDir: path.join(instanceDir, 'libraries'),
        clientJar: path.join(instanceDir, CLIENT_JAR),
    };
}

export interface InstallOrchestratorOptions {
    client: HttpClient;
    manifestResolver: ManifestResolver;
    /** Directory holding cached <versionId>.json manifests */
    manifestCacheDir: string;
    resourcesBaseUrl: string;
    concurrency?: number;
    retries?: number;
    retryBaseDelay?: number;
    verifyIntegrity?: boolean;
    files?: FileManager;
}

interface DownloadPlan {
    tasks: DownloadTask[];
    skipped: number;
    /** Entries refused while planning; reported without a download attempt */
    rejected: InstallFailure[];
}

export class InstallOrchestrator extends EventEmitter {
    private readonly client: HttpClient;
    private readonly manifestResolver: ManifestResolver;
    private readonly manifestCacheDir: string;
    private readonly resourcesBaseUrl: string;
    private readonly concurrency: number;
    private readonly retries: number;
    private readonly retryBaseDelay: number;
    private readonly verifyIntegrity: boolean;
    private readonly files: FileManager;

    constructor(options: InstallOrchestratorOptions) {
        super();
        this.client = options.client;
        this.manifestResolver = options.manifestResolver;
        this.manifestCacheDir = options.manifestCacheDir;
        this.resourcesBaseUrl = options.resourcesBaseUrl.replace(/\/+$/, '');
        this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
        this.retries = options.retries ?? 2;
        this.retryBaseDelay = options.retryBaseDelay ?? 500;
        this.verifyIntegrity = options.verifyIntegrity ?? false;
        this.files = options.files ?? new FileManager();
    }

    private emitStage(stage: InstallStage, versionId: string, data?: Record<string, unknown>): void {
        const event: InstallStageEvent = { stage, versionId, timestamp: new Date(), data };
        this.emit('stage', event);
    }

    async installOrUpdate(versionId: string, instanceDir: string, targetPlatform: string): Promise<InstallReport> {
        const startedAt = Date.now();
        const layout = instanceLayout(instanceDir);

        this.emitStage('manifest', versionId);
        const manifest = await this.manifestResolver.resolve(versionId, this.manifestCacheDir);

        this.emitStage('asset-index', versionId, { indexId: manifest.assetIndex.id });
        const fetcher = new AssetIndexFetcher(this.client, layout.indexesDir, this.files, {
            retries: this.retries,
            retryBaseDelay: this.retryBaseDelay,
        });
        const assetIndex = await fetcher.fetch(manifest.assetIndex.id, manifest.assetIndex.url);

        const libraries = applicable(manifest.libraries, targetPlatform);

        const store = new ContentStore(layout.objectsDir, {
            verifyIntegrity: this.verifyIntegrity,
            fileManager: this.files,
        });
        const plan = await this.planDownloads(manifest, assetIndex, libraries, layout, store);
        this.emitStage('plan', versionId, { tasks: plan.tasks.length, skipped: plan.skipped });
        logger.info('Download plan ready', {
            versionId,
            tasks: plan.tasks.length,
            alreadyPresent: plan.skipped,
        });

        this.emitStage('download', versionId);
        const downloader = new BoundedDownloader({
            client: this.client,
            store,
            files: this.files,
            retries: this.retries,
            retryBaseDelay: this.retryBaseDelay,
        });
        const results = await downloader.run(plan.tasks, this.concurrency);

        const report = this.buildReport(manifest, plan, results, Date.now() - startedAt);
        this.emitStage('done', versionId, { succeeded: report.succeeded, failed: report.failed });
        return report;
    }

    /**
     * One task per distinct absent asset hash, per applicable library whose
     * artifact is absent, and for the client artifact when absent
     */
    private async planDownloads(
        manifest: VersionManifest,
        assetIndex: AssetIndex,
        libraries: Iterable<LibraryEntry>,
        layout: InstanceLayout,
        store: ContentStore,
    ): Promise<DownloadPlan> {
        const tasks: DownloadTask[] = [];
        const rejected: InstallFailure[] = [];
        let skipped = 0;

        const assets = new Map<string, number>();
        for (const entry of Object.values(assetIndex.objects)) {
            assets.set(entry.hash.toLowerCase(), entry.size);
        }

        const presence = await Promise.all(
            Array.from(assets.keys(), async (hash) => [hash, await store.has(hash)] as const),
        );
        for (const [hash, present] of presence) {
            if (present) {
                skipped++;
                continue;
            }
            tasks.push({
                id: `asset:${hash}`,
                kind: 'asset',
                sourceUrl: `${this.resourcesBaseUrl}/${hash.slice(0, 2)}/${hash}`,
                destinationPath: store.pathFor(hash),
                hash,
                size: assets.get(hash),
            });
        }

        const claimed = new Set<string>();
        for (const library of libraries) {
            const artifact = library.downloads?.artifact;
            if (!artifact) {
                logger.debug('Library has no artifact download', { library: library.name });
                continue;
            }

            const destinationPath = path.join(layout.librariesDir, artifact.path);
            const relative = path.relative(layout.librariesDir, destinationPath);
            if (relative.startsWith('..') || path.isAbsolute(relative)) {
                logger.warn('Library path escapes the libraries directory', {
                    library: library.name,
                    path: artifact.path,
                });
                rejected.push({
                    taskId: `library:${library.name}`,
                    kind: 'library',
                    sourceUrl: artifact.url,
                    error: `Library path ${artifact.path} escapes the libraries directory`,
                });
                continue;
            }
            if (claimed.has(destinationPath)) continue;
            claimed.add(destinationPath);

            if (await this.files.fileExists(destinationPath)) {
                skipped++;
                continue;
            }
            tasks.push({
                id: `library:${library.name}`,
                kind: 'library',
                sourceUrl: artifact.url,
                destinationPath,
                size: artifact.size,
            });
        }

        if (await this.files.fileExists(layout.clientJar)) {
            skipped++;
        } else {
            tasks.push({
                id: `client:${manifest.id}`,
                kind: 'client',
                sourceUrl: manifest.downloads.client.url,
                destinationPath: layout.clientJar,
                size: manifest.downloads.client.size,
            });
        }

        return { tasks, skipped, rejected };
    }

    private buildReport(
        manifest: VersionManifest,
        plan: DownloadPlan,
        results: DownloadResult[],
        elapsedMs: number,
    ): InstallReport {
        const downloadFailures = results.flatMap((result): InstallFailure[] =>
            result.success
                ? []
                : [
                      {
                          taskId: result.task.id,
                          kind: result.task.kind,
                          sourceUrl: result.task.sourceUrl,
                          hash: result.task.hash,
                          error: result.error.message,
                      },
                  ],
        );

        const failures = [...plan.rejected, ...downloadFailures];

        return {
            versionId: manifest.id,
            assetIndexId: manifest.assetIndex.id,
            planned: plan.tasks.length,
            succeeded: results.length - downloadFailures.length,
            failed: failures.length,
            skipped: plan.skipped,
            failures,
            elapsedMs,
        };
    }
}
