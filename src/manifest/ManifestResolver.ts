/**
 * ManifestResolver - loads a version manifest from the local cache or the network
 * A cached manifest is trusted forever; there is no staleness check.
 */

import path from 'path';
import { HttpClient } from '../download/HttpClient';
import { FileManager } from '../utils/FileManager';
import { ParseError } from '../utils/errors';
import { logger } from '../utils/logger';
import { DocumentFetchOptions, fetchDocument } from './fetchDocument';
import { VersionManifest, VersionManifestSchema, VersionListSchema, parseDocument } from './schema';

export interface ManifestSource {
    /** Pinned manifest URL; when absent the version list is searched */
    manifestUrl?: string;
    versionListUrl: string;
}

export class ManifestResolver {
    private readonly client: HttpClient;
    private readonly source: ManifestSource;
    private readonly files: FileManager;
    private readonly fetchOptions: DocumentFetchOptions;

    constructor(
        client: HttpClient,
        source: ManifestSource,
        files: FileManager = new FileManager(),
        fetchOptions: DocumentFetchOptions = {},
    ) {
        this.client = client;
        this.source = source;
        this.files = files;
        this.fetchOptions = fetchOptions;
    }

    cachePathFor(versionId: string, localCacheDir: string): string {
        return path.join(localCacheDir, `${versionId}.json`);
    }

    async resolve(versionId: string, localCacheDir: string): Promise<VersionManifest> {
        const cachePath = this.cachePathFor(versionId, localCacheDir);

        if (await this.files.fileExists(cachePath)) {
            logger.debug('Using cached version manifest', { versionId, cachePath });
            const raw = await this.files.readText(cachePath);
            return this.checkIdentity(parseDocument(VersionManifestSchema, raw, cachePath), versionId, cachePath);
        }

        const url = await this.manifestUrlFor(versionId);
        logger.info('Fetching version manifest', { versionId, url });

        const raw = await fetchDocument(this.client, url, this.fetchOptions);
        const manifest = this.checkIdentity(parseDocument(VersionManifestSchema, raw, url), versionId, url);

        await this.files.writeAtomic(cachePath, raw);
        logger.debug('Version manifest cached', { versionId, cachePath });

        return manifest;
    }

    private async manifestUrlFor(versionId: string): Promise<string> {
        if (this.source.manifestUrl) {
            return this.source.manifestUrl;
        }

        const listUrl = this.source.versionListUrl;
        const raw = await fetchDocument(this.client, listUrl, this.fetchOptions);
        const entry = parseDocument(VersionListSchema, raw, listUrl).versions.find((v) => v.id === versionId);
        if (!entry) {
            throw new ParseError(`Version ${versionId} is not listed in ${listUrl}`, listUrl);
        }
        return entry.url;
    }

    /**
     * A run is pinned to one version; a manifest for another version is rejected
     */
    private checkIdentity(manifest: VersionManifest, versionId: string, source: string): VersionManifest {
        if (manifest.id !== versionId) {
            throw new ParseError(`Manifest from ${source} describes version ${manifest.id}, expected ${versionId}`, source);
        }
        return manifest;
    }
}
