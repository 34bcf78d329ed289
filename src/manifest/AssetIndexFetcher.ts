import path from 'path';
import { HttpClient } from '../download/HttpClient';
import { FileManager } from '../utils/FileManager';
import { logger } from '../utils/logger';
import { DocumentFetchOptions, fetchDocument } from './fetchDocument';
import { AssetIndex, AssetIndexSchema, parseDocument } from './schema';

/**
 * AssetIndexFetcher - always fetches the index fresh and stores the raw
 * document at <indexesDir>/<indexId>.json
 */
export class AssetIndexFetcher {
    constructor(
        private readonly client: HttpClient,
        private readonly indexesDir: string,
        private readonly files: FileManager = new FileManager(),
        private readonly fetchOptions: DocumentFetchOptions = {},
    ) {}

    indexPathFor(indexId: string): string {
        return path.join(this.indexesDir, `${indexId}.json`);
    }

    async fetch(indexId: string, url: string): Promise<AssetIndex> {
        logger.info('Fetching asset index', { indexId, url });

        const raw = await fetchDocument(this.client, url, this.fetchOptions);
        const index = parseDocument(AssetIndexSchema, raw, url);

        await this.files.writeAtomic(this.indexPathFor(indexId), raw);
        logger.debug('Asset index stored', {
            indexId,
            objects: Object.keys(index.objects).length,
        });

        return index;
    }
}
