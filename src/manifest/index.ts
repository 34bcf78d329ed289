export * from './schema';
export { ManifestResolver, ManifestSource } from './ManifestResolver';
export { AssetIndexFetcher } from './AssetIndexFetcher';
export { applicable, isApplicable, currentPlatform } from './LibraryFilter';
export { fetchDocument, DocumentFetchOptions } from './fetchDocument';
