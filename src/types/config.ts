export const TARGET_PLATFORMS = ['windows', 'osx', 'linux'] as const;

export type TargetPlatform = (typeof TARGET_PLATFORMS)[number];

export interface AppConfig {
  versionId: string;
  /** Pinned manifest URL; when absent the version list is consulted */
  manifestUrl?: string;
  versionListUrl: string;
  resourcesBaseUrl: string;
  instanceDirectory: string;
  manifestCacheDirectory: string;
  maxConcurrentDownloads: number;
  downloadTimeout: number;
  retryAttempts: number;
  retryBaseDelay: number;
  targetPlatform: TargetPlatform;
  verifyAssetHashes: boolean;
  javaPath: string;
  maxMemory: string;
}
