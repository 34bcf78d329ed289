import { z } from 'zod';
import { AppConfig, TARGET_PLATFORMS } from '../types';
import { currentPlatform } from '../manifest/LibraryFilter';
import { ConfigError } from './errors';

export const DEFAULT_VERSION_ID = '1.20.4';
export const DEFAULT_MANIFEST_URL =
  'https://piston-meta.mojang.com/v1/packages/efcc510e525cef0e859b5435f82b6e3193214efc/1.20.4.json';
export const DEFAULT_VERSION_LIST_URL =
  'https://piston-meta.mojang.com/mc/game/version_manifest_v2.json';
export const DEFAULT_RESOURCES_BASE_URL = 'https://resources.download.minecraft.net';

const EnvSchema = z.object({
  VERSION_ID: z
    .string()
    .regex(/^[\w.-]+$/, 'must contain only letters, digits, ".", "_" and "-"')
    .optional(),
  MANIFEST_URL: z.string().url().optional(),
  VERSION_LIST_URL: z.string().url().default(DEFAULT_VERSION_LIST_URL),
  RESOURCES_BASE_URL: z.string().url().default(DEFAULT_RESOURCES_BASE_URL),
  INSTANCE_DIR: z.string().default('instance'),
  MANIFEST_CACHE_DIR: z.string().default('.'),
  MAX_CONCURRENT_DOWNLOADS: z.coerce.number().int().positive().default(5),
  DOWNLOAD_TIMEOUT: z.coerce.number().int().positive().default(60000), // 1 min per request
  RETRY_ATTEMPTS: z.coerce.number().int().min(0).default(2),
  RETRY_BASE_DELAY: z.coerce.number().int().min(0).default(500),
  TARGET_PLATFORM: z.enum(TARGET_PLATFORMS).optional(),
  VERIFY_ASSET_HASHES: z.enum(['true', 'false']).default('false'),
  JAVA_PATH: z.string().optional(),
  MAX_MEMORY: z
    .string()
    .regex(/^\d+[KMG]$/i, 'must look like 512M or 2G')
    .default('2G'),
});

/**
 * Load configuration from environment variables
 * Empty values count as unset so a blank line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  const targetPlatform = vars.TARGET_PLATFORM ?? currentPlatform();

  // The pinned manifest URL only describes the default version
  const manifestUrl =
    vars.MANIFEST_URL ?? (vars.VERSION_ID === undefined ? DEFAULT_MANIFEST_URL : undefined);

  return {
    versionId: vars.VERSION_ID ?? DEFAULT_VERSION_ID,
    manifestUrl,
    versionListUrl: vars.VERSION_LIST_URL,
    resourcesBaseUrl: vars.RESOURCES_BASE_URL.replace(/\/+$/, ''),
    instanceDirectory: vars.INSTANCE_DIR,
    manifestCacheDirectory: vars.MANIFEST_CACHE_DIR,
    maxConcurrentDownloads: vars.MAX_CONCURRENT_DOWNLOADS,
    downloadTimeout: vars.DOWNLOAD_TIMEOUT,
    retryAttempts: vars.RETRY_ATTEMPTS,
    retryBaseDelay: vars.RETRY_BASE_DELAY,
    targetPlatform,
    verifyAssetHashes: vars.VERIFY_ASSET_HASHES === 'true',
    javaPath: vars.JAVA_PATH ?? (targetPlatform === 'windows' ? 'javaw' : 'java'),
    maxMemory: vars.MAX_MEMORY.toUpperCase(),
  };
}
