/**
 * Shared type definitions
 */

export * from './config';
export type {
  VersionManifest,
  AssetIndex,
  AssetEntry,
  LibraryEntry,
  LibraryArtifact,
  PlatformRule,
} from '../manifest/schema';
export type {
  DownloadTask,
  DownloadResult,
  DownloadKind,
  InstallReport,
  InstallStage,
} from '../download/core/types';
