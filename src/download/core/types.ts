/**
 * Core Types for the fetch pipeline
 */

// ============================================================================
// Download Types
// ============================================================================

export type DownloadKind = 'asset' | 'library' | 'client';

export interface DownloadTask {
    id: string;
    kind: DownloadKind;
    sourceUrl: string;
    destinationPath: string;
    /** Present for hash-addressed objects; routes the write through the ContentStore */
    hash?: string;
    size?: number;
}

export type DownloadResult =
    | {
          task: DownloadTask;
          success: true;
          attempts: number;
          bytes: number;
      }
    | {
          task: DownloadTask;
          success: false;
          attempts: number;
          error: Error;
      };

export interface DownloaderStats {
    active: number;
    queued: number;
    peakActive: number;
    completed: number;
    failed: number;
}

// ============================================================================
// Event Types
// ============================================================================

export type DownloadEventType = 'task:started' | 'task:completed' | 'task:failed';

export interface DownloadEvent {
    type: DownloadEventType;
    taskId: string;
    timestamp: Date;
    data?: Record<string, unknown>;
}

export type DownloadEventHandler = (event: DownloadEvent) => void;

// ============================================================================
// Install Types
// ============================================================================

export type InstallStage = 'manifest' | 'asset-index' | 'plan' | 'download' | 'done';

export interface InstallStageEvent {
    stage: InstallStage;
    versionId: string;
    timestamp: Date;
    data?: Record<string, unknown>;
}

export interface InstallFailure {
    taskId: string;
    kind: DownloadKind;
    sourceUrl: string;
    hash?: string;
    error: string;
}

export interface InstallReport {
    versionId: string;
    assetIndexId: string;
    planned: number;
    succeeded: number;
    failed: number;
    /** Items already present before the run */
    skipped: number;
    failures: InstallFailure[];
    elapsedMs: number;
}
