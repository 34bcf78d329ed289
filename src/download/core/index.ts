/**
 * Core index - exports all core components
 */

export * from './types';
export { BoundedDownloader, BoundedDownloaderOptions } from './BoundedDownloader';
export {
    InstallOrchestrator,
    InstallOrchestratorOptions,
    InstanceLayout,
    instanceLayout,
    CLIENT_JAR,
    DEFAULT_CONCURRENCY,
} from './InstallOrchestrator';
