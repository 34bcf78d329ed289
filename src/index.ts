#!/usr/bin/env node
import 'dotenv/config';
import * as Sentry from '@sentry/node';
import { Command } from 'commander';
import { loadConfig } from './utils/config';
import { logError, logOperation, logger } from './utils/logger';
import { toError } from './utils/errors';
import { FileManager } from './utils/FileManager';
import { AppConfig, InstallReport } from './types';
import { InstallOrchestrator, InstallStageEvent, NodeFetchHttpClient } from './download';
import { ManifestResolver } from './manifest';
import { buildClasspath, ensureProfileConfig, launch, readProfileConfig } from './launch';

interface CommandOptions {
  versionId?: string;
  instanceDir?: string;
  concurrency?: string;
}

function initializeSentry(): void {
  if (!process.env.SENTRY_DSN) return;
  Sentry.init({
    dsn: process.env.SENTRY_DSN,
    tracesSampleRate: 0,
  });
}

/**
 * Command line flags take precedence over the environment
 */
function configFromOptions(options: CommandOptions): AppConfig {
  const overrides: NodeJS.ProcessEnv = {};
  if (options.versionId) overrides.VERSION_ID = options.versionId;
  if (options.instanceDir) overrides.INSTANCE_DIR = options.instanceDir;
  if (options.concurrency) overrides.MAX_CONCURRENT_DOWNLOADS = options.concurrency;
  return loadConfig({ ...process.env, ...overrides });
}

function createManifestResolver(config: AppConfig, client: NodeFetchHttpClient, files: FileManager): ManifestResolver {
  return new ManifestResolver(
    client,
    { manifestUrl: config.manifestUrl, versionListUrl: config.versionListUrl },
    files,
    { retries: config.retryAttempts, retryBaseDelay: config.retryBaseDelay },
  );
}

function logReport(report: InstallReport): void {
  logOperation('Install finished', {
    versionId: report.versionId,
    assetIndex: report.assetIndexId,
    planned: report.planned,
    succeeded: report.succeeded,
    failed: report.failed,
    alreadyPresent: report.skipped,
    elapsedMs: report.elapsedMs,
  });
  for (const failure of report.failures) {
    logger.error('Download failed', { ...failure });
  }
}

async function runInstall(options: CommandOptions): Promise<void> {
  const config = configFromOptions(options);
  const files = new FileManager();
  const client = new NodeFetchHttpClient({ timeout: config.downloadTimeout });

  try {
    const orchestrator = new InstallOrchestrator({
      client,
      manifestResolver: createManifestResolver(config, client, files),
      manifestCacheDir: config.manifestCacheDirectory,
      resourcesBaseUrl: config.resourcesBaseUrl,
      concurrency: config.maxConcurrentDownloads,
      retries: config.retryAttempts,
      retryBaseDelay: config.retryBaseDelay,
      verifyIntegrity: config.verifyAssetHashes,
      files,
    });
    orchestrator.on('stage', (event: InstallStageEvent) => {
      logger.info(`Stage: ${event.stage}`, { versionId: event.versionId, ...event.data });
    });

    const report = await orchestrator.installOrUpdate(
      config.versionId,
      config.instanceDirectory,
      config.targetPlatform,
    );
    await ensureProfileConfig(config.instanceDirectory, files);
    logReport(report);

    if (report.failed > 0) {
      process.exitCode = 1;
    }
  } finally {
    client.close();
  }
}

async function runLaunch(options: CommandOptions): Promise<void> {
  const config = configFromOptions(options);
  const files = new FileManager();
  const client = new NodeFetchHttpClient({ timeout: config.downloadTimeout });

  try {
    const manifest = await createManifestResolver(config, client, files).resolve(
      config.versionId,
      config.manifestCacheDirectory,
    );
    const profile = await readProfileConfig(config.instanceDirectory, files);
    const classpath = await buildClasspath(config.instanceDirectory, files);

    launch({
      javaPath: config.javaPath,
      instanceDir: config.instanceDirectory,
      versionId: manifest.id,
      versionType: manifest.type,
      assetIndexId: manifest.assetIndex.id,
      username: profile.username,
      classpath,
      maxMemory: config.maxMemory,
    });
  } finally {
    client.close();
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('instance-sync')
    .description('Install and launch a game instance from its version manifest')
    .version('1.0.0');

  program
    .command('install')
    .description('Download the manifest, asset index, assets, libraries and client')
    .option('-v, --version-id <id>', 'release to install')
    .option('-d, --instance-dir <dir>', 'instance directory')
    .option('-c, --concurrency <n>', 'maximum concurrent downloads')
    .action((options: CommandOptions) => runInstall(options));

  program
    .command('launch')
    .description('Start the installed instance')
    .option('-v, --version-id <id>', 'release to launch')
    .option('-d, --instance-dir <dir>', 'instance directory')
    .action((options: CommandOptions) => runLaunch(options));

  return program;
}

async function main(): Promise<void> {
  initializeSentry();
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    logError(toError(error), { argv: process.argv.slice(2) });
    process.exitCode = 1;
  } finally {
    await Sentry.flush(2000);
  }
}

if (require.main === module) {
  void main();
}
