import { spawn, ChildProcess } from 'child_process';
import path from 'path';
import { instanceLayout } from '../download/core/InstallOrchestrator';
import { logger } from '../utils/logger';

const MAIN_CLASS = 'net.minecraft.client.main.Main';
const LAUNCHER_BRAND = 'instance-sync';
const LAUNCHER_VERSION = '1.0.0';

const GC_FLAGS = [
  '-XX:+UnlockExperimentalVMOptions',
  '-XX:+UseG1GC',
  '-XX:G1NewSizePercent=20',
  '-XX:G1ReservePercent=20',
  '-XX:MaxGCPauseMillis=50',
  '-XX:G1HeapRegionSize=32M',
];

export interface LaunchOptions {
  javaPath: string;
  instanceDir: string;
  versionId: string;
  versionType?: string;
  assetIndexId: string;
  username: string;
  classpath: string;
  maxMemory: string;
}

export interface LaunchCommand {
  command: string;
  args: string[];
}

export function buildLaunchCommand(options: LaunchOptions): LaunchCommand {
  const layout = instanceLayout(path.resolve(options.instanceDir));

  const args = [
    `-Djava.library.path=${layout.librariesDir}`,
    `-Djna.tmpdir=${layout.librariesDir}`,
    `-Dio.netty.native.workdir=${layout.librariesDir}`,
    `-Dminecraft.launcher.brand=${LAUNCHER_BRAND}`,
    `-Dminecraft.launcher.version=${LAUNCHER_VERSION}`,
    '-cp',
    options.classpath,
    `-Xmx${options.maxMemory}`,
    ...GC_FLAGS,
    MAIN_CLASS,
    '--username',
    options.username,
    '--version',
    options.versionId,
    '--gameDir',
    layout.root,
    '--assetsDir',
    layout.assetsDir,
    '--assetIndex',
    options.assetIndexId,
    // No session handling: the runtime gets an empty token
    '--accessToken',
    '',
    '--versionType',
    options.versionType ?? 'release',
  ];

  return { command: options.javaPath, args };
}

export type SpawnFn = typeof spawn;

/**
 * Start the runtime detached; the launcher does not supervise it
 */
export function launch(options: LaunchOptions, spawnFn: SpawnFn = spawn): ChildProcess {
  const { command, args } = buildLaunchCommand(options);
  logger.info('Launching runtime', { command, versionId: options.versionId, username: options.username });

  const child = spawnFn(command, args, {
    cwd: path.resolve(options.instanceDir),
    detached: true,
    stdio: 'ignore',
  });
  child.on('error', (error) => {
    logger.error('Failed to start runtime', { command, error: error.message });
  });
  child.unref();
  return child;
}
