import TOML from '@iarna/toml';
import path from 'path';
import { z } from 'zod';
import { FileManager } from '../utils/FileManager';
import { ParseError } from '../utils/errors';
import { logger } from '../utils/logger';

export const PROFILE_CONFIG_FILE = 'LauncherConfig.toml';
export const DEFAULT_USERNAME = 'Username';

const ProfileConfigSchema = z.object({
  username: z.string().min(1),
});

export type ProfileConfig = z.infer<typeof ProfileConfigSchema>;

export function profileConfigPath(instanceDir: string): string {
  return path.join(instanceDir, PROFILE_CONFIG_FILE);
}

/**
 * Write the default profile when none exists yet
 * Returns true when a file was created.
 */
export async function ensureProfileConfig(
  instanceDir: string,
  files: FileManager = new FileManager(),
): Promise<boolean> {
  const configPath = profileConfigPath(instanceDir);
  if (await files.fileExists(configPath)) {
    return false;
  }

  await files.writeAtomic(configPath, TOML.stringify({ username: DEFAULT_USERNAME }));
  logger.info('Profile config created', { path: configPath });
  return true;
}

export async function readProfileConfig(
  instanceDir: string,
  files: FileManager = new FileManager(),
): Promise<ProfileConfig> {
  const configPath = profileConfigPath(instanceDir);
  const raw = await files.readText(configPath);

  let parsed: unknown;
  try {
    parsed = TOML.parse(raw);
  } catch (error) {
    throw new ParseError(`Malformed TOML in ${configPath}`, configPath, error);
  }

  const result = ProfileConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ParseError(`${configPath}: username must be a non-empty string`, configPath, result.error);
  }
  return result.data;
}
