import fs from 'fs/promises';
import type { Dirent } from 'fs';
import { randomBytes } from 'crypto';
import path from 'path';
import { logger } from './logger';
import { FilesystemError, errnoCode } from './errors';

const TEMP_SUFFIX_BYTES = 6;
const TEMP_FILE = /^\..+\.[0-9a-f]{12}\.tmp$/;

/**
 * Matches the sibling temp files writeAtomic creates
 */
function isTempFile(name: string): boolean {
  return TEMP_FILE.test(name);
}

export interface FileManagerOptions {
  /** Flush the temp file to disk before it is renamed into place */
  fsync?: boolean;
}

/**
 * FileManager - filesystem access for the instance layout
 * Every write goes through a sibling temp file and a rename, so readers never
 * observe a partially written file.
 */
export class FileManager {
  private readonly fsync: boolean;

  constructor(options: FileManagerOptions = {}) {
    this.fsync = options.fsync ?? false;
  }

  /**
   * Check if file exists
   */
  async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch (error: unknown) {
      const code = errnoCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return false;
      }
      throw new FilesystemError(`Failed to check ${filePath}`, filePath, error);
    }
  }

  async ensureDir(dirPath: string): Promise<void> {
    try {
      await fs.mkdir(dirPath, { recursive: true });
    } catch (error) {
      throw new FilesystemError(`Failed to create directory ${dirPath}`, dirPath, error);
    }
  }

  async readText(filePath: string): Promise<string> {
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new FilesystemError(`Failed to read ${filePath}`, filePath, error);
    }
  }

  /**
   * Write content through a temp file in the same directory, then rename it
   * over the target. The temp file is removed if any step fails.
   */
  async writeAtomic(filePath: string, content: string | Buffer): Promise<void> {
    await this.ensureDir(path.dirname(filePath));
    const tmpPath = this.tempPathFor(filePath);

    try {
      await fs.writeFile(tmpPath, content);
      if (this.fsync) {
        const handle = await fs.open(tmpPath, 'r');
        try {
          await handle.sync();
        } finally {
          await handle.close();
        }
      }
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        logger.warn('Failed to remove temp file', {
          path: tmpPath,
          error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      });
      throw new FilesystemError(`Failed to write ${filePath}`, filePath, error);
    }
  }

  /**
   * List every file below root, walking directories with an explicit stack.
   * A missing root lists as empty; leftovers of interrupted writes are skipped.
   */
  async listFiles(root: string): Promise<string[]> {
    const files: string[] = [];
    if (!(await this.fileExists(root))) {
      return files;
    }
    const pending: string[] = [root];

    let dir: string | undefined;
    while ((dir = pending.pop()) !== undefined) {
      for (const entry of await this.readDir(dir)) {
        const entryPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          pending.push(entryPath);
        } else if (!isTempFile(entry.name)) {
          files.push(entryPath);
        }
      }
    }

    return files.sort();
  }

  private async readDir(dirPath: string): Promise<Dirent[]> {
    try {
      return await fs.readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      throw new FilesystemError(`Failed to list ${dirPath}`, dirPath, error);
    }
  }

  private tempPathFor(filePath: string): string {
    const dir = path.dirname(filePath);
    const base = path.basename(filePath);
    return path.join(dir, `.${base}.${randomBytes(TEMP_SUFFIX_BYTES).toString('hex')}.tmp`);
  }
}
