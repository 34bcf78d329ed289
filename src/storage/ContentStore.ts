import { createHash } from 'crypto';
import path from 'path';
import { CONTENT_HASH } from '../manifest/schema';
import { FileManager } from '../utils/FileManager';
import { IntegrityError, ParseError } from '../utils/errors';
import { logger } from '../utils/logger';

export type PutOutcome = 'written' | 'exists';

export interface ContentStoreOptions {
  /** Reject bytes whose SHA-1 does not match the hash they are stored under */
  verifyIntegrity?: boolean;
  fileManager?: FileManager;
}

/**
 * ContentStore - hash-addressed object storage
 * Layout: <objectsDir>/<hash[0:2]>/<hash>. An object that exists is trusted;
 * reads never re-verify it and writes never replace it.
 */
export class ContentStore {
  private readonly objectsDir: string;
  private readonly verifyIntegrity: boolean;
  private readonly files: FileManager;

  constructor(objectsDir: string, options: ContentStoreOptions = {}) {
    this.objectsDir = objectsDir;
    this.verifyIntegrity = options.verifyIntegrity ?? false;
    this.files = options.fileManager ?? new FileManager();
  }

  pathFor(hash: string): string {
    if (!CONTENT_HASH.test(hash)) {
      throw new ParseError(`Invalid content hash "${hash}"`, 'content-store');
    }
    return path.join(this.objectsDir, hash.slice(0, 2), hash);
  }

  async has(hash: string): Promise<boolean> {
    return this.files.fileExists(this.pathFor(hash));
  }

  async put(hash: string, bytes: Buffer): Promise<PutOutcome> {
    const target = this.pathFor(hash);

    if (await this.files.fileExists(target)) {
      logger.debug('Object already stored', { hash });
      return 'exists';
    }

    if (this.verifyIntegrity) {
      const actual = createHash('sha1').update(bytes).digest('hex');
      if (actual !== hash.toLowerCase()) {
        throw new IntegrityError(hash, actual);
      }
    }

    await this.files.writeAtomic(target, bytes);
    return 'written';
  }
}
