import { createHash } from 'crypto';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';

export const RESOURCES = 'https://resources.test';
export const MANIFEST_URL = 'https://meta.test/v1/packages/1.20.4.json';
export const INDEX_URL = 'https://meta.test/v1/packages/indexes/12.json';
export const CLIENT_URL = 'https://files.test/client.jar';

export function sha1(content: string): string {
  return createHash('sha1').update(content).digest('hex');
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'instance-sync-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function objectUrl(hash: string): string {
  return `${RESOURCES}/${hash.slice(0, 2)}/${hash}`;
}

export interface LibraryFixture {
  name: string;
  path: string;
  url: string;
  rules?: Array<{ action: string; os?: { name: string } }>;
}

export function manifestJson(libraries: LibraryFixture[] = [], id: string = '1.20.4'): string {
  return JSON.stringify({
    id,
    type: 'release',
    downloads: { client: { url: CLIENT_URL, size: 6 } },
    assetIndex: { id: '12', url: INDEX_URL },
    libraries: libraries.map((lib) => ({
      name: lib.name,
      downloads: { artifact: { path: lib.path, url: lib.url, size: 3 } },
      ...(lib.rules ? { rules: lib.rules } : {}),
    })),
  });
}

export function assetIndexJson(assets: Record<string, string>): string {
  const objects: Record<string, { hash: string; size: number }> = {};
  for (const [name, hash] of Object.entries(assets)) {
    objects[name] = { hash, size: 1 };
  }
  return JSON.stringify({ objects });
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
