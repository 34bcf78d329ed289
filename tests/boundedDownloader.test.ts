import fc from 'fast-check';
import fs from 'fs/promises';
import path from 'path';
import { BoundedDownloader } from '../src/download/core/BoundedDownloader';
import { DownloadEvent, DownloadTask } from '../src/download/core/types';
import { ContentStore } from '../src/storage/ContentStore';
import { NetworkError } from '../src/utils/errors';
import { FakeHttpClient } from './helpers/FakeHttpClient';
import { makeTempDir, objectUrl, removeDir, sha1 } from './helpers/fixtures';

function assetTask(store: ContentStore, content: string): DownloadTask {
  const hash = sha1(content);
  return {
    id: `asset:${hash}`,
    kind: 'asset',
    sourceUrl: objectUrl(hash),
    destinationPath: store.pathFor(hash),
    hash,
  };
}

describe('BoundedDownloader', () => {
  let root: string;
  let store: ContentStore;

  beforeEach(async () => {
    root = await makeTempDir();
    store = new ContentStore(path.join(root, 'objects'));
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('should never exceed the concurrency limit', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 2, max: 12 }),
        fc.integer({ min: 1, max: 4 }),
        async (taskCount, limit) => {
          const client = new FakeHttpClient(2);
          const tasks: DownloadTask[] = [];
          for (let i = 0; i < taskCount; i++) {
            const target = path.join(root, `run-${taskCount}-${limit}`, `file-${i}`);
            const url = `https://files.test/${i}`;
            client.reply(url, `body-${i}`);
            tasks.push({ id: `file:${i}`, kind: 'library', sourceUrl: url, destinationPath: target });
          }

          const downloader = new BoundedDownloader({ client, store, retries: 0 });
          const results = await downloader.run(tasks, limit);

          expect(results).toHaveLength(taskCount);
          expect(client.peakInFlight).toBeLessThanOrEqual(limit);
          expect(downloader.getStats().peakActive).toBeLessThanOrEqual(limit);
          expect(downloader.getStats().peakActive).toBe(Math.min(limit, taskCount));
        },
      ),
      { numRuns: 15 },
    );
  });

  it('should isolate a failing task from its siblings', async () => {
    const ok1 = assetTask(store, 'one');
    const bad = assetTask(store, 'two');
    const ok2 = assetTask(store, 'three');
    const client = new FakeHttpClient()
      .reply(ok1.sourceUrl, 'one')
      .reply(bad.sourceUrl, 500)
      .reply(ok2.sourceUrl, 'three');

    const downloader = new BoundedDownloader({ client, store, retries: 0 });
    const results = await downloader.run([ok1, bad, ok2], 1);

    const failed = results.filter((r) => !r.success);
    expect(failed).toHaveLength(1);
    expect(failed[0].task.id).toBe(bad.id);
    expect(results.filter((r) => r.success)).toHaveLength(2);
    expect(await store.has(ok1.hash ?? '')).toBe(true);
    expect(await store.has(ok2.hash ?? '')).toBe(true);
    expect(await store.has(bad.hash ?? '')).toBe(false);
  });

  it('should retry transient failures with backoff', async () => {
    const task = assetTask(store, 'flaky');
    const client = new FakeHttpClient().reply(task.sourceUrl, 503, 'flaky');

    const downloader = new BoundedDownloader({ client, store, retries: 2, retryBaseDelay: 1 });
    const [result] = await downloader.run([task], 1);

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(2);
    expect(await fs.readFile(task.destinationPath, 'utf-8')).toBe('flaky');
  });

  it('should not retry client errors', async () => {
    const task = assetTask(store, 'missing');
    const client = new FakeHttpClient().reply(task.sourceUrl, 404);

    const downloader = new BoundedDownloader({ client, store, retries: 3, retryBaseDelay: 1 });
    const [result] = await downloader.run([task], 2);

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(1);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(NetworkError);
      expect(result.error.message).toBe('HTTP 404');
    }
    expect(client.requestCount(task.sourceUrl)).toBe(1);
  });

  it('should give up after the retry budget', async () => {
    const task = assetTask(store, 'down');
    const client = new FakeHttpClient().reply(task.sourceUrl, 502);

    const downloader = new BoundedDownloader({ client, store, retries: 2, retryBaseDelay: 1 });
    const [result] = await downloader.run([task], 1);

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(3);
  });

  it('should write tasks without a hash to their destination path', async () => {
    const target = path.join(root, 'libraries', 'org', 'example', 'lib.jar');
    const client = new FakeHttpClient().reply('https://files.test/lib.jar', 'jar');

    const downloader = new BoundedDownloader({ client, store });
    const results = await downloader.run(
      [{ id: 'library:lib', kind: 'library', sourceUrl: 'https://files.test/lib.jar', destinationPath: target }],
      5,
    );

    expect(results[0].success).toBe(true);
    expect(await fs.readFile(target, 'utf-8')).toBe('jar');
  });

  it('should drop duplicate destinations', async () => {
    const task = assetTask(store, 'dup');
    const client = new FakeHttpClient().reply(task.sourceUrl, 'dup');

    const downloader = new BoundedDownloader({ client, store });
    const results = await downloader.run([task, { ...task, id: 'asset:again' }], 3);

    expect(results).toHaveLength(1);
    expect(client.requests).toEqual([task.sourceUrl]);
  });

  it('should emit lifecycle events for every task', async () => {
    const good = assetTask(store, 'good');
    const bad = assetTask(store, 'bad');
    const client = new FakeHttpClient().reply(good.sourceUrl, 'good').reply(bad.sourceUrl, 400);

    const downloader = new BoundedDownloader({ client, store, retries: 0 });
    const events: DownloadEvent[] = [];
    downloader.onDownloadEvent((event) => events.push(event));

    await downloader.run([good, bad], 2);

    expect(events.filter((e) => e.type === 'task:started')).toHaveLength(2);
    expect(events.filter((e) => e.type === 'task:completed').map((e) => e.taskId)).toEqual([good.id]);
    expect(events.filter((e) => e.type === 'task:failed').map((e) => e.taskId)).toEqual([bad.id]);
    expect(downloader.getStats()).toEqual({ active: 0, queued: 0, peakActive: 2, completed: 1, failed: 1 });
  });

  it('should finish every task when an event listener throws', async () => {
    const tasks = ['t0', 't1', 't2', 't3'].map((content) => assetTask(store, content));
    const client = new FakeHttpClient(2);
    tasks.forEach((task, i) => client.reply(task.sourceUrl, `t${i}`));

    const downloader = new BoundedDownloader({ client, store, retries: 0 });
    downloader.onDownloadEvent((event) => {
      if (event.type === 'task:completed' && event.taskId === tasks[0].id) {
        throw new Error('listener failure');
      }
    });
    downloader.on('task:started', () => {
      throw new Error('emitter listener failure');
    });
    const seen: string[] = [];
    downloader.onDownloadEvent((event) => {
      if (event.type === 'task:completed') seen.push(event.taskId);
    });

    const results = await downloader.run(tasks, 2);

    expect(results).toHaveLength(4);
    expect(results.every((r) => r.success)).toBe(true);
    expect(seen.sort()).toEqual(tasks.map((t) => t.id).sort());
    expect(downloader.getStats()).toEqual({ active: 0, queued: 0, peakActive: 2, completed: 4, failed: 0 });
  });

  it('should resolve immediately for an empty batch', async () => {
    const downloader = new BoundedDownloader({ client: new FakeHttpClient(), store });
    await expect(downloader.run([], 5)).resolves.toEqual([]);
  });

  it.each([0, -1, 1.5])('should reject concurrency %p', async (limit) => {
    const downloader = new BoundedDownloader({ client: new FakeHttpClient(), store });
    await expect(downloader.run([], limit)).rejects.toBeInstanceOf(RangeError);
  });
});
