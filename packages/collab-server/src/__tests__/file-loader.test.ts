import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type {
  ContentModel,
  ContentsManager,
  GetContentOptions,
  SaveContentModel,
} from '../contents/contents-manager.js';
import { FileLoader } from '../loaders/file-loader.js';
import { silentLogger } from '../logger.js';
import { createFixture, createLoader, type Fixture } from './helpers.js';

const text = (content: string): SaveContentModel => ({ type: 'file', format: 'text', content });

/**
 * Delegates to another contents manager, taking 10ms per call and
 * recording how many calls overlap
 */
class SlowContents implements ContentsManager {
  active = 0;
  maxActive = 0;

  constructor(private readonly inner: ContentsManager) {}

  get(path: string, options?: GetContentOptions): Promise<ContentModel> {
    return this.track(() => this.inner.get(path, options));
  }

  save(model: SaveContentModel, path: string): Promise<ContentModel> {
    return this.track(() => this.inner.save(model, path));
  }

  exists(path: string): Promise<boolean> {
    return this.inner.exists(path);
  }

  private async track<T>(task: () => Promise<T>): Promise<T> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await new Promise((resolve) => setTimeout(resolve, 10));
      return await task();
    } finally {
      this.active--;
    }
  }
}

describe('FileLoader', () => {
  let fx: Fixture;
  let loader: FileLoader | undefined;

  beforeEach(() => {
    fx = createFixture();
  });

  afterEach(async () => {
    await loader?.clean();
    loader = undefined;
    vi.useRealTimers();
  });

  describe('notify', () => {
    it('fires observers only when the timestamp advanced', async () => {
      const fileId = await fx.addFile('notes.md', 'hello');
      loader = createLoader(fx, fileId);
      await loader.loadContent('text', 'file');
      expect(loader.lastModified).toBe(1000);

      const observer = vi.fn();
      loader.observe('room', observer);

      expect(await loader.notify()).toBe(false);

      fx.contents.setFile('notes.md', 'changed');
      expect(await loader.notify()).toBe(true);
      expect(await loader.notify()).toBe(false);

      expect(observer).toHaveBeenCalledTimes(1);
      expect(observer).toHaveBeenCalledWith(
        'metadata',
        expect.objectContaining({ path: 'notes.md', lastModified: 1001, content: null })
      );
      expect(loader.lastModified).toBe(1001);
    });

    it('fires when no timestamp was seen yet', async () => {
      const fileId = await fx.addFile('notes.md', 'hello');
      loader = createLoader(fx, fileId);
      const observer = vi.fn();
      loader.observe('room', observer);

      expect(await loader.notify()).toBe(true);
      expect(observer).toHaveBeenCalledTimes(1);
      expect(loader.lastModified).toBe(1000);
    });

    it('keeps notifying other observers when one fails', async () => {
      const fileId = await fx.addFile('notes.md', 'hello');
      loader = createLoader(fx, fileId);
      const failing = vi.fn().mockRejectedValue(new Error('observer failed'));
      const healthy = vi.fn();
      loader.observe('a', failing);
      loader.observe('b', healthy);

      expect(await loader.notify()).toBe(true);
      expect(failing).toHaveBeenCalledTimes(1);
      expect(healthy).toHaveBeenCalledTimes(1);
    });

    it('stops calling an unobserved callback', async () => {
      const fileId = await fx.addFile('notes.md', 'hello');
      loader = createLoader(fx, fileId);
      const observer = vi.fn();
      loader.observe('room', observer);
      loader.unobserve('room');

      await loader.notify();
      expect(observer).not.toHaveBeenCalled();
    });
  });

  describe('path', () => {
    it('follows renames of the file id', async () => {
      const fileId = await fx.addFile('draft.md', 'hello');
      loader = createLoader(fx, fileId);
      expect(loader.path).toBe('draft.md');

      fx.fileIds.move('draft.md', 'final.md');
      expect(loader.path).toBe('final.md');
    });

    it('throws NOT_FOUND for an unknown id', () => {
      loader = createLoader(fx, 'missing-id');
      expect(() => loader?.path).toThrow('No path for file id missing-id');
    });
  });

  describe('save', () => {
    it('collapses saves within the delay into one write of the last model', async () => {
      vi.useFakeTimers();
      const fileId = await fx.addFile('notes.md', 'v0');
      loader = createLoader(fx, fileId);
      await loader.loadContent('text', 'file');
      const saveSpy = vi.spyOn(fx.contents, 'save');

      const first = loader.save(text('v1'), 1000);
      await vi.advanceTimersByTimeAsync(500);
      const second = loader.save(text('v2'), 1000);
      await vi.advanceTimersByTimeAsync(500);
      const third = loader.save(text('v3'), 1000);

      expect(second).toBe(first);
      expect(third).toBe(first);
      expect(saveSpy).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1000);
      const saved = await first;

      expect(saveSpy).toHaveBeenCalledTimes(1);
      expect(fx.contents.readContent('notes.md')).toBe('v3');
      expect(saved?.lastModified).toBe(1001);
      expect(loader.lastModified).toBe(1001);
    });

    it('does not report its own write as an external change', async () => {
      const fileId = await fx.addFile('notes.md', 'v0');
      loader = createLoader(fx, fileId);
      await loader.loadContent('text', 'file');
      const observer = vi.fn();
      loader.observe('room', observer);

      await loader.save(text('v1'), 0);
      expect(await loader.notify()).toBe(false);
      expect(observer).not.toHaveBeenCalled();
    });

    it('refuses to overwrite a file changed on disk', async () => {
      const fileId = await fx.addFile('notes.md', 'v0');
      loader = createLoader(fx, fileId);
      await loader.loadContent('text', 'file');

      fx.contents.setFile('notes.md', 'external');

      await expect(loader.save(text('mine'), 0)).rejects.toMatchObject({ code: 'OUT_OF_BAND_CHANGE' });
      expect(fx.contents.readContent('notes.md')).toBe('external');
    });

    it('resolves null when cleaned before the delay elapsed', async () => {
      vi.useFakeTimers();
      const fileId = await fx.addFile('notes.md', 'v0');
      loader = createLoader(fx, fileId);
      await loader.loadContent('text', 'file');

      const pending = loader.save(text('v1'), 1000);
      expect(loader.hasPendingSave).toBe(true);

      await loader.clean();
      await vi.advanceTimersByTimeAsync(5000);

      await expect(pending).resolves.toBeNull();
      expect(fx.contents.readContent('notes.md')).toBe('v0');
      expect(loader.hasPendingSave).toBe(false);
    });

    it('writes a waiting save on flush', async () => {
      const fileId = await fx.addFile('notes.md', 'v0');
      loader = createLoader(fx, fileId);
      await loader.loadContent('text', 'file');

      const pending = loader.save(text('v1'), 60_000);
      await loader.flush();

      expect(fx.contents.readContent('notes.md')).toBe('v1');
      await expect(pending).resolves.toMatchObject({ lastModified: 1001 });
    });
  });

  describe('serialization', () => {
    it('never runs a check and a write at the same time', async () => {
      vi.useFakeTimers();
      const fileId = await fx.addFile('notes.md', 'v0');
      const slow = new SlowContents(fx.contents);
      loader = new FileLoader({
        fileId,
        fileIdManager: fx.fileIds,
        contentsManager: slow,
        logger: silentLogger,
        pollInterval: null,
      });

      const notified = loader.notify();
      const saved = loader.save(text('v1'), 0);
      const loaded = loader.loadContent('text', 'file');

      await vi.advanceTimersByTimeAsync(100);
      await Promise.all([notified, saved, loaded]);

      expect(slow.maxActive).toBe(1);
      expect(fx.contents.readContent('notes.md')).toBe('v1');
    });
  });

  describe('watcher', () => {
    it('polls for changes until cleaned', async () => {
      vi.useFakeTimers();
      const fileId = await fx.addFile('notes.md', 'v0');
      loader = createLoader(fx, fileId, 1000);
      await loader.loadContent('text', 'file');
      expect(loader.watching).toBe(true);

      const observer = vi.fn();
      loader.observe('room', observer);

      fx.contents.setFile('notes.md', 'v1');
      await vi.advanceTimersByTimeAsync(1000);
      await vi.waitFor(() => expect(observer).toHaveBeenCalledTimes(1));

      await loader.clean();
      expect(loader.watching).toBe(false);

      fx.contents.setFile('notes.md', 'v2');
      await vi.advanceTimersByTimeAsync(5000);
      expect(observer).toHaveBeenCalledTimes(1);
    });

    it('keeps polling after a storage error', async () => {
      vi.useFakeTimers();
      const fileId = await fx.addFile('notes.md', 'v0');
      loader = createLoader(fx, fileId, 1000);
      await loader.loadContent('text', 'file');
      const observer = vi.fn();
      loader.observe('room', observer);

      vi.spyOn(fx.contents, 'get').mockRejectedValueOnce(new Error('disk offline'));
      fx.contents.setFile('notes.md', 'v1');

      await vi.advanceTimersByTimeAsync(1000);
      expect(observer).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1000);
      await vi.waitFor(() => expect(observer).toHaveBeenCalledTimes(1));
    });
  });
});
