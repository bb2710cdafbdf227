import type { ContentsManager, FileIdManager } from '../contents/contents-manager.js';
import type { Logger } from '../logger.js';
import { FileLoader } from './file-loader.js';

/**
 * Configuration for the loader registry
 */
export interface FileLoaderRegistryConfig {
  fileIdManager: FileIdManager;
  contentsManager: ContentsManager;
  logger: Logger;
  /** Seconds between two checks of a file; null disables watching */
  filePollInterval: number | null;
}

/**
 * Holds one {@link FileLoader} per file id, shared by every room that
 * edits the file and reference-counted by {@link acquire}/{@link release}.
 *
 * Lookup-or-create and the removal at zero references happen without
 * yielding to the event loop, so two loaders never exist for one id. A
 * loader created while its predecessor is still flushing waits for that
 * flush before touching storage.
 */
export class FileLoaderRegistry {
  private readonly loaders = new Map<string, FileLoader>();
  private readonly teardowns = new Map<string, Promise<void>>();
  private readonly config: FileLoaderRegistryConfig;

  constructor(config: FileLoaderRegistryConfig) {
    this.config = config;
  }

  /** Number of live loaders */
  get size(): number {
    return this.loaders.size;
  }

  has(fileId: string): boolean {
    return this.loaders.has(fileId);
  }

  /**
   * Loader for a file id without taking a reference
   */
  get(fileId: string): FileLoader | undefined {
    return this.loaders.get(fileId);
  }

  /**
   * Get or create the loader of a file and take a reference on it
   */
  acquire(fileId: string): FileLoader {
    let loader = this.loaders.get(fileId);
    if (!loader) {
      const { fileIdManager, contentsManager, logger, filePollInterval } = this.config;
      loader = new FileLoader({
        fileId,
        fileIdManager,
        contentsManager,
        logger,
        pollInterval: filePollInterval === null ? null : filePollInterval * 1000,
        ready: this.teardowns.get(fileId),
      });
      this.loaders.set(fileId, loader);
    }
    loader.retain();
    return loader;
  }

  /**
   * Drop a reference. The last one removes the loader, writes its pending
   * save and stops its watcher. Resolves true when the loader was removed.
   */
  async release(fileId: string): Promise<boolean> {
    const loader = this.loaders.get(fileId);
    if (!loader) return false;
    if (loader.releaseRef() > 0) return false;

    this.loaders.delete(fileId);
    await this.teardown(fileId, loader);
    return true;
  }

  /**
   * Tear down every loader
   */
  async clear(): Promise<void> {
    const entries = Array.from(this.loaders.entries());
    this.loaders.clear();
    await Promise.all(entries.map(([fileId, loader]) => this.teardown(fileId, loader)));
  }

  private teardown(fileId: string, loader: FileLoader): Promise<void> {
    const previous = this.teardowns.get(fileId) ?? Promise.resolve();
    const done = previous
      .then(async () => {
        await loader.flush();
        await loader.clean();
      })
      .catch((error: unknown) => {
        this.config.logger.error(`Failed to tear down loader of ${fileId}:`, error);
      })
      .finally(() => {
        if (this.teardowns.get(fileId) === done) this.teardowns.delete(fileId);
      });

    this.teardowns.set(fileId, done);
    return done;
  }
}
