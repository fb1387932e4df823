import { logger } from '../../utils/logger.js';
import type { PackageManifest } from '../packaging/package-manifest.js';

/**
 * Per-resolution memo shared by every registry call of one resolution, so a
 * package's metadata is read once even when both the graph walk and the
 * download need it.
 */
export class RegistryCacheContext {
  private readonly manifests = new Map<string, Promise<PackageManifest | null>>();
  private hits = 0;

  /**
   * Return the cached manifest for `key`, loading it on first use.
   * Failed loads are evicted so a later call can retry.
   */
  getManifest(key: string, load: () => Promise<PackageManifest | null>): Promise<PackageManifest | null> {
    const cached = this.manifests.get(key);
    if (cached) {
      this.hits++;
      return cached;
    }

    const pending = load();
    this.manifests.set(key, pending);
    pending.catch(() => {
      this.manifests.delete(key);
    });
    return pending;
  }

  get size(): number {
    return this.manifests.size;
  }

  get hitCount(): number {
    return this.hits;
  }

  dispose(): void {
    logger.debug('Disposing registry cache context', { entries: this.manifests.size, hits: this.hits });
    this.manifests.clear();
  }
}
