/**
 * backend/src/modules/assets/asset.resolver.ts
 *
 * WHY:
 * - Pages show a background image kept in the object store.
 * - The image is decoration: failing to load it must never fail a page.
 *
 * RULES:
 * - Page renders only locate the image (metadata); bytes are pulled only by
 *   the proxy route.
 * - Bounded by a timeout, at most one transparent retry.
 * - Any failure is logged as `asset.unavailable` and resolves to null.
 * - No key configured => no background, nothing logged.
 */

import { retry, withTimeout } from '../../shared/async/async';
import type { LogMeta } from '../../shared/logger/with-context';
import type { Logger } from '../../shared/logger/logger';
import {
  AssetUnavailableError,
  type ObjectStore,
  type ObjectStoreFetchOptions,
  type StoredObject,
} from '../../shared/storage/object-store';

export const BACKGROUND_ASSET_PATH = '/assets/background';

const MAX_ATTEMPTS = 2;

export type AssetResolverDeps = {
  objectStore: ObjectStore | null;
  backgroundImageKey: string | null;
  timeoutMs: number;
  logger: Logger;
};

export class AssetResolver {
  constructor(private readonly deps: AssetResolverDeps) {}

  /**
   * URL to embed in the page, or null when the page should render without a background.
   * Proxied assets are embedded through the proxy route; their bytes are not pulled here.
   */
  async resolveBackgroundUrl(meta: LogMeta = {}): Promise<string | null> {
    const location = await this.attempt(meta, (store, key, opts) => store.locate(key, opts));
    if (!location) return null;

    return location.kind === 'url' ? location.url : BACKGROUND_ASSET_PATH;
  }

  async loadBackground(meta: LogMeta = {}): Promise<StoredObject | null> {
    return this.attempt(meta, (store, key, opts) => store.fetch(key, opts));
  }

  private async attempt<T>(
    meta: LogMeta,
    call: (store: ObjectStore, key: string, opts: ObjectStoreFetchOptions) => Promise<T>,
  ): Promise<T | null> {
    const key = this.deps.backgroundImageKey;
    if (!key) return null;

    try {
      return await retry(() => this.callOnce(key, call), { maxAttempts: MAX_ATTEMPTS, delayMs: 0 });
    } catch (err) {
      this.deps.logger.warn('asset.unavailable', {
        ...meta,
        flow: 'assets.background',
        key,
        reason: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  private async callOnce<T>(
    key: string,
    call: (store: ObjectStore, key: string, opts: ObjectStoreFetchOptions) => Promise<T>,
  ): Promise<T> {
    const store = this.deps.objectStore;
    if (!store) {
      throw new AssetUnavailableError(key, 'Object store is not configured');
    }

    const timeoutMs = this.deps.timeoutMs;

    return withTimeout(
      (signal) => call(store, key, { signal }),
      timeoutMs,
      `Object store fetch timed out after ${timeoutMs}ms`,
    );
  }
}
