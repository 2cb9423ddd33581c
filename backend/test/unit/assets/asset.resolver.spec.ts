import { describe, it, expect, vi } from 'vitest';
import { AssetResolver } from '../../../src/modules/assets/asset.resolver';
import { InMemObjectStore } from '../../../src/shared/storage/inmem-object-store';
import type { ObjectStore } from '../../../src/shared/storage/object-store';
import { logger } from '../../../src/shared/logger/logger';

function buildResolver(opts: {
  objectStore: ObjectStore | null;
  backgroundImageKey: string | null;
  timeoutMs?: number;
}) {
  return new AssetResolver({
    objectStore: opts.objectStore,
    backgroundImageKey: opts.backgroundImageKey,
    timeoutMs: opts.timeoutMs ?? 200,
    logger,
  });
}

describe('AssetResolver', () => {
  it('resolves nothing and logs nothing when no key is configured', async () => {
    const store = new InMemObjectStore();
    const warn = vi.spyOn(logger, 'warn');

    await expect(buildResolver({ objectStore: store, backgroundImageKey: null }).resolveBackgroundUrl()).resolves.toBeNull();
    expect(store.locates).toBe(0);
    expect(store.fetches).toBe(0);
    expect(warn).not.toHaveBeenCalled();
  });

  it('points byte-backed assets at the proxy route', async () => {
    const store = new InMemObjectStore();
    store.put('bg.png', new Uint8Array([1, 2, 3]), 'image/png');

    await expect(buildResolver({ objectStore: store, backgroundImageKey: 'bg.png' }).resolveBackgroundUrl()).resolves.toBe(
      '/assets/background',
    );
  });

  it('never pulls the image bytes while rendering pages', async () => {
    const store = new InMemObjectStore();
    store.put('bg.png', new Uint8Array(1000), 'image/png');
    const resolver = buildResolver({ objectStore: store, backgroundImageKey: 'bg.png' });

    for (let render = 0; render < 3; render++) {
      await expect(resolver.resolveBackgroundUrl()).resolves.toBe('/assets/background');
    }

    expect(store.locates).toBe(3);
    expect(store.fetches).toBe(0);
    expect(store.bytesServed).toBe(0);

    await resolver.loadBackground();
    expect(store.bytesServed).toBe(1000);
  });

  it('returns store-issued urls as they are', async () => {
    const store = new InMemObjectStore({ baseUrl: 'https://assets.test' });
    store.put('bg.png', new Uint8Array([1]), 'image/png');

    await expect(buildResolver({ objectStore: store, backgroundImageKey: 'bg.png' }).resolveBackgroundUrl()).resolves.toBe(
      'https://assets.test/bg.png',
    );
  });

  it('retries a transient failure once', async () => {
    const store = new InMemObjectStore();
    store.put('bg.png', new Uint8Array([1]), 'image/png');
    store.failNext(1);
    const warn = vi.spyOn(logger, 'warn');

    const asset = await buildResolver({ objectStore: store, backgroundImageKey: 'bg.png' }).loadBackground();

    expect(asset).toEqual({ kind: 'bytes', body: new Uint8Array([1]), contentType: 'image/png' });
    expect(store.fetches).toBe(2);
    expect(warn).not.toHaveBeenCalled();
  });

  it('gives up after the retry and logs asset.unavailable', async () => {
    const store = new InMemObjectStore();
    const warn = vi.spyOn(logger, 'warn');

    const url = await buildResolver({ objectStore: store, backgroundImageKey: 'missing.png' }).resolveBackgroundUrl({
      requestId: 'req-1',
    });

    expect(url).toBeNull();
    expect(store.locates).toBe(2);
    expect(warn).toHaveBeenCalledWith('asset.unavailable', {
      requestId: 'req-1',
      flow: 'assets.background',
      key: 'missing.png',
      reason: 'No object stored under key: missing.png',
    });
  });

  it('treats a missing object store as unavailable', async () => {
    const warn = vi.spyOn(logger, 'warn');

    await expect(buildResolver({ objectStore: null, backgroundImageKey: 'bg.png' }).resolveBackgroundUrl()).resolves.toBeNull();
    expect(warn).toHaveBeenCalledWith(
      'asset.unavailable',
      expect.objectContaining({ key: 'bg.png', reason: 'Object store is not configured' }),
    );
  });

  it('bounds a hanging store with the timeout', async () => {
    const hanging: ObjectStore = {
      locate: () => new Promise(() => undefined),
      fetch: () => new Promise(() => undefined),
    };
    const warn = vi.spyOn(logger, 'warn');

    await expect(
      buildResolver({ objectStore: hanging, backgroundImageKey: 'bg.png', timeoutMs: 20 }).resolveBackgroundUrl(),
    ).resolves.toBeNull();
    expect(warn).toHaveBeenCalledWith(
      'asset.unavailable',
      expect.objectContaining({ reason: 'Object store fetch timed out after 20ms' }),
    );
  });
});
