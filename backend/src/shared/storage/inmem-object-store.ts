/**
 * backend/src/shared/storage/inmem-object-store.ts
 *
 * WHY:
 * - Lets tests (and local dev without a bucket) run without external infra.
 *
 * HOW TO USE:
 * - const store = new InMemObjectStore()                       // serves bytes
 * - const store = new InMemObjectStore({ baseUrl: 'https://…' }) // serves URLs
 * - store.put('bg.png', bytes, 'image/png')
 * - store.failNext(1) -> next call throws (simulates a transient outage)
 * - store.locates / store.fetches / store.bytesServed -> what callers pulled
 */

import {
  AssetUnavailableError,
  type ObjectLocation,
  type ObjectStore,
  type ObjectStoreFetchOptions,
  type StoredObject,
} from './object-store';

type Entry = { body: Uint8Array; contentType: string | null };

export class InMemObjectStore implements ObjectStore {
  private readonly objects = new Map<string, Entry>();
  private pendingFailures = 0;
  private locateCount = 0;
  private fetchCount = 0;
  private bytesCount = 0;

  constructor(private readonly opts: { baseUrl?: string } = {}) {}

  put(key: string, body: Uint8Array, contentType: string | null = null): void {
    this.objects.set(key, { body, contentType });
  }

  failNext(times: number): void {
    this.pendingFailures = times;
  }

  get locates(): number {
    return this.locateCount;
  }

  get fetches(): number {
    return this.fetchCount;
  }

  get bytesServed(): number {
    return this.bytesCount;
  }

  locate(key: string, opts: ObjectStoreFetchOptions = {}): Promise<ObjectLocation> {
    this.locateCount += 1;

    try {
      this.lookup(key, opts);
    } catch (err) {
      return Promise.reject(err);
    }

    if (this.opts.baseUrl) {
      return Promise.resolve({ kind: 'url', url: this.urlFor(key) });
    }

    return Promise.resolve({ kind: 'proxy' });
  }

  fetch(key: string, opts: ObjectStoreFetchOptions = {}): Promise<StoredObject> {
    this.fetchCount += 1;

    let entry: Entry;
    try {
      entry = this.lookup(key, opts);
    } catch (err) {
      return Promise.reject(err);
    }

    if (this.opts.baseUrl) {
      return Promise.resolve({ kind: 'url', url: this.urlFor(key) });
    }

    this.bytesCount += entry.body.byteLength;
    return Promise.resolve({ kind: 'bytes', body: entry.body, contentType: entry.contentType });
  }

  private lookup(key: string, opts: ObjectStoreFetchOptions): Entry {
    if (opts.signal?.aborted) {
      throw new AssetUnavailableError(key, 'Fetch aborted');
    }

    if (this.pendingFailures > 0) {
      this.pendingFailures -= 1;
      throw new AssetUnavailableError(key, 'Simulated object store outage');
    }

    const entry = this.objects.get(key);
    if (!entry) {
      throw new AssetUnavailableError(key, `No object stored under key: ${key}`);
    }

    return entry;
  }

  private urlFor(key: string): string {
    return `${this.opts.baseUrl}/${key}`;
  }
}
