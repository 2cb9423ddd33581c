/**
 * backend/src/shared/storage/object-store.ts
 *
 * WHY:
 * - The background image lives in an external object store (S3 in the cluster).
 * - Rendering depends on this abstraction so tests can use an in-memory
 *   implementation instead of the AWS SDK.
 *
 * HOW TO USE:
 * - store.locate(key) -> metadata only: a URL the browser can load directly,
 *   or 'proxy' when the app must serve the bytes itself. Used on page renders.
 * - store.fetch(key) -> the URL, or the bytes (served through /assets/background).
 * - Implementations throw AssetUnavailableError when the key cannot be served.
 */

export type ObjectLocation = { kind: 'url'; url: string } | { kind: 'proxy' };

export type StoredObject =
  | { kind: 'url'; url: string }
  | { kind: 'bytes'; body: Uint8Array; contentType: string | null };

export interface ObjectStoreFetchOptions {
  signal?: AbortSignal;
}

export interface ObjectStore {
  locate(key: string, opts?: ObjectStoreFetchOptions): Promise<ObjectLocation>;
  fetch(key: string, opts?: ObjectStoreFetchOptions): Promise<StoredObject>;
}

export class AssetUnavailableError extends Error {
  readonly key: string;

  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AssetUnavailableError';
    this.key = key;
  }
}
