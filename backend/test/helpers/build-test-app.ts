import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import type { ObjectStore } from '../../src/shared/storage/object-store';
import { createTestDb } from './test-db';

export function buildTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  const baseConfig: AppConfig = {
    nodeEnv: 'test',
    port: 0,
    host: '127.0.0.1',

    logLevel: 'error',
    serviceName: 'employee-directory',

    displayName: 'Team A',
    slogan: 'We ship',
    backgroundImageKey: null,

    db: {
      host: 'localhost',
      port: 3306,
      name: 'employees_test',
      user: 'test',
      password: 'test-secret',
      poolSize: 1,
      timeoutMs: 2000,
    },

    assets: {
      bucket: null,
      region: 'us-east-1',
      endpoint: null,
      delivery: 'proxy',
      urlTtlSeconds: 900,
      timeoutMs: 500,
    },

    records: { deleteMissing: 'not_found' },

    seed: { enabled: false },
  };

  return {
    ...baseConfig,
    ...overrides,
    // ensure nested objects merge correctly
    db: { ...baseConfig.db, ...(overrides.db ?? {}) },
    assets: { ...baseConfig.assets, ...(overrides.assets ?? {}) },
    records: { ...baseConfig.records, ...(overrides.records ?? {}) },
    seed: { ...baseConfig.seed, ...(overrides.seed ?? {}) },
  };
}

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - Fresh in-memory database per app (ids start at 1).
 * - No object store unless the test passes one.
 */
export async function buildTestApp(
  opts: { config?: Partial<AppConfig>; objectStore?: ObjectStore | null } = {},
) {
  const db = await createTestDb();
  const config = buildTestConfig(opts.config);

  const built = await buildApp(config, { db, objectStore: opts.objectStore ?? null });

  return {
    app: built.app,
    deps: built.deps,
    db,
    close: built.close,
  };
}

export const FORM_HEADERS = { 'content-type': 'application/x-www-form-urlencoded' } as const;

export function formBody(values: Record<string, string>): string {
  return new URLSearchParams(values).toString();
}
