/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (MySQL pool, S3 client) and shares them safely.
 * - Keeps modules testable: tests inject an in-process db and object store.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. no bucket => no object store) belong HERE,
 *   not inside the classes themselves.
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import type { ObjectStore } from '../shared/storage/object-store';
import { S3ObjectStore } from '../shared/storage/s3-object-store';

import { createAssetModule } from '../modules/assets/asset.module';
import type { AssetModule } from '../modules/assets/asset.module';

import { createEmployeeModule } from '../modules/employees/employee.module';
import type { EmployeeModule } from '../modules/employees/employee.module';

export type AppDeps = {
  db: Db;
  logger: Logger;
  objectStore: ObjectStore | null;

  // modules
  assets: AssetModule;
  employees: EmployeeModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  db?: Db;
  // null => run without an object store
  objectStore?: ObjectStore | null;
};

function createObjectStore(config: AppConfig): S3ObjectStore | null {
  if (!config.assets.bucket) return null;

  return new S3ObjectStore({
    bucket: config.assets.bucket,
    region: config.assets.region,
    endpoint: config.assets.endpoint,
    delivery: config.assets.delivery,
    urlTtlSeconds: config.assets.urlTtlSeconds,
  });
}

export function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): AppDeps {
  const db = overrides.db ?? createDb(config.db);

  const s3 = overrides.objectStore === undefined ? createObjectStore(config) : null;
  const objectStore = overrides.objectStore === undefined ? s3 : overrides.objectStore;

  // modules (no HTTP / no business logic here)
  const assets = createAssetModule({
    objectStore,
    backgroundImageKey: config.backgroundImageKey,
    timeoutMs: config.assets.timeoutMs,
    displayName: config.displayName,
    slogan: config.slogan,
    logger,
  });

  const employees = createEmployeeModule({
    db,
    logger,
    pageChrome: assets.pageChrome,
    timeoutMs: config.db.timeoutMs,
    deleteMissing: config.records.deleteMissing,
  });

  return {
    db,
    logger,
    objectStore,
    assets,
    employees,
    close: async () => {
      s3?.close();
      await db.destroy();
    },
  };
}
