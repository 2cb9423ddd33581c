/**
 * backend/src/modules/assets/asset.module.ts
 *
 * WHY:
 * - Encapsulates presentation-asset wiring (background image + page chrome).
 *
 * RULES:
 * - No infra creation here (DI passes the object store in).
 */

import type { FastifyInstance } from 'fastify';

import type { Logger } from '../../shared/logger/logger';
import type { ObjectStore } from '../../shared/storage/object-store';
import { AssetController } from './asset.controller';
import { AssetResolver, BACKGROUND_ASSET_PATH } from './asset.resolver';
import { PageChromeProvider } from './page-chrome';

export type AssetModule = ReturnType<typeof createAssetModule>;

export function createAssetModule(deps: {
  objectStore: ObjectStore | null;
  backgroundImageKey: string | null;
  timeoutMs: number;
  displayName: string;
  slogan: string;
  logger: Logger;
}) {
  const assetResolver = new AssetResolver({
    objectStore: deps.objectStore,
    backgroundImageKey: deps.backgroundImageKey,
    timeoutMs: deps.timeoutMs,
    logger: deps.logger,
  });

  const pageChrome = new PageChromeProvider({
    displayName: deps.displayName,
    slogan: deps.slogan,
    assetResolver,
  });

  const controller = new AssetController(assetResolver);

  return {
    assetResolver,
    pageChrome,
    registerRoutes(app: FastifyInstance) {
      app.get(BACKGROUND_ASSET_PATH, controller.background.bind(controller));
    },
  };
}
