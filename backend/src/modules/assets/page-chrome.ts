/**
 * backend/src/modules/assets/page-chrome.ts
 *
 * WHY:
 * - Builds the per-request page chrome (display name, slogan, background)
 *   from the config snapshot and the asset resolver.
 */

import type { FastifyRequest } from 'fastify';

import type { PageChrome } from '../../shared/html/layout';
import { requestLogMeta } from '../../shared/logger/with-context';
import type { AssetResolver } from './asset.resolver';

export class PageChromeProvider {
  constructor(
    private readonly deps: {
      displayName: string;
      slogan: string;
      assetResolver: AssetResolver;
    },
  ) {}

  /**
   * Chrome without a background (error pages must not depend on the object store).
   */
  plain(): PageChrome {
    return {
      displayName: this.deps.displayName,
      slogan: this.deps.slogan,
      backgroundUrl: null,
    };
  }

  async forRequest(req: FastifyRequest): Promise<PageChrome> {
    const backgroundUrl = await this.deps.assetResolver.resolveBackgroundUrl(requestLogMeta(req));

    return { ...this.plain(), backgroundUrl };
  }
}
