/**
 * backend/src/modules/assets/asset.controller.ts
 *
 * WHY:
 * - Serves the background image: streams bytes in proxy mode,
 *   redirects to the (presigned) URL otherwise.
 *
 * RULES:
 * - Unavailable asset => 404 (already logged by the resolver).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requestLogMeta } from '../../shared/logger/with-context';
import type { AssetResolver } from './asset.resolver';

export class AssetController {
  constructor(private readonly assetResolver: AssetResolver) {}

  async background(req: FastifyRequest, reply: FastifyReply) {
    const asset = await this.assetResolver.loadBackground(requestLogMeta(req));
    if (!asset) {
      throw AppError.notFound('Background image is not available');
    }

    if (asset.kind === 'url') {
      return reply.redirect(asset.url, 302);
    }

    return reply
      .status(200)
      .type(asset.contentType ?? 'application/octet-stream')
      .header('cache-control', 'public, max-age=300')
      .send(Buffer.from(asset.body));
  }
}
