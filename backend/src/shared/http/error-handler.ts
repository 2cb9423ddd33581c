/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Browsers get an HTML error page; /api and /health callers get JSON.
 * - Internal details (meta, driver messages, SQL, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to the response.
 * - FieldValidationError → also expose its user-facing `fields`.
 * - Fastify client errors (bad JSON, unsupported media type) → 4xx.
 * - Unexpected errors → 500 with generic message.
 * - Unknown routes → 404 in the same two formats.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log full error details (meta REDACTED) with request context.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import { AppError, FieldValidationError } from './errors';
import { withRequestContext } from '../logger/with-context';
import { renderErrorPage } from '../html/error-page';
import type { PageChrome } from '../html/layout';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
    fields?: Readonly<Record<string, string>>;
  };
};

const SENSITIVE_META_KEYS = new Set(['password', 'dbPassword', 'secret', 'token', 'credentials']);

const PAGE_TITLES: Record<number, string> = {
  400: 'Bad request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not found',
  503: 'Service unavailable',
};

function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

export function isJsonRequest(req: FastifyRequest): boolean {
  const path = req.url.split('?')[0] ?? '';
  return path === '/api' || path.startsWith('/api/') || path === '/health';
}

export type ErrorResponder = (
  req: FastifyRequest,
  reply: FastifyReply,
  body: ErrorResponseBody['error'] & { status: number },
) => FastifyReply;

export function createErrorResponder(chrome: PageChrome): ErrorResponder {
  return (req, reply, { status, ...error }) => {
    if (isJsonRequest(req)) {
      const body: ErrorResponseBody = { error };
      return reply.status(status).send(body);
    }

    const title = PAGE_TITLES[status] ?? 'Something went wrong';
    return reply
      .status(status)
      .type('text/html; charset=utf-8')
      .send(renderErrorPage({ page: chrome, title, message: error.message }));
  };
}

export function registerErrorHandler(app: FastifyInstance, opts: { chrome: PageChrome }): void {
  const respond = createErrorResponder(opts.chrome);

  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return respond(req, reply, {
        status: err.status,
        code: err.code,
        message: err.message,
        ...(err instanceof FieldValidationError ? { fields: err.fields } : {}),
      });
    }

    // 2) Fastify client errors (malformed body, unsupported content type, ...)
    if (typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500) {
      log.warn('client_error', {
        flow: 'http.error',
        status: err.statusCode,
        fastifyCode: err.code,
        message: err.message,
      });

      return respond(req, reply, {
        status: err.statusCode,
        code: err.statusCode === 404 ? 'NOT_FOUND' : 'VALIDATION_ERROR',
        message: 'Invalid request',
      });
    }

    // 3) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return respond(req, reply, {
      status: 500,
      code: 'INTERNAL',
      message: 'Internal server error',
    });
  });

  app.setNotFoundHandler(async (req: FastifyRequest, reply: FastifyReply) => {
    withRequestContext(req).info('route_not_found', {
      flow: 'http.not_found',
      method: req.method,
      url: req.url,
    });

    return respond(req, reply, { status: 404, code: 'NOT_FOUND', message: 'Page not found' });
  });
}
