/**
 * API Route Registration
 *
 * Registers the control API under the `/api` prefix: session status,
 * one-off resolution, reload and cache control.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { Logger } from 'pino';
import {
  ErrorFactory,
  LocatorCodec,
  SourceValidator,
  type QualityMode
} from '@stream-keeper/shared';
import type { IPlaybackSession } from '../../../application';
import type { ISourceResolver } from '../../../domain/resolution';
import { registerAPIMiddleware } from './middleware';
import {
  HTTP_STATUS,
  errorResponse,
  successResponse,
  type CacheClearRouteInterface,
  type ReloadRouteInterface,
  type ResolveRouteInterface,
  type StatusRouteInterface
} from './types';

export interface APIDependencies {
  readonly session: IPlaybackSession;
  /** Separate from the session's resolver so a lookup never cancels playback */
  readonly resolver: ISourceResolver;
  readonly defaultQualityMode: QualityMode;
  readonly logger: Logger;
}

const resolveBodySchema = {
  type: 'object',
  required: ['url'],
  properties: {
    url: { type: 'string', minLength: 1, maxLength: 2048 },
    qualityMode: { type: 'string' }
  }
} as const;

/**
 * Register all API routes with the Fastify instance
 */
export async function registerAPIRoutes(fastify: FastifyInstance, dependencies: APIDependencies): Promise<void> {
  const logger = dependencies.logger.child({ component: 'API' });

  await fastify.register(async (apiInstance) => {
    registerAPIMiddleware(apiInstance, logger);

    apiInstance.get<StatusRouteInterface>('/status', async () => {
      const snapshot = dependencies.session.getSnapshot();
      const locator = snapshot.resilience.locator ?? snapshot.session.locator;
      return successResponse({
        ...snapshot,
        locator: locator ? LocatorCodec.encode(locator) : null
      });
    });

    apiInstance.post<ResolveRouteInterface>('/resolve', { schema: { body: resolveBodySchema } }, async (request, reply) => {
      return handleResolve(request, reply, dependencies);
    });

    apiInstance.post<ReloadRouteInterface>('/playback/reload', async (_request, reply) => {
      dependencies.session.reload().catch(error => {
        logger.error({ err: error }, 'Reload failed');
      });
      reply.code(HTTP_STATUS.ACCEPTED);
      return successResponse({ reloading: true } as const);
    });

    apiInstance.delete<CacheClearRouteInterface>('/cache', async () => {
      dependencies.session.invalidateCache();
      logger.info('Resolution cache cleared on request');
      return successResponse({ cleared: true } as const);
    });
  }, { prefix: '/api' });
}

/**
 * POST /api/resolve - resolve a source without playing it
 */
async function handleResolve(
  request: FastifyRequest<ResolveRouteInterface>,
  reply: FastifyReply,
  dependencies: APIDependencies
) {
  const created = SourceValidator.create(request.body, dependencies.defaultQualityMode);
  if (!created.success) {
    const details = ErrorFactory.createSourceError(created.error);
    reply.code(HTTP_STATUS.BAD_REQUEST);
    return errorResponse({ code: details.code, message: details.message, suggestion: details.suggestion });
  }

  const result = await dependencies.resolver.resolve(created.value);
  if (!result.success) {
    const details = ErrorFactory.createResolutionError(result.error.kind);
    reply.code(result.error.kind === 'RESOLUTION_CANCELLED' ? HTTP_STATUS.CONFLICT : HTTP_STATUS.BAD_GATEWAY);
    return errorResponse({
      code: details.code,
      message: details.message,
      suggestion: details.suggestion,
      details: { reason: result.error.reason, status: result.error.status }
    });
  }

  return successResponse({
    locator: result.locator,
    playableUrl: LocatorCodec.playableUrl(result.locator),
    quality: result.quality,
    platform: result.platform,
    strategy: result.strategy,
    fromCache: result.fromCache === true
  });
}
