/**
 * API Types and Interfaces
 *
 * Envelope, status codes and route typings for the control API.
 */

import type { FastifyReply, FastifyRequest, RouteGenericInterface } from 'fastify';
import type { MediaLocator, PlatformTag } from '@stream-keeper/shared';
import type { SessionSnapshot } from '../../../application';

/**
 * Standard API error format
 */
export interface APIError {
  code: string;
  message: string;
  details?: unknown;
  suggestion?: string;
  timestamp?: string;
}

/**
 * Every response uses this envelope
 */
export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: APIError;
  timestamp: string;
}

export type APIRouteHandler<TRequest extends RouteGenericInterface = RouteGenericInterface, TResponse = unknown> = (
  request: FastifyRequest<TRequest>,
  reply: FastifyReply
) => Promise<APIResponse<TResponse>>;

/**
 * Request size limits for different endpoints
 */
export const REQUEST_LIMITS = {
  DEFAULT: 64 * 1024,
  RESOLVE: 4 * 1024
} as const;

export const HTTP_STATUS = {
  OK: 200,
  ACCEPTED: 202,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  PAYLOAD_TOO_LARGE: 413,
  UNSUPPORTED_MEDIA_TYPE: 415,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503
} as const;

export const API_ERROR_CODES = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_JSON: 'INVALID_JSON',
  INVALID_REQUEST: 'INVALID_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR'
} as const;

/**
 * GET /api/status
 */
export interface StatusData extends SessionSnapshot {
  /** Wire form of the locator being played, null when stopped */
  readonly locator: string | null;
}

export interface StatusRouteInterface extends RouteGenericInterface {
  Reply: APIResponse<StatusData>;
}

/**
 * POST /api/resolve
 */
export interface ResolveRequest {
  url: string;
  qualityMode?: string;
}

export interface ResolveData {
  readonly locator: MediaLocator;
  readonly playableUrl: string;
  readonly quality: string;
  readonly platform: PlatformTag;
  readonly strategy: string;
  readonly fromCache: boolean;
}

export interface ResolveRouteInterface extends RouteGenericInterface {
  Body: ResolveRequest;
  Reply: APIResponse<ResolveData>;
}

/**
 * POST /api/playback/reload
 */
export interface ReloadData {
  readonly reloading: true;
}

export interface ReloadRouteInterface extends RouteGenericInterface {
  Reply: APIResponse<ReloadData>;
}

/**
 * DELETE /api/cache
 */
export interface CacheClearData {
  readonly cleared: true;
}

export interface CacheClearRouteInterface extends RouteGenericInterface {
  Reply: APIResponse<CacheClearData>;
}

export function successResponse<T>(data: T): APIResponse<T> {
  return { success: true, data, timestamp: new Date().toISOString() };
}

export function errorResponse(error: Omit<APIError, 'timestamp'>): APIResponse<never> {
  const timestamp = new Date().toISOString();
  return { success: false, error: { ...error, timestamp }, timestamp };
}
