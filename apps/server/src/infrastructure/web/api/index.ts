/**
 * API Infrastructure Exports
 */

export type {
  APIError,
  APIResponse,
  APIRouteHandler,
  StatusData,
  ResolveRequest,
  ResolveData,
  ReloadData,
  CacheClearData
} from './types';

export {
  REQUEST_LIMITS,
  HTTP_STATUS,
  API_ERROR_CODES,
  successResponse,
  errorResponse
} from './types';

export {
  createRequestValidationMiddleware,
  createErrorHandlingMiddleware,
  createSecurityHeadersMiddleware,
  registerAPIMiddleware
} from './middleware';

export { registerAPIRoutes } from './routes';
export type { APIDependencies } from './routes';
