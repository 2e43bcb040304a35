export { SourceResolver, DEFAULT_RESOLUTION_TIMEOUT_MS } from './SourceResolver';
export type { SourceResolverOptions } from './SourceResolver';
export { ResolutionCache, isCacheEntry } from './ResolutionCache';
export type { CacheStats, CachedResolution } from './ResolutionCache';
export { NetworkMonitor } from './NetworkMonitor';
export { SignatureDescrambler, CIPHER_CACHE_TTL_MS } from './cipher';
export * from './extractors';
export { HttpRequestError, HttpTimeoutError, HttpAbortedError, fetchWithTimeout, sanitizeErrorMessage } from './http';
