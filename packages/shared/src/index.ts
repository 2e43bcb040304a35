/**
 * Shared types and contracts for stream-keeper
 *
 * Source references, media locators and the error vocabulary used by the
 * server and by any client reading its API.
 */

// Source references
export type {
  Result,
  PlatformTag,
  QualityMode,
  SourceReference,
  SourceCreateData,
  SourceError
} from './domain/Source';
export {
  QUALITY_MODES,
  DEFAULT_QUALITY_MODE,
  QualityModeUtils,
  SourceUrlUtils,
  SourceValidator
} from './domain/Source';

// Media locators
export type { MediaLocator } from './domain/MediaLocator';
export { VIDEO_ONLY_TAG, LocatorCodec, LocatorUtils } from './domain/MediaLocator';

// Error types and utilities
export type {
  ResolutionErrorKind,
  RecoveryErrorKind,
  ErrorDetails
} from './domain/errors';
export { ErrorFactory } from './domain/errors';
