/**
 * Source resolution domain exports
 */

export type {
  ResolutionFailure,
  ExtractionResult,
  CacheEntry,
  CipherOperation,
  CipherTransformProgram,
  SignatureCipher,
  CipherError,
  StreamingFormat,
  StreamingData,
  ManifestVariant
} from './types';

export type {
  KeyValueStore,
  IExtractionStrategy,
  ISignatureDescrambler,
  INetworkMonitor,
  ResolveOptions,
  ISourceResolver
} from './interfaces';

export { ResolutionFailures } from './errors';
