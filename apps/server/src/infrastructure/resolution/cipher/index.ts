export { SignatureDescrambler, CIPHER_CACHE_TTL_MS } from './SignatureDescrambler';
export type { SignatureDescramblerOptions } from './SignatureDescrambler';
export { parseSignatureCipher, applyOperations, buildSignedUrl, isCipherProgram } from './CipherProgram';
export { findPlayerUrl, deriveOperations } from './playerScript';
