/**
 * Signature cipher parsing and transform program application
 */

import type { Result } from '@stream-keeper/shared';
import type { CipherOperation, CipherTransformProgram, SignatureCipher } from '../../../domain/resolution';
import { isRecord, readNumber, readString, readArray } from '../json';

/**
 * Split a `s=…&sp=…&url=…` cipher string into its fields
 */
export function parseSignatureCipher(signatureCipher: string): Result<SignatureCipher, 'INVALID_CIPHER'> {
  const params = new URLSearchParams(signatureCipher);
  const url = params.get('url');
  const encryptedSignature = params.get('s');

  if (!url || encryptedSignature === null) {
    return { success: false, error: 'INVALID_CIPHER' };
  }

  return {
    success: true,
    value: {
      url,
      encryptedSignature,
      parameterName: params.get('sp') || 'sig'
    }
  };
}

/**
 * Run the operations in order. Fails when there is nothing to run or
 * nothing left of the signature.
 */
export function applyOperations(signature: string, operations: readonly CipherOperation[]): Result<string, 'APPLY_FAILED'> {
  if (operations.length === 0 || signature.length === 0) {
    return { success: false, error: 'APPLY_FAILED' };
  }

  let chars = Array.from(signature);
  for (const operation of operations) {
    switch (operation.op) {
      case 'reverse':
        chars = chars.reverse();
        break;
      case 'splice':
        if (operation.n > 0 && operation.n < chars.length) {
          chars = chars.slice(operation.n);
        }
        break;
      case 'swap': {
        const index = operation.n % chars.length;
        const first = chars[0];
        chars[0] = chars[index];
        chars[index] = first;
        break;
      }
    }
  }

  const result = chars.join('');
  return result.length > 0 ? { success: true, value: result } : { success: false, error: 'APPLY_FAILED' };
}

export function buildSignedUrl(cipher: SignatureCipher, signature: string): string {
  return `${cipher.url}&${cipher.parameterName}=${encodeURIComponent(signature)}`;
}

function isCipherOperation(value: unknown): value is CipherOperation {
  if (!isRecord(value)) return false;
  const op = readString(value, 'op');
  if (op === 'reverse') return true;
  return (op === 'splice' || op === 'swap') && Number.isInteger(readNumber(value, 'n'));
}

/**
 * Shape check for a program read back from the cipher cache
 */
export function isCipherProgram(value: unknown): value is CipherTransformProgram {
  if (!isRecord(value)) return false;
  const operations = readArray(value, 'operations');
  return typeof value.playerUrl === 'string'
    && typeof value.derivedAt === 'number'
    && Array.isArray(value.operations)
    && operations.every(isCipherOperation);
}
