/**
 * SignatureDescrambler
 *
 * Resolves withheld format URLs. The transform program is derived from the
 * current player script, persisted, and reused for up to 24 hours.
 */

import * as fs from 'fs';
import type { Logger } from 'pino';
import type { Result } from '@stream-keeper/shared';
import type {
  CipherError,
  CipherTransformProgram,
  ISignatureDescrambler,
  KeyValueStore
} from '../../../domain/resolution';
import { describeTransportError, fetchWithTimeout, isCancellation } from '../http';
import { applyOperations, buildSignedUrl, parseSignatureCipher } from './CipherProgram';
import { deriveOperations, findPlayerUrl } from './playerScript';

export const CIPHER_CACHE_TTL_MS = 24 * 60 * 60 * 1000;
const PROGRAM_KEY = 'program';

export interface SignatureDescramblerOptions {
  readonly store: KeyValueStore<CipherTransformProgram>;
  readonly logger: Logger;
  readonly timeoutMs: number;
  /** User-supplied override script. Its presence is reported; it is never executed. */
  readonly overrideScriptPath?: string;
  readonly now?: () => number;
}

export class SignatureDescrambler implements ISignatureDescrambler {
  private readonly store: KeyValueStore<CipherTransformProgram>;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly overrideScriptPath?: string;
  private readonly now: () => number;
  private readonly overridePresent: boolean;

  constructor(options: SignatureDescramblerOptions) {
    this.store = options.store;
    this.logger = options.logger.child({ component: 'SignatureDescrambler' });
    this.timeoutMs = options.timeoutMs;
    this.overrideScriptPath = options.overrideScriptPath;
    this.now = options.now ?? Date.now;
    this.overridePresent = this.reportOverrideScript();
  }

  /**
   * Whether a user-supplied override script was found at startup
   */
  hasOverrideScript(): boolean {
    return this.overridePresent;
  }

  async descramble(signatureCipher: string, videoId: string, signal?: AbortSignal): Promise<Result<string, CipherError>> {
    const parsed = parseSignatureCipher(signatureCipher);
    if (!parsed.success) {
      return { success: false, error: parsed.error };
    }
    const cipher = parsed.value;

    const cached = this.getValidProgram();
    if (cached) {
      const applied = applyOperations(cipher.encryptedSignature, cached.operations);
      if (applied.success) {
        return { success: true, value: buildSignedUrl(cipher, applied.value) };
      }
      this.logger.warn({ playerUrl: cached.playerUrl }, 'Cached cipher program failed to apply, re-deriving');
      this.invalidate();
    }

    const derived = await this.deriveProgram(videoId, signal);
    if (!derived.success) {
      return derived;
    }

    const applied = applyOperations(cipher.encryptedSignature, derived.value.operations);
    if (!applied.success) {
      this.invalidate();
      return { success: false, error: 'EXTRACTOR_OUTDATED' };
    }
    return { success: true, value: buildSignedUrl(cipher, applied.value) };
  }

  invalidate(): void {
    this.store.delete(PROGRAM_KEY);
  }

  private getValidProgram(): CipherTransformProgram | null {
    const program = this.store.get(PROGRAM_KEY);
    if (!program) return null;
    if (this.now() - program.derivedAt > CIPHER_CACHE_TTL_MS) {
      this.logger.debug({ playerUrl: program.playerUrl }, 'Cipher program expired');
      return null;
    }
    return program;
  }

  private reportOverrideScript(): boolean {
    if (!this.overrideScriptPath) return false;
    if (!fs.existsSync(this.overrideScriptPath)) {
      this.logger.warn({ path: this.overrideScriptPath }, 'Cipher override script not found');
      return false;
    }
    this.logger.info({ path: this.overrideScriptPath }, 'Cipher override script present; not executed');
    return true;
  }

  /**
   * Embed page → player script → transform program
   */
  private async deriveProgram(videoId: string, signal?: AbortSignal): Promise<Result<CipherTransformProgram, CipherError>> {
    const embedPage = await this.fetchText(`https://www.youtube.com/embed/${videoId}`, signal);
    const playerUrl = embedPage === null ? null : findPlayerUrl(embedPage);
    if (!playerUrl) {
      return { success: false, error: 'PLAYER_URL_NOT_FOUND' };
    }

    const script = await this.fetchText(playerUrl, signal);
    if (script === null) {
      return { success: false, error: 'PLAYER_DOWNLOAD_FAILED' };
    }

    const operations = deriveOperations(script);
    if (!operations) {
      this.logger.warn({ playerUrl }, 'Descrambling function not found in player script; extractor outdated');
      return { success: false, error: 'EXTRACTOR_OUTDATED' };
    }

    const program: CipherTransformProgram = { playerUrl, operations, derivedAt: this.now() };
    this.store.put(PROGRAM_KEY, program);
    this.logger.info({ playerUrl, operations: operations.length }, 'Derived cipher program');
    return { success: true, value: program };
  }

  /**
   * GET a text body. Transport failures and non-OK answers yield null;
   * cancellation propagates.
   */
  private async fetchText(url: string, signal?: AbortSignal): Promise<string | null> {
    try {
      const response = await fetchWithTimeout(url, { timeoutMs: this.timeoutMs, signal });
      if (!response.ok) {
        this.logger.warn({ url, status: response.status }, 'Cipher source request failed');
        return null;
      }
      return await response.text();
    } catch (error) {
      if (isCancellation(error, signal)) {
        throw error;
      }
      this.logger.warn({ url, reason: describeTransportError(error) }, 'Cipher source request failed');
      return null;
    }
  }
}
