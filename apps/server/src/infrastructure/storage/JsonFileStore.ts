/**
 * Key-value store persisted as one JSON document
 *
 * The document is read once, on first access. Every mutation rewrites the
 * file synchronously so a crash never loses an acknowledged write.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from 'pino';
import type { KeyValueStore } from '../../domain/resolution';

export type ValueGuard<T> = (value: unknown) => value is T;

export class JsonFileStore<T> implements KeyValueStore<T> {
  private entries: Map<string, T> | null = null;

  constructor(
    private readonly filePath: string,
    private readonly isValue: ValueGuard<T>,
    private readonly logger: Logger
  ) {}

  get(key: string): T | undefined {
    return this.load().get(key);
  }

  put(key: string, value: T): void {
    this.load().set(key, value);
    this.flush();
  }

  delete(key: string): void {
    if (this.load().delete(key)) {
      this.flush();
    }
  }

  clear(): void {
    this.load().clear();
    this.flush();
  }

  keys(): string[] {
    return Array.from(this.load().keys());
  }

  private load(): Map<string, T> {
    if (this.entries) {
      return this.entries;
    }

    const entries = new Map<string, T>();
    this.entries = entries;

    if (!fs.existsSync(this.filePath)) {
      return entries;
    }

    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        this.logger.warn({ file: this.filePath }, 'Store file is not a JSON object, starting empty');
        return entries;
      }
      for (const [key, value] of Object.entries(parsed)) {
        if (this.isValue(value)) {
          entries.set(key, value);
        } else {
          this.logger.warn({ file: this.filePath, key }, 'Dropping malformed store entry');
        }
      }
    } catch (error) {
      this.logger.warn({ file: this.filePath, err: error }, 'Store file unreadable, starting empty');
    }

    return entries;
  }

  /**
   * A failed write keeps the in-memory value; it is retried on the next change
   */
  private flush(): void {
    const document = Object.fromEntries(this.load());
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(document, null, 2));
    } catch (error) {
      this.logger.error({ file: this.filePath, err: error }, 'Could not write store file');
    }
  }
}
