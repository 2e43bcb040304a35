/**
 * In-process key-value store
 */

import type { KeyValueStore } from '../../domain/resolution';

export class MemoryStore<T> implements KeyValueStore<T> {
  private readonly entries = new Map<string, T>();

  get(key: string): T | undefined {
    return this.entries.get(key);
  }

  put(key: string, value: T): void {
    this.entries.set(key, value);
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }
}
