// ============================================
// Memory Storage
// ============================================

import type { JsonValue } from '@asteroid-tap/shared';
import type { KeyValueStorage } from './types';

/**
 * In-process storage. Values are cloned on the way in and out so callers
 * never share references with the store.
 */
export class MemoryStorage implements KeyValueStorage {
  private entries = new Map<string, JsonValue>();

  async read(key: string): Promise<JsonValue | undefined> {
    const value = this.entries.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  async write(key: string, value: JsonValue): Promise<void> {
    this.entries.set(key, structuredClone(value));
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
