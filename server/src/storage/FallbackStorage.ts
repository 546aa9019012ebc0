// ============================================
// Fallback Storage
// ============================================

import type { JsonValue } from '@asteroid-tap/shared';
import { logStorageFallback } from '../logger';
import { MemoryStorage } from './MemoryStorage';
import type { KeyValueStorage } from './types';

/**
 * FallbackStorage - wraps a durable store. The first time the primary
 * rejects, the failure is logged and this instance switches to an in-memory
 * store for the rest of its life; the failed call is retried there once.
 * Gameplay never sees a storage rejection.
 */
export class FallbackStorage implements KeyValueStorage {
  private readonly memory = new MemoryStorage();
  private degraded = false;

  constructor(private readonly primary: KeyValueStorage) {}

  get isDegraded(): boolean {
    return this.degraded;
  }

  read(key: string): Promise<JsonValue | undefined> {
    return this.run('read', (storage) => storage.read(key));
  }

  write(key: string, value: JsonValue): Promise<void> {
    return this.run('write', (storage) => storage.write(key, value));
  }

  delete(key: string): Promise<void> {
    return this.run('delete', (storage) => storage.delete(key));
  }

  clear(): Promise<void> {
    return this.run('clear', (storage) => storage.clear());
  }

  private async run<T>(operation: string, call: (storage: KeyValueStorage) => Promise<T>): Promise<T> {
    if (!this.degraded) {
      try {
        return await call(this.primary);
      } catch (error) {
        this.degraded = true;
        logStorageFallback(operation, error);
      }
    }
    return call(this.memory);
  }
}
