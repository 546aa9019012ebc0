// ============================================
// Storage Types
// ============================================

import type { JsonValue } from '@asteroid-tap/shared';

/**
 * Flat async key/value store of JSON values. read() resolves undefined for a
 * missing key.
 */
export interface KeyValueStorage {
  read(key: string): Promise<JsonValue | undefined>;
  write(key: string, value: JsonValue): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}
