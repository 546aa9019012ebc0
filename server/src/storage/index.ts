export type { KeyValueStorage } from './types';
export { MemoryStorage } from './MemoryStorage';
export { FileStorage } from './FileStorage';
export { FallbackStorage } from './FallbackStorage';
