export { MemoryStore } from './MemoryStore';
export { JsonFileStore } from './JsonFileStore';
export type { ValueGuard } from './JsonFileStore';
