export { deriveCacheKey, KeyDerivationError } from './derive-key.js';
export type { KeyArg } from './derive-key.js';
