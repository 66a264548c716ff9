/**
 * Common execution middleware.
 *
 * @example
 * ```typescript
 * import { logging, timeout } from 'gearman-wire/middleware';
 * ```
 *
 * @module
 */

export { logging } from './logging.js';
export type { LoggingOptions } from './logging.js';

export { timeout } from './timeout.js';
export type { TimeoutOptions } from './timeout.js';
