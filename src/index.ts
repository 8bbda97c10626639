/**
 * weft - directive-based template rendering.
 *
 * @example
 * ```typescript
 * import { renderString, processFile } from 'weft'
 *
 * await renderString('Hi /** variable name **\/', { name: 'Ada' })  // → 'Hi Ada'
 * await processFile('page.html', 'out.html', 'data.json')
 * ```
 *
 * @module
 */
export * from './core/template/index.js';

export { observer, type WeftEvents, type WeftEventNames } from './core/observer.js';

export { Logger, type LoggerOptions, type LogLevel } from './core/logger/index.js';

export { resolveConfig, type Config, type ConfigInput, ConfigValidationError } from './core/config/index.js';
