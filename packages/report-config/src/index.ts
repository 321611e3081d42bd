/**
 * Report configuration for report-kit
 *
 * Provides: immutable settings value, pure merge, YAML file loading.
 */

export { ReportConfig, ConfigValidationError, mergeSettings } from './report-config.js';
export { loadConfigFile } from './config-loader.js';
export { deepFreeze, deepMerge, isPlainObject } from './merge.js';
export type { DeepReadonly, PlainObject } from './merge.js';
