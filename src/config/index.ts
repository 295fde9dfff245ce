/**
 * Configuration module.
 * Loads and validates session config from config files.
 * Zod-validated; the schema owns every default.
 */

export { TIMEOUTS, LIMITS, SCROLL, CACHE, PATHS, VIEWPORT } from './defaults.js';
export { loadConfigFile, loadOptionalConfigFile, loadScriptFile } from './loader.js';
