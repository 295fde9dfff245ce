/**
 * Element catalogs, oracle answers, cache documents, outcomes,
 * config and scripts. Oracle replies, cache files and user YAML
 * are parsed through these before use.
 */

export * from './element.js';
export * from './oracle.js';
export * from './cache.js';
export * from './outcome.js';
export * from './config.js';
export * from './script.js';
