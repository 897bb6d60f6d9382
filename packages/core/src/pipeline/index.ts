/**
 * Pipeline exports
 */

export * from './config.js';
export * from './statistics.js';
export * from './puzzle-extractor.js';
