/**
 * vertex-md - Vertex AI Studio export to Markdown converter
 * Main library entry point
 */

// Re-export modules for programmatic use
export * from './config/index.js';
export * from './convert/index.js';
export * from './export/markdown.js';
export * from './ingest/vertex/index.js';
export * from './utils/index.js';
export { getLogger, createLogger, resetLogger } from './utils/logger.js';
export { version } from './version.js';
