export * from './board/index.js';
export * from './adapters/index.js';
export { config, validateConfig } from './config.js';
export type { BoardConfig } from './config.js';
export { initDatabase, closeDatabase, getDb } from './db/index.js';
export { logger } from './logger.js';
export { createNode } from './node.js';
export type { BoardNode, NodeOptions } from './node.js';
export { buildServer } from './server.js';
export type { ServerOptions } from './server.js';
