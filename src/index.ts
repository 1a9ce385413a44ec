export * from './backend/index.js';
export * from './types/config.js';
export * from './types/protocol.js';
export * from './types/server.js';
export { loadJsonConfig, loadToolServersConfig } from './utils/config-loader.js';
export { getConfigDir, getToolServersConfigPath } from './utils/config-paths.js';
export type { Logger } from './utils/silent-logger.js';
