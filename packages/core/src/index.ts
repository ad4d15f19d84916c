export * from './types.js';
export * from './errors.js';
export { defaultLogLevel, getLogger, setLogLevel, type Logger } from './logger.js';
export * from './router/index.js';
export * from './run/index.js';
export * from './synthesis/index.js';
export * from './output/index.js';
