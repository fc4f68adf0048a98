export * from './errors.js';
export * from './file-system.js';
export * from './logger.js';
export * from './yaml.js';
