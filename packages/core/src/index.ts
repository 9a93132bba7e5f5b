export * from './config/index.js';
export * from './encoding/index.js';
export * from './errors/index.js';
export * from './gate/index.js';
export * from './http-client/index.js';
export * from './logging/index.js';
export * from './stores/index.js';
export * from './types/index.js';
