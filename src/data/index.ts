export * from './converter-config.js';
export * from './override-list.js';
export * from './reference-region.js';
