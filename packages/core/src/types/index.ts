export * from './record.js';
export * from './schema.js';
