/**
 * @geosync/connector-db
 *
 * Database loaders
 */

export * from './postgresql/index.js';
