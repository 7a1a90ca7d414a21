/**
 * @geosync/connector-api
 *
 * HTTP extraction: source client, payload decoding and Overpass queries
 */

export * from './http/index.js';
export * from './overpass/index.js';
