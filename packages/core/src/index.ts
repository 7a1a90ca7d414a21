/**
 * @geosync/core
 *
 * Shared record types, table declarations, errors and retry helpers
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Utilities
export * from './utils/index.js';
