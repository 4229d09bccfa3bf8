/**
 * Schema exports
 *
 * @module schemas
 */

export * from './common.js';
export * from './trip.js';
export * from './here.js';
