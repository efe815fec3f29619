/**
 * Mesh module - flattened triangle lists
 */

export * from './types.js';
