/**
 * Export module - STL text, flat render buffers and facet records
 */

export * from './facets.js';
export * from './stl.js';
export * from './buffers.js';
