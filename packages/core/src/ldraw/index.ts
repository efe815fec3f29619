/**
 * LDraw module - part resolution, line parsing and flattening
 */

export * from './diagnostics.js';
export * from './fileSystem.js';
export * from './lineCommands.js';
export * from './options.js';
export * from './parser.js';
export * from './resolver.js';
export * from './result.js';
export * from './winding.js';
