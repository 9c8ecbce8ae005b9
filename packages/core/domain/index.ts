/**
 * Core Domain Types
 *
 * Entity types, the attribute registry, value semantics and the declared
 * tree. Independent of any live server.
 */

export * from './entity-types.js';
export * from './attributes.js';
export * from './values.js';
export * from './column-types.js';
export * from './errors.js';
export * from './declared.js';
