/**
 * Core Ports
 *
 * Exports all port interfaces (contracts) for the application.
 * Ports define the boundaries between the reconciler and external adapters.
 */

// Backend Driver Interface
export * from './sql-driver.js';

// Schema Dialect Interface
export * from './schema-dialect.js';

// Confirmation Provider Interface
export * from './confirmation.js';
