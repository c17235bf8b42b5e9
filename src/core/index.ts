/**
 * DB Desk Core
 *
 * Task execution core (delivery queue, dispatcher, single-flight executor,
 * foreground pump), the RPC layer and the sql.js database engine.
 */

// Type definitions
export * from './types';
export * from './errors';

// Task execution
export * from './delivery-queue';
export * from './task-dispatcher';
export * from './single-flight';
export * from './foreground-pump';
export * from './latest-only';

// RPC utilities
export * from './rpc';

// SQLite database implementation
export * from './sql-utils';
export * from './sqlite-db';
