/**
 * Application Constants
 *
 * Centralized configuration for application identity and timing.
 */

// Application identity
export const AppId = 'dbdesk';
export const Title = 'DB Desk';

// Render loop: one pump tick per frame (~60 fps)
export const FrameIntervalMs = 16;

// Remote invocations on the database worker
export const InvocationTimeoutMs = 30000;

// Progress text label for the single-flight query executor
export const QueryTaskLabel = 'query';

// Connection defaults
export const MemoryDatabase = ':memory:';
export const DatabaseExtensions = ['.sqlite', '.sqlite3', '.db', '.db3', '.sdb', '.s3db'];

// Table browser
export const MaxListedTables = 500;
