// Database module exports
export { DatabaseService, getDatabase, closeDatabase } from './database.js';
export type { DatabaseStats, StoredRun, StoredResult, RunMeta } from './database.js';
export { SCHEMA_VERSION, CREATE_TABLES_SQL } from './schema.js';
