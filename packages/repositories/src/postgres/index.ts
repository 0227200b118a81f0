export { createDatabase, type Database, type DatabaseConfig } from './db.js';
export * from './schema/index.js';
export { PgConfigRepository } from './repositories/index.js';
