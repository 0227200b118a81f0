export { PgConfigRepository } from './config-repository.js';
