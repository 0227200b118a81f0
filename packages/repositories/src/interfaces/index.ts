export type { ConfigRepository } from './config-repository.js';
