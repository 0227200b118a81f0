export * from './common.js';
export * from './participants.js';
export * from './modules.js';
export * from './patches.js';
export * from './locations.js';
export * from './config.js';
