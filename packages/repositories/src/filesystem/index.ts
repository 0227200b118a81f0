export type { LocationFileSystem, ListFilesOptions } from './types.js';
export { createNodeFileSystem } from './node.js';
export { createInMemoryFileSystem } from './in-memory.js';
