export { EarlyPatch } from './early-patch.js';
export { Patch } from './patch.js';
