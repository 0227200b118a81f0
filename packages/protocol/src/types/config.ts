// Config document types - the persisted form of a config scope

import type { Timestamp } from './common.js';

/**
 * One stored config scope.
 * `content` is the serializer's string form of the scope's section values.
 */
export type ConfigDocument = {
  ownerId: string;
  content: string;
  updatedAt: Timestamp;
};
