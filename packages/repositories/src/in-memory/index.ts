// In-memory repository implementations for development and testing
//
// Data does not persist between restarts.

import type { ConfigDocument } from '@patchwork/protocol';
import type { ConfigRepository } from '../interfaces/index.js';

/**
 * In-memory config repository with access to the underlying data.
 */
export interface InMemoryConfigRepository extends ConfigRepository {
  /** Direct access to stored documents (for debugging/testing) */
  _data: Map<string, ConfigDocument>;
  /** Clear all data */
  clear(): void;
}

/**
 * Create an in-memory config repository, optionally seeded with documents.
 */
export function createInMemoryConfigRepository(
  seed: ConfigDocument[] = []
): InMemoryConfigRepository {
  const documents = new Map<string, ConfigDocument>(seed.map((doc) => [doc.ownerId, doc]));

  return {
    _data: documents,

    async load(ownerId: string): Promise<ConfigDocument | null> {
      return documents.get(ownerId) ?? null;
    },

    async save(document: ConfigDocument): Promise<void> {
      documents.set(document.ownerId, { ...document });
    },

    async listOwners(): Promise<string[]> {
      return Array.from(documents.keys());
    },

    clear() {
      documents.clear();
    },
  };
}
