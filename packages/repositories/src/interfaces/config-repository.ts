import type { ConfigDocument } from '@patchwork/protocol';

/**
 * Repository interface for persisted config scopes.
 *
 * Each scope (the orchestrator's own, one per participant) is stored as one
 * document keyed by its owner id. The content is opaque to the repository.
 */
export interface ConfigRepository {
  /**
   * Load the document for an owner
   * @returns ConfigDocument or null if nothing was saved yet
   */
  load(ownerId: string): Promise<ConfigDocument | null>;

  /**
   * Insert or replace the document for its owner
   */
  save(document: ConfigDocument): Promise<void>;

  /**
   * List the owners that have a stored document
   */
  listOwners(): Promise<string[]>;
}
