import { eq } from 'drizzle-orm';
import type { ConfigDocument } from '@patchwork/protocol';
import type { Database } from '../db.js';
import { configDocuments } from '../schema/index.js';
import type { ConfigRepository } from '../../interfaces/index.js';

export class PgConfigRepository implements ConfigRepository {
  constructor(private db: Database) {}

  async load(ownerId: string): Promise<ConfigDocument | null> {
    const [row] = await this.db
      .select()
      .from(configDocuments)
      .where(eq(configDocuments.ownerId, ownerId));
    return row ? this.rowToDocument(row) : null;
  }

  async save(document: ConfigDocument): Promise<void> {
    const updatedAt = new Date(document.updatedAt);

    await this.db
      .insert(configDocuments)
      .values({
        ownerId: document.ownerId,
        content: document.content,
        updatedAt,
      })
      .onConflictDoUpdate({
        target: configDocuments.ownerId,
        set: { content: document.content, updatedAt },
      });
  }

  async listOwners(): Promise<string[]> {
    const rows = await this.db
      .select({ ownerId: configDocuments.ownerId })
      .from(configDocuments);
    return rows.map((row) => row.ownerId);
  }

  private rowToDocument(row: typeof configDocuments.$inferSelect): ConfigDocument {
    return {
      ownerId: row.ownerId,
      content: row.content,
      updatedAt: row.updatedAt.toISOString(),
    };
  }
}
