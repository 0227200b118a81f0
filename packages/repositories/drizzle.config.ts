import { defineConfig } from 'drizzle-kit';

// Only the config store lives in Postgres; other tables in a shared database are left alone.
export default defineConfig({
  dialect: 'postgresql',
  schema: './src/postgres/schema/index.ts',
  out: './drizzle',
  tablesFilter: ['config_documents'],
  dbCredentials: {
    url: process.env.PATCHWORK_DATABASE_URL ?? 'postgres://localhost:5432/patchwork',
  },
});
