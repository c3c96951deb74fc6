/**
 * Drizzle ORM Configuration
 *
 * Used by drizzle-kit to generate SQL migrations from the schema in
 * src/storage/schema.ts:
 *
 *   npm run db:generate
 *
 * The generated ./drizzle folder is applied by src/storage/migrate.ts.
 */
import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/storage/schema.ts',

  // Output directory for generated migrations
  out: './drizzle',

  dialect: 'sqlite',

  dbCredentials: {
    url: process.env.DATABASE_PATH || './data/mastery-track.db',
  },

  verbose: true,

  // Require confirmation for destructive operations
  strict: true,
});
