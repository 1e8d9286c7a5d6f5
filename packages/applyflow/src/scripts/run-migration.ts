/**
 * Run database migrations for ApplyFlow
 *
 * Usage:
 *   node dist/scripts/run-migration.js                          # Run all migrations in order
 *   node dist/scripts/run-migration.js 001                      # Run specific migration by number
 *   node dist/scripts/run-migration.js 001_orchestration.sql    # Run by filename
 *
 * Table names in the SQL use the `af_` prefix; it is rewritten to
 * APPLYFLOW_TABLE_PREFIX before execution.
 */

import { existsSync, readFileSync, readdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import pg from 'pg';
import { getEnv } from '../config/env.js';

const { Pool } = pg;

// The compiled script lives in dist/ but the SQL stays beside the sources
const MIGRATIONS_DIR = [
  join(dirname(fileURLToPath(import.meta.url)), '../db/migrations'),
  join(process.cwd(), 'packages/applyflow/src/db/migrations'),
].find((dir) => existsSync(dir));

function applyTablePrefix(sql: string, prefix: string): string {
  return prefix === 'af_' ? sql : sql.replace(/\baf_/g, prefix);
}

function getMigrationFiles(dir: string, filter?: string): string[] {
  const files = readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  if (!filter) return files;

  // Match by number prefix (e.g., "001") or full filename
  return files.filter((f) => f.startsWith(filter) || f === filter);
}

async function runMigration(): Promise<void> {
  if (!MIGRATIONS_DIR) {
    console.error('Migrations directory not found');
    process.exit(1);
  }

  const filter = process.argv[2];
  const files = getMigrationFiles(MIGRATIONS_DIR, filter);

  if (files.length === 0) {
    console.error(`No migration files found${filter ? ` matching "${filter}"` : ''}`);
    console.error('Available migrations:');
    getMigrationFiles(MIGRATIONS_DIR).forEach((f) => console.error(`  ${f}`));
    process.exit(1);
  }

  const env = getEnv();
  if (!env.DATABASE_URL) {
    console.error('Missing database connection string (DATABASE_URL)');
    process.exit(1);
  }

  const pool = new Pool({ connectionString: env.DATABASE_URL });

  try {
    const dbHost = env.DATABASE_URL.split('@')[1]?.split('?')[0] || 'unknown';
    console.log(`Database: ${dbHost}`);
    console.log(`Table prefix: ${env.APPLYFLOW_TABLE_PREFIX}`);
    console.log(`Migrations to run: ${files.length}\n`);

    for (const file of files) {
      const sql = applyTablePrefix(readFileSync(join(MIGRATIONS_DIR, file), 'utf8'), env.APPLYFLOW_TABLE_PREFIX);

      console.log(`Running ${file}...`);
      await pool.query(sql);
      console.log('  Done.\n');
    }

    console.log(`All ${files.length} migration(s) completed successfully.`);
  } catch (error) {
    console.error('Migration failed:', error);
    throw error;
  } finally {
    await pool.end();
  }
}

runMigration().catch((error) => {
  console.error(error);
  process.exit(1);
});
