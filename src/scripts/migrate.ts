import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import dotenv from 'dotenv';
import pg from 'pg';

dotenv.config();

const { Pool } = pg;

// Same relative location from src/scripts and dist/scripts.
const MIGRATIONS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../db/migrations',
);

async function listMigrations(): Promise<string[]> {
  const names = await readdir(MIGRATIONS_DIR);
  return names.filter((name) => name.endsWith('.sql')).sort();
}

async function main(): Promise<void> {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('Missing DATABASE_URL for migration run.');
  }

  const pool = new Pool({ connectionString });
  try {
    for (const name of await listMigrations()) {
      const sql = await readFile(path.join(MIGRATIONS_DIR, name), 'utf-8');
      // Every migration is written to be re-runnable.
      await pool.query(sql);
      console.log('migration applied', name);
    }
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  console.error('migration failed', err);
  process.exit(1);
});
