import fs from 'fs/promises';
import path from 'path';
import { query, disconnect, withTransaction } from './client.js';
import { logger } from '../config/logger.js';

const MIGRATIONS_DIR = path.resolve(process.cwd(), 'server', 'src', 'db', 'migrations');
const MIGRATION_FILE = /^(\d+)_(.+)\.sql$/;

interface MigrationFile {
  id: number;
  name: string;
  filename: string;
}

async function listMigrationFiles(): Promise<MigrationFile[]> {
  const files = (await fs.readdir(MIGRATIONS_DIR)).filter((f) => f.endsWith('.sql')).sort();
  return files.map((filename) => {
    const match = filename.match(MIGRATION_FILE);
    if (!match) throw new Error(`Invalid migration filename: ${filename}`);
    return { id: parseInt(match[1], 10), name: match[2], filename };
  });
}

async function appliedMigrationIds(): Promise<Set<number>> {
  await query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id INTEGER PRIMARY KEY,
      name VARCHAR(255) NOT NULL,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
  const result = await query<{ id: number }>('SELECT id FROM migrations');
  return new Set(result.rows.map((row) => row.id));
}

/**
 * Apply every pending migration in filename order, each in its own transaction
 */
async function runMigrations() {
  try {
    const applied = await appliedMigrationIds();
    const pending = (await listMigrationFiles()).filter((migration) => !applied.has(migration.id));
    logger.info('Starting database migrations', { pending: pending.length });

    for (const migration of pending) {
      const sql = await fs.readFile(path.join(MIGRATIONS_DIR, migration.filename), 'utf-8');
      await withTransaction(async (client) => {
        await client.query(sql);
        await client.query('INSERT INTO migrations (id, name) VALUES ($1, $2)', [migration.id, migration.name]);
      });
      logger.info(`Applied migration ${migration.filename}`);
    }

    logger.info('Database is up to date');
  } catch (error) {
    logger.error('Migration failed', { error });
    throw error;
  } finally {
    await disconnect();
  }
}

if (require.main === module) {
  runMigrations().catch(() => {
    process.exit(1);
  });
}

export { runMigrations };
