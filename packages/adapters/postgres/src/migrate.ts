import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import pg from 'pg';
import { loadConfig } from '@streamlens/domain';

const { Client } = pg;

export interface MigrateConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;

  /** Directory holding NNN_*.sql files, applied in name order */
  migrationsDir: string;
}

/**
 * Run database migrations
 */
export async function migrate(config: MigrateConfig): Promise<string[]> {
  const client = new Client({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
  });

  const files = readdirSync(config.migrationsDir)
    .filter((name) => name.endsWith('.sql'))
    .sort();

  try {
    await client.connect();

    for (const file of files) {
      const migration = readFileSync(join(config.migrationsDir, file), 'utf-8');
      console.log(`[Migrate] Running migration: ${file}`);
      await client.query(migration);
    }

    console.log('[Migrate] Migrations completed successfully');
    return files;
  } finally {
    await client.end();
  }
}

// CLI entry point (run from the repository root)
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const { database } = loadConfig();
  const config: MigrateConfig = {
    host: database.host,
    port: database.port,
    database: database.database,
    user: database.user,
    password: database.password,
    migrationsDir: process.env.MIGRATIONS_DIR || join(process.cwd(), 'db/migrations'),
  };

  migrate(config)
    .then(() => process.exit(0))
    .catch((err) => {
      console.error('[Migrate] Migration failed:', err);
      process.exit(1);
    });
}
