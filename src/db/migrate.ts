import type { Db } from './connection.js';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const MIGRATIONS_DIR = path.join(__dirname, 'migrations');

function findMigrationsDir(): string | null {
  if (fs.existsSync(MIGRATIONS_DIR)) return MIGRATIONS_DIR;
  // Compiled output lives in dist/db; the .sql files stay with the sources
  const sourceDir = path.join(__dirname, '..', '..', 'src', 'db', 'migrations');
  return fs.existsSync(sourceDir) ? sourceDir : null;
}

export function runMigrations(db: Db): number[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT DEFAULT (datetime('now'))
    )
  `);

  const applied = new Set(
    (db.prepare('SELECT version FROM schema_version').all() as { version: number }[])
      .map(row => row.version)
  );

  const migrationsDir = findMigrationsDir();
  if (!migrationsDir) {
    console.warn(`Migrations directory not found at ${MIGRATIONS_DIR}`);
    return [];
  }

  const migrationFiles = fs.readdirSync(migrationsDir)
    .filter(f => f.endsWith('.sql'))
    .sort();

  const newlyApplied: number[] = [];
  for (const file of migrationFiles) {
    const version = parseInt(file.split('_')[0], 10);
    if (applied.has(version)) continue;

    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
    db.transaction(() => {
      db.exec(sql);
      db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(version);
    })();
    newlyApplied.push(version);
    console.log(`Applied migration: ${file}`);
  }
  return newlyApplied;
}
