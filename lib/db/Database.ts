/**
 * Database Connection and Migration Manager
 *
 * Provides singleton SQLite connection using better-sqlite3 with:
 * - Migration runner that records each applied file
 * - WAL mode and enforced foreign keys
 * - Graceful shutdown handling
 */

import BetterSqlite3, { Database as SqliteDatabase, Statement } from 'better-sqlite3';
import { readFileSync, readdirSync, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { getDatabaseSettings } from '../config';
import { StoreUnavailableError, errorMessage } from '../errors';

export type DatabaseRow = Record<string, unknown>;

export class Database {
  private static instance: Database | null = null;
  private db: SqliteDatabase;
  private dbPath: string;
  private migrationsPath: string;

  private constructor(dbPath?: string, migrationsPath?: string) {
    const settings = getDatabaseSettings();
    this.dbPath = dbPath || settings.dbPath;
    this.migrationsPath = migrationsPath || settings.migrationsPath;

    try {
      const dataDir = dirname(this.dbPath);
      if (!existsSync(dataDir)) {
        mkdirSync(dataDir, { recursive: true });
      }
      this.db = new BetterSqlite3(this.dbPath);
    } catch (error) {
      throw new StoreUnavailableError(
        `Cannot open database at ${this.dbPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('busy_timeout = 5000');

    try {
      this.migrate();
    } catch (error) {
      this.db.close();
      throw error;
    }
  }

  /**
   * Get the singleton Database instance
   */
  public static getInstance(dbPath?: string, migrationsPath?: string): Database {
    if (!Database.instance) {
      Database.instance = new Database(dbPath, migrationsPath);
    }
    return Database.instance;
  }

  /**
   * Apply pending migrations from the migrations directory in name order
   */
  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        applied_at INTEGER DEFAULT (strftime('%s', 'now'))
      )
    `);

    if (!existsSync(this.migrationsPath)) {
      console.warn(`[Database] Migrations directory not found: ${this.migrationsPath}`);
      return;
    }

    const migrationFiles = readdirSync(this.migrationsPath)
      .filter(file => file.endsWith('.sql'))
      .sort();

    if (migrationFiles.length === 0) {
      console.warn('[Database] No migration files found');
      return;
    }

    const isApplied = this.db.prepare<[string], { name: string }>(
      'SELECT name FROM migrations WHERE name = ?'
    );
    const recordApplied = this.db.prepare<[string]>('INSERT INTO migrations (name) VALUES (?)');

    for (const file of migrationFiles) {
      const migrationName = file.replace(/\.sql$/, '');

      if (isApplied.get(migrationName)) {
        continue;
      }

      const sql = readFileSync(join(this.migrationsPath, file), 'utf8');
      console.log(`[Database] Applying migration: ${migrationName}`);

      try {
        this.db.transaction(() => {
          this.db.exec(sql);
          recordApplied.run(migrationName);
        })();
      } catch (error) {
        console.error(`[Database] Migration ${migrationName} failed:`, error);
        throw new Error(`Migration failed: ${migrationName}\nError: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    }
  }

  public exec(sql: string): void {
    this.db.exec(sql);
  }

  public prepare<Result = DatabaseRow>(sql: string): Statement<unknown[], Result> {
    return this.db.prepare<unknown[], Result>(sql);
  }

  /**
   * Run a transaction with automatic rollback on error
   */
  public transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /**
   * Underlying better-sqlite3 handle, for pragmas and tests
   */
  public getRawDb(): SqliteDatabase {
    return this.db;
  }

  public getPath(): string {
    return this.dbPath;
  }

  public close(): void {
    if (this.db.open) {
      this.db.close();
      console.log('[Database] Connection closed');
    }
    if (Database.instance === this) {
      Database.instance = null;
    }
  }

  /**
   * Reset the singleton instance (useful for testing)
   */
  public static resetInstance(): void {
    if (Database.instance) {
      Database.instance.close();
    }
    Database.instance = null;
  }
}

export function getDatabase(): Database {
  return Database.getInstance();
}

let shutdownRegistered = false;

/**
 * Close the database on SIGINT/SIGTERM. Long-running scripts call this once.
 */
export function registerShutdownHandlers(): void {
  if (shutdownRegistered) return;
  shutdownRegistered = true;

  const shutdownHandler = () => {
    console.log('[Database] Shutting down database connection...');
    Database.resetInstance();
    process.exit(0);
  };

  process.on('SIGINT', shutdownHandler);
  process.on('SIGTERM', shutdownHandler);
  process.on('exit', () => {
    Database.resetInstance();
  });
}
