/**
 * Cache Database Wrapper
 *
 * Thin lifecycle and transaction layer over a better-sqlite3 connection.
 * All calls are synchronous; SQLite serializes writers on its own.
 *
 * @module
 */

import Database from "better-sqlite3";
import * as fs from "node:fs";
import * as path from "node:path";
import { ErrorCode, StorageError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("cache-database");

export const IN_MEMORY_PATH = ":memory:";

// =============================================================================
// Types
// =============================================================================

/**
 * Database configuration options
 */
export interface CacheDatabaseConfig {
  /** SQLite file path, or ":memory:" */
  dbPath: string;
  /** Whether to create the parent directory if it doesn't exist */
  createIfNotExists?: boolean;
}

export type Connection = Database.Database;

// =============================================================================
// Database Implementation
// =============================================================================

/**
 * SQLite connection wrapper for the local Pokémon cache.
 *
 * @example
 * ```typescript
 * const db = new CacheDatabase({ dbPath: ".pokemon-meetup/data/pokemon.db" });
 * db.initialize();
 *
 * db.withTransaction((conn) => {
 *   conn.prepare("DELETE FROM mega_evolutions WHERE pokemon_id = ?").run(6);
 * });
 *
 * db.close();
 * ```
 */
export class CacheDatabase {
  private config: Required<CacheDatabaseConfig>;
  private database: Connection | null = null;

  constructor(config: CacheDatabaseConfig) {
    this.config = {
      dbPath: config.dbPath,
      createIfNotExists: config.createIfNotExists ?? true,
    };
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Opens the connection, creating the parent directory when needed.
   */
  initialize(): void {
    if (this.database) {
      return;
    }

    if (this.config.createIfNotExists && !this.isInMemory) {
      const dir = path.dirname(this.config.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    try {
      this.database = new Database(this.config.dbPath, {
        fileMustExist: !this.config.createIfNotExists,
      });
    } catch (error) {
      throw new StorageError(`Could not open database at ${this.config.dbPath}`, ErrorCode.STORAGE_OPEN_FAILED, {
        dbPath: this.config.dbPath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    logger.debug({ dbPath: this.config.dbPath }, "Database opened");
  }

  /**
   * Closes the connection. Safe to call more than once.
   */
  close(): void {
    if (!this.database) {
      return;
    }
    this.database.close();
    this.database = null;
    logger.debug({ dbPath: this.config.dbPath }, "Database closed");
  }

  get dbPath(): string {
    return this.config.dbPath;
  }

  get isInMemory(): boolean {
    return this.config.dbPath === IN_MEMORY_PATH;
  }

  /**
   * The open connection.
   *
   * @throws {StorageError} if initialize() has not been called
   */
  get connection(): Connection {
    if (!this.database) {
      throw new StorageError("Database not initialized. Call initialize() first.", ErrorCode.STORAGE_NOT_READY);
    }
    return this.database;
  }

  // ===========================================================================
  // Transactions
  // ===========================================================================

  /**
   * Runs `fn` inside one SQLite transaction. Any throw rolls the whole
   * block back and is rethrown.
   */
  withTransaction<T>(fn: (conn: Connection) => T): T {
    const conn = this.connection;
    return conn.transaction(() => fn(conn))();
  }

  // ===========================================================================
  // Schema Introspection
  // ===========================================================================

  tableExists(name: string): boolean {
    const row = this.connection
      .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
      .get(name);
    return row !== undefined;
  }

  columnExists(table: string, column: string): boolean {
    if (!this.tableExists(table)) {
      return false;
    }
    const columns = this.connection
      .prepare<[string], { name: string }>("SELECT name FROM pragma_table_info(?)")
      .all(table);
    return columns.some((c) => c.name === column);
  }

  /**
   * Gets the schema version recorded by the migration runner, 0 if none.
   */
  getSchemaVersion(): number {
    if (!this.tableExists("schema_version")) {
      return 0;
    }
    const row = this.connection
      .prepare<[], { version: number }>("SELECT version FROM schema_version WHERE id = 'version'")
      .get();
    return row?.version ?? 0;
  }

  setSchemaVersion(version: number): void {
    this.connection
      .prepare<[number, string]>(
        `INSERT INTO schema_version (id, version, updated_at) VALUES ('version', ?, ?)
         ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at`
      )
      .run(version, new Date().toISOString());
  }

  /**
   * Size of the database file on disk; 0 for in-memory databases.
   */
  getFileSizeBytes(): number {
    if (this.isInMemory || !fs.existsSync(this.config.dbPath)) {
      return 0;
    }
    return fs.statSync(this.config.dbPath).size;
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Creates a new CacheDatabase instance.
 */
export function createCacheDatabase(config: CacheDatabaseConfig): CacheDatabase {
  return new CacheDatabase(config);
}
