/**
 * Schema Migration Runner
 *
 * Handles versioned schema migrations for the cache database. Each
 * migration and its version bump run in one SQLite transaction, so a
 * failed step leaves the previous version intact.
 *
 * @module
 */

import type { CacheDatabase, Connection } from "./database.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("migrations");

// =============================================================================
// Types
// =============================================================================

/**
 * Migration definition interface.
 * Each migration has an up (apply) and down (revert) function.
 */
export interface Migration {
  /** Migration version number (must be sequential) */
  version: number;
  /** Human-readable migration name */
  name: string;
  /** Description of what this migration does */
  description?: string;
  up: (conn: Connection) => void;
  down: (conn: Connection) => void;
}

export interface MigrationStatus {
  currentVersion: number;
  targetVersion: number;
  pendingMigrations: Migration[];
  needsMigration: boolean;
}

export interface MigrationResult {
  success: boolean;
  fromVersion: number;
  toVersion: number;
  /** Migrations that were applied, as "<version>_<name>" */
  appliedMigrations: string[];
  error?: Error;
}

// =============================================================================
// Migration Runner
// =============================================================================

/**
 * Manages database schema migrations.
 *
 * @example
 * ```typescript
 * const runner = new MigrationRunner(db);
 * runner.registerMigrations(migrations);
 *
 * if (runner.getStatus().needsMigration) {
 *   runner.migrate();
 * }
 * ```
 */
export class MigrationRunner {
  private migrations: Migration[] = [];

  constructor(private db: CacheDatabase) {}

  /**
   * Registers migrations to be managed by this runner.
   *
   * @throws Error if versions are not 1..n without gaps
   */
  registerMigrations(migrations: Migration[]): void {
    const sorted = [...migrations].sort((a, b) => a.version - b.version);

    sorted.forEach((migration, i) => {
      if (migration.version !== i + 1) {
        throw new Error(
          `Migration versions must be sequential. Expected version ${i + 1}, got ${migration.version}`
        );
      }
    });

    this.migrations = sorted;
  }

  get latestVersion(): number {
    return this.migrations.length;
  }

  getStatus(): MigrationStatus {
    const currentVersion = this.getCurrentVersion();
    const targetVersion = this.latestVersion;
    const pendingMigrations = this.migrations.filter(
      (m) => m.version > currentVersion && m.version <= targetVersion
    );

    return {
      currentVersion,
      targetVersion,
      pendingMigrations,
      needsMigration: currentVersion !== targetVersion,
    };
  }

  getCurrentVersion(): number {
    return this.db.getSchemaVersion();
  }

  /**
   * Migrates the database to the target version (defaults to latest).
   * Moves down when the target is below the current version.
   */
  migrate(targetVersion: number = this.latestVersion): MigrationResult {
    this.ensureVersionTable();

    const currentVersion = this.getCurrentVersion();
    const appliedMigrations: string[] = [];

    if (currentVersion === targetVersion) {
      return { success: true, fromVersion: currentVersion, toVersion: targetVersion, appliedMigrations };
    }

    try {
      if (currentVersion < targetVersion) {
        const toApply = this.migrations.filter((m) => m.version > currentVersion && m.version <= targetVersion);
        for (const migration of toApply) {
          this.runMigration(migration, "up");
          appliedMigrations.push(`${migration.version}_${migration.name}`);
        }
      } else {
        const toRevert = this.migrations
          .filter((m) => m.version <= currentVersion && m.version > targetVersion)
          .reverse();
        for (const migration of toRevert) {
          this.runMigration(migration, "down");
          appliedMigrations.push(`${migration.version}_${migration.name} (reverted)`);
        }
      }

      return { success: true, fromVersion: currentVersion, toVersion: targetVersion, appliedMigrations };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      logger.error({ err: failure, fromVersion: currentVersion, targetVersion }, "Migration failed");
      return {
        success: false,
        fromVersion: currentVersion,
        toVersion: this.getCurrentVersion(),
        appliedMigrations,
        error: failure,
      };
    }
  }

  /**
   * Rolls back the last applied migration.
   */
  rollback(): MigrationResult {
    const currentVersion = this.getCurrentVersion();
    if (currentVersion === 0) {
      return { success: true, fromVersion: 0, toVersion: 0, appliedMigrations: [] };
    }
    return this.migrate(currentVersion - 1);
  }

  private runMigration(migration: Migration, direction: "up" | "down"): void {
    const newVersion = direction === "up" ? migration.version : migration.version - 1;

    this.db.withTransaction((conn) => {
      migration[direction](conn);
      this.db.setSchemaVersion(newVersion);
    });

    logger.info({ migration: migration.name, direction, version: newVersion }, "Migration applied");
  }

  /**
   * Creates the schema version table if it doesn't exist.
   */
  ensureVersionTable(): void {
    if (this.db.tableExists("schema_version")) {
      return;
    }
    this.db.connection.exec(`
      CREATE TABLE schema_version (
        id TEXT PRIMARY KEY,
        version INTEGER NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);
    this.db.setSchemaVersion(0);
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createMigrationRunner(db: CacheDatabase): MigrationRunner {
  return new MigrationRunner(db);
}
