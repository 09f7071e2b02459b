/**
 * Cache Migration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { CacheDatabase, IN_MEMORY_PATH } from "../database.js";
import { MigrationRunner, type Migration } from "../migration-runner.js";
import { migrations, getLatestVersion } from "../migrations/index.js";
import { migration as initialSchema } from "../migrations/001_initial_schema.js";
import { openPokemonCache } from "../impl/SqlitePokemonCache.js";
import { makeEvolutions, makeMega, makePokemon, makeRequirement, steppingClock } from "../../../__tests__/fixtures.js";

const LEGACY_SCHEMA = fs.readFileSync(new URL("./fixtures/legacy-schema.sql", import.meta.url), "utf-8");

describe("MigrationRunner", () => {
  let db: CacheDatabase;
  let runner: MigrationRunner;

  beforeEach(() => {
    db = new CacheDatabase({ dbPath: IN_MEMORY_PATH });
    db.initialize();
    runner = new MigrationRunner(db);
    runner.registerMigrations(migrations);
  });

  afterEach(() => {
    db.close();
  });

  it("migrates a fresh database to the latest version", () => {
    const result = runner.migrate();

    expect(result.success).toBe(true);
    expect(result.fromVersion).toBe(0);
    expect(result.toVersion).toBe(3);
    expect(result.appliedMigrations).toEqual([
      "1_initial_schema",
      "2_add_base_stardust",
      "3_drop_legacy_constraints",
    ]);
    expect(db.getSchemaVersion()).toBe(getLatestVersion());
    expect(db.columnExists("pokemon_data", "base_stardust")).toBe(true);
    expect(runner.getStatus().needsMigration).toBe(false);
  });

  it("is a no-op when already current", () => {
    runner.migrate();
    const again = runner.migrate();

    expect(again.appliedMigrations).toEqual([]);
    expect(again.fromVersion).toBe(3);
  });

  it("rolls back one version at a time", () => {
    runner.migrate();

    expect(runner.rollback().appliedMigrations).toEqual(["3_drop_legacy_constraints (reverted)"]);
    expect(db.getSchemaVersion()).toBe(2);

    const result = runner.rollback();

    expect(result.success).toBe(true);
    expect(result.appliedMigrations).toEqual(["2_add_base_stardust (reverted)"]);
    expect(db.getSchemaVersion()).toBe(1);
    expect(db.columnExists("pokemon_data", "base_stardust")).toBe(false);
    expect(db.tableExists("pokemon_data")).toBe(true);
  });

  it("rejects migrations that are not numbered sequentially", () => {
    const gap: Migration = { version: 3, name: "gap", up: () => undefined, down: () => undefined };
    expect(() => runner.registerMigrations([initialSchema, gap])).toThrow(
      "Migration versions must be sequential. Expected version 2, got 3"
    );
  });

  it("reports a failing migration and keeps the last good version", () => {
    const broken: Migration = {
      version: 2,
      name: "broken",
      up: (conn) => conn.exec("ALTER TABLE no_such_table ADD COLUMN x INTEGER"),
      down: () => undefined,
    };
    runner.registerMigrations([initialSchema, broken]);

    const result = runner.migrate();

    expect(result.success).toBe(false);
    expect(result.appliedMigrations).toEqual(["1_initial_schema"]);
    expect(result.toVersion).toBe(1);
    expect(db.getSchemaVersion()).toBe(1);
  });
});

describe("legacy database adoption", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "pokemon-meetup-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("adds base_stardust to tables created before the column existed", () => {
    const dbPath = path.join(dir, "pokemon.db");
    const legacy = new Database(dbPath);
    initialSchema.up(legacy);
    legacy
      .prepare(
        `INSERT INTO pokemon_data (
           id, name, types_json, base_attack, base_defense, base_stamina,
           cp_level_20, cp_level_25, cp_level_30, cp_level_40, max_cp,
           buddy_distance, candy_to_evolve, is_shiny_available, is_released,
           rarity, form, created_at, updated_at, data_source
         ) VALUES (25, 'Pikachu', '["electric"]', 112, 96, 111, 536, 670, 804, 938, 938,
           1, 50, 1, 1, 'Standard', 'Normal', '2024-01-01T00:00:00.000Z', '2024-01-01T00:00:00.000Z', 'pogoapi.net')`
      )
      .run();
    legacy.close();

    const cache = openPokemonCache({ dbPath });
    try {
      const record = cache.getById(25);
      expect(record?.name).toBe("Pikachu");
      expect(record?.types).toEqual(["electric"]);
      expect(record?.baseStardust).toBeNull();
      expect(cache.updateFields(25, { baseStardust: 400 })).toBe(true);
      expect(cache.getById(25)?.baseStardust).toBe(400);

      const stats = cache.getStats();
      expect(stats.totalCount).toBe(1);
      expect(stats.storageLocation).toBe(dbPath);
      expect(stats.storageSizeBytes).toBeGreaterThan(0);
    } finally {
      cache.close();
    }
  });

  function createLegacyDatabase(dbPath: string): void {
    const legacy = new Database(dbPath);
    legacy.exec(LEGACY_SCHEMA);
    legacy
      .prepare(
        `INSERT INTO pokemon_data (
           id, name, types_json, base_attack, base_defense, base_stamina,
           cp_level_20, cp_level_25, cp_level_30, cp_level_40, max_cp,
           buddy_distance, candy_to_evolve, is_shiny_available, is_released,
           rarity, form, created_at, updated_at
         ) VALUES (25, 'Pikachu', '["electric"]', 112, 96, 111, 536, 670, 804, 938, 938,
           1, 50, 1, 1, 'Standard', 'Normal', '2024-01-01 08:30:00', '2024-01-01 08:30:00')`
      )
      .run();
    legacy.close();
  }

  it("rewrites legacy timestamps as ISO-8601", () => {
    const dbPath = path.join(dir, "pokemon.db");
    createLegacyDatabase(dbPath);

    const cache = openPokemonCache({ dbPath });
    try {
      const record = cache.getById(25);
      expect(record?.createdAt).toBe("2024-01-01T08:30:00.000Z");
      expect(record?.updatedAt).toBe("2024-01-01T08:30:00.000Z");
    } finally {
      cache.close();
    }
  });

  it("stores evolutions and mega forms whose species are not cached", () => {
    const dbPath = path.join(dir, "pokemon.db");
    createLegacyDatabase(dbPath);

    const cache = openPokemonCache({ dbPath, clock: steppingClock() });
    try {
      cache.upsertEvolutions(makeEvolutions(25, "Pikachu", [makeRequirement()]));
      cache.upsertMegaForms([makeMega()]);

      expect(cache.getEvolutions(25)?.evolutions.map((e) => e.targetId)).toEqual([26]);
      expect(cache.getMegaForms(6).map((m) => m.megaName)).toEqual(["Mega Charizard X"]);
      expect(cache.exists(6)).toBe(false);
    } finally {
      cache.close();
    }
  });

  it("keeps the stored updated_at equal to the one returned by an upsert", () => {
    const dbPath = path.join(dir, "pokemon.db");
    createLegacyDatabase(dbPath);

    const cache = openPokemonCache({ dbPath, clock: steppingClock() });
    try {
      const stored = cache.upsertPokemon(makePokemon());

      expect(stored.createdAt).toBe("2024-01-01T08:30:00.000Z");
      expect(stored.updatedAt).toBe("2025-06-01T10:00:00.000Z");
      expect(cache.getById(25)?.updatedAt).toBe("2025-06-01T10:00:00.000Z");
      expect(cache.getStats().lastUpdateTimestamp).toBe("2025-06-01T10:00:00.000Z");
    } finally {
      cache.close();
    }
  });

  it("drops the legacy foreign keys and triggers", () => {
    const dbPath = path.join(dir, "pokemon.db");
    createLegacyDatabase(dbPath);
    openPokemonCache({ dbPath }).close();

    const conn = new Database(dbPath);
    try {
      const count = (sql: string, arg: string): number =>
        conn.prepare<[string], { total: number }>(sql).get(arg)?.total ?? -1;

      expect(count("SELECT COUNT(*) AS total FROM sqlite_master WHERE type = ?", "trigger")).toBe(0);
      expect(count("SELECT COUNT(*) AS total FROM pragma_foreign_key_list(?)", "pokemon_evolutions")).toBe(0);
      expect(count("SELECT COUNT(*) AS total FROM pragma_foreign_key_list(?)", "mega_evolutions")).toBe(0);
      expect(count("SELECT COUNT(*) AS total FROM sqlite_master WHERE type = 'index' AND tbl_name = ?", "mega_evolutions")).toBe(1);
    } finally {
      conn.close();
    }
  });

  it("creates missing parent directories", () => {
    const dbPath = path.join(dir, "nested", "data", "pokemon.db");
    const cache = openPokemonCache({ dbPath });
    cache.close();

    expect(fs.existsSync(dbPath)).toBe(true);
  });
});
