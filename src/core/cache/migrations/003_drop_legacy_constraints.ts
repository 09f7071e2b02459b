/**
 * Migration 003: Drop Legacy Constraints
 *
 * Databases written by the earlier cache declared foreign keys from the
 * evolution and mega tables to pokemon_data, and kept `updated_at` fresh
 * with AFTER UPDATE triggers writing "YYYY-MM-DD HH:MM:SS". Evolution
 * targets and mega owners are often not cached, and timestamps here are
 * ISO-8601, so both are removed and older timestamps are rewritten.
 *
 * @module
 */

import type { Connection } from "../database.js";
import type { Migration } from "../migration-runner.js";

const LEGACY_TRIGGERS = [
  "update_pokemon_data_timestamp",
  "update_pokemon_evolutions_timestamp",
  "update_mega_evolutions_timestamp",
];

const TIMESTAMPED_TABLES = ["pokemon_data", "pokemon_evolutions", "mega_evolutions"];

interface RebuildPlan {
  table: string;
  columns: string[];
  create: string;
  indexes: string[];
}

const REBUILDS: RebuildPlan[] = [
  {
    table: "pokemon_evolutions",
    columns: [
      "id",
      "from_pokemon_id",
      "to_pokemon_id",
      "to_pokemon_name",
      "candy_required",
      "item_required",
      "lure_required",
      "no_candy_cost_if_traded",
      "priority",
      "only_evolves_in_daytime",
      "only_evolves_in_nighttime",
      "must_be_buddy_to_evolve",
      "buddy_distance_required",
      "gender_required",
      "created_at",
      "updated_at",
    ],
    create: `
      CREATE TABLE pokemon_evolutions_rebuilt (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        from_pokemon_id INTEGER NOT NULL,
        to_pokemon_id INTEGER NOT NULL,
        to_pokemon_name TEXT NOT NULL,
        candy_required INTEGER NOT NULL,
        item_required TEXT,
        lure_required TEXT,
        no_candy_cost_if_traded INTEGER NOT NULL DEFAULT 0,
        priority INTEGER,
        only_evolves_in_daytime INTEGER NOT NULL DEFAULT 0,
        only_evolves_in_nighttime INTEGER NOT NULL DEFAULT 0,
        must_be_buddy_to_evolve INTEGER NOT NULL DEFAULT 0,
        buddy_distance_required REAL,
        gender_required TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )`,
    indexes: [
      "CREATE INDEX IF NOT EXISTS idx_evolution_from ON pokemon_evolutions (from_pokemon_id)",
      "CREATE INDEX IF NOT EXISTS idx_evolution_to ON pokemon_evolutions (to_pokemon_id)",
    ],
  },
  {
    table: "mega_evolutions",
    columns: [
      "id",
      "pokemon_id",
      "pokemon_name",
      "form",
      "mega_name",
      "first_time_mega_energy_required",
      "mega_energy_required",
      "base_attack",
      "base_defense",
      "base_stamina",
      "types_json",
      "cp_multiplier_override",
      "created_at",
      "updated_at",
    ],
    create: `
      CREATE TABLE mega_evolutions_rebuilt (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        pokemon_id INTEGER NOT NULL,
        pokemon_name TEXT NOT NULL,
        form TEXT NOT NULL,
        mega_name TEXT NOT NULL,
        first_time_mega_energy_required INTEGER NOT NULL,
        mega_energy_required INTEGER NOT NULL,
        base_attack INTEGER NOT NULL,
        base_defense INTEGER NOT NULL,
        base_stamina INTEGER NOT NULL,
        types_json TEXT NOT NULL,
        cp_multiplier_override REAL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )`,
    indexes: ["CREATE INDEX IF NOT EXISTS idx_mega_pokemon ON mega_evolutions (pokemon_id)"],
  },
];

function hasForeignKeys(conn: Connection, table: string): boolean {
  const row = conn
    .prepare<[string], { total: number }>("SELECT COUNT(*) AS total FROM pragma_foreign_key_list(?)")
    .get(table);
  return (row?.total ?? 0) > 0;
}

function rebuildWithoutForeignKeys(conn: Connection, plan: RebuildPlan): void {
  const columns = plan.columns.join(", ");
  conn.exec(`
    ${plan.create};
    INSERT INTO ${plan.table}_rebuilt (${columns}) SELECT ${columns} FROM ${plan.table};
    DROP TABLE ${plan.table};
    ALTER TABLE ${plan.table}_rebuilt RENAME TO ${plan.table};
  `);
  for (const index of plan.indexes) {
    conn.exec(index);
  }
}

export const migration: Migration = {
  version: 3,
  name: "drop_legacy_constraints",
  description: "Drop foreign keys and timestamp triggers left by older databases; normalize timestamps to ISO-8601",

  up(conn) {
    // triggers go first, or the timestamp rewrite below would fire them
    for (const trigger of LEGACY_TRIGGERS) {
      conn.exec(`DROP TRIGGER IF EXISTS ${trigger}`);
    }

    for (const plan of REBUILDS) {
      if (hasForeignKeys(conn, plan.table)) {
        rebuildWithoutForeignKeys(conn, plan);
      }
    }

    for (const table of TIMESTAMPED_TABLES) {
      conn.exec(`
        UPDATE ${table}
        SET created_at = strftime('%Y-%m-%dT%H:%M:%fZ', created_at)
        WHERE created_at NOT LIKE '%T%';
        UPDATE ${table}
        SET updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', updated_at)
        WHERE updated_at NOT LIKE '%T%';
      `);
    }
  },

  // Nothing to restore: the dropped constraints never applied to this schema.
  down: () => undefined,
};
