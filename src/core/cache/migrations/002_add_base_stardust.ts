/**
 * Migration 002: Base Stardust
 *
 * Adds the hand-entered stardust-per-catch column used by stardust
 * bonus events. Skipped when an adopted database already has it.
 *
 * @module
 */

import type { Connection } from "../database.js";
import type { Migration } from "../migration-runner.js";

function hasColumn(conn: Connection, table: string, column: string): boolean {
  return conn
    .prepare<[string], { name: string }>("SELECT name FROM pragma_table_info(?)")
    .all(table)
    .some((c) => c.name === column);
}

export const migration: Migration = {
  version: 2,
  name: "add_base_stardust",
  description: "Add nullable base_stardust to pokemon_data",

  up(conn) {
    if (!hasColumn(conn, "pokemon_data", "base_stardust")) {
      conn.exec("ALTER TABLE pokemon_data ADD COLUMN base_stardust INTEGER");
    }
  },

  down(conn) {
    if (hasColumn(conn, "pokemon_data", "base_stardust")) {
      conn.exec("ALTER TABLE pokemon_data DROP COLUMN base_stardust");
    }
  },
};
