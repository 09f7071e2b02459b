/**
 * Migration 001: Initial Schema
 *
 * Base species table plus the evolution and mega-form tables keyed by the
 * owning Pokémon id. Statements use IF NOT EXISTS so databases created
 * before version tracking existed are adopted; 003 strips what they
 * declared beyond this schema.
 *
 * @module
 */

import type { Migration } from "../migration-runner.js";

export const migration: Migration = {
  version: 1,
  name: "initial_schema",
  description: "Create pokemon_data, pokemon_evolutions and mega_evolutions with their indexes",

  up(conn) {
    conn.exec(`
      CREATE TABLE IF NOT EXISTS pokemon_data (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        types_json TEXT NOT NULL,
        base_attack INTEGER NOT NULL,
        base_defense INTEGER NOT NULL,
        base_stamina INTEGER NOT NULL,
        cp_level_20 INTEGER NOT NULL,
        cp_level_25 INTEGER NOT NULL,
        cp_level_30 INTEGER NOT NULL,
        cp_level_40 INTEGER NOT NULL,
        max_cp INTEGER NOT NULL,
        buddy_distance INTEGER,
        candy_to_evolve INTEGER,
        is_shiny_available INTEGER NOT NULL,
        is_released INTEGER NOT NULL,
        rarity TEXT,
        form TEXT NOT NULL DEFAULT 'Normal',
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        data_source TEXT NOT NULL DEFAULT 'pogoapi.net'
      );

      CREATE TABLE IF NOT EXISTS pokemon_evolutions (
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
      );

      CREATE TABLE IF NOT EXISTS mega_evolutions (
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
      );

      CREATE INDEX IF NOT EXISTS idx_pokemon_name ON pokemon_data (name);
      CREATE INDEX IF NOT EXISTS idx_pokemon_updated_at ON pokemon_data (updated_at);
      CREATE INDEX IF NOT EXISTS idx_evolution_from ON pokemon_evolutions (from_pokemon_id);
      CREATE INDEX IF NOT EXISTS idx_evolution_to ON pokemon_evolutions (to_pokemon_id);
      CREATE INDEX IF NOT EXISTS idx_mega_pokemon ON mega_evolutions (pokemon_id);
    `);
  },

  down(conn) {
    conn.exec(`
      DROP TABLE IF EXISTS mega_evolutions;
      DROP TABLE IF EXISTS pokemon_evolutions;
      DROP TABLE IF EXISTS pokemon_data;
    `);
  },
};
