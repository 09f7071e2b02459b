/**
 * SQLite Pokémon Cache
 *
 * better-sqlite3 implementation of IPokemonCache. Each upsert family runs
 * in a single transaction so readers never see a half-replaced set of
 * evolution or mega rows.
 *
 * @module
 */

import { z } from "zod";
import type { IPokemonCache } from "../interfaces/IPokemonCache.js";
import { createCacheDatabase, type CacheDatabase, type Connection } from "../database.js";
import { createMigrationRunner } from "../migration-runner.js";
import { migrations } from "../migrations/index.js";
import { ErrorCode, StorageError } from "../../errors.js";
import { parsePokemonTypes } from "../../game/pokemon-types.js";
import { createLogger } from "../../../utils/logger.js";
import type {
  CacheStats,
  EvolutionRecord,
  EvolutionRequirement,
  MegaEvolutionRecord,
  PokemonFieldUpdate,
  PokemonRecord,
  PokemonType,
} from "../../../types/index.js";

const logger = createLogger("pokemon-cache");

// =============================================================================
// Configuration
// =============================================================================

export interface PokemonCacheConfig {
  /** SQLite file path, or ":memory:" */
  dbPath: string;
  /** Source of "now" for created/updated timestamps */
  clock?: () => Date;
}

const DEFAULT_SEARCH_LIMIT = 10;

// =============================================================================
// Row Shapes
// =============================================================================

interface PokemonRow {
  id: number;
  name: string;
  types_json: string;
  base_attack: number;
  base_defense: number;
  base_stamina: number;
  cp_level_20: number;
  cp_level_25: number;
  cp_level_30: number;
  cp_level_40: number;
  max_cp: number;
  buddy_distance: number | null;
  candy_to_evolve: number | null;
  is_shiny_available: number;
  is_released: number;
  rarity: string | null;
  form: string;
  base_stardust: number | null;
  created_at: string;
  updated_at: string;
  data_source: string;
}

interface EvolutionRow {
  to_pokemon_id: number;
  to_pokemon_name: string;
  candy_required: number;
  item_required: string | null;
  lure_required: string | null;
  no_candy_cost_if_traded: number;
  priority: number | null;
  only_evolves_in_daytime: number;
  only_evolves_in_nighttime: number;
  must_be_buddy_to_evolve: number;
  buddy_distance_required: number | null;
  gender_required: string | null;
}

interface MegaRow {
  pokemon_id: number;
  pokemon_name: string;
  form: string;
  mega_name: string;
  first_time_mega_energy_required: number;
  mega_energy_required: number;
  base_attack: number;
  base_defense: number;
  base_stamina: number;
  types_json: string;
  cp_multiplier_override: number | null;
}

const TypeTokensSchema = z.array(z.string());

function decodeTypes(json: string): PokemonType[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    logger.warn({ json }, "Stored type list is not valid JSON, treating as empty");
    return [];
  }
  const parsed = TypeTokensSchema.safeParse(raw);
  return parsed.success ? parsePokemonTypes(parsed.data) : [];
}

function encodeTypes(types: readonly PokemonType[]): string {
  return JSON.stringify(types);
}

function flag(value: boolean): number {
  return value ? 1 : 0;
}

/**
 * Name comparisons go through this instead of COLLATE NOCASE or LIKE,
 * which only fold ASCII ("FLABÉBÉ" vs "Flabébé").
 */
const FOLD_CASE = "fold_case";

function foldCase(value: unknown): unknown {
  return typeof value === "string" ? value.toLowerCase() : value;
}

function rowToPokemon(row: PokemonRow): PokemonRecord {
  return {
    id: row.id,
    name: row.name,
    types: decodeTypes(row.types_json),
    baseAttack: row.base_attack,
    baseDefense: row.base_defense,
    baseStamina: row.base_stamina,
    cpLevel20: row.cp_level_20,
    cpLevel25: row.cp_level_25,
    cpLevel30: row.cp_level_30,
    cpLevel40: row.cp_level_40,
    maxCp: row.max_cp,
    buddyDistance: row.buddy_distance,
    candyToEvolve: row.candy_to_evolve,
    shinyAvailable: row.is_shiny_available !== 0,
    released: row.is_released !== 0,
    rarity: row.rarity,
    form: row.form,
    baseStardust: row.base_stardust,
    dataSource: row.data_source,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToRequirement(row: EvolutionRow): EvolutionRequirement {
  return {
    targetId: row.to_pokemon_id,
    targetName: row.to_pokemon_name,
    candyRequired: row.candy_required,
    itemRequired: row.item_required,
    lureRequired: row.lure_required,
    noCandyCostIfTraded: row.no_candy_cost_if_traded !== 0,
    priority: row.priority,
    onlyEvolvesInDaytime: row.only_evolves_in_daytime !== 0,
    onlyEvolvesInNighttime: row.only_evolves_in_nighttime !== 0,
    mustBeBuddyToEvolve: row.must_be_buddy_to_evolve !== 0,
    buddyDistanceRequired: row.buddy_distance_required,
    genderRequired: row.gender_required,
  };
}

function rowToMega(row: MegaRow): MegaEvolutionRecord {
  return {
    pokemonId: row.pokemon_id,
    pokemonName: row.pokemon_name,
    form: row.form,
    megaName: row.mega_name,
    firstTimeMegaEnergyRequired: row.first_time_mega_energy_required,
    megaEnergyRequired: row.mega_energy_required,
    baseAttack: row.base_attack,
    baseDefense: row.base_defense,
    baseStamina: row.base_stamina,
    types: decodeTypes(row.types_json),
    cpMultiplierOverride: row.cp_multiplier_override,
  };
}

// =============================================================================
// Implementation
// =============================================================================

export class SqlitePokemonCache implements IPokemonCache {
  private db: CacheDatabase;
  private clock: () => Date;

  constructor(config: PokemonCacheConfig) {
    this.db = createCacheDatabase({ dbPath: config.dbPath });
    this.clock = config.clock ?? (() => new Date());
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  initialize(): void {
    this.db.initialize();
    this.conn.function(FOLD_CASE, { deterministic: true }, foldCase);

    const runner = createMigrationRunner(this.db);
    runner.registerMigrations(migrations);
    const result = runner.migrate();
    if (!result.success) {
      throw new StorageError("Cache schema migration failed", ErrorCode.STORAGE_MIGRATION_FAILED, {
        fromVersion: result.fromVersion,
        toVersion: result.toVersion,
        cause: result.error?.message,
      });
    }
    if (result.appliedMigrations.length > 0) {
      logger.info({ applied: result.appliedMigrations, dbPath: this.db.dbPath }, "Cache schema updated");
    }
  }

  close(): void {
    this.db.close();
  }

  private get conn(): Connection {
    return this.db.connection;
  }

  private now(): string {
    return this.clock().toISOString();
  }

  // ===========================================================================
  // Species
  // ===========================================================================

  exists(id: number): boolean {
    const row = this.conn.prepare<[number], { id: number }>("SELECT id FROM pokemon_data WHERE id = ?").get(id);
    return row !== undefined;
  }

  getById(id: number): PokemonRecord | null {
    const row = this.conn.prepare<[number], PokemonRow>("SELECT * FROM pokemon_data WHERE id = ?").get(id);
    return row ? rowToPokemon(row) : null;
  }

  getByName(name: string): PokemonRecord | null {
    const row = this.conn
      .prepare<[string], PokemonRow>(`SELECT * FROM pokemon_data WHERE ${FOLD_CASE}(name) = ? ORDER BY id LIMIT 1`)
      .get(name.trim().toLowerCase());
    return row ? rowToPokemon(row) : null;
  }

  searchByNamePrefix(partial: string, limit: number = DEFAULT_SEARCH_LIMIT): PokemonRecord[] {
    const rows = this.conn
      .prepare<[string, number], PokemonRow>(
        `SELECT * FROM pokemon_data
         WHERE instr(${FOLD_CASE}(name), ?) > 0
         ORDER BY name
         LIMIT ?`
      )
      .all(partial.trim().toLowerCase(), limit);
    return rows.map(rowToPokemon);
  }

  listAll(limit?: number): PokemonRecord[] {
    const rows =
      limit === undefined
        ? this.conn.prepare<[], PokemonRow>("SELECT * FROM pokemon_data ORDER BY id").all()
        : this.conn.prepare<[number], PokemonRow>("SELECT * FROM pokemon_data ORDER BY id LIMIT ?").all(limit);
    return rows.map(rowToPokemon);
  }

  upsertPokemon(record: PokemonRecord): PokemonRecord {
    const stored = this.db.withTransaction((conn) => {
      const now = this.now();
      const existing = conn
        .prepare<[number], { created_at: string }>("SELECT created_at FROM pokemon_data WHERE id = ?")
        .get(record.id);
      const createdAt = existing?.created_at ?? now;

      conn
        .prepare(
          `INSERT INTO pokemon_data (
             id, name, types_json, base_attack, base_defense, base_stamina,
             cp_level_20, cp_level_25, cp_level_30, cp_level_40, max_cp,
             buddy_distance, candy_to_evolve, is_shiny_available, is_released,
             rarity, form, base_stardust, created_at, updated_at, data_source
           ) VALUES (
             @id, @name, @types_json, @base_attack, @base_defense, @base_stamina,
             @cp_level_20, @cp_level_25, @cp_level_30, @cp_level_40, @max_cp,
             @buddy_distance, @candy_to_evolve, @is_shiny_available, @is_released,
             @rarity, @form, @base_stardust, @created_at, @updated_at, @data_source
           )
           ON CONFLICT(id) DO UPDATE SET
             name = excluded.name,
             types_json = excluded.types_json,
             base_attack = excluded.base_attack,
             base_defense = excluded.base_defense,
             base_stamina = excluded.base_stamina,
             cp_level_20 = excluded.cp_level_20,
             cp_level_25 = excluded.cp_level_25,
             cp_level_30 = excluded.cp_level_30,
             cp_level_40 = excluded.cp_level_40,
             max_cp = excluded.max_cp,
             buddy_distance = excluded.buddy_distance,
             candy_to_evolve = excluded.candy_to_evolve,
             is_shiny_available = excluded.is_shiny_available,
             is_released = excluded.is_released,
             rarity = excluded.rarity,
             form = excluded.form,
             base_stardust = excluded.base_stardust,
             created_at = excluded.created_at,
             updated_at = excluded.updated_at,
             data_source = excluded.data_source`
        )
        .run({
          id: record.id,
          name: record.name,
          types_json: encodeTypes(record.types),
          base_attack: record.baseAttack,
          base_defense: record.baseDefense,
          base_stamina: record.baseStamina,
          cp_level_20: record.cpLevel20,
          cp_level_25: record.cpLevel25,
          cp_level_30: record.cpLevel30,
          cp_level_40: record.cpLevel40,
          max_cp: record.maxCp,
          buddy_distance: record.buddyDistance,
          candy_to_evolve: record.candyToEvolve,
          is_shiny_available: flag(record.shinyAvailable),
          is_released: flag(record.released),
          rarity: record.rarity,
          form: record.form,
          base_stardust: record.baseStardust,
          created_at: createdAt,
          updated_at: now,
          data_source: record.dataSource,
        });

      return { ...record, types: [...record.types], createdAt, updatedAt: now };
    });

    logger.debug({ pokemonId: record.id, name: record.name }, "Stored Pokémon");
    return stored;
  }

  updateFields(id: number, fields: PokemonFieldUpdate): boolean {
    const assignments: string[] = [];
    const values: Array<number | string> = [];

    if (fields.shinyAvailable !== undefined) {
      assignments.push("is_shiny_available = ?");
      values.push(flag(fields.shinyAvailable));
    }
    if (fields.baseStardust !== undefined) {
      assignments.push("base_stardust = ?");
      values.push(fields.baseStardust);
    }
    if (assignments.length === 0) {
      return false;
    }

    return this.db.withTransaction((conn) => {
      if (!this.exists(id)) {
        return false;
      }
      assignments.push("updated_at = ?");
      values.push(this.now(), id);
      conn.prepare(`UPDATE pokemon_data SET ${assignments.join(", ")} WHERE id = ?`).run(...values);
      logger.debug({ pokemonId: id, fields }, "Updated Pokémon fields");
      return true;
    });
  }

  // ===========================================================================
  // Evolutions
  // ===========================================================================

  upsertEvolutions(record: EvolutionRecord): void {
    this.db.withTransaction((conn) => {
      const now = this.now();
      conn.prepare<[number]>("DELETE FROM pokemon_evolutions WHERE from_pokemon_id = ?").run(record.pokemonId);

      const insert = conn.prepare(
        `INSERT INTO pokemon_evolutions (
           from_pokemon_id, to_pokemon_id, to_pokemon_name, candy_required,
           item_required, lure_required, no_candy_cost_if_traded, priority,
           only_evolves_in_daytime, only_evolves_in_nighttime,
           must_be_buddy_to_evolve, buddy_distance_required, gender_required,
           created_at, updated_at
         ) VALUES (
           @from_pokemon_id, @to_pokemon_id, @to_pokemon_name, @candy_required,
           @item_required, @lure_required, @no_candy_cost_if_traded, @priority,
           @only_evolves_in_daytime, @only_evolves_in_nighttime,
           @must_be_buddy_to_evolve, @buddy_distance_required, @gender_required,
           @created_at, @updated_at
         )`
      );

      for (const evolution of record.evolutions) {
        insert.run({
          from_pokemon_id: record.pokemonId,
          to_pokemon_id: evolution.targetId,
          to_pokemon_name: evolution.targetName,
          candy_required: evolution.candyRequired,
          item_required: evolution.itemRequired,
          lure_required: evolution.lureRequired,
          no_candy_cost_if_traded: flag(evolution.noCandyCostIfTraded),
          priority: evolution.priority,
          only_evolves_in_daytime: flag(evolution.onlyEvolvesInDaytime),
          only_evolves_in_nighttime: flag(evolution.onlyEvolvesInNighttime),
          must_be_buddy_to_evolve: flag(evolution.mustBeBuddyToEvolve),
          buddy_distance_required: evolution.buddyDistanceRequired,
          gender_required: evolution.genderRequired,
          created_at: now,
          updated_at: now,
        });
      }
    });

    logger.debug({ pokemonId: record.pokemonId, count: record.evolutions.length }, "Replaced evolutions");
  }

  getEvolutions(id: number): EvolutionRecord | null {
    const owner = this.conn.prepare<[number], { name: string }>("SELECT name FROM pokemon_data WHERE id = ?").get(id);
    if (!owner) {
      return null;
    }

    const rows = this.conn
      .prepare<[number], EvolutionRow>(
        `SELECT * FROM pokemon_evolutions
         WHERE from_pokemon_id = ?
         ORDER BY priority IS NULL, priority DESC, to_pokemon_name ASC`
      )
      .all(id);
    if (rows.length === 0) {
      return null;
    }

    return {
      pokemonId: id,
      pokemonName: owner.name,
      form: null,
      evolutions: rows.map(rowToRequirement),
    };
  }

  // ===========================================================================
  // Mega Forms
  // ===========================================================================

  upsertMegaForms(forms: MegaEvolutionRecord[]): void {
    if (forms.length === 0) {
      return;
    }

    const ownerIds = [...new Set(forms.map((form) => form.pokemonId))];

    this.db.withTransaction((conn) => {
      const now = this.now();
      const remove = conn.prepare<[number]>("DELETE FROM mega_evolutions WHERE pokemon_id = ?");
      for (const ownerId of ownerIds) {
        remove.run(ownerId);
      }

      const insert = conn.prepare(
        `INSERT INTO mega_evolutions (
           pokemon_id, pokemon_name, form, mega_name,
           first_time_mega_energy_required, mega_energy_required,
           base_attack, base_defense, base_stamina, types_json,
           cp_multiplier_override, created_at, updated_at
         ) VALUES (
           @pokemon_id, @pokemon_name, @form, @mega_name,
           @first_time_mega_energy_required, @mega_energy_required,
           @base_attack, @base_defense, @base_stamina, @types_json,
           @cp_multiplier_override, @created_at, @updated_at
         )`
      );

      for (const form of forms) {
        insert.run({
          pokemon_id: form.pokemonId,
          pokemon_name: form.pokemonName,
          form: form.form,
          mega_name: form.megaName,
          first_time_mega_energy_required: form.firstTimeMegaEnergyRequired,
          mega_energy_required: form.megaEnergyRequired,
          base_attack: form.baseAttack,
          base_defense: form.baseDefense,
          base_stamina: form.baseStamina,
          types_json: encodeTypes(form.types),
          cp_multiplier_override: form.cpMultiplierOverride,
          created_at: now,
          updated_at: now,
        });
      }
    });

    logger.debug({ pokemonIds: ownerIds, count: forms.length }, "Replaced mega forms");
  }

  getMegaForms(id: number): MegaEvolutionRecord[] {
    const rows = this.conn
      .prepare<[number], MegaRow>("SELECT * FROM mega_evolutions WHERE pokemon_id = ? ORDER BY form ASC, id ASC")
      .all(id);
    return rows.map(rowToMega);
  }

  hasMegaInLine(id: number): boolean {
    const row = this.conn
      .prepare<{ id: number }, { has_mega: number }>(
        `SELECT (
           EXISTS (SELECT 1 FROM mega_evolutions WHERE pokemon_id = @id)
           OR EXISTS (
             SELECT 1 FROM pokemon_evolutions e
             JOIN mega_evolutions m ON m.pokemon_id = e.to_pokemon_id
             WHERE e.from_pokemon_id = @id
           )
         ) AS has_mega`
      )
      .get({ id });
    return row !== undefined && row.has_mega !== 0;
  }

  // ===========================================================================
  // Statistics
  // ===========================================================================

  getStats(): CacheStats {
    const row = this.conn
      .prepare<[], { total: number; last_updated: string | null }>(
        "SELECT COUNT(*) AS total, MAX(updated_at) AS last_updated FROM pokemon_data"
      )
      .get();

    return {
      totalCount: row?.total ?? 0,
      lastUpdateTimestamp: row?.last_updated ?? null,
      storageSizeBytes: this.db.getFileSizeBytes(),
      storageLocation: this.db.dbPath,
    };
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Creates and initializes a cache, migrating its schema to the latest version.
 */
export function openPokemonCache(config: PokemonCacheConfig): SqlitePokemonCache {
  const cache = new SqlitePokemonCache(config);
  cache.initialize();
  return cache;
}
