/**
 * Pokémon Cache Interface
 *
 * Durable local copy of the three record families (species, evolutions,
 * mega forms), shared by id. All operations are synchronous.
 */

import type {
  CacheStats,
  EvolutionRecord,
  MegaEvolutionRecord,
  PokemonFieldUpdate,
  PokemonRecord,
} from "../../../types/index.js";

export interface IPokemonCache {
  /**
   * Open the store and bring its schema up to date
   */
  initialize(): void;

  /**
   * Release the underlying connection
   */
  close(): void;

  exists(id: number): boolean;

  getById(id: number): PokemonRecord | null;

  /**
   * Case-insensitive exact name match
   */
  getByName(name: string): PokemonRecord | null;

  /**
   * Substring match on name (not prefix-only), ordered by name
   */
  searchByNamePrefix(partial: string, limit?: number): PokemonRecord[];

  /**
   * All stored species ordered by id
   */
  listAll(limit?: number): PokemonRecord[];

  /**
   * Insert or replace by id. Keeps the original creation timestamp and
   * refreshes the update timestamp. Returns the stored copy.
   */
  upsertPokemon(record: PokemonRecord): PokemonRecord;

  /**
   * Partial update of shiny availability and/or base stardust.
   * False when the id is unknown or no field was supplied.
   */
  updateFields(id: number, fields: PokemonFieldUpdate): boolean;

  /**
   * Replace every stored requirement for the record's Pokémon. An empty
   * requirement list clears them.
   */
  upsertEvolutions(record: EvolutionRecord): void;

  /**
   * Replace every stored mega form for the Pokémon the list belongs to.
   * An empty list is a no-op and keeps what is stored: "nothing returned
   * this time" must not erase known mega data.
   */
  upsertMegaForms(forms: MegaEvolutionRecord[]): void;

  /**
   * Null when the Pokémon is unknown or has no stored requirements.
   * Ordered by priority descending (missing last), then target name.
   */
  getEvolutions(id: number): EvolutionRecord | null;

  /**
   * Ordered by form tag
   */
  getMegaForms(id: number): MegaEvolutionRecord[];

  /**
   * True when the Pokémon or one of its direct evolution targets has
   * stored mega forms. Only one evolution hop is followed.
   */
  hasMegaInLine(id: number): boolean;

  getStats(): CacheStats;
}
