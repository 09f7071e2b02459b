/**
 * Shared types for pokemon-meetup
 */

import type { PokemonType } from "../core/game/pokemon-types.js";

export type { PokemonType } from "../core/game/pokemon-types.js";

// =============================================================================
// Pokémon Records
// =============================================================================

/** Data source tag written on records built from the remote provider */
export const DEFAULT_DATA_SOURCE = "pogoapi.net";

/** Form label used when a species has several upstream variants */
export const DEFAULT_FORM = "Normal";

/**
 * Resolved species data for one Pokémon
 */
export interface PokemonRecord {
  /** Source-assigned Pokédex number; join key across all record families */
  id: number;
  name: string;
  types: PokemonType[];
  baseAttack: number;
  baseDefense: number;
  baseStamina: number;
  /** CP with perfect IVs at the reference levels */
  cpLevel20: number;
  cpLevel25: number;
  cpLevel30: number;
  cpLevel40: number;
  maxCp: number;
  /** Buddy walking distance in km */
  buddyDistance: number | null;
  candyToEvolve: number | null;
  shinyAvailable: boolean;
  released: boolean;
  rarity: string | null;
  form: string;
  /** Stardust per catch, entered by hand for stardust bonus events */
  baseStardust: number | null;
  dataSource: string;
  /** ISO timestamps; null until the record has been stored */
  createdAt: string | null;
  updatedAt: string | null;
}

export interface EvolutionRequirement {
  targetId: number;
  targetName: string;
  candyRequired: number;
  itemRequired: string | null;
  lureRequired: string | null;
  noCandyCostIfTraded: boolean;
  /** Display ordering hint; higher first */
  priority: number | null;
  onlyEvolvesInDaytime: boolean;
  onlyEvolvesInNighttime: boolean;
  mustBeBuddyToEvolve: boolean;
  buddyDistanceRequired: number | null;
  genderRequired: string | null;
}

export interface EvolutionRecord {
  pokemonId: number;
  pokemonName: string;
  form: string | null;
  evolutions: EvolutionRequirement[];
}

export interface MegaEvolutionRecord {
  pokemonId: number;
  pokemonName: string;
  form: string;
  megaName: string;
  firstTimeMegaEnergyRequired: number;
  megaEnergyRequired: number;
  baseAttack: number;
  baseDefense: number;
  baseStamina: number;
  types: PokemonType[];
  cpMultiplierOverride: number | null;
}

// =============================================================================
// Cache & Service Views
// =============================================================================

export interface CacheStats {
  totalCount: number;
  /** Most recent update timestamp, null for an empty store */
  lastUpdateTimestamp: string | null;
  storageSizeBytes: number;
  storageLocation: string;
}

/** Partial update accepted by the store */
export interface PokemonFieldUpdate {
  shinyAvailable?: boolean;
  baseStardust?: number;
}

/**
 * Where a record returned by the service came from
 *
 * - `cache`: served from the local store
 * - `provider`: freshly fetched and written through
 * - `cache-fallback`: the provider failed, the stored copy was returned
 * - `not-found`: neither source has the Pokémon
 */
export type RecordOrigin = "cache" | "provider" | "cache-fallback" | "not-found";

export interface ResolvedPokemon {
  record: PokemonRecord | null;
  origin: RecordOrigin;
}

export interface FullProfile {
  record: PokemonRecord | null;
  evolutions: EvolutionRecord | null;
  megaForms: MegaEvolutionRecord[];
  hasMegaInLine: boolean;
}

export type NameSearchSource = "cache" | "provider" | "both";
