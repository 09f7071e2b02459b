/**
 * Record Resolver
 *
 * Joins the normalized lookup tables into the record shapes the cache and
 * service work with. No raw upstream payload leaves this module.
 *
 * @module
 */

import { computeReferenceCps, type CpMultiplierEntry } from "../cp/calculator.js";
import { parsePokemonTypes } from "../game/pokemon-types.js";
import {
  DEFAULT_DATA_SOURCE,
  DEFAULT_FORM,
  type EvolutionRecord,
  type EvolutionRequirement,
  type MegaEvolutionRecord,
  type PokemonRecord,
} from "../../types/index.js";
import type { EvolutionEntry, EvolutionTarget, MaxCpEntry, MegaEntry, StatsEntry, TypesEntry } from "./schemas.js";

/** Rarity reported when the species is in no rarity group */
export const DEFAULT_RARITY = "Standard";

export interface SpeciesTables {
  stats: Map<number, StatsEntry>;
  types: Map<number, TypesEntry>;
  maxCp: Map<number, MaxCpEntry>;
  shiny: Set<number>;
  released: Set<number>;
  buddyDistances: Map<number, number>;
  candyToEvolve: Map<number, number>;
  rarity: Map<number, string>;
  cpCurve: CpMultiplierEntry[];
}

/**
 * Builds the species record, or null when the stats table has no entry.
 * Max CP falls back to the computed level-40 CP.
 */
export function resolvePokemonRecord(id: number, name: string, tables: SpeciesTables): PokemonRecord | null {
  const stats = tables.stats.get(id);
  if (!stats) {
    return null;
  }

  const baseAttack = Math.trunc(stats.base_attack);
  const baseDefense = Math.trunc(stats.base_defense);
  const baseStamina = Math.trunc(stats.base_stamina);
  const cps = computeReferenceCps(baseAttack, baseDefense, baseStamina, tables.cpCurve);

  return {
    id,
    name,
    types: parsePokemonTypes(tables.types.get(id)?.type ?? []),
    baseAttack,
    baseDefense,
    baseStamina,
    ...cps,
    maxCp: tables.maxCp.get(id)?.max_cp ?? cps.cpLevel40,
    buddyDistance: tables.buddyDistances.get(id) ?? null,
    candyToEvolve: tables.candyToEvolve.get(id) ?? null,
    shinyAvailable: tables.shiny.has(id),
    released: tables.released.has(id),
    rarity: tables.rarity.get(id) ?? DEFAULT_RARITY,
    form: DEFAULT_FORM,
    baseStardust: null,
    dataSource: DEFAULT_DATA_SOURCE,
    createdAt: null,
    updatedAt: null,
  };
}

function resolveRequirement(target: EvolutionTarget): EvolutionRequirement {
  return {
    targetId: target.pokemon_id,
    targetName: target.pokemon_name,
    candyRequired: target.candy_required,
    itemRequired: target.item_required ?? null,
    lureRequired: target.lure_required ?? null,
    noCandyCostIfTraded: target.no_candy_cost_if_traded,
    priority: target.priority ?? null,
    onlyEvolvesInDaytime: target.only_evolves_in_daytime,
    onlyEvolvesInNighttime: target.only_evolves_in_nighttime,
    mustBeBuddyToEvolve: target.must_be_buddy_to_evolve,
    buddyDistanceRequired: target.buddy_distance_required ?? null,
    genderRequired: target.gender_required ?? null,
  };
}

/**
 * Requirements keep upstream order.
 */
export function resolveEvolutionRecord(entry: EvolutionEntry): EvolutionRecord {
  return {
    pokemonId: entry.pokemon_id,
    pokemonName: entry.pokemon_name,
    form: entry.form ?? null,
    evolutions: entry.evolutions.map(resolveRequirement),
  };
}

export function resolveMegaForm(entry: MegaEntry): MegaEvolutionRecord {
  return {
    pokemonId: entry.pokemon_id,
    pokemonName: entry.pokemon_name,
    form: entry.form,
    megaName: entry.mega_name,
    firstTimeMegaEnergyRequired: entry.first_time_mega_energy_required,
    megaEnergyRequired: entry.mega_energy_required,
    baseAttack: Math.trunc(entry.stats.base_attack),
    baseDefense: Math.trunc(entry.stats.base_defense),
    baseStamina: Math.trunc(entry.stats.base_stamina),
    types: parsePokemonTypes(entry.type),
    cpMultiplierOverride: entry.cp_multiplier_override ?? null,
  };
}
