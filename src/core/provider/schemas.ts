/**
 * Upstream Dataset Schemas
 *
 * Zod schemas for single entries of the remote stats datasets. Entries are
 * validated one at a time so one malformed row never sinks a whole table.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Dataset Names
// =============================================================================

export const DATASETS = {
  stats: "pokemon_stats.json",
  names: "pokemon_names.json",
  types: "pokemon_types.json",
  maxCp: "pokemon_max_cp.json",
  shiny: "shiny_pokemon.json",
  released: "released_pokemon.json",
  buddyDistances: "pokemon_buddy_distances.json",
  candyToEvolve: "pokemon_candy_to_evolve.json",
  rarity: "pokemon_rarity.json",
  cpMultiplier: "cp_multiplier.json",
  evolutions: "pokemon_evolutions.json",
  megas: "mega_pokemon.json",
} as const;

export type DatasetName = (typeof DATASETS)[keyof typeof DATASETS];

// =============================================================================
// Entry Schemas
// =============================================================================

const PokemonIdSchema = z.number().int().positive();

export const StatsEntrySchema = z.object({
  pokemon_id: PokemonIdSchema,
  form: z.string().optional(),
  base_attack: z.number(),
  base_defense: z.number(),
  base_stamina: z.number(),
});

export type StatsEntry = z.infer<typeof StatsEntrySchema>;

export const NameEntrySchema = z.object({
  name: z.string().min(1),
});

export const TypesEntrySchema = z.object({
  pokemon_id: PokemonIdSchema,
  form: z.string().optional(),
  type: z.array(z.string()),
});

export type TypesEntry = z.infer<typeof TypesEntrySchema>;

export const MaxCpEntrySchema = z.object({
  pokemon_id: PokemonIdSchema,
  form: z.string().optional(),
  max_cp: z.number().int(),
});

export type MaxCpEntry = z.infer<typeof MaxCpEntrySchema>;

/** Member of a grouped table (buddy distance, candy, rarity) */
export const GroupMemberSchema = z.object({
  pokemon_id: PokemonIdSchema,
});

export const CpMultiplierEntrySchema = z.object({
  level: z.number(),
  multiplier: z.number().positive(),
});

export const EvolutionTargetSchema = z.object({
  pokemon_id: PokemonIdSchema,
  pokemon_name: z.string(),
  candy_required: z.number().int().default(0),
  item_required: z.string().nullish(),
  lure_required: z.string().nullish(),
  no_candy_cost_if_traded: z.boolean().default(false),
  priority: z.number().int().nullish(),
  only_evolves_in_daytime: z.boolean().default(false),
  only_evolves_in_nighttime: z.boolean().default(false),
  must_be_buddy_to_evolve: z.boolean().default(false),
  buddy_distance_required: z.number().nullish(),
  gender_required: z.string().nullish(),
});

export type EvolutionTarget = z.infer<typeof EvolutionTargetSchema>;

export const EvolutionEntrySchema = z.object({
  pokemon_id: PokemonIdSchema,
  pokemon_name: z.string(),
  form: z.string().optional(),
  evolutions: z.array(EvolutionTargetSchema).default([]),
});

export type EvolutionEntry = z.infer<typeof EvolutionEntrySchema>;

export const MegaEntrySchema = z.object({
  pokemon_id: PokemonIdSchema,
  pokemon_name: z.string(),
  form: z.string(),
  mega_name: z.string(),
  first_time_mega_energy_required: z.number().int(),
  mega_energy_required: z.number().int(),
  stats: z.object({
    base_attack: z.number(),
    base_defense: z.number(),
    base_stamina: z.number(),
  }),
  type: z.array(z.string()).default([]),
  cp_multiplier_override: z.number().nullish(),
});

export type MegaEntry = z.infer<typeof MegaEntrySchema>;

// =============================================================================
// Container Schemas
// =============================================================================

export const ListPayloadSchema = z.array(z.unknown());

export const DictPayloadSchema = z.record(z.unknown());
