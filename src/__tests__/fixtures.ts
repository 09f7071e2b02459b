/**
 * Shared record builders for tests
 */

import type {
  EvolutionRecord,
  EvolutionRequirement,
  MegaEvolutionRecord,
  PokemonRecord,
} from "../types/index.js";

export function makePokemon(overrides: Partial<PokemonRecord> = {}): PokemonRecord {
  return {
    id: 25,
    name: "Pikachu",
    types: ["electric"],
    baseAttack: 112,
    baseDefense: 96,
    baseStamina: 111,
    cpLevel20: 536,
    cpLevel25: 670,
    cpLevel30: 804,
    cpLevel40: 938,
    maxCp: 938,
    buddyDistance: 1,
    candyToEvolve: 50,
    shinyAvailable: true,
    released: true,
    rarity: "Standard",
    form: "Normal",
    baseStardust: null,
    dataSource: "pogoapi.net",
    createdAt: null,
    updatedAt: null,
    ...overrides,
  };
}

export function makeRequirement(overrides: Partial<EvolutionRequirement> = {}): EvolutionRequirement {
  return {
    targetId: 26,
    targetName: "Raichu",
    candyRequired: 50,
    itemRequired: null,
    lureRequired: null,
    noCandyCostIfTraded: false,
    priority: null,
    onlyEvolvesInDaytime: false,
    onlyEvolvesInNighttime: false,
    mustBeBuddyToEvolve: false,
    buddyDistanceRequired: null,
    genderRequired: null,
    ...overrides,
  };
}

export function makeEvolutions(
  pokemonId: number,
  pokemonName: string,
  evolutions: EvolutionRequirement[]
): EvolutionRecord {
  return { pokemonId, pokemonName, form: null, evolutions };
}

export function makeMega(overrides: Partial<MegaEvolutionRecord> = {}): MegaEvolutionRecord {
  return {
    pokemonId: 6,
    pokemonName: "Charizard",
    form: "X",
    megaName: "Mega Charizard X",
    firstTimeMegaEnergyRequired: 200,
    megaEnergyRequired: 40,
    baseAttack: 273,
    baseDefense: 213,
    baseStamina: 186,
    types: ["fire", "dragon"],
    cpMultiplierOverride: null,
    ...overrides,
  };
}

/**
 * Clock that advances one minute on every call, starting at `start`
 */
export function steppingClock(start = "2025-06-01T10:00:00.000Z"): () => Date {
  let next = new Date(start).getTime();
  return () => {
    const now = new Date(next);
    next += 60000;
    return now;
  };
}
