/**
 * Core module - Cache, provider, service and templates shared by the CLI
 */

// Re-export error classes
export * from "./errors.js";

// CP calculator
export * from "./cp/calculator.js";

// Game data
export {
  POKEMON_TYPES,
  formatTypeInfo,
  getTypeEmoji,
  getTypeSpanishName,
  isPokemonType,
  parsePokemonTypes,
} from "./game/pokemon-types.js";
export * from "./game/weather.js";

// Local cache
export type { IPokemonCache } from "./cache/interfaces/IPokemonCache.js";
export { SqlitePokemonCache, openPokemonCache, type PokemonCacheConfig } from "./cache/impl/SqlitePokemonCache.js";

// Remote provider
export {
  ProviderSession,
  withProviderSession,
  type IStatsProvider,
  type StatsProviderFactory,
} from "./provider/interfaces/IStatsProvider.js";
export * from "./provider/impl/PoGoApiProvider.js";

// Service
export * from "./service/pokemon-service.js";

// Templates
export * from "./templates/template-manager.js";
export * from "./templates/formatters.js";
export * from "./templates/spotlight-bonuses.js";

// Re-export types
export * from "../types/index.js";
