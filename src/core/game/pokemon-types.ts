/**
 * Pokémon elemental types with their Spanish display names and emoji.
 *
 * @module
 */

export const POKEMON_TYPES = [
  "normal",
  "fire",
  "water",
  "electric",
  "grass",
  "ice",
  "fighting",
  "poison",
  "ground",
  "flying",
  "psychic",
  "bug",
  "rock",
  "ghost",
  "dragon",
  "dark",
  "steel",
  "fairy",
] as const;

export type PokemonType = (typeof POKEMON_TYPES)[number];

interface TypeDisplay {
  spanishName: string;
  emoji: string;
}

const TYPE_DISPLAY: Record<PokemonType, TypeDisplay> = {
  normal: { spanishName: "Normal", emoji: "⚪" },
  fire: { spanishName: "Fuego", emoji: "🔥" },
  water: { spanishName: "Agua", emoji: "💧" },
  electric: { spanishName: "Eléctrico", emoji: "⚡️" },
  grass: { spanishName: "Planta", emoji: "🌿" },
  ice: { spanishName: "Hielo", emoji: "❄️" },
  fighting: { spanishName: "Lucha", emoji: "🥊" },
  poison: { spanishName: "Veneno", emoji: "☠️" },
  ground: { spanishName: "Tierra", emoji: "🌋" },
  flying: { spanishName: "Volador", emoji: "🪽" },
  psychic: { spanishName: "Psíquico", emoji: "🔮" },
  bug: { spanishName: "Bicho", emoji: "🐛" },
  rock: { spanishName: "Roca", emoji: "🪨" },
  ghost: { spanishName: "Fantasma", emoji: "👻" },
  dragon: { spanishName: "Dragón", emoji: "🐉" },
  dark: { spanishName: "Siniestro", emoji: "🌑" },
  steel: { spanishName: "Acero", emoji: "⚙️" },
  fairy: { spanishName: "Hada", emoji: "🧚" },
};

export function isPokemonType(value: string): value is PokemonType {
  return POKEMON_TYPES.some((type) => type === value);
}

/**
 * Converts upstream type tokens ("Fire", "water") to known types.
 * Unrecognized tokens are dropped.
 */
export function parsePokemonTypes(tokens: readonly string[]): PokemonType[] {
  const types: PokemonType[] = [];
  for (const token of tokens) {
    const normalized = token.toLowerCase();
    if (isPokemonType(normalized)) {
      types.push(normalized);
    }
  }
  return types;
}

export function getTypeSpanishName(type: PokemonType): string {
  return TYPE_DISPLAY[type].spanishName;
}

export function getTypeEmoji(type: PokemonType): string {
  return TYPE_DISPLAY[type].emoji;
}

/**
 * "Fuego 🔥 / Volador 🪽", or "Tipo desconocido" for an empty list.
 */
export function formatTypeInfo(types: readonly PokemonType[]): string {
  if (types.length === 0) {
    return "Tipo desconocido";
  }
  return types.map((type) => `${getTypeSpanishName(type)} ${getTypeEmoji(type)}`).join(" / ");
}
