/**
 * Pokémon type display tests
 */

import { describe, it, expect } from "vitest";
import {
  POKEMON_TYPES,
  formatTypeInfo,
  getTypeEmoji,
  getTypeSpanishName,
  isPokemonType,
  parsePokemonTypes,
} from "../pokemon-types.js";

describe("pokemon types", () => {
  it("knows all eighteen types", () => {
    expect(POKEMON_TYPES).toHaveLength(18);
    expect(new Set(POKEMON_TYPES).size).toBe(18);
  });

  it("gives every type a Spanish name and an emoji", () => {
    for (const type of POKEMON_TYPES) {
      expect(getTypeSpanishName(type).length).toBeGreaterThan(0);
      expect(getTypeEmoji(type).length).toBeGreaterThan(0);
    }
    expect(getTypeSpanishName("fire")).toBe("Fuego");
    expect(getTypeSpanishName("dark")).toBe("Siniestro");
  });

  it("recognises lowercase tokens only", () => {
    expect(isPokemonType("water")).toBe(true);
    expect(isPokemonType("Water")).toBe(false);
    expect(isPokemonType("shadow")).toBe(false);
  });

  it("parses upstream tokens case-insensitively and drops unknown ones", () => {
    expect(parsePokemonTypes(["Fire", "Flying"])).toEqual(["fire", "flying"]);
    expect(parsePokemonTypes(["Water", "Cosmic"])).toEqual(["water"]);
    expect(parsePokemonTypes([])).toEqual([]);
  });

  it("formats single and dual types", () => {
    expect(formatTypeInfo(["electric"])).toBe("Eléctrico ⚡️");
    expect(formatTypeInfo(["fire", "flying"])).toBe("Fuego 🔥 / Volador 🪽");
  });

  it("reports an unknown type for an empty list", () => {
    expect(formatTypeInfo([])).toBe("Tipo desconocido");
  });
});
