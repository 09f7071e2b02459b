import { describe, it, expect } from "vitest";
import {
  formatCp,
  formatEvolutionInfo,
  formatMegaDetails,
  formatMultipleShinyText,
  formatPokemonId,
  formatShinyText,
  formatSpanishList,
  formatSpotlightMegaInfo,
  formatStardustDetails,
  padPokemonId,
} from "../formatters.js";
import { makeEvolutions, makeMega, makeRequirement } from "../../../__tests__/fixtures.js";

describe("number formatting", () => {
  it("groups CP digits in thousands", () => {
    expect(formatCp(999)).toBe("999");
    expect(formatCp(3657)).toBe("3,657");
    expect(formatCp(1234567)).toBe("1,234,567");
  });

  it("pads ids to three digits", () => {
    expect(padPokemonId(25)).toBe("025");
    expect(padPokemonId(1010)).toBe("1010");
    expect(formatPokemonId(6)).toBe("#006");
  });
});

describe("formatSpanishList", () => {
  it("joins with commas and a final y", () => {
    expect(formatSpanishList([])).toBe("");
    expect(formatSpanishList(["Articuno"])).toBe("Articuno");
    expect(formatSpanishList(["Articuno", "Zapdos"])).toBe("Articuno y Zapdos");
    expect(formatSpanishList(["Articuno", "Zapdos", "Moltres"])).toBe("Articuno, Zapdos y Moltres");
  });
});

describe("shiny text", () => {
  it("differs per event kind when available", () => {
    expect(formatShinyText(true, "max_battle")).toBe("La forma shiny estará potenciada (alrededor de 1/20). ✨");
    expect(formatShinyText(true, "legendary")).toBe("La forma shiny estará disponible (alrededor de 1/20). ✨");
  });

  it("is the same for every kind when unavailable", () => {
    expect(formatShinyText(false, "dynamax")).toBe("La forma shiny no estará disponible. 🚫✨");
    expect(formatShinyText(false, "spotlight")).toBe("La forma shiny no estará disponible. 🚫✨");
  });

  it("summarises several legendaries", () => {
    expect(formatMultipleShinyText(["Zapdos"], [])).toBe("La forma shiny estará disponible (alrededor de 1/20). ✨");
    expect(formatMultipleShinyText(["Zapdos", "Moltres"], [])).toBe(
      "La forma shiny estará disponible para todos (alrededor de 1/20). ✨"
    );
    expect(formatMultipleShinyText([], ["Zapdos", "Moltres"])).toBe(
      "La forma shiny no estará disponible para ninguno. 🚫✨"
    );
    expect(formatMultipleShinyText(["Articuno", "Zapdos"], ["Moltres"])).toBe(
      "La forma shiny estará disponible para Articuno y Zapdos (alrededor de 1/20), pero no para Moltres. ✨"
    );
  });
});

describe("formatStardustDetails", () => {
  it("doubles the base amount and applies the star piece on top", () => {
    expect(formatStardustDetails(100)).toBe("Polvos estelares: cada captura otorgará 200, 300 con estrella. ⭐️");
    expect(formatStardustDetails(125)).toBe("Polvos estelares: cada captura otorgará 250, 375 con estrella. ⭐️");
  });
});

describe("formatEvolutionInfo", () => {
  it("reports a species that does not evolve", () => {
    expect(formatEvolutionInfo(null, [], false)).toBe("No evoluciona");
  });

  it("describes a single evolution with candy and item", () => {
    const evolutions = makeEvolutions(61, "Poliwhirl", [
      makeRequirement({ targetId: 186, targetName: "Politoed", candyRequired: 100, itemRequired: "King's Rock" }),
    ]);
    expect(formatEvolutionInfo(evolutions, [], false)).toBe("🔄 Evoluciona a Politoed (100 caramelos) + King's Rock");
  });

  it("lists several targets and omits a zero candy cost", () => {
    const evolutions = makeEvolutions(133, "Eevee", [
      makeRequirement({ targetId: 134, targetName: "Vaporeon", candyRequired: 25 }),
      makeRequirement({ targetId: 700, targetName: "Sylveon", candyRequired: 0 }),
    ]);
    expect(formatEvolutionInfo(evolutions, [], false)).toBe("🔄 Puede evolucionar a: Vaporeon (25 caramelos), Sylveon");
  });

  it("puts own mega forms first", () => {
    const megas = [makeMega(), makeMega({ form: "Y", megaName: "Mega Charizard Y" })];
    expect(formatEvolutionInfo(null, megas, true)).toBe(
      "🌟 Puede megaevolucionar a: Mega Charizard X, Mega Charizard Y"
    );
    expect(formatEvolutionInfo(null, [makeMega()], true)).toBe("🌟 Puede megaevolucionar a Mega Charizard X");
  });

  it("mentions megas further down the line", () => {
    const evolutions = makeEvolutions(5, "Charmeleon", [
      makeRequirement({ targetId: 6, targetName: "Charizard", candyRequired: 100 }),
    ]);
    expect(formatEvolutionInfo(evolutions, [], true)).toBe(
      "🔄 Evoluciona a Charizard (100 caramelos) | ⭐ Su línea evolutiva incluye megaevoluciones"
    );
  });
});

describe("formatMegaDetails", () => {
  it("reports no mega evolution", () => {
    expect(formatMegaDetails([])).toBe("No tiene megaevolución disponible");
  });

  it("describes each form with Spanish type names", () => {
    const megas = [makeMega(), makeMega({ form: "Y", megaName: "Mega Charizard Y", types: ["fire", "flying"] })];
    expect(formatMegaDetails(megas)).toBe(
      "Mega Charizard X: Fuego / Dragón (ATK 273, DEF 213, STA 186) - Energía: 200 primera vez, 40 después | " +
        "Mega Charizard Y: Fuego / Volador (ATK 273, DEF 213, STA 186) - Energía: 200 primera vez, 40 después"
    );
  });
});

describe("formatSpotlightMegaInfo", () => {
  const toCharizard = makeEvolutions(5, "Charmeleon", [makeRequirement({ targetId: 6, targetName: "Charizard" })]);

  it("names the featured Pokémon when it has mega forms", () => {
    expect(formatSpotlightMegaInfo("Charizard", null, [makeMega()], true)).toBe(
      "❖ Charizard tiene mega-evolución disponible. 💎\n"
    );
  });

  it("names the first evolution target when only the line has mega forms", () => {
    expect(formatSpotlightMegaInfo("Charmeleon", toCharizard, [], true)).toBe(
      "❖ Charizard tiene mega-evolución disponible. 💎\n"
    );
  });

  it("is empty otherwise", () => {
    expect(formatSpotlightMegaInfo("Charmeleon", toCharizard, [], false)).toBe("");
    expect(formatSpotlightMegaInfo("Pikachu", null, [], true)).toBe("");
  });
});
