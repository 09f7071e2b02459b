/**
 * SqlitePokemonCache Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { openPokemonCache, type SqlitePokemonCache } from "../impl/SqlitePokemonCache.js";
import { IN_MEMORY_PATH } from "../database.js";
import {
  makeEvolutions,
  makeMega,
  makePokemon,
  makeRequirement,
  steppingClock,
} from "../../../__tests__/fixtures.js";

describe("SqlitePokemonCache", () => {
  let cache: SqlitePokemonCache;

  beforeEach(() => {
    cache = openPokemonCache({ dbPath: IN_MEMORY_PATH, clock: steppingClock() });
  });

  afterEach(() => {
    cache.close();
  });

  describe("species", () => {
    it("round-trips a record by id and by name", () => {
      const record = makePokemon({ id: 1, name: "Bulbasaur", types: ["grass", "poison"] });
      cache.upsertPokemon(record);

      const byId = cache.getById(1);
      const byName = cache.getByName("bulbasaur");

      expect(byId).not.toBeNull();
      expect({ ...byId, createdAt: null, updatedAt: null }).toEqual(record);
      expect(byName).toEqual(byId);
    });

    it("resolves names case-insensitively to the same id", () => {
      cache.upsertPokemon(makePokemon());

      expect(cache.getByName("pikachu")?.id).toBe(25);
      expect(cache.getByName("PIKACHU")?.id).toBe(25);
      expect(cache.getByName("PiKaChu")?.id).toBe(25);
      expect(cache.getByName("Raichu")).toBeNull();
    });

    it("folds non-ASCII letters when matching names", () => {
      cache.upsertPokemon(makePokemon({ id: 669, name: "Flabébé", types: ["fairy"] }));

      expect(cache.getByName("FLABÉBÉ")?.id).toBe(669);
      expect(cache.searchByNamePrefix("BÉBÉ").map((r) => r.name)).toEqual(["Flabébé"]);
    });

    it("keeps the creation timestamp and advances the update timestamp on replace", () => {
      const first = cache.upsertPokemon(makePokemon({ cpLevel40: 938 }));
      const second = cache.upsertPokemon(makePokemon({ cpLevel40: 999, shinyAvailable: false }));

      expect(first.createdAt).toBe("2025-06-01T10:00:00.000Z");
      expect(first.updatedAt).toBe("2025-06-01T10:00:00.000Z");
      expect(second.createdAt).toBe("2025-06-01T10:00:00.000Z");
      expect(second.updatedAt).toBe("2025-06-01T10:01:00.000Z");

      const stored = cache.getById(25);
      expect(stored?.cpLevel40).toBe(999);
      expect(stored?.shinyAvailable).toBe(false);
      expect(stored?.createdAt).toBe("2025-06-01T10:00:00.000Z");
      expect(stored?.updatedAt).toBe("2025-06-01T10:01:00.000Z");
    });

    it("reports existence", () => {
      cache.upsertPokemon(makePokemon());
      expect(cache.exists(25)).toBe(true);
      expect(cache.exists(26)).toBe(false);
    });

    it("searches by substring ordered by name and capped at the limit", () => {
      cache.upsertPokemon(makePokemon({ id: 26, name: "Raichu" }));
      cache.upsertPokemon(makePokemon({ id: 25, name: "Pikachu" }));
      cache.upsertPokemon(makePokemon({ id: 172, name: "Pichu" }));

      expect(cache.searchByNamePrefix("chu").map((r) => r.name)).toEqual(["Pichu", "Pikachu", "Raichu"]);
      expect(cache.searchByNamePrefix("chu", 2).map((r) => r.name)).toEqual(["Pichu", "Pikachu"]);
      expect(cache.searchByNamePrefix("ICHU").map((r) => r.name)).toEqual(["Pichu", "Raichu"]);
    });

    it("matches wildcard characters literally", () => {
      cache.upsertPokemon(makePokemon());
      expect(cache.searchByNamePrefix("%")).toEqual([]);
      expect(cache.searchByNamePrefix("_ikachu")).toEqual([]);
    });

    it("lists records ordered by id", () => {
      cache.upsertPokemon(makePokemon({ id: 26, name: "Raichu" }));
      cache.upsertPokemon(makePokemon({ id: 25, name: "Pikachu" }));

      expect(cache.listAll().map((r) => r.id)).toEqual([25, 26]);
      expect(cache.listAll(1).map((r) => r.id)).toEqual([25]);
    });
  });

  describe("updateFields", () => {
    it("returns false for an unknown id", () => {
      expect(cache.updateFields(999, { shinyAvailable: true })).toBe(false);
    });

    it("returns false when no field is supplied", () => {
      cache.upsertPokemon(makePokemon());
      expect(cache.updateFields(25, {})).toBe(false);
      expect(cache.getById(25)?.updatedAt).toBe("2025-06-01T10:00:00.000Z");
    });

    it("updates only the supplied fields and bumps the update timestamp", () => {
      cache.upsertPokemon(makePokemon({ shinyAvailable: true }));

      expect(cache.updateFields(25, { baseStardust: 500 })).toBe(true);
      let stored = cache.getById(25);
      expect(stored?.baseStardust).toBe(500);
      expect(stored?.shinyAvailable).toBe(true);
      expect(stored?.updatedAt).toBe("2025-06-01T10:01:00.000Z");

      expect(cache.updateFields(25, { shinyAvailable: false })).toBe(true);
      stored = cache.getById(25);
      expect(stored?.shinyAvailable).toBe(false);
      expect(stored?.baseStardust).toBe(500);
      expect(stored?.createdAt).toBe("2025-06-01T10:00:00.000Z");
      expect(stored?.updatedAt).toBe("2025-06-01T10:02:00.000Z");
    });
  });

  describe("evolutions", () => {
    beforeEach(() => {
      cache.upsertPokemon(makePokemon({ id: 133, name: "Eevee" }));
    });

    it("replaces the stored requirements instead of merging", () => {
      cache.upsertEvolutions(
        makeEvolutions(133, "Eevee", [
          makeRequirement({ targetId: 134, targetName: "Vaporeon", candyRequired: 25 }),
          makeRequirement({ targetId: 135, targetName: "Jolteon", candyRequired: 25 }),
        ])
      );
      cache.upsertEvolutions(
        makeEvolutions(133, "Eevee", [makeRequirement({ targetId: 136, targetName: "Flareon", candyRequired: 25 })])
      );

      const stored = cache.getEvolutions(133);
      expect(stored?.evolutions).toHaveLength(1);
      expect(stored?.evolutions[0]?.targetName).toBe("Flareon");
    });

    it("orders by priority descending with missing priority last, then by name", () => {
      cache.upsertEvolutions(
        makeEvolutions(133, "Eevee", [
          makeRequirement({ targetId: 134, targetName: "Vaporeon", priority: null }),
          makeRequirement({ targetId: 135, targetName: "Jolteon", priority: 1 }),
          makeRequirement({ targetId: 136, targetName: "Flareon", priority: 1 }),
          makeRequirement({ targetId: 197, targetName: "Umbreon", priority: 2, onlyEvolvesInNighttime: true }),
        ])
      );

      const stored = cache.getEvolutions(133);
      expect(stored?.evolutions.map((e) => e.targetName)).toEqual(["Umbreon", "Flareon", "Jolteon", "Vaporeon"]);
      expect(stored?.evolutions[0]?.onlyEvolvesInNighttime).toBe(true);
      expect(stored?.pokemonName).toBe("Eevee");
    });

    it("round-trips every requirement field", () => {
      const requirement = makeRequirement({
        targetId: 196,
        targetName: "Espeon",
        candyRequired: 25,
        itemRequired: "Sun Stone",
        lureRequired: "Magnetic Lure",
        noCandyCostIfTraded: true,
        priority: 3,
        onlyEvolvesInDaytime: true,
        mustBeBuddyToEvolve: true,
        buddyDistanceRequired: 10,
        genderRequired: "FEMALE",
      });
      cache.upsertEvolutions(makeEvolutions(133, "Eevee", [requirement]));

      expect(cache.getEvolutions(133)).toEqual(makeEvolutions(133, "Eevee", [requirement]));
    });

    it("clears the requirements when given an empty list", () => {
      cache.upsertEvolutions(makeEvolutions(133, "Eevee", [makeRequirement({ targetId: 134, targetName: "Vaporeon" })]));
      cache.upsertEvolutions(makeEvolutions(133, "Eevee", []));

      expect(cache.getEvolutions(133)).toBeNull();
    });

    it("returns null when the owning Pokémon is not stored", () => {
      cache.upsertEvolutions(makeEvolutions(999, "Missing", [makeRequirement()]));
      expect(cache.getEvolutions(999)).toBeNull();
    });
  });

  describe("mega forms", () => {
    it("stores several forms ordered by form tag", () => {
      const y = makeMega({ form: "Y", megaName: "Mega Charizard Y", types: ["fire", "flying"] });
      const x = makeMega();
      cache.upsertMegaForms([y, x]);

      expect(cache.getMegaForms(6)).toEqual([x, y]);
    });

    it("keeps the stored forms when given an empty list", () => {
      cache.upsertMegaForms([makeMega()]);
      cache.upsertMegaForms([]);

      expect(cache.getMegaForms(6)).toHaveLength(1);
      expect(cache.getMegaForms(6)[0]?.megaName).toBe("Mega Charizard X");
    });

    it("replaces the stored forms of the same Pokémon", () => {
      cache.upsertMegaForms([makeMega(), makeMega({ form: "Y", megaName: "Mega Charizard Y" })]);
      cache.upsertMegaForms([makeMega({ form: "Y", megaName: "Mega Charizard Y" })]);

      expect(cache.getMegaForms(6).map((m) => m.form)).toEqual(["Y"]);
    });

    it("returns an empty list for a Pokémon without forms", () => {
      expect(cache.getMegaForms(25)).toEqual([]);
    });
  });

  describe("hasMegaInLine", () => {
    beforeEach(() => {
      cache.upsertEvolutions(makeEvolutions(4, "Charmander", [makeRequirement({ targetId: 5, targetName: "Charmeleon" })]));
      cache.upsertEvolutions(makeEvolutions(5, "Charmeleon", [makeRequirement({ targetId: 6, targetName: "Charizard" })]));
      cache.upsertMegaForms([makeMega()]);
      cache.upsertEvolutions(makeEvolutions(10, "Caterpie", [makeRequirement({ targetId: 11, targetName: "Metapod" })]));
    });

    it("is true for a Pokémon with its own mega forms", () => {
      expect(cache.hasMegaInLine(6)).toBe(true);
    });

    it("is true when a direct evolution target has mega forms", () => {
      expect(cache.hasMegaInLine(5)).toBe(true);
    });

    it("is false when no direct target has mega forms", () => {
      expect(cache.hasMegaInLine(10)).toBe(false);
    });

    it("follows a single evolution hop only", () => {
      expect(cache.hasMegaInLine(4)).toBe(false);
    });
  });

  describe("getStats", () => {
    it("reports an empty in-memory store", () => {
      expect(cache.getStats()).toEqual({
        totalCount: 0,
        lastUpdateTimestamp: null,
        storageSizeBytes: 0,
        storageLocation: ":memory:",
      });
    });

    it("counts records and reports the latest update", () => {
      cache.upsertPokemon(makePokemon({ id: 25 }));
      cache.upsertPokemon(makePokemon({ id: 26, name: "Raichu" }));

      const stats = cache.getStats();
      expect(stats.totalCount).toBe(2);
      expect(stats.lastUpdateTimestamp).toBe("2025-06-01T10:01:00.000Z");
    });
  });
});
