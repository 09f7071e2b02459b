/**
 * Pokémon Service
 *
 * Read-through / write-through coordinator between the local cache and the
 * remote stats provider. It is the only layer that decides whether a stored
 * copy is acceptable or a fresh fetch is required.
 *
 * Every public operation runs inside one provider session; the session is
 * only opened when the cache cannot answer.
 *
 * @module
 */

import type { IPokemonCache } from "../cache/interfaces/IPokemonCache.js";
import {
  withProviderSession,
  type ProviderSession,
  type StatsProviderFactory,
} from "../provider/interfaces/IStatsProvider.js";
import type {
  CacheStats,
  EvolutionRecord,
  FullProfile,
  MegaEvolutionRecord,
  NameSearchSource,
  PokemonFieldUpdate,
  PokemonRecord,
  ResolvedPokemon,
} from "../../types/index.js";
import { InvalidInputError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("pokemon-service");

// =============================================================================
// Types
// =============================================================================

export type SourceChoice = "cached" | "fresh";

/**
 * Asked when a cached record exists and the caller runs interactively
 */
export interface SourcePrompt {
  chooseSource(record: PokemonRecord): Promise<SourceChoice>;
}

export interface GetPokemonOptions {
  /** Skip the cache and always ask the provider */
  forceRefresh?: boolean;
  /** Offer the cached-or-fresh choice through the SourcePrompt */
  interactive?: boolean;
}

export interface PokemonServiceConfig {
  cache: IPokemonCache;
  providerFactory: StatsProviderFactory;
  prompt?: SourcePrompt;
}

export const DEFAULT_SEARCH_LIMIT = 5;

// =============================================================================
// Service Implementation
// =============================================================================

export class PokemonService {
  private readonly cache: IPokemonCache;
  private readonly providerFactory: StatsProviderFactory;
  private readonly prompt: SourcePrompt | undefined;

  constructor(config: PokemonServiceConfig) {
    this.cache = config.cache;
    this.providerFactory = config.providerFactory;
    this.prompt = config.prompt;
  }

  // ===========================================================================
  // Species
  // ===========================================================================

  /**
   * Resolves a species by name and reports where the record came from.
   */
  async getPokemonWithOrigin(name: string, options: GetPokemonOptions = {}): Promise<ResolvedPokemon> {
    return withProviderSession(this.providerFactory, (session) => this.resolvePokemon(session, name, options));
  }

  async getPokemon(name: string, options: GetPokemonOptions = {}): Promise<PokemonRecord | null> {
    return (await this.getPokemonWithOrigin(name, options)).record;
  }

  /**
   * Cache matches first, then provider matches, de-duplicated by name and
   * capped at `limit`. The provider is only asked when the cache alone
   * does not fill the limit.
   */
  async searchNames(
    partial: string,
    limit: number = DEFAULT_SEARCH_LIMIT,
    source: NameSearchSource = "both"
  ): Promise<string[]> {
    const results: string[] = [];
    if (limit <= 0) {
      return results;
    }

    if (source !== "provider") {
      for (const record of this.cache.searchByNamePrefix(partial, limit)) {
        if (!results.includes(record.name)) results.push(record.name);
      }
    }

    if (source !== "cache" && results.length < limit) {
      const remaining = limit - results.length;
      const names = await withProviderSession(this.providerFactory, (session) =>
        this.callProvider(() => session.provider.searchNames(partial, remaining), [], { partial })
      );
      for (const name of names) {
        if (results.length >= limit) break;
        if (!results.includes(name)) results.push(name);
      }
    }

    return results.slice(0, limit);
  }

  // ===========================================================================
  // Evolutions & Mega Forms
  // ===========================================================================

  async getEvolutions(id: number, forceRefresh = false): Promise<EvolutionRecord | null> {
    return withProviderSession(this.providerFactory, (session) => this.resolveEvolutions(session, id, forceRefresh));
  }

  async getMegaForms(id: number, forceRefresh = false): Promise<MegaEvolutionRecord[]> {
    return withProviderSession(this.providerFactory, (session) => this.resolveMegaForms(session, id, forceRefresh));
  }

  async hasMegaInLine(id: number, forceRefresh = false): Promise<boolean> {
    return withProviderSession(this.providerFactory, (session) => this.resolveHasMegaInLine(session, id, forceRefresh));
  }

  /**
   * Species, evolutions, mega forms and the mega-in-line flag, resolved one
   * after another over a single provider session.
   */
  async getFullProfile(name: string, options: GetPokemonOptions = {}): Promise<FullProfile> {
    const forceRefresh = options.forceRefresh ?? false;

    return withProviderSession(this.providerFactory, async (session) => {
      const { record } = await this.resolvePokemon(session, name, options);
      if (!record) {
        return { record: null, evolutions: null, megaForms: [], hasMegaInLine: false };
      }

      const evolutions = await this.resolveEvolutions(session, record.id, forceRefresh);
      const megaForms = await this.resolveMegaForms(session, record.id, forceRefresh);
      const hasMegaInLine = await this.resolveHasMegaInLine(session, record.id, forceRefresh);

      return { record, evolutions, megaForms, hasMegaInLine };
    });
  }

  // ===========================================================================
  // Cache Management
  // ===========================================================================

  /**
   * Writes hand-entered corrections to the cache and mirrors them onto
   * `record` when the write succeeds.
   */
  updateField(record: PokemonRecord, fields: PokemonFieldUpdate): boolean {
    if (fields.baseStardust !== undefined && (!Number.isInteger(fields.baseStardust) || fields.baseStardust <= 0)) {
      throw new InvalidInputError("Base stardust must be a positive integer", { baseStardust: fields.baseStardust });
    }

    const updated = this.cache.updateFields(record.id, fields);
    if (!updated) {
      return false;
    }

    if (fields.shinyAvailable !== undefined) {
      record.shinyAvailable = fields.shinyAvailable;
    }
    if (fields.baseStardust !== undefined) {
      record.baseStardust = fields.baseStardust;
    }
    logger.info({ pokemonId: record.id, fields }, "Updated cached fields");
    return true;
  }

  getStats(): CacheStats {
    return this.cache.getStats();
  }

  listCached(limit?: number): PokemonRecord[] {
    return this.cache.listAll(limit);
  }

  /**
   * Non-interactive fetch of several names. A failure for one name is
   * recorded as null and the rest continue.
   */
  async bulkFetch(names: readonly string[], forceRefresh = false): Promise<Map<string, PokemonRecord | null>> {
    const results = new Map<string, PokemonRecord | null>();

    for (const name of names) {
      try {
        results.set(name, await this.getPokemon(name, { forceRefresh, interactive: false }));
      } catch (error) {
        logger.error({ name, err: error }, "Bulk fetch failed for name");
        results.set(name, null);
      }
    }

    return results;
  }

  // ===========================================================================
  // Resolution Steps
  // ===========================================================================

  private async resolvePokemon(
    session: ProviderSession,
    name: string,
    options: GetPokemonOptions
  ): Promise<ResolvedPokemon> {
    const cached = this.cache.getByName(name);

    if (cached && !options.forceRefresh) {
      const choice = options.interactive ? await this.chooseSource(cached) : "cached";
      if (choice === "cached") {
        logger.debug({ pokemonId: cached.id }, "Serving species from cache");
        return { record: cached, origin: "cache" };
      }
    }

    const fresh = await this.callProvider(() => session.provider.fetchStatsByName(name), null, { name });
    if (fresh) {
      const stored = this.cache.upsertPokemon(fresh);
      logger.info({ pokemonId: stored.id, replaced: cached !== null }, "Stored species from provider");
      return { record: stored, origin: "provider" };
    }

    if (cached) {
      logger.warn({ pokemonId: cached.id }, "Provider returned nothing, falling back to cached species");
      return { record: cached, origin: "cache-fallback" };
    }

    return { record: null, origin: "not-found" };
  }

  private async resolveEvolutions(
    session: ProviderSession,
    id: number,
    forceRefresh: boolean
  ): Promise<EvolutionRecord | null> {
    const cached = this.cache.getEvolutions(id);
    if (cached && !forceRefresh) {
      return cached;
    }

    const fresh = await this.callProvider(() => session.provider.fetchEvolutions(id), null, { pokemonId: id });
    if (fresh) {
      this.cache.upsertEvolutions(fresh);
      logger.debug({ pokemonId: id, count: fresh.evolutions.length }, "Stored evolutions from provider");
      return fresh;
    }
    return cached;
  }

  /**
   * An empty provider answer is never written through, so previously known
   * mega forms survive.
   */
  private async resolveMegaForms(
    session: ProviderSession,
    id: number,
    forceRefresh: boolean
  ): Promise<MegaEvolutionRecord[]> {
    const cached = this.cache.getMegaForms(id);
    if (cached.length > 0 && !forceRefresh) {
      return cached;
    }

    const fresh = await this.callProvider(() => session.provider.fetchMegaForms(id), [], { pokemonId: id });
    if (fresh.length > 0) {
      this.cache.upsertMegaForms(fresh);
      logger.debug({ pokemonId: id, count: fresh.length }, "Stored mega forms from provider");
      return fresh;
    }
    return cached;
  }

  /**
   * A positive cached answer short-circuits. A positive live answer
   * pre-warms the cache with the subject's evolutions and mega forms and
   * with the mega forms of every direct evolution target.
   */
  private async resolveHasMegaInLine(session: ProviderSession, id: number, forceRefresh: boolean): Promise<boolean> {
    if (!forceRefresh && this.cache.hasMegaInLine(id)) {
      return true;
    }

    const provider = session.provider;
    const live = await this.callProvider(() => provider.hasMegaInLine(id), false, { pokemonId: id });
    if (!live) {
      return false;
    }

    const evolutions = await this.callProvider(() => provider.fetchEvolutions(id), null, { pokemonId: id });
    if (evolutions) {
      this.cache.upsertEvolutions(evolutions);
    }

    const megaForms = await this.callProvider(() => provider.fetchMegaForms(id), [], { pokemonId: id });
    if (megaForms.length > 0) {
      this.cache.upsertMegaForms(megaForms);
    }

    for (const target of evolutions?.evolutions ?? []) {
      const targetForms = await this.callProvider(() => provider.fetchMegaForms(target.targetId), [], {
        pokemonId: target.targetId,
      });
      if (targetForms.length > 0) {
        this.cache.upsertMegaForms(targetForms);
      }
    }

    logger.debug({ pokemonId: id }, "Pre-warmed evolution line with mega forms");
    return true;
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async chooseSource(record: PokemonRecord): Promise<SourceChoice> {
    if (!this.prompt) {
      return "cached";
    }
    const answer = await this.prompt.chooseSource(record);
    return answer === "fresh" ? "fresh" : "cached";
  }

  /**
   * Provider calls resolve to `fallback` instead of rejecting; the caller
   * then treats the answer as "nothing found".
   */
  private async callProvider<T>(call: () => Promise<T>, fallback: T, context: Record<string, unknown>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      logger.warn({ ...context, err: error }, "Provider call failed");
      return fallback;
    }
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createPokemonService(config: PokemonServiceConfig): PokemonService {
  return new PokemonService(config);
}
