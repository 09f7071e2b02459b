/**
 * PoGoAPI Stats Provider
 *
 * Fetches the public pogoapi.net JSON datasets over HTTP. A failed or
 * malformed dataset degrades to an empty table; errors never cross this
 * boundary.
 *
 * @module
 */

import type { IStatsProvider } from "../interfaces/IStatsProvider.js";
import { ErrorCode, ProviderError } from "../../errors.js";
import { err, fromPromiseWith, isErr, unwrapOr, type Result } from "../../../types/result.js";
import type { EvolutionRecord, MegaEvolutionRecord, PokemonRecord } from "../../../types/index.js";
import { createLogger } from "../../../utils/logger.js";
import { DATASETS, type DatasetName, type EvolutionEntry, type MegaEntry } from "../schemas.js";
import {
  normalizeCpCurve,
  normalizeEvolutions,
  normalizeGrouped,
  normalizeIdSet,
  normalizeMaxCp,
  normalizeMegas,
  normalizeNames,
  normalizeStats,
  normalizeTypes,
  parseIntegerKey,
  parseStringKey,
} from "../normalize.js";
import { resolveEvolutionRecord, resolveMegaForm, resolvePokemonRecord, type SpeciesTables } from "../resolve.js";

const logger = createLogger("provider");

// =============================================================================
// Configuration
// =============================================================================

export const DEFAULT_API_BASE_URL = "https://pogoapi.net/api/v1";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type FetchLike = (
  url: string,
  init: { signal: AbortSignal; headers: Record<string, string> }
) => Promise<HttpResponseLike>;

export interface PoGoApiProviderConfig {
  baseUrl?: string;
  timeoutMs?: number;
  /** HTTP client; defaults to the global fetch */
  fetchImpl?: FetchLike;
}

// =============================================================================
// Lazy Table
// =============================================================================

/**
 * Loads once on first use; concurrent callers share the same promise.
 */
class LazyTable<T> {
  private promise: Promise<T> | null = null;

  constructor(private readonly load: () => Promise<T>) {}

  get(): Promise<T> {
    this.promise ??= this.load();
    return this.promise;
  }
}

// =============================================================================
// Provider Implementation
// =============================================================================

export class PoGoApiProvider implements IStatsProvider {
  private readonly config: Required<PoGoApiProviderConfig>;
  private readonly inflight = new Set<AbortController>();
  private closed = false;

  private readonly stats = this.table(DATASETS.stats, normalizeStats);
  private readonly names = this.table(DATASETS.names, normalizeNames);
  private readonly types = this.table(DATASETS.types, normalizeTypes);
  private readonly maxCp = this.table(DATASETS.maxCp, normalizeMaxCp);
  private readonly shiny = this.table(DATASETS.shiny, normalizeIdSet);
  private readonly released = this.table(DATASETS.released, normalizeIdSet);
  private readonly buddyDistances = this.table(DATASETS.buddyDistances, (raw) =>
    normalizeGrouped(raw, parseIntegerKey)
  );
  private readonly candyToEvolve = this.table(DATASETS.candyToEvolve, (raw) => normalizeGrouped(raw, parseIntegerKey));
  private readonly rarity = this.table(DATASETS.rarity, (raw) => normalizeGrouped(raw, parseStringKey));
  private readonly cpCurve = this.table(DATASETS.cpMultiplier, normalizeCpCurve);
  private readonly evolutions = this.table(DATASETS.evolutions, normalizeEvolutions);
  private readonly megas = this.table(DATASETS.megas, normalizeMegas);

  constructor(config: PoGoApiProviderConfig = {}) {
    this.config = {
      baseUrl: (config.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, ""),
      timeoutMs: config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      fetchImpl: config.fetchImpl ?? ((url, init) => fetch(url, init)),
    };
  }

  // ===========================================================================
  // IStatsProvider
  // ===========================================================================

  async fetchStatsByName(name: string): Promise<PokemonRecord | null> {
    const needle = name.trim().toLowerCase();
    const names = await this.names.get();

    let match: { id: number; name: string } | null = null;
    for (const [id, candidate] of names) {
      if (candidate.toLowerCase() === needle) {
        match = { id, name: candidate };
        break;
      }
    }
    if (!match) {
      logger.debug({ name }, "Name not found upstream");
      return null;
    }

    const tables = await this.speciesTables();
    const record = resolvePokemonRecord(match.id, match.name, tables);
    if (!record) {
      logger.debug({ pokemonId: match.id }, "No stats entry upstream");
    }
    return record;
  }

  async fetchEvolutions(id: number): Promise<EvolutionRecord | null> {
    const entry: EvolutionEntry | undefined = (await this.evolutions.get()).get(id);
    return entry ? resolveEvolutionRecord(entry) : null;
  }

  async fetchMegaForms(id: number): Promise<MegaEvolutionRecord[]> {
    const entries: MegaEntry[] = (await this.megas.get()).get(id) ?? [];
    return entries.map(resolveMegaForm);
  }

  async hasMegaInLine(id: number): Promise<boolean> {
    if ((await this.fetchMegaForms(id)).length > 0) {
      return true;
    }

    const evolution = await this.fetchEvolutions(id);
    for (const target of evolution?.evolutions ?? []) {
      if ((await this.fetchMegaForms(target.targetId)).length > 0) {
        return true;
      }
    }
    return false;
  }

  async searchNames(partial: string, limit: number): Promise<string[]> {
    const needle = partial.trim().toLowerCase();
    const matches: string[] = [];
    if (limit <= 0) {
      return matches;
    }

    for (const candidate of (await this.names.get()).values()) {
      if (candidate.toLowerCase().includes(needle)) {
        matches.push(candidate);
        if (matches.length >= limit) break;
      }
    }
    return matches.sort();
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const controller of this.inflight) {
      controller.abort();
    }
    this.inflight.clear();
    logger.debug("Provider session closed");
  }

  // ===========================================================================
  // Dataset Loading
  // ===========================================================================

  private async speciesTables(): Promise<SpeciesTables> {
    const [stats, types, maxCp, shiny, released, buddyDistances, candyToEvolve, rarity, cpCurve] = await Promise.all([
      this.stats.get(),
      this.types.get(),
      this.maxCp.get(),
      this.shiny.get(),
      this.released.get(),
      this.buddyDistances.get(),
      this.candyToEvolve.get(),
      this.rarity.get(),
      this.cpCurve.get(),
    ]);
    return { stats, types, maxCp, shiny, released, buddyDistances, candyToEvolve, rarity, cpCurve };
  }

  private table<T>(endpoint: DatasetName, normalize: (raw: unknown) => T): LazyTable<T> {
    return new LazyTable(async () => {
      const result = await this.fetchJson(endpoint);
      if (isErr(result)) {
        logger.warn({ endpoint, err: result.error }, "Dataset unavailable, continuing with an empty table");
      }
      // normalizers map anything unexpected, null included, to an empty table
      return normalize(unwrapOr<unknown, ProviderError>(result, null));
    });
  }

  private async fetchJson(endpoint: DatasetName): Promise<Result<unknown, ProviderError>> {
    if (this.closed) {
      return err(new ProviderError("Provider session is closed", ErrorCode.PROVIDER_SESSION_CLOSED, { endpoint }));
    }

    return fromPromiseWith(this.request(endpoint), (error) =>
      error instanceof ProviderError
        ? error
        : new ProviderError(`Request for ${endpoint} failed`, ErrorCode.PROVIDER_REQUEST_FAILED, {
            endpoint,
            cause: error instanceof Error ? error.message : String(error),
          })
    );
  }

  private async request(endpoint: DatasetName): Promise<unknown> {
    const url = `${this.config.baseUrl}/${endpoint}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
    this.inflight.add(controller);

    try {
      const response = await this.config.fetchImpl(url, {
        signal: controller.signal,
        headers: { accept: "application/json" },
      });
      if (!response.ok) {
        throw new ProviderError(`HTTP ${response.status} for ${endpoint}`, ErrorCode.PROVIDER_HTTP_STATUS, {
          endpoint,
          status: response.status,
        });
      }
      const body = await response.json();
      logger.debug({ endpoint }, "Fetched dataset");
      return body;
    } finally {
      clearTimeout(timer);
      this.inflight.delete(controller);
    }
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createPoGoApiProvider(config: PoGoApiProviderConfig = {}): PoGoApiProvider {
  return new PoGoApiProvider(config);
}
