/**
 * Stats Provider Interface
 *
 * A provider session fetches each upstream dataset at most once and keeps
 * the normalized tables for its own lifetime only. Sessions must be closed;
 * use withProviderSession() to guarantee it.
 */

import type { EvolutionRecord, MegaEvolutionRecord, PokemonRecord } from "../../../types/index.js";

export interface IStatsProvider {
  /**
   * Resolve a species by case-insensitive name; null when unknown upstream
   * or when its datasets could not be fetched
   */
  fetchStatsByName(name: string): Promise<PokemonRecord | null>;

  /**
   * Null when the species has no evolution entry upstream
   */
  fetchEvolutions(id: number): Promise<EvolutionRecord | null>;

  /**
   * Empty when the species has no mega forms
   */
  fetchMegaForms(id: number): Promise<MegaEvolutionRecord[]>;

  /**
   * Live check: the species or one of its direct evolution targets has
   * mega forms. Never consults the local cache.
   */
  hasMegaInLine(id: number): Promise<boolean>;

  /**
   * Up to `limit` names containing `partial` (case-insensitive), sorted
   */
  searchNames(partial: string, limit: number): Promise<string[]>;

  /**
   * Abort outstanding requests and drop the session's tables
   */
  close(): void;
}

export type StatsProviderFactory = () => IStatsProvider;

/**
 * Scoped handle on one provider session. The session is opened on first
 * use, so a scope served entirely from the cache never touches the network.
 */
export class ProviderSession {
  private opened: IStatsProvider | null = null;

  constructor(private readonly factory: StatsProviderFactory) {}

  get provider(): IStatsProvider {
    this.opened ??= this.factory();
    return this.opened;
  }

  get isOpen(): boolean {
    return this.opened !== null;
  }

  close(): void {
    this.opened?.close();
    this.opened = null;
  }
}

/**
 * Runs `fn` with a provider session and closes it on every exit path.
 */
export async function withProviderSession<T>(
  factory: StatsProviderFactory,
  fn: (session: ProviderSession) => Promise<T>
): Promise<T> {
  const session = new ProviderSession(factory);
  try {
    return await fn(session);
  } finally {
    session.close();
  }
}
