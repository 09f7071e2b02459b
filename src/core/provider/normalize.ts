/**
 * Dataset Normalization
 *
 * Turns raw upstream payloads into id-keyed lookup tables. Anything that is
 * not the expected container shape becomes an empty table.
 *
 * @module
 */

import type { z } from "zod";
import { DEFAULT_FORM } from "../../types/index.js";
import type { CpMultiplierEntry } from "../cp/calculator.js";
import { createLogger } from "../../utils/logger.js";
import {
  CpMultiplierEntrySchema,
  DictPayloadSchema,
  EvolutionEntrySchema,
  GroupMemberSchema,
  ListPayloadSchema,
  MaxCpEntrySchema,
  MegaEntrySchema,
  NameEntrySchema,
  StatsEntrySchema,
  TypesEntrySchema,
  type EvolutionEntry,
  type MaxCpEntry,
  type MegaEntry,
  type StatsEntry,
  type TypesEntry,
} from "./schemas.js";

const logger = createLogger("provider-normalize");

const NUMERIC_KEY = /^\d+$/;

// =============================================================================
// Generic Helpers
// =============================================================================

/**
 * Validates each element of a list payload, dropping the ones that fail.
 */
export function parseEntries<S extends z.ZodTypeAny>(raw: unknown, schema: S): z.output<S>[] {
  const list = ListPayloadSchema.safeParse(raw);
  if (!list.success) {
    return [];
  }

  const entries: z.output<S>[] = [];
  let skipped = 0;
  for (const item of list.data) {
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      entries.push(parsed.data);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    logger.debug({ skipped, kept: entries.length }, "Dropped malformed dataset entries");
  }
  return entries;
}

function isNormalForm(entry: { form?: string }): boolean {
  return (entry.form ?? DEFAULT_FORM) === DEFAULT_FORM;
}

/**
 * Collapses multi-form duplicates to one entry per id: the last "Normal"
 * entry (a missing form counts as "Normal"), or the first entry seen when
 * no "Normal" one exists.
 */
export function preferNormalForm<T extends { pokemon_id: number; form?: string }>(
  entries: readonly T[]
): Map<number, T> {
  const byId = new Map<number, T>();
  for (const entry of entries) {
    const current = byId.get(entry.pokemon_id);
    if (current === undefined || isNormalForm(entry)) {
      byId.set(entry.pokemon_id, entry);
    }
  }
  return byId;
}

function dictEntries(raw: unknown): [string, unknown][] {
  const dict = DictPayloadSchema.safeParse(raw);
  return dict.success ? Object.entries(dict.data) : [];
}

// =============================================================================
// Dataset Normalizers
// =============================================================================

export function normalizeStats(raw: unknown): Map<number, StatsEntry> {
  return preferNormalForm(parseEntries(raw, StatsEntrySchema));
}

export function normalizeTypes(raw: unknown): Map<number, TypesEntry> {
  return preferNormalForm(parseEntries(raw, TypesEntrySchema));
}

export function normalizeMaxCp(raw: unknown): Map<number, MaxCpEntry> {
  return preferNormalForm(parseEntries(raw, MaxCpEntrySchema));
}

export function normalizeEvolutions(raw: unknown): Map<number, EvolutionEntry> {
  return preferNormalForm(parseEntries(raw, EvolutionEntrySchema));
}

/**
 * `{ "25": { "id": 25, "name": "Pikachu" } }` to id → name
 */
export function normalizeNames(raw: unknown): Map<number, string> {
  const names = new Map<number, string>();
  for (const [key, value] of dictEntries(raw)) {
    if (!NUMERIC_KEY.test(key)) continue;
    const parsed = NameEntrySchema.safeParse(value);
    if (parsed.success) {
      names.set(Number(key), parsed.data.name);
    }
  }
  return names;
}

/**
 * Membership tables (shiny, released): presence of the id key is what counts.
 */
export function normalizeIdSet(raw: unknown): Set<number> {
  const ids = new Set<number>();
  for (const [key] of dictEntries(raw)) {
    if (NUMERIC_KEY.test(key)) {
      ids.add(Number(key));
    }
  }
  return ids;
}

/**
 * Flattens `{ groupValue: [{ pokemon_id }, ...] }` into id → group value.
 * When an id appears under several groups the last one wins.
 */
export function normalizeGrouped<V>(raw: unknown, parseKey: (key: string) => V | null): Map<number, V> {
  const byId = new Map<number, V>();
  for (const [key, members] of dictEntries(raw)) {
    const value = parseKey(key);
    if (value === null) continue;
    for (const member of parseEntries(members, GroupMemberSchema)) {
      byId.set(member.pokemon_id, value);
    }
  }
  return byId;
}

export function parseIntegerKey(key: string): number | null {
  const value = Number.parseInt(key, 10);
  return Number.isNaN(value) ? null : value;
}

export function parseStringKey(key: string): string {
  return key;
}

export function normalizeCpCurve(raw: unknown): CpMultiplierEntry[] {
  return parseEntries(raw, CpMultiplierEntrySchema);
}

/**
 * Mega forms grouped by owning id; a species can have several.
 */
export function normalizeMegas(raw: unknown): Map<number, MegaEntry[]> {
  const byId = new Map<number, MegaEntry[]>();
  for (const entry of parseEntries(raw, MegaEntrySchema)) {
    const forms = byId.get(entry.pokemon_id) ?? [];
    forms.push(entry);
    byId.set(entry.pokemon_id, forms);
  }
  return byId;
}
