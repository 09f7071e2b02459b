/**
 * Interactive prompts shared by the event and database commands.
 */

import * as p from "@clack/prompts";
import chalk from "chalk";
import { PromptCancelledError } from "../core/errors.js";
import type { PokemonService, SourcePrompt } from "../core/service/pokemon-service.js";
import type { PokemonRecord } from "../types/index.js";
import { formatStardustDetails } from "../core/templates/formatters.js";
import { SPOTLIGHT_BONUSES, type SpotlightBonus } from "../core/templates/spotlight-bonuses.js";
import type { MaxFormKind } from "../core/templates/template-manager.js";

const SUGGESTION_LIMIT = 5;
const RETYPE = "__retype__";

/**
 * Unwraps a prompt answer.
 *
 * @throws {PromptCancelledError} when the user cancels (Ctrl+C / Esc); the
 * command unwinds through its cleanup and the CLI exits with status 0
 */
export function ensureAnswered<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel("Cancelled");
    throw new PromptCancelledError();
  }
  return value;
}

/**
 * Cached-or-fresh choice offered when a Pokémon is already stored
 */
export function createSourcePrompt(): SourcePrompt {
  return {
    async chooseSource(record) {
      p.log.info(
        `${chalk.cyan(record.name)} is cached (last updated ${chalk.dim(record.updatedAt ?? "unknown")})`
      );
      const choice = ensureAnswered(
        await p.select({
          message: "Use the cached data or fetch fresh data?",
          options: [
            { value: "cached" as const, label: "Use cached data" },
            { value: "fresh" as const, label: "Fetch fresh data" },
          ],
          initialValue: "cached" as const,
        })
      );
      return choice;
    },
  };
}

/**
 * Asks for a name until one resolves, offering suggestions from the cache
 * and the provider after a miss.
 */
export async function promptPokemon(
  service: PokemonService,
  options: { forceRefresh: boolean; interactive: boolean; message?: string }
): Promise<PokemonRecord> {
  let name = await promptName(options.message ?? "Pokémon name");

  for (;;) {
    const { record, origin } = await service.getPokemonWithOrigin(name, options);
    if (record) {
      if (origin === "cache-fallback") {
        p.log.warn(`Could not fetch fresh data for ${record.name}; using cached data`);
      } else {
        p.log.success(`${record.name} ${chalk.dim(`(${origin})`)}`);
      }
      return record;
    }

    p.log.error(`Could not find ${chalk.cyan(name)}`);
    const suggestions = await service.searchNames(name, SUGGESTION_LIMIT, "both");
    if (suggestions.length === 0) {
      name = await promptName("Try another name");
      continue;
    }

    const choice = ensureAnswered(
      await p.select({
        message: "Did you mean",
        options: [
          ...suggestions.map((suggestion) => ({ value: suggestion, label: suggestion })),
          { value: RETYPE, label: "Type another name" },
        ],
      })
    );
    name = choice === RETYPE ? await promptName("Pokémon name") : choice;
  }
}

async function promptName(message: string): Promise<string> {
  const value = ensureAnswered(
    await p.text({
      message,
      validate: (input) => (input.trim().length === 0 ? "Enter a name" : undefined),
    })
  );
  return value.trim();
}

/**
 * Confirms shiny availability, defaulting to the stored flag; a changed
 * answer is written back to the cache.
 */
export async function promptShinyAvailability(service: PokemonService, record: PokemonRecord): Promise<boolean> {
  const shiny = ensureAnswered(
    await p.confirm({
      message: `Is shiny ${record.name} available for this event? ${chalk.dim(
        `(data says ${record.shinyAvailable ? "yes" : "no"})`
      )}`,
      initialValue: record.shinyAvailable,
    })
  );

  if (shiny !== record.shinyAvailable && service.updateField(record, { shinyAvailable: shiny })) {
    p.log.info("Shiny availability saved");
  }
  return shiny;
}

/**
 * Base stardust per catch; the confirmed value is written back to the cache.
 */
export async function promptBaseStardust(service: PokemonService, record: PokemonRecord): Promise<number> {
  for (;;) {
    const raw = ensureAnswered(
      await p.text({
        message: "Base stardust per catch (common values: 100, 500, 750, 1000, 1250)",
        initialValue: record.baseStardust !== null ? String(record.baseStardust) : "",
        validate: (input) => (parsePositiveInt(input) === null ? "Enter a positive whole number" : undefined),
      })
    );
    const stardust = parsePositiveInt(raw);
    if (stardust === null) continue;

    const confirmed = ensureAnswered(
      await p.confirm({ message: `${formatStardustDetails(stardust)} Is this correct?`, initialValue: true })
    );
    if (!confirmed) continue;

    if (stardust !== record.baseStardust && service.updateField(record, { baseStardust: stardust })) {
      p.log.info("Base stardust saved");
    }
    return stardust;
  }
}

export async function promptSpotlightBonus(): Promise<SpotlightBonus> {
  const index = ensureAnswered(
    await p.select({
      message: "Spotlight Hour bonus",
      options: SPOTLIGHT_BONUSES.map((bonus, i) => ({ value: i, label: bonus.description })),
    })
  );
  const bonus = SPOTLIGHT_BONUSES[index];
  if (!bonus) {
    throw new Error(`Unknown bonus selection ${index}`);
  }
  return bonus;
}

const WEEKDAY_OPTIONS = [
  { value: 1, label: "Monday" },
  { value: 2, label: "Tuesday" },
  { value: 3, label: "Wednesday" },
  { value: 4, label: "Thursday" },
  { value: 5, label: "Friday" },
  { value: 6, label: "Saturday" },
  { value: 7, label: "Sunday" },
];

/** 1 = Monday ... 7 = Sunday */
export async function promptWeekday(): Promise<number> {
  return ensureAnswered(
    await p.select({ message: "Event day", options: WEEKDAY_OPTIONS, initialValue: 3 })
  );
}

/** 1 = Saturday, 2 = Sunday */
export async function promptWeekendDay(): Promise<number> {
  return ensureAnswered(
    await p.select({
      message: "Event day",
      options: [
        { value: 1, label: "Saturday" },
        { value: 2, label: "Sunday" },
      ],
    })
  );
}

export async function promptMaxForm(): Promise<MaxFormKind> {
  return ensureAnswered(
    await p.select({
      message: "Max form",
      options: [
        { value: "Dynamax" as const, label: "Dynamax" },
        { value: "Gigantamax" as const, label: "Gigantamax" },
      ],
    })
  );
}

export async function promptAddAnother(): Promise<boolean> {
  return ensureAnswered(await p.confirm({ message: "Add another Pokémon to this hour?", initialValue: false }));
}

export function parsePositiveInt(input: string): number | null {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const value = Number.parseInt(trimmed, 10);
  return value > 0 ? value : null;
}
