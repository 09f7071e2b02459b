/**
 * event command - Generate the announcement text for one event
 */

import * as p from "@clack/prompts";
import chalk from "chalk";
import ora from "ora";
import { InvalidInputError } from "../../core/errors.js";
import type { EvolutionContext, LegendaryHourEntry } from "../../core/templates/template-manager.js";
import type { PokemonRecord } from "../../types/index.js";
import { createLogger, writeText } from "../../utils/index.js";
import {
  getCurrentWeekInfo,
  getDynamaxMondayDate,
  getSpotlightTuesdayDate,
} from "../../utils/date.js";
import { withAppContext, type AppContext } from "../context.js";
import {
  createSourcePrompt,
  promptAddAnother,
  promptBaseStardust,
  promptMaxForm,
  promptPokemon,
  promptShinyAvailability,
  promptSpotlightBonus,
  promptWeekday,
  promptWeekendDay,
} from "../interactive.js";

const logger = createLogger("event");

export const EVENT_KINDS = [
  "dynamax-monday",
  "spotlight-hour",
  "legendary-hour",
  "max-battle-day",
  "raid-day",
] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

export const EVENT_LABELS: Record<EventKind, string> = {
  "dynamax-monday": "Dynamax Monday",
  "spotlight-hour": "Spotlight Hour",
  "legendary-hour": "Legendary Hour",
  "max-battle-day": "Max Battle Day",
  "raid-day": "Raid Day",
};

export interface EventOptions {
  /** Always fetch fresh data */
  refresh?: boolean;
  /** Use cached data without asking */
  yes?: boolean;
  /** Also write the text to this file */
  out?: string;
}

export function isEventKind(value: string): value is EventKind {
  return EVENT_KINDS.some((kind) => kind === value);
}

/**
 * Generate the announcement for `kind`, print it and optionally save it.
 */
export async function eventCommand(kind: string, options: EventOptions): Promise<void> {
  if (!isEventKind(kind)) {
    throw new InvalidInputError(`Unknown event "${kind}". Expected one of: ${EVENT_KINDS.join(", ")}`, { kind });
  }
  logger.info({ kind, options }, "Generating event text");

  p.intro(chalk.bgCyan.black(` ${EVENT_LABELS[kind]} `));

  const text = await withAppContext({ prompt: createSourcePrompt() }, (ctx) => renderEvent(ctx, kind, options));

  p.outro(chalk.green("Announcement ready"));
  console.log();
  console.log(text);

  if (options.out) {
    writeText(options.out, text);
    console.log(chalk.dim(`\nSaved to ${options.out}`));
  }
}

async function renderEvent(ctx: AppContext, kind: EventKind, options: EventOptions): Promise<string> {
  const lookup = { forceRefresh: options.refresh ?? false, interactive: !options.yes };
  const { service, templates } = ctx;

  switch (kind) {
    case "dynamax-monday": {
      showWeekInfo(`Event date: ${getDynamaxMondayDate()}`);
      const pokemon = await promptPokemon(service, lookup);
      const evolution = await loadEvolutionContext(ctx, pokemon, lookup.forceRefresh);
      const shinyAvailable = await promptShinyAvailability(service, pokemon);
      return templates.renderDynamaxMonday({ pokemon, shinyAvailable, ...evolution });
    }

    case "spotlight-hour": {
      p.log.info(`Event date: ${getSpotlightTuesdayDate()}`);
      const pokemon = await promptPokemon(service, lookup);
      const evolution = await loadEvolutionContext(ctx, pokemon, lookup.forceRefresh);
      const bonus = await promptSpotlightBonus();
      const baseStardust = bonus.type === "catch_stardust" ? await promptBaseStardust(service, pokemon) : null;
      const shinyAvailable = await promptShinyAvailability(service, pokemon);
      return templates.renderSpotlightHour({ pokemon, bonus, baseStardust, shinyAvailable, ...evolution });
    }

    case "legendary-hour": {
      const dayChoice = await promptWeekday();
      const entries: LegendaryHourEntry[] = [];
      do {
        const pokemon = await promptPokemon(service, lookup);
        entries.push({ pokemon, shinyAvailable: await promptShinyAvailability(service, pokemon) });
      } while (await promptAddAnother());
      return templates.renderMultipleLegendaryHour({ entries, dayChoice });
    }

    case "max-battle-day": {
      const dayChoice = await promptWeekendDay();
      const pokemon = await promptPokemon(service, lookup);
      const maxType = await promptMaxForm();
      const shinyAvailable = await promptShinyAvailability(service, pokemon);
      return templates.renderMaxBattleDay({ pokemon, dayChoice, maxType, shinyAvailable });
    }

    case "raid-day": {
      const dayChoice = await promptWeekendDay();
      const pokemon = await promptPokemon(service, lookup);
      const shinyAvailable = await promptShinyAvailability(service, pokemon);
      return templates.renderRaidDay({ pokemon, dayChoice, shinyAvailable });
    }
  }
}

function showWeekInfo(message: string): void {
  const week = getCurrentWeekInfo();
  p.log.info(message);
  p.log.message(
    chalk.dim(week.isTodayMonday ? "Today is Monday" : `${week.daysUntilMonday} day(s) until Monday`)
  );
}

async function loadEvolutionContext(
  ctx: AppContext,
  pokemon: PokemonRecord,
  forceRefresh: boolean
): Promise<EvolutionContext> {
  const spinner = ora(`Loading evolution data for ${pokemon.name}...`).start();
  try {
    const evolutions = await ctx.service.getEvolutions(pokemon.id, forceRefresh);
    const megaForms = await ctx.service.getMegaForms(pokemon.id, forceRefresh);
    const hasMegaInLine = await ctx.service.hasMegaInLine(pokemon.id, forceRefresh);
    const evolutionCount = evolutions?.evolutions.length ?? 0;
    spinner.succeed(describeEvolutionLine(pokemon, evolutionCount, megaForms.length, hasMegaInLine));
    return { evolutions, megaForms, hasMegaInLine };
  } catch (error) {
    spinner.fail(chalk.red("Could not load evolution data"));
    throw error;
  }
}

function describeEvolutionLine(
  pokemon: PokemonRecord,
  evolutionCount: number,
  megaCount: number,
  hasMegaInLine: boolean
): string {
  const parts = [`${evolutionCount} evolution(s)`, `${megaCount} mega form(s)`];
  if (hasMegaInLine && megaCount === 0) {
    parts.push("mega in evolution line");
  }
  return `${pokemon.name}: ${parts.join(", ")}`;
}
