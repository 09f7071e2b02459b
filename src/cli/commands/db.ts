/**
 * db commands - Inspect and maintain the local Pokémon cache
 */

import chalk from "chalk";
import ora from "ora";
import { InvalidInputError } from "../../core/errors.js";
import { formatCp } from "../../core/templates/formatters.js";
import type { PokemonRecord } from "../../types/index.js";
import { createLogger, formatBytes } from "../../utils/index.js";
import { withAppContext } from "../context.js";
import { parsePositiveInt } from "../interactive.js";

const logger = createLogger("db");

export interface DbListOptions {
  limit?: string;
}

export interface DbAddOptions {
  refresh?: boolean;
}

export interface DbUpdateOptions {
  shiny?: string;
  stardust?: string;
}

function printHeader(title: string): void {
  console.log();
  console.log(chalk.cyan.bold(title));
  console.log(chalk.dim("─".repeat(40)));
}

/**
 * Show record count, last update and storage size
 */
export async function dbStatsCommand(): Promise<void> {
  await withAppContext({}, async ({ service }) => {
    const stats = service.getStats();

    printHeader("Pokémon Cache");
    console.log(`  Pokémon:      ${chalk.cyan(stats.totalCount)}`);
    console.log(`  Last update:  ${stats.lastUpdateTimestamp ?? chalk.dim("never")}`);
    console.log(`  Size:         ${formatBytes(stats.storageSizeBytes)}`);
    console.log(`  Location:     ${chalk.dim(stats.storageLocation)}`);
    console.log();
  });
}

/**
 * List cached Pokémon ordered by id
 */
export async function dbListCommand(options: DbListOptions): Promise<void> {
  const limit = options.limit !== undefined ? parsePositiveInt(options.limit) : undefined;
  if (limit === null) {
    throw new InvalidInputError("--limit must be a positive whole number", { limit: options.limit });
  }

  await withAppContext({}, async ({ service }) => {
    const records = service.listCached(limit);
    printHeader(`Cached Pokémon (${records.length})`);

    if (records.length === 0) {
      console.log(chalk.dim("  Nothing cached yet. Run `pokemon-meetup db add <name>`."));
    }
    for (const record of records) {
      console.log(`  ${chalk.dim(`#${String(record.id).padStart(3, "0")}`)} ${record.name} ${formatShiny(record)}`);
    }
    console.log();
  });
}

/**
 * Print the summary of one Pokémon, fetching it when it is not cached
 */
export async function dbShowCommand(name: string, options: DbAddOptions): Promise<void> {
  await withAppContext({}, async ({ service, templates }) => {
    const spinner = ora(`Looking up ${name}...`).start();
    const profile = await service.getFullProfile(name, { forceRefresh: options.refresh ?? false });

    if (!profile.record) {
      spinner.fail(chalk.red(`Could not find ${name}`));
      return;
    }
    spinner.stop();

    console.log();
    console.log(
      templates.renderPokemonSummary({
        pokemon: profile.record,
        evolutions: profile.evolutions,
        megaForms: profile.megaForms,
        hasMegaInLine: profile.hasMegaInLine,
      })
    );
    console.log(chalk.dim(`Max CP ${formatCp(profile.record.maxCp)} · ${formatShiny(profile.record)}`));
  });
}

/**
 * Fetch one or more Pokémon into the cache
 */
export async function dbAddCommand(names: string[], options: DbAddOptions): Promise<void> {
  await withAppContext({}, async ({ service }) => {
    const spinner = ora(`Fetching ${names.length} Pokémon...`).start();
    const results = await service.bulkFetch(names, options.refresh ?? false);
    spinner.stop();

    let failures = 0;
    for (const [name, record] of results) {
      if (record) {
        console.log(chalk.green(`  ✓ ${record.name}`), chalk.dim(`#${record.id}`));
      } else {
        failures++;
        console.log(chalk.red(`  ✗ ${name}`), chalk.dim("not found"));
      }
    }
    logger.info({ requested: names.length, failures }, "Bulk fetch finished");
  });
}

/**
 * Correct the shiny flag and/or base stardust of a cached Pokémon
 */
export async function dbUpdateCommand(name: string, options: DbUpdateOptions): Promise<void> {
  const shinyAvailable = options.shiny !== undefined ? parseYesNo(options.shiny) : undefined;
  const baseStardust = options.stardust !== undefined ? parsePositiveInt(options.stardust) : undefined;

  if (shinyAvailable === null) {
    throw new InvalidInputError("--shiny must be yes or no", { shiny: options.shiny });
  }
  if (baseStardust === null) {
    throw new InvalidInputError("--stardust must be a positive whole number", { stardust: options.stardust });
  }
  if (shinyAvailable === undefined && baseStardust === undefined) {
    throw new InvalidInputError("Nothing to update: pass --shiny and/or --stardust");
  }

  await withAppContext({}, async ({ service }) => {
    const record = await service.getPokemon(name, { interactive: false });
    if (!record) {
      console.log(chalk.red(`Could not find ${name}`));
      return;
    }

    if (service.updateField(record, { shinyAvailable, baseStardust })) {
      console.log(chalk.green(`Updated ${record.name}`), chalk.dim(formatShiny(record)));
    } else {
      console.log(chalk.yellow(`${record.name} was not updated`));
    }
  });
}

function formatShiny(record: PokemonRecord): string {
  const shiny = record.shinyAvailable ? chalk.yellow("✨ shiny") : chalk.dim("no shiny");
  return record.baseStardust !== null ? `${shiny} · ${record.baseStardust} stardust` : shiny;
}

export function parseYesNo(value: string): boolean | null {
  const normalized = value.trim().toLowerCase();
  if (["y", "yes", "true", "1", "si", "sí"].includes(normalized)) return true;
  if (["n", "no", "false", "0"].includes(normalized)) return false;
  return null;
}
