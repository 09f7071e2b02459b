#!/usr/bin/env node

/**
 * pokemon-meetup CLI
 * Announcement generator for Pokémon Go community meetups
 */

import { Command } from "commander";
import chalk from "chalk";
import { menuCommand } from "./commands/menu.js";
import { EVENT_KINDS, eventCommand } from "./commands/event.js";
import { dbAddCommand, dbListCommand, dbShowCommand, dbStatsCommand, dbUpdateCommand } from "./commands/db.js";
import { isPokemonMeetupError, PromptCancelledError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("pokemon-meetup")
  .description("Generate Spanish announcement texts for Pokémon Go community meetups")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .option("-r, --refresh", "Always fetch fresh data from the stats API")
  .option("-y, --yes", "Use cached data without asking")
  .option("-o, --out <file>", "Also save the text to a file")
  .action(menuCommand);

program
  .command("event")
  .description(`Generate the text for one event (${EVENT_KINDS.join(", ")})`)
  .argument("<kind>", "Event kind")
  .option("-r, --refresh", "Always fetch fresh data from the stats API")
  .option("-y, --yes", "Use cached data without asking")
  .option("-o, --out <file>", "Also save the text to a file")
  .action(eventCommand);

const db = program.command("db").description("Inspect and maintain the local Pokémon cache");

db.command("stats").description("Show cache statistics").action(dbStatsCommand);

db.command("list")
  .description("List cached Pokémon")
  .option("-l, --limit <n>", "Maximum number of entries")
  .action(dbListCommand);

db.command("show")
  .description("Show the summary of one Pokémon")
  .argument("<name>", "Pokémon name")
  .option("-r, --refresh", "Always fetch fresh data from the stats API")
  .action(dbShowCommand);

db.command("add")
  .description("Fetch Pokémon into the cache")
  .argument("<names...>", "Pokémon names")
  .option("-r, --refresh", "Fetch even when already cached")
  .action(dbAddCommand);

db.command("update")
  .description("Correct cached fields of one Pokémon")
  .argument("<name>", "Pokémon name")
  .option("--shiny <yes|no>", "Shiny availability")
  .option("--stardust <n>", "Base stardust per catch")
  .action(dbUpdateCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof PromptCancelledError) {
    process.exit(0);
  }
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    const issues = isPokemonMeetupError(error) ? error.context?.issues : undefined;
    if (Array.isArray(issues)) {
      for (const issue of issues) {
        console.error(chalk.red(`  - ${String(issue)}`));
      }
    }
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

process.on("SIGINT", () => {
  console.log(chalk.dim("\nInterrupted"));
  process.exit(130);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
