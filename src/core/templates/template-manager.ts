/**
 * Template Manager
 *
 * Loads announcement templates from `<templatesDir>/<name>.txt` and renders
 * one per event kind from resolved Pokémon records.
 *
 * @module
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { ErrorCode, InvalidInputError, TemplateError } from "../errors.js";
import { formatTypeInfo } from "../game/pokemon-types.js";
import { weatherEmojisForTypes } from "../game/weather.js";
import type { EvolutionRecord, MegaEvolutionRecord, PokemonRecord } from "../../types/index.js";
import {
  getDynamaxMondayDate,
  getLegendaryHourDate,
  getSpotlightTuesdayDate,
  getWeekendEventDate,
} from "../../utils/date.js";
import { createLogger } from "../../utils/logger.js";
import { substitute, type TemplateVariables } from "./template-engine.js";
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
} from "./formatters.js";
import type { SpotlightBonus } from "./spotlight-bonuses.js";

const logger = createLogger("templates");

const TEMPLATE_EXTENSION = ".txt";

// =============================================================================
// Render Inputs
// =============================================================================

/** Evolution context shared by the detailed templates */
export interface EvolutionContext {
  evolutions?: EvolutionRecord | null;
  megaForms?: readonly MegaEvolutionRecord[];
  hasMegaInLine?: boolean;
}

export interface DynamaxMondayInput extends EvolutionContext {
  pokemon: PokemonRecord;
  shinyAvailable: boolean;
  /** Reference date for the "next Monday" lookup; defaults to now */
  today?: Date;
}

export interface SpotlightHourInput extends EvolutionContext {
  pokemon: PokemonRecord;
  bonus: SpotlightBonus;
  /** Overrides the record's shiny flag */
  shinyAvailable?: boolean;
  /** Replaces the stardust bonus details with computed amounts */
  baseStardust?: number | null;
  today?: Date;
}

export interface LegendaryHourEntry {
  pokemon: PokemonRecord;
  shinyAvailable: boolean;
}

export interface LegendaryHourInput extends LegendaryHourEntry {
  /** 1 = Monday ... 7 = Sunday */
  dayChoice: number;
  today?: Date;
}

export interface MultipleLegendaryHourInput {
  entries: readonly LegendaryHourEntry[];
  dayChoice: number;
  today?: Date;
}

export type MaxFormKind = "Dynamax" | "Gigantamax";

export interface MaxBattleDayInput {
  pokemon: PokemonRecord;
  /** 1 = Saturday, 2 = Sunday */
  dayChoice: number;
  maxType: MaxFormKind;
  shinyAvailable: boolean;
  today?: Date;
}

export interface RaidDayInput {
  pokemon: PokemonRecord;
  dayChoice: number;
  shinyAvailable: boolean;
  today?: Date;
}

export interface PokemonSummaryInput extends EvolutionContext {
  pokemon: PokemonRecord;
}

export interface TemplateManagerConfig {
  templatesDir: string;
}

// =============================================================================
// Template Manager
// =============================================================================

export class TemplateManager {
  private readonly templatesDir: string;
  private readonly templateCache = new Map<string, string>();

  constructor(config: TemplateManagerConfig) {
    this.templatesDir = config.templatesDir;
  }

  /**
   * Template source text; read from disk once per manager.
   *
   * @throws {TemplateError} when the file does not exist
   */
  loadTemplate(name: string): string {
    const cached = this.templateCache.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const templatePath = path.join(this.templatesDir, `${name}${TEMPLATE_EXTENSION}`);
    if (!fs.existsSync(templatePath)) {
      throw new TemplateError(`Template not found: ${templatePath}`, ErrorCode.TEMPLATE_NOT_FOUND, {
        templateName: name,
      });
    }

    const source = fs.readFileSync(templatePath, "utf-8");
    this.templateCache.set(name, source);
    logger.debug({ templateName: name }, "Template loaded");
    return source;
  }

  render(name: string, variables: TemplateVariables): string {
    return substitute(this.loadTemplate(name), variables, name);
  }

  /**
   * Template names (without extension), sorted
   */
  listAvailableTemplates(): string[] {
    if (!fs.existsSync(this.templatesDir)) {
      return [];
    }
    return fs
      .readdirSync(this.templatesDir)
      .filter((file) => file.endsWith(TEMPLATE_EXTENSION))
      .map((file) => file.slice(0, -TEMPLATE_EXTENSION.length))
      .sort();
  }

  // ===========================================================================
  // Event Renderers
  // ===========================================================================

  renderDynamaxMonday(input: DynamaxMondayInput): string {
    const { pokemon } = input;
    const megaForms = input.megaForms ?? [];

    return this.render("dynamax_monday", {
      ...statVariables(pokemon),
      pokemon_id: formatPokemonId(pokemon.id),
      monday_date: getDynamaxMondayDate(input.today),
      shiny_text: formatShinyText(input.shinyAvailable, "dynamax"),
      evolution_info: formatEvolutionInfo(input.evolutions ?? null, megaForms, input.hasMegaInLine ?? false),
      mega_details: formatMegaDetails(megaForms),
    });
  }

  renderSpotlightHour(input: SpotlightHourInput): string {
    const { pokemon, bonus } = input;
    const megaForms = input.megaForms ?? [];
    const shinyAvailable = input.shinyAvailable ?? pokemon.shinyAvailable;
    const details =
      bonus.type === "catch_stardust" && input.baseStardust != null
        ? formatStardustDetails(input.baseStardust)
        : bonus.details;

    return this.render("spotlight_hour", {
      ...statVariables(pokemon),
      pokemon_id: padPokemonId(pokemon.id),
      tuesday_date: getSpotlightTuesdayDate(input.today),
      bonus_type: bonus.type,
      bonus_description: bonus.description,
      bonus_details: details,
      shiny_text: formatShinyText(shinyAvailable, "spotlight"),
      mega_info: formatSpotlightMegaInfo(
        pokemon.name,
        input.evolutions ?? null,
        megaForms,
        input.hasMegaInLine ?? false
      ),
    });
  }

  renderLegendaryHour(input: LegendaryHourInput): string {
    const { pokemon } = input;

    return this.render("legendary_hour", {
      pokemon_name: pokemon.name,
      event_date: getLegendaryHourDate(input.dayChoice, input.today),
      type_info: formatTypeInfo(pokemon.types),
      type_verb: "es",
      cp_level_20: formatCp(pokemon.cpLevel20),
      cp_level_25: formatCp(pokemon.cpLevel25),
      weather_emojis: weatherEmojisForTypes(pokemon.types),
      shiny_text: formatShinyText(input.shinyAvailable, "legendary"),
      pokemon_details: "",
      shiny_newline: "",
    });
  }

  /**
   * One announcement for several legendaries sharing the hour; a single
   * entry renders like renderLegendaryHour.
   */
  renderMultipleLegendaryHour(input: MultipleLegendaryHourInput): string {
    const [first, ...rest] = input.entries;
    if (!first) {
      throw new InvalidInputError("At least one Pokémon is required", { templateName: "legendary_hour" });
    }
    if (rest.length === 0) {
      return this.renderLegendaryHour({ ...first, dayChoice: input.dayChoice, today: input.today });
    }

    const details = input.entries.map(
      ({ pokemon }) =>
        `❖ ${pokemon.name} (${formatTypeInfo(pokemon.types)}) - CP: ${formatCp(pokemon.cpLevel20)}, ` +
        `${formatCp(pokemon.cpLevel25)} con clima ${weatherEmojisForTypes(pokemon.types)}.`
    );
    const available = input.entries.filter((e) => e.shinyAvailable).map((e) => e.pokemon.name);
    const unavailable = input.entries.filter((e) => !e.shinyAvailable).map((e) => e.pokemon.name);

    return this.render("legendary_hour", {
      pokemon_name: formatSpanishList(input.entries.map((e) => e.pokemon.name)),
      event_date: getLegendaryHourDate(input.dayChoice, input.today),
      type_info: "múltiples tipos",
      type_verb: "son",
      cp_level_20: "variado",
      cp_level_25: "variado",
      weather_emojis: "🌤️",
      shiny_text: formatMultipleShinyText(available, unavailable),
      pokemon_details: details.join("\n"),
      shiny_newline: "\n",
    });
  }

  renderMaxBattleDay(input: MaxBattleDayInput): string {
    const { pokemon } = input;

    return this.render("max_battle_day", {
      pokemon_name: pokemon.name,
      event_date: getWeekendEventDate(input.dayChoice, input.today),
      max_type: input.maxType,
      type_info: formatTypeInfo(pokemon.types),
      cp_level_20: formatCp(pokemon.cpLevel20),
      shiny_text: formatShinyText(input.shinyAvailable, "max_battle"),
    });
  }

  renderRaidDay(input: RaidDayInput): string {
    const { pokemon } = input;

    return this.render("raid_day", {
      pokemon_name: pokemon.name,
      event_date: getWeekendEventDate(input.dayChoice, input.today),
      type_info: formatTypeInfo(pokemon.types),
      cp_level_20: formatCp(pokemon.cpLevel20),
      cp_level_25: formatCp(pokemon.cpLevel25),
      weather_emojis: weatherEmojisForTypes(pokemon.types),
      shiny_text: formatShinyText(input.shinyAvailable, "legendary"),
    });
  }

  renderPokemonSummary(input: PokemonSummaryInput): string {
    const { pokemon } = input;
    const megaForms = input.megaForms ?? [];

    return this.render("pokemon_summary", {
      ...statVariables(pokemon),
      pokemon_id: formatPokemonId(pokemon.id),
      evolution_info: formatEvolutionInfo(input.evolutions ?? null, megaForms, input.hasMegaInLine ?? false),
      mega_details: formatMegaDetails(megaForms),
    });
  }
}

// =============================================================================
// Helpers
// =============================================================================

function statVariables(pokemon: PokemonRecord): Record<string, string | number> {
  return {
    pokemon_name: pokemon.name,
    type_info: formatTypeInfo(pokemon.types),
    base_attack: pokemon.baseAttack,
    base_defense: pokemon.baseDefense,
    base_stamina: pokemon.baseStamina,
    cp_level_20: formatCp(pokemon.cpLevel20),
    cp_level_25: formatCp(pokemon.cpLevel25),
    cp_level_30: formatCp(pokemon.cpLevel30),
    cp_level_40: formatCp(pokemon.cpLevel40),
  };
}

// =============================================================================
// Factory Function
// =============================================================================

export function createTemplateManager(config: TemplateManagerConfig): TemplateManager {
  return new TemplateManager(config);
}
