/**
 * Spanish display fragments for announcement templates.
 *
 * @module
 */

import { getTypeSpanishName } from "../game/pokemon-types.js";
import type { EvolutionRecord, MegaEvolutionRecord } from "../../types/index.js";

export type ShinyEventKind = "dynamax" | "spotlight" | "legendary" | "max_battle";

const SHINY_AVAILABLE: Record<ShinyEventKind, string> = {
  dynamax:
    "La forma shiny estará disponible, pero tengan en cuenta que la probabilidad base (1/512) no se incrementa en batallas Max. ✨",
  spotlight:
    "La forma shiny estará disponible, pero tengan en cuenta que la probabilidad base (1/512) no se incrementa durante la hora. ✨",
  max_battle: "La forma shiny estará potenciada (alrededor de 1/20). ✨",
  legendary: "La forma shiny estará disponible (alrededor de 1/20). ✨",
};

const SHINY_UNAVAILABLE = "La forma shiny no estará disponible. 🚫✨";

/** 3657 -> "3,657" */
export function formatCp(cp: number): string {
  return String(Math.trunc(cp)).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

/** 25 -> "025" */
export function padPokemonId(id: number): string {
  return String(id).padStart(3, "0");
}

/** 25 -> "#025" */
export function formatPokemonId(id: number): string {
  return `#${padPokemonId(id)}`;
}

/**
 * "A", "A y B", "A, B y C"
 */
export function formatSpanishList(items: readonly string[]): string {
  if (items.length <= 1) {
    return items[0] ?? "";
  }
  return `${items.slice(0, -1).join(", ")} y ${items[items.length - 1] ?? ""}`;
}

export function formatShinyText(available: boolean, kind: ShinyEventKind): string {
  return available ? SHINY_AVAILABLE[kind] : SHINY_UNAVAILABLE;
}

/**
 * Shiny line for an event featuring several Pokémon.
 */
export function formatMultipleShinyText(available: readonly string[], unavailable: readonly string[]): string {
  const total = available.length + unavailable.length;
  if (total === 1) {
    return formatShinyText(available.length === 1, "legendary");
  }
  if (available.length === total) {
    return "La forma shiny estará disponible para todos (alrededor de 1/20). ✨";
  }
  if (available.length === 0) {
    return "La forma shiny no estará disponible para ninguno. 🚫✨";
  }
  return (
    `La forma shiny estará disponible para ${formatSpanishList(available)} (alrededor de 1/20), ` +
    `pero no para ${formatSpanishList(unavailable)}. ✨`
  );
}

/**
 * Doubled catch stardust, and the same with a star piece active (x1.5).
 */
export function formatStardustDetails(baseStardust: number): string {
  const doubled = baseStardust * 2;
  const withStarPiece = Math.trunc(doubled * 1.5);
  return `Polvos estelares: cada captura otorgará ${doubled}, ${withStarPiece} con estrella. ⭐️`;
}

export function formatEvolutionInfo(
  evolutions: EvolutionRecord | null,
  megaForms: readonly MegaEvolutionRecord[],
  hasMegaInLine: boolean
): string {
  const parts: string[] = [];

  if (megaForms.length === 1) {
    parts.push(`🌟 Puede megaevolucionar a ${megaForms[0]?.megaName ?? ""}`);
  } else if (megaForms.length > 1) {
    parts.push(`🌟 Puede megaevolucionar a: ${megaForms.map((m) => m.megaName).join(", ")}`);
  }

  const targets = (evolutions?.evolutions ?? []).map((evo) => {
    let text = evo.targetName;
    if (evo.candyRequired > 0) text += ` (${evo.candyRequired} caramelos)`;
    if (evo.itemRequired) text += ` + ${evo.itemRequired}`;
    return text;
  });
  if (targets.length === 1) {
    parts.push(`🔄 Evoluciona a ${targets[0] ?? ""}`);
  } else if (targets.length > 1) {
    parts.push(`🔄 Puede evolucionar a: ${targets.join(", ")}`);
  }

  if (hasMegaInLine && megaForms.length === 0) {
    parts.push("⭐ Su línea evolutiva incluye megaevoluciones");
  }

  return parts.length > 0 ? parts.join(" | ") : "No evoluciona";
}

export function formatMegaDetails(megaForms: readonly MegaEvolutionRecord[]): string {
  if (megaForms.length === 0) {
    return "No tiene megaevolución disponible";
  }
  return megaForms
    .map((mega) => {
      const types = mega.types.map(getTypeSpanishName).join(" / ");
      return (
        `${mega.megaName}: ${types} (ATK ${mega.baseAttack}, DEF ${mega.baseDefense}, STA ${mega.baseStamina}) ` +
        `- Energía: ${mega.firstTimeMegaEnergyRequired} primera vez, ${mega.megaEnergyRequired} después`
      );
    })
    .join(" | ");
}

/**
 * Line announcing which member of the line can mega evolve, with its
 * trailing newline; empty when none can. When only the line has megas,
 * the first listed evolution target is named.
 */
export function formatSpotlightMegaInfo(
  pokemonName: string,
  evolutions: EvolutionRecord | null,
  megaForms: readonly MegaEvolutionRecord[],
  hasMegaInLine: boolean
): string {
  if (megaForms.length > 0) {
    return `❖ ${pokemonName} tiene mega-evolución disponible. 💎\n`;
  }
  const firstTarget = evolutions?.evolutions[0];
  if (hasMegaInLine && firstTarget) {
    return `❖ ${firstTarget.targetName} tiene mega-evolución disponible. 💎\n`;
  }
  return "";
}
