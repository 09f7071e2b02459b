/**
 * Combat Power calculation.
 *
 * @module
 */

export interface CpMultiplierEntry {
  level: number;
  multiplier: number;
}

/** Used when the curve has no entry for the requested level */
export const FALLBACK_CP_MULTIPLIER = 0.5;

/** Reference CPs always assume a perfect 15/15/15 spread */
export const PERFECT_IV = 15;

export const MIN_CP = 10;

/**
 * Multiplier for the exact level; no interpolation between entries.
 */
export function findMultiplier(level: number, curve: readonly CpMultiplierEntry[]): number {
  return curve.find((entry) => entry.level === level)?.multiplier ?? FALLBACK_CP_MULTIPLIER;
}

/**
 * CP of a perfect-IV Pokémon at `level`:
 * floor(atk * sqrt(def) * sqrt(sta) / 10), never below 10.
 */
export function computeCP(
  baseAttack: number,
  baseDefense: number,
  baseStamina: number,
  level: number,
  curve: readonly CpMultiplierEntry[]
): number {
  const multiplier = findMultiplier(level, curve);
  const attack = (baseAttack + PERFECT_IV) * multiplier;
  const defense = (baseDefense + PERFECT_IV) * multiplier;
  const stamina = (baseStamina + PERFECT_IV) * multiplier;

  const cp = Math.floor((attack * Math.sqrt(defense) * Math.sqrt(stamina)) / 10);
  return Math.max(cp, MIN_CP);
}

export interface ReferenceCps {
  cpLevel20: number;
  cpLevel25: number;
  cpLevel30: number;
  cpLevel40: number;
}

export function computeReferenceCps(
  baseAttack: number,
  baseDefense: number,
  baseStamina: number,
  curve: readonly CpMultiplierEntry[]
): ReferenceCps {
  const at = (level: number): number => computeCP(baseAttack, baseDefense, baseStamina, level, curve);
  return {
    cpLevel20: at(20),
    cpLevel25: at(25),
    cpLevel30: at(30),
    cpLevel40: at(40),
  };
}
