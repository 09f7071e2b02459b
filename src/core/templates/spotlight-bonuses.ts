/**
 * Spotlight Hour bonus catalogue
 */

export type SpotlightBonusType = "catch_candy" | "evolution_xp" | "catch_xp" | "catch_stardust" | "transfer_candy";

export interface SpotlightBonus {
  type: SpotlightBonusType;
  description: string;
  details: string;
}

export const SPOTLIGHT_BONUSES: readonly SpotlightBonus[] = [
  {
    type: "catch_candy",
    description: "✨X2 caramelos por captura ✨",
    details: "Obtendrán el doble de caramelos por cada captura durante la hora destacada.",
  },
  {
    type: "evolution_xp",
    description: "✨X2 XP por evolución ✨",
    details:
      "XP por evolución: 1000 XP por evolución normal, 2000 XP por nueva entrada en su Pokédex " +
      "(4000 XP y 6000 XP, respectivamente, con huevo suerte activo 🥚).",
  },
  {
    type: "catch_xp",
    description: "✨X2 XP por captura ✨",
    details:
      "XP por captura: hasta 2340 XP por captura (4680 XP con huevo suerte 🥚), " +
      "por cada captura con tiro excelente, bola curva y primera bola.",
  },
  {
    type: "catch_stardust",
    description: "✨X2 polvo estelar por captura ✨",
    details: "Obtendrán el doble de polvo estelar por cada captura durante la hora destacada.",
  },
  {
    type: "transfer_candy",
    description: "✨X2 caramelos por transferencia ✨",
    details: "Obtendrán el doble de caramelos al transferir Pokémon durante la hora destacada.",
  },
];

export function findSpotlightBonus(type: SpotlightBonusType): SpotlightBonus | undefined {
  return SPOTLIGHT_BONUSES.find((bonus) => bonus.type === type);
}
