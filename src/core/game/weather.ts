/**
 * In-game weather conditions and the types each one boosts.
 *
 * @module
 */

import type { PokemonType } from "./pokemon-types.js";

export const WEATHERS = ["clear", "sunny", "partly_cloudy", "cloudy", "rain", "snow", "fog", "windy"] as const;

export type Weather = (typeof WEATHERS)[number];

const WEATHER_EMOJIS: Record<Weather, string> = {
  clear: "🌙",
  sunny: "☀️",
  partly_cloudy: "⛅",
  cloudy: "☁️",
  rain: "🌧️",
  snow: "❄️",
  fog: "🌫️",
  windy: "🪁",
};

const WEATHER_BOOSTS: Record<Weather, readonly PokemonType[]> = {
  clear: ["fire", "grass", "ground"],
  sunny: ["fire", "grass", "ground"],
  partly_cloudy: ["normal", "rock"],
  cloudy: ["fighting", "poison", "fairy"],
  rain: ["water", "electric", "bug"],
  snow: ["ice", "steel"],
  fog: ["dark", "ghost"],
  windy: ["flying", "dragon", "psychic"],
};

export function getWeatherEmoji(weather: Weather): string {
  return WEATHER_EMOJIS[weather];
}

export function getBoostedTypes(weather: Weather): readonly PokemonType[] {
  return WEATHER_BOOSTS[weather];
}

export function isTypeBoosted(type: PokemonType, weather: Weather): boolean {
  return WEATHER_BOOSTS[weather].includes(type);
}

export function getWeathersForType(type: PokemonType): Weather[] {
  return WEATHERS.filter((weather) => isTypeBoosted(type, weather));
}

/**
 * Emoji of every weather that boosts any of the given types, ordered by
 * weather token with duplicates removed. Clear weather is left out because
 * meetups run during daylight.
 */
export function weatherEmojisForTypes(types: readonly PokemonType[]): string {
  const boosting = new Set<Weather>();
  for (const type of types) {
    for (const weather of getWeathersForType(type)) {
      boosting.add(weather);
    }
  }
  boosting.delete("clear");

  const emojis: string[] = [];
  for (const weather of [...boosting].sort()) {
    const emoji = WEATHER_EMOJIS[weather];
    if (!emojis.includes(emoji)) {
      emojis.push(emoji);
    }
  }
  return emojis.join("");
}
