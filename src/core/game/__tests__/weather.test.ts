/**
 * Weather boost tests
 */

import { describe, it, expect } from "vitest";
import {
  WEATHERS,
  getBoostedTypes,
  getWeatherEmoji,
  getWeathersForType,
  isTypeBoosted,
  weatherEmojisForTypes,
} from "../weather.js";

describe("weather boosts", () => {
  it("maps each weather to an emoji", () => {
    expect(WEATHERS).toHaveLength(8);
    expect(getWeatherEmoji("rain")).toBe("🌧️");
    expect(getWeatherEmoji("windy")).toBe("🪁");
  });

  it("lists boosted types", () => {
    expect(getBoostedTypes("snow")).toEqual(["ice", "steel"]);
    expect(isTypeBoosted("ghost", "fog")).toBe(true);
    expect(isTypeBoosted("ghost", "rain")).toBe(false);
  });

  it("finds every weather boosting a type", () => {
    expect(getWeathersForType("fire")).toEqual(["clear", "sunny"]);
    expect(getWeathersForType("fairy")).toEqual(["cloudy"]);
  });
});

describe("weatherEmojisForTypes", () => {
  it("leaves out clear weather", () => {
    expect(weatherEmojisForTypes(["ground"])).toBe("☀️");
  });

  it("orders emoji by weather name", () => {
    expect(weatherEmojisForTypes(["water", "ground"])).toBe("🌧️☀️");
    expect(weatherEmojisForTypes(["fire", "flying"])).toBe("☀️🪁");
  });

  it("does not repeat an emoji for types sharing a weather", () => {
    expect(weatherEmojisForTypes(["dragon", "flying"])).toBe("🪁");
  });

  it("is empty for no types", () => {
    expect(weatherEmojisForTypes([])).toBe("");
  });
});
