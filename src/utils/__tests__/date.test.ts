import { describe, it, expect } from "vitest";
import {
  MONDAY,
  TUESDAY,
  WEDNESDAY,
  formatSpanishDate,
  getCurrentWeekInfo,
  getLegendaryHourDate,
  getSpotlightTuesdayDate,
  getWeekendEventDate,
  nextWeekday,
} from "../date.js";
import { InvalidInputError } from "../../core/errors.js";

// Wednesday 4 June 2025, local time
const WEDNESDAY_4_JUNE = new Date(2025, 5, 4, 9, 30, 0);

describe("nextWeekday", () => {
  it("moves forward to the requested weekday", () => {
    const monday = nextWeekday(MONDAY, WEDNESDAY_4_JUNE);
    expect(monday.getDate()).toBe(9);
    expect(monday.getHours()).toBe(9);
  });

  it("returns the same day when it already matches", () => {
    expect(nextWeekday(WEDNESDAY, WEDNESDAY_4_JUNE).getDate()).toBe(4);
  });

  it("does not mutate the reference date", () => {
    nextWeekday(TUESDAY, WEDNESDAY_4_JUNE);
    expect(WEDNESDAY_4_JUNE.getDate()).toBe(4);
  });

  it("rejects weekdays outside 0 to 6", () => {
    expect(() => nextWeekday(7, WEDNESDAY_4_JUNE)).toThrow(InvalidInputError);
    expect(() => nextWeekday(1.5, WEDNESDAY_4_JUNE)).toThrow(InvalidInputError);
  });
});

describe("formatSpanishDate", () => {
  it("formats the full and short forms", () => {
    expect(formatSpanishDate(WEDNESDAY_4_JUNE)).toBe("miércoles 4 de junio");
    expect(formatSpanishDate(WEDNESDAY_4_JUNE, "short")).toBe("4 de junio");
  });
});

describe("event dates", () => {
  it("crosses month boundaries", () => {
    expect(getSpotlightTuesdayDate(new Date(2026, 0, 31))).toBe("martes 3 de febrero");
  });

  it("maps legendary day choices 1 to 7 onto Monday to Sunday", () => {
    expect(getLegendaryHourDate(1, WEDNESDAY_4_JUNE)).toBe("lunes 9 de junio");
    expect(getLegendaryHourDate(3, WEDNESDAY_4_JUNE)).toBe("miércoles 4 de junio");
    expect(getLegendaryHourDate(7, WEDNESDAY_4_JUNE)).toBe("domingo 8 de junio");
    expect(() => getLegendaryHourDate(0, WEDNESDAY_4_JUNE)).toThrow(InvalidInputError);
  });

  it("maps weekend choices onto Saturday and Sunday", () => {
    expect(getWeekendEventDate(1, WEDNESDAY_4_JUNE)).toBe("sábado 7 de junio");
    expect(getWeekendEventDate(2, WEDNESDAY_4_JUNE)).toBe("domingo 8 de junio");
    expect(() => getWeekendEventDate(3, WEDNESDAY_4_JUNE)).toThrow(InvalidInputError);
  });
});

describe("getCurrentWeekInfo", () => {
  it("describes the coming Monday", () => {
    expect(getCurrentWeekInfo(WEDNESDAY_4_JUNE)).toEqual({
      nextMondayDate: "lunes 9 de junio",
      nextMondayShort: "9 de junio",
      isTodayMonday: false,
      daysUntilMonday: 5,
      currentDate: "miércoles 4 de junio",
    });
  });
});
