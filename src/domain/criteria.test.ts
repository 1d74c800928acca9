import {
  criteriaFromInput,
  getDefaultCriteria,
  parsePercentInput,
  parseStreakInput,
  thresholdAsPercent,
  validateCriteria,
} from "./criteria";
import { InvalidCriteriaError } from "./errors";

describe("criteria", () => {
  describe("validateCriteria", () => {
    it("accepts the boundaries", () => {
      expect(() => validateCriteria({ absenceThreshold: 0, minStreak: 0 })).not.toThrow();
      expect(() => validateCriteria({ absenceThreshold: 1, minStreak: 30 })).not.toThrow();
    });

    it("lists every problem in one error", () => {
      expect(() => validateCriteria({ absenceThreshold: 2, minStreak: -3 })).toThrow(
        "Invalid defaulter criteria: absenceThreshold must be between 0 and 1; minStreak must be a non-negative whole number"
      );
    });

    it("rejects NaN", () => {
      expect(() => validateCriteria({ absenceThreshold: NaN, minStreak: 1 })).toThrow(InvalidCriteriaError);
    });
  });

  describe("criteriaFromInput", () => {
    it("converts a percentage to a fraction", () => {
      expect(criteriaFromInput(15, 3)).toEqual({ absenceThreshold: 0.15, minStreak: 3 });
    });

    it("rejects out-of-range percentages", () => {
      expect(() => criteriaFromInput(120, 3)).toThrow(InvalidCriteriaError);
    });
  });

  describe("thresholdAsPercent", () => {
    it("rounds away floating point noise", () => {
      expect(thresholdAsPercent({ absenceThreshold: 0.07, minStreak: 0 })).toBe(7);
    });
  });

  describe("parsePercentInput", () => {
    it("parses numbers with or without a percent sign", () => {
      expect(parsePercentInput("25")).toBe(25);
      expect(parsePercentInput(" 12.5% ")).toBe(12.5);
    });

    it("returns null for blank input", () => {
      expect(parsePercentInput("   ")).toBeNull();
    });

    it.each(["abc", "101", "-1"])("rejects %j", (text) => {
      expect(() => parsePercentInput(text)).toThrow(InvalidCriteriaError);
    });
  });

  describe("parseStreakInput", () => {
    it("parses whole numbers", () => {
      expect(parseStreakInput("3")).toBe(3);
      expect(parseStreakInput("0")).toBe(0);
    });

    it("returns null for blank input", () => {
      expect(parseStreakInput("")).toBeNull();
    });

    it.each(["2.5", "-1", "five"])("rejects %j", (text) => {
      expect(() => parseStreakInput(text)).toThrow(
        "Invalid defaulter criteria: minimum streak must be a non-negative whole number"
      );
    });
  });

  describe("getDefaultCriteria", () => {
    let warnSpy: jest.SpyInstance;

    beforeEach(() => {
      warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
    });

    afterEach(() => {
      warnSpy.mockRestore();
    });

    it("uses built-in defaults when nothing is configured", () => {
      expect(getDefaultCriteria({})).toEqual({ absenceThreshold: 0.1, minStreak: 5 });
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it("reads values from the environment", () => {
      const env = { ATTENDANCE_ABSENCE_THRESHOLD: "25", ATTENDANCE_MIN_STREAK: "7" };

      expect(getDefaultCriteria(env)).toEqual({ absenceThreshold: 0.25, minStreak: 7 });
    });

    it("falls back and warns on invalid values", () => {
      const env = { ATTENDANCE_ABSENCE_THRESHOLD: "lots", ATTENDANCE_MIN_STREAK: "4" };

      expect(getDefaultCriteria(env)).toEqual({ absenceThreshold: 0.1, minStreak: 4 });
      expect(warnSpy).toHaveBeenCalledWith(
        "Ignoring ATTENDANCE_ABSENCE_THRESHOLD: Invalid defaulter criteria: absence threshold must be a number between 0 and 100"
      );
    });
  });
});
