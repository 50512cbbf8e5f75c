import { describe, expect, it } from "vitest";
import {
  formatDuration,
  formatReportTimestamp,
  formatZonedISO,
  isDateKey,
  isoWeek,
  subtractMonths,
  toDateKey,
} from "./date";

describe("date utils", () => {
  describe("formatZonedISO", () => {
    it("should use the winter offset for Stockholm", () => {
      const d = new Date("2024-11-25T09:42:05.123Z");
      expect(formatZonedISO(d)).toBe("2024-11-25T10:42:05+01:00");
    });

    it("should use the summer offset for Stockholm", () => {
      const d = new Date("2025-06-02T08:00:00Z");
      expect(formatZonedISO(d)).toBe("2025-06-02T10:00:00+02:00");
    });

    it("should format UTC with a zero offset", () => {
      const d = new Date("2025-01-01T00:00:00Z");
      expect(formatZonedISO(d, "UTC")).toBe("2025-01-01T00:00:00+00:00");
    });
  });

  describe("toDateKey", () => {
    it("should return the calendar date in the time zone", () => {
      // 23:30 UTC is already the next day in Stockholm
      const d = new Date("2024-12-31T23:30:00Z");
      expect(toDateKey(d)).toBe("2025-01-01");
      expect(toDateKey(d, "UTC")).toBe("2024-12-31");
    });
  });

  it("should format the report timestamp", () => {
    const d = new Date("2024-11-25T09:42:05Z");
    expect(formatReportTimestamp(d)).toBe("2024-11-25 kl 10:42");
  });

  describe("isoWeek", () => {
    it("should number a mid-year Monday", () => {
      expect(isoWeek(2024, 11, 25)).toEqual({ week: 48, year: 2024 });
    });

    it("should put late December into week 1 of the next year", () => {
      expect(isoWeek(2024, 12, 30)).toEqual({ week: 1, year: 2025 });
    });

    it("should put early January into the last week of the previous year", () => {
      expect(isoWeek(2021, 1, 3)).toEqual({ week: 53, year: 2020 });
    });
  });

  describe("isDateKey", () => {
    it("should accept real dates only", () => {
      expect(isDateKey("2024-02-29")).toBe(true);
      expect(isDateKey("2023-02-29")).toBe(false);
      expect(isDateKey("2024-13-01")).toBe(false);
      expect(isDateKey("2024-11-25T10:00:00")).toBe(false);
    });
  });

  describe("subtractMonths", () => {
    it("should subtract within a year", () => {
      expect(subtractMonths("2025-08-15", 6)).toBe("2025-02-15");
    });

    it("should cross a year boundary", () => {
      expect(subtractMonths("2025-03-15", 6)).toBe("2024-09-15");
    });

    it("should clamp to the end of a shorter month", () => {
      expect(subtractMonths("2025-08-31", 6)).toBe("2025-02-28");
    });

    it("should reject malformed input", () => {
      expect(() => subtractMonths("15/3", 6)).toThrow(RangeError);
    });
  });

  it("should format durations", () => {
    expect(formatDuration(5.7)).toBe("5s");
    expect(formatDuration(3723)).toBe("1h2m3s");
  });
});
