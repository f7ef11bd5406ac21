import { describe, expect, it } from "vitest";
import { Languages, Platforms, Queue, Queues } from "../src/data/enums.js";
import { chunk, deduplicate, groupBy } from "../src/utils/collections.js";
import { dateWindows } from "../src/utils/dateWindows.js";
import { SequenceMatcher, similarityAbove } from "../src/utils/similarity.js";
import { formatApiDate, formatSignatureTimestamp, parseApiTimestamp } from "../src/utils/timestamp.js";

describe("collections", () => {
  it("chunks values and rejects invalid sizes", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 10)).toEqual([]);
    expect(() => chunk([1], 0)).toThrow(RangeError);
    expect(() => chunk([1], 1.5)).toThrow(RangeError);
  });

  it("deduplicates in first-seen order and removes unwanted values", () => {
    expect(deduplicate([3, 1, 3, 0, 2, 1], 0)).toEqual([3, 1, 2]);
  });

  it("groups by key in insertion order", () => {
    const groups = groupBy(["apple", "avocado", "banana"], (value) => value[0]);
    expect([...groups.entries()]).toEqual([
      ["a", ["apple", "avocado"]],
      ["b", ["banana"]]
    ]);
  });
});

describe("similarity", () => {
  it("computes the matching-blocks ratio", () => {
    expect(new SequenceMatcher("abcd", "bcde").ratio()).toBe(0.75);
    expect(new SequenceMatcher("", "").ratio()).toBe(1);
  });

  it("returns null below the cutoff", () => {
    expect(similarityAbove("androxus", "andro", 0.6)).toBeCloseTo(10 / 13);
    expect(similarityAbove("ash", "andro", 0.6)).toBeNull();
  });
});

describe("timestamps", () => {
  it("parses API timestamps as UTC", () => {
    expect(parseApiTimestamp("1/2/2020 3:04:05 PM")?.toISOString()).toBe("2020-01-02T15:04:05.000Z");
    expect(parseApiTimestamp("12/31/2023 12:00:00 AM")?.toISOString()).toBe("2023-12-31T00:00:00.000Z");
    expect(parseApiTimestamp("")).toBeNull();
    expect(parseApiTimestamp("not a date")).toBeNull();
  });

  it("formats signature timestamps and dates", () => {
    const date = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));
    expect(formatSignatureTimestamp(date)).toBe("20240102030405");
    expect(formatApiDate(date)).toBe("20240102");
  });
});

describe("dateWindows", () => {
  const start = new Date("2024-01-01T00:00:00Z");
  const end = new Date("2024-01-03T01:20:00Z");
  const expected = [
    ["20240101", "-1"],
    ["20240102", "-1"],
    ["20240103", "0"],
    ["20240103", "1,00"],
    ["20240103", "1,10"]
  ];

  it("uses whole days, then hours, then 10-minute slots", () => {
    expect([...dateWindows(start, end)]).toEqual(expected);
  });

  it("walks backwards with reverse", () => {
    expect([...dateWindows(start, end, true)]).toEqual([...expected].reverse());
  });

  it("starts with slots and hours up to the next boundary", () => {
    const windows = [...dateWindows(new Date("2024-03-05T22:40:00Z"), new Date("2024-03-06T00:00:00Z"))];
    expect(windows).toEqual([
      ["20240305", "22,40"],
      ["20240305", "22,50"],
      ["20240305", "23"]
    ]);
  });

  it("yields nothing for an empty range", () => {
    expect([...dateWindows(end, start)]).toEqual([]);
  });
});

describe("enum registries", () => {
  it("resolves names, aliases and values", () => {
    expect(Languages.resolve("English")).toBe(1);
    expect(Languages.resolve("de")).toBe(2);
    expect(Languages.resolve("11")).toBe(11);
    expect(Languages.resolve(4)).toBeUndefined();
    expect(Platforms.resolve("epic games")).toBe(28);
    expect(Platforms.nameOf(28)).toBe("Epic Games");
    expect(Queues.resolve("tdm")).toBe(Queue.Team_Deathmatch);
    expect(Queues.resolveOr("nope", Queue.Unknown)).toBe(Queue.Unknown);
  });
});
