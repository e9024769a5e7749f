import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import {
  createBibleReference,
  createVerseLocation,
  isSameLocation,
  isSameReference,
  locationKey
} from "@/lib/bible/reference";
import { parse } from "@/lib/bible/parser";

describe("createVerseLocation", () => {
  it("defaults verses to null", () => {
    expect(createVerseLocation({ chapters: [1, 3] })).toEqual({ chapters: [1, 3], verses: null });
  });

  it("freezes the location", () => {
    const location = createVerseLocation({ chapters: [1], verses: [1, 2] });
    expect(Object.isFrozen(location)).toBe(true);
    expect(Object.isFrozen(location.verses)).toBe(true);
  });

  it("rejects empty and out of range sequences", () => {
    expect(() => createVerseLocation({ chapters: [] })).toThrow(ZodError);
    expect(() => createVerseLocation({ chapters: [1], verses: [] })).toThrow(ZodError);
    expect(() => createVerseLocation({ chapters: [256] })).toThrow(ZodError);
    expect(() => createVerseLocation({ chapters: [1.5] })).toThrow(ZodError);
  });
});

describe("createBibleReference", () => {
  it("builds a reference", () => {
    const reference = createBibleReference({ book: "Gen", locations: [{ chapters: [1], verses: [1, 2] }] });
    expect(reference.book).toBe("Gen");
    expect(reference.locations[0].chapters).toEqual([1]);
    expect(reference.locations[0].verses).toEqual([1, 2]);
    expect(Object.isFrozen(reference.locations)).toBe(true);
  });

  it("rebuilds a parsed reference into an equal value", () => {
    const [parsed] = parse("Gen 1:1-2 2:2,5");
    const rebuilt = createBibleReference({ book: parsed.book, locations: parsed.locations });
    expect(rebuilt).toEqual(parsed);
    expect(isSameReference(rebuilt, parsed)).toBe(true);
  });

  it("requires a book and at least one location", () => {
    expect(() => createBibleReference({ book: "", locations: [{ chapters: [1] }] })).toThrow(ZodError);
    expect(() => createBibleReference({ book: "Gen", locations: [] })).toThrow(ZodError);
  });
});

describe("location equality", () => {
  it("compares by value", () => {
    const left = createVerseLocation({ chapters: [1], verses: [2, 4] });
    expect(isSameLocation(left, { chapters: [1], verses: [2, 4] })).toBe(true);
    expect(isSameLocation(left, { chapters: [1], verses: [4, 2] })).toBe(false);
    expect(isSameLocation(left, { chapters: [1], verses: null })).toBe(false);
  });

  it("compares references by book and locations", () => {
    const reference = createBibleReference({ book: "Rev", locations: [{ chapters: [2, 4] }] });
    expect(isSameReference(reference, { book: "Rev", locations: [{ chapters: [2, 4], verses: null }] })).toBe(true);
    expect(isSameReference(reference, { book: "Rev.", locations: [{ chapters: [2, 4], verses: null }] })).toBe(false);
  });

  it("keys equal locations alike", () => {
    expect(locationKey({ chapters: [1, 2], verses: [3] })).toBe("1,2|3");
    expect(locationKey({ chapters: [4], verses: null })).toBe("4|-");

    const keys = new Set([
      locationKey(createVerseLocation({ chapters: [1], verses: [1] })),
      locationKey({ chapters: [1], verses: [1] })
    ]);
    expect(keys.size).toBe(1);
  });
});
