import { bibleReferenceSchema, verseLocationSchema } from "../validation/reference";

export type VerseLocation = {
  readonly chapters: readonly number[];
  readonly verses: readonly number[] | null;
};

export type BibleReference = {
  readonly book: string;
  readonly locations: readonly VerseLocation[];
};

export type VerseLocationInput = {
  chapters: readonly number[];
  verses?: readonly number[] | null;
};

export type BibleReferenceInput = {
  book: string;
  locations: readonly VerseLocationInput[];
};

function freezeLocation(chapters: number[], verses: number[] | null): VerseLocation {
  return Object.freeze({
    chapters: Object.freeze(chapters),
    verses: verses ? Object.freeze(verses) : null
  });
}

export function createVerseLocation(input: VerseLocationInput): VerseLocation {
  const parsed = verseLocationSchema.parse(input);
  return freezeLocation(parsed.chapters, parsed.verses);
}

export function createBibleReference(input: BibleReferenceInput): BibleReference {
  const parsed = bibleReferenceSchema.parse(input);
  return Object.freeze({
    book: parsed.book,
    locations: Object.freeze(parsed.locations.map((location) => freezeLocation(location.chapters, location.verses)))
  });
}

function sameSequence(left: readonly number[] | null, right: readonly number[] | null): boolean {
  if (left === null || right === null) {
    return left === right;
  }
  return left.length === right.length && left.every((value, index) => value === right[index]);
}

export function isSameLocation(left: VerseLocation, right: VerseLocation): boolean {
  return sameSequence(left.chapters, right.chapters) && sameSequence(left.verses, right.verses);
}

export function isSameReference(left: BibleReference, right: BibleReference): boolean {
  return (
    left.book === right.book &&
    left.locations.length === right.locations.length &&
    left.locations.every((location, index) => isSameLocation(location, right.locations[index]))
  );
}

/**
 * Stable key for a location, e.g. "1,2|3" or "4|-". Two locations share a key
 * exactly when isSameLocation holds for them.
 */
export function locationKey(location: VerseLocation): string {
  const verses = location.verses ? location.verses.join(",") : "-";
  return `${location.chapters.join(",")}|${verses}`;
}
