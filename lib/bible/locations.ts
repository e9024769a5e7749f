import { env } from "../env";
import { MAX_LOCATION_NUMBER } from "../validation/reference";
import { getDefaultGrammar, type ReferenceGrammar } from "./grammar";
import { expandRange } from "./range";
import { createVerseLocation, type VerseLocation } from "./reference";

type Steps = {
  end?: number;
  next?: number;
};

class OutOfRangeError extends Error {
  constructor(readonly raw: string) {
    super(`Location number out of range: ${raw}`);
    this.name = "OutOfRangeError";
  }
}

function toLocationNumber(raw: string): number {
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 0 || value > MAX_LOCATION_NUMBER) {
    throw new OutOfRangeError(raw);
  }
  return value;
}

// Later steps overwrite earlier ones of the same kind: "1-2-5" ends at 5.
function readSteps(grammar: ReferenceGrammar, run: string | undefined): Steps {
  const steps: Steps = {};
  if (!run) {
    return steps;
  }

  for (const match of run.matchAll(grammar.step)) {
    const end = match.groups?.end;
    const next = match.groups?.next;
    if (end !== undefined) {
      steps.end = toLocationNumber(end);
    }
    if (next !== undefined) {
      steps.next = toLocationNumber(next);
    }
  }
  return steps;
}

function toLocation(grammar: ReferenceGrammar, groups: Record<string, string | undefined>): VerseLocation | null {
  const chapter = groups.chapter;
  if (chapter === undefined) {
    return null;
  }

  const chapterSteps = readSteps(grammar, groups.chapterSteps);
  const chapters = expandRange(toLocationNumber(chapter), chapterSteps.next, chapterSteps.end);

  let verses: number[] | null = null;
  if (groups.verse !== undefined) {
    const verseSteps = readSteps(grammar, groups.verseSteps);
    verses = expandRange(toLocationNumber(groups.verse), verseSteps.next, verseSteps.end);
  }

  return createVerseLocation({ chapters, verses });
}

/**
 * Splits the chapter/verse part of a citation ("1:1-2 2:2,5") into one
 * location per match of the location grammar, left to right. Matches without
 * a chapter or with a number outside 0-255 are skipped.
 */
export function parseLocations(text: string, grammar: ReferenceGrammar = getDefaultGrammar()): VerseLocation[] {
  const locations: VerseLocation[] = [];

  for (const match of text.matchAll(grammar.location)) {
    try {
      const location = toLocation(grammar, match.groups ?? {});
      if (location) {
        locations.push(location);
      }
    } catch (error) {
      if (!(error instanceof OutOfRangeError)) {
        throw error;
      }
      if (env.debugParser) {
        console.debug("location_skipped", { location: match[0], value: error.raw });
      }
    }
  }

  return locations;
}
