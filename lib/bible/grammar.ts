import { grammarSourceSchema, type GrammarSource } from "../validation/reference";

export type { GrammarSource };

// Single chapter: 1
// Range: 1-2
// Sequence: 1,4
// Mixed chapters: 1-2,4
// Single verse: 1:1
// Range: 1:1-3
// Sequence: 1:1,3
// Mixed verses: 1:1-2,4
const LOCATION_PATTERN =
  "(?<chapter>1?[0-9]?[0-9])" +
  "(?<chapterSteps>(?:-\\d+|,\\s*\\d+)*)" +
  "(?::\\s*(?<verse>\\d+))?" +
  "(?<verseSteps>(?:-\\d+|,\\s*\\d+)*)";

// Gen 1:1, 2
// 3 King 1:3-4
// II Ki. 3:12-14, 25
//
// A book starts at the beginning of a letter run, except for a roman numeral
// prefix followed by whitespace ("XII Ki 3" gives "II Ki"). Starting anywhere
// else inside a run cannot produce a match the run start would not, and
// retrying there makes long letter runs quadratic.
const REFERENCE_PATTERN =
  "(?<book>(?:(?<!\\p{L})(?:(?:[1234]|I{1,4})\\s*)?|(?<=\\p{L})I{1,4}\\s+)\\p{L}+\\.?)\\s*" +
  "(?<locations>(?:" +
  "1?[0-9]?[0-9]" +
  "(?:-\\d+|,\\s*\\d+)*" +
  "(?::\\s*\\d+)?" +
  "(?:-\\d+|,\\s*\\d+)*" +
  "\\s?)+)";

const STEP_PATTERN = "-(?<end>\\d+)|,\\s*(?<next>\\d+)";

export const DEFAULT_GRAMMAR_SOURCE: GrammarSource = Object.freeze({
  reference: REFERENCE_PATTERN,
  location: LOCATION_PATTERN,
  step: STEP_PATTERN
});

const REQUIRED_GROUPS: Record<keyof GrammarSource, string[]> = {
  reference: ["book", "locations"],
  location: ["chapter", "chapterSteps", "verse", "verseSteps"],
  step: ["end", "next"]
};

/**
 * Compiled form of a GrammarSource. Immutable once built, so a single
 * instance can back any number of parsers.
 *
 * `reference` and `location` carry the global flag and are only ever driven
 * through `String.prototype.matchAll`, which clones the expression, so their
 * `lastIndex` is never touched.
 */
export type ReferenceGrammar = {
  readonly source: GrammarSource;
  readonly reference: RegExp;
  readonly location: RegExp;
  readonly step: RegExp;
};

export class GrammarError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GrammarError";
  }
}

function compilePattern(name: keyof GrammarSource, pattern: string, flags: string): RegExp {
  let compiled: RegExp;
  try {
    compiled = new RegExp(pattern, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GrammarError(`Invalid ${name} pattern: ${reason}`);
  }

  const missing = REQUIRED_GROUPS[name].filter((group) => !pattern.includes(`(?<${group}>`));
  if (missing.length > 0) {
    throw new GrammarError(`The ${name} pattern is missing named groups: ${missing.join(", ")}`);
  }

  return compiled;
}

export function compileGrammar(source: GrammarSource = DEFAULT_GRAMMAR_SOURCE): ReferenceGrammar {
  const parsed = grammarSourceSchema.safeParse(source);
  if (!parsed.success) {
    throw new GrammarError(`Invalid grammar source: ${parsed.error.issues.map((issue) => issue.path.join(".")).join(", ")}`);
  }

  return Object.freeze({
    source: Object.freeze({ ...parsed.data }),
    reference: compilePattern("reference", parsed.data.reference, "gu"),
    location: compilePattern("location", parsed.data.location, "gu"),
    step: compilePattern("step", parsed.data.step, "gu")
  });
}

let defaultGrammar: ReferenceGrammar | undefined;

/** Compiles the built-in grammar on first call and returns the same instance afterwards. */
export function getDefaultGrammar(): ReferenceGrammar {
  defaultGrammar ??= compileGrammar();
  return defaultGrammar;
}
