import type { BibleReference, VerseLocation } from "./reference";

export class FormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormatError";
  }
}

function isRun(values: readonly number[]): boolean {
  return values.every((value, index) => index === 0 || value === values[index - 1] + 1);
}

/**
 * Renders a sequence in the notation the parser reads back: "3", "3,5",
 * "3-6" or "3-6,9".
 */
export function formatSequence(values: readonly number[]): string {
  if (values.length === 0) {
    throw new FormatError("Cannot format an empty sequence");
  }
  if (values.length === 1) {
    return String(values[0]);
  }
  if (values.length === 2) {
    return `${values[0]},${values[1]}`;
  }
  if (isRun(values)) {
    return `${values[0]}-${values[values.length - 1]}`;
  }

  const head = values.slice(0, -1);
  if (isRun(head)) {
    return `${head[0]}-${head[head.length - 1]},${values[values.length - 1]}`;
  }

  throw new FormatError(`Sequence has no range notation: ${values.join(",")}`);
}

export function formatLocation(location: VerseLocation): string {
  const chapters = formatSequence(location.chapters);
  return location.verses ? `${chapters}:${formatSequence(location.verses)}` : chapters;
}

export function formatReference(reference: BibleReference): string {
  if (reference.locations.length === 0) {
    throw new FormatError(`Reference "${reference.book}" has no locations`);
  }
  return [reference.book, ...reference.locations.map(formatLocation)].join(" ");
}
