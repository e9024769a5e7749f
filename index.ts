export { parse, getDefaultParser, ReferenceParser } from "./lib/bible/parser";
export { parseLocations } from "./lib/bible/locations";
export { expandRange } from "./lib/bible/range";
export {
  compileGrammar,
  getDefaultGrammar,
  DEFAULT_GRAMMAR_SOURCE,
  GrammarError,
  type GrammarSource,
  type ReferenceGrammar
} from "./lib/bible/grammar";
export {
  createBibleReference,
  createVerseLocation,
  isSameLocation,
  isSameReference,
  locationKey,
  type BibleReference,
  type VerseLocation
} from "./lib/bible/reference";
export { formatLocation, formatReference, formatSequence, FormatError } from "./lib/bible/format";
