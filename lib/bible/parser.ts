import { compileGrammar, getDefaultGrammar, type GrammarSource, type ReferenceGrammar } from "./grammar";
import { parseLocations } from "./locations";
import { createBibleReference, type BibleReference } from "./reference";

function isCompiled(grammar: ReferenceGrammar | GrammarSource): grammar is ReferenceGrammar {
  return grammar.reference instanceof RegExp;
}

/**
 * Finds citations such as "Gen 1:1-3", "1 Пет 5-8, 10" or "II Ki. 3:12-14, 25"
 * in free text. The book label is returned exactly as written.
 */
export class ReferenceParser {
  readonly grammar: ReferenceGrammar;

  constructor(grammar: ReferenceGrammar | GrammarSource = getDefaultGrammar()) {
    this.grammar = isCompiled(grammar) ? grammar : compileGrammar(grammar);
  }

  parse(text: string): BibleReference[] {
    const references: BibleReference[] = [];

    for (const match of text.matchAll(this.grammar.reference)) {
      const book = match.groups?.book;
      const locationsText = match.groups?.locations;
      if (book === undefined || locationsText === undefined) {
        continue;
      }

      const locations = parseLocations(locationsText, this.grammar);
      if (locations.length === 0) {
        continue;
      }

      references.push(createBibleReference({ book, locations }));
    }

    return references;
  }
}

let defaultParser: ReferenceParser | undefined;

export function getDefaultParser(): ReferenceParser {
  defaultParser ??= new ReferenceParser();
  return defaultParser;
}

export function parse(text: string): BibleReference[] {
  return getDefaultParser().parse(text);
}
