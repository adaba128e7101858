// src/compliance/classifier/entityRecognizer.ts
// Local named-entity recognition for classifier snippets.
//
// The wink lite model tags parts of speech but ships no entity recognizer, so
// spans are built from runs of capitalized word tokens and categorized against
// a gazetteer (data/gazetteer.json):
//
//   "She studied at National Taiwan University."  → Organization
//   "Flights leave Heathrow Airport hourly."       → Facility
//   "He moved to Japan."                           → GeopoliticalEntity
//
// A sentence-initial capital only opens a span when the tagger calls it a
// proper noun, so "Our policy ..." is not an entity.

import { readFileSync } from "node:fs";
import winkNLP from "wink-nlp";
import type { ItemSentence } from "wink-nlp";
import model from "wink-eng-lite-web-model";
import { createLogger } from "../../observability";
import type { EntityCategory, EntityRecognizer, RecognizedEntity } from "../types";

const log = createLogger("compliance/entityRecognizer");

/* ============= Gazetteer ============= */

export interface Gazetteer {
  /** Words that make a span an Organization ("university", "bank") */
  organizationKeywords: string[];
  /** Words that make a span a Facility ("airport", "museum") */
  facilityKeywords: string[];
  /** Final words that make a span a GeopoliticalEntity ("republic") */
  geopoliticalSuffixes: string[];
  /** Whole-span place names ("japan", "east asia") */
  places: string[];
}

const GAZETTEER_KEYS = [
  "organizationKeywords",
  "facilityKeywords",
  "geopoliticalSuffixes",
  "places",
] as const;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

export function parseGazetteer(raw: unknown): Gazetteer {
  if (!raw || typeof raw !== "object") {
    throw new Error("Gazetteer must be a JSON object");
  }
  const doc = raw as Record<string, unknown>;
  for (const key of GAZETTEER_KEYS) {
    if (!isStringArray(doc[key])) {
      throw new Error(`Gazetteer '${key}' must be a string array`);
    }
  }
  const list = (key: (typeof GAZETTEER_KEYS)[number]): string[] => {
    const value = doc[key];
    return isStringArray(value) ? value.map((v) => v.toLowerCase()) : [];
  };
  return {
    organizationKeywords: list("organizationKeywords"),
    facilityKeywords: list("facilityKeywords"),
    geopoliticalSuffixes: list("geopoliticalSuffixes"),
    places: list("places"),
  };
}

export function loadGazetteer(filePath: string): Gazetteer {
  return parseGazetteer(JSON.parse(readFileSync(filePath, "utf8")));
}

/* ============= Tokens ============= */

interface Token {
  text: string;
  pos: string;
  type: string;
  start: number;
  end: number;
  sentenceInitial: boolean;
}

// Lower-case words allowed inside a name: "Bank of Taiwan", "Institute for Policy"
const CONNECTORS = new Set(["of", "for", "and", "the", "&"]);

const CAPITALIZED_RE = /^\p{Lu}/u;

function strings(values: unknown): string[] {
  return Array.isArray(values) ? values.map((v) => String(v)) : [];
}

function isCapitalizedWord(token: Token): boolean {
  return token.type === "word" && CAPITALIZED_RE.test(token.text);
}

/* ============= Recognizer ============= */

export class WinkEntityRecognizer implements EntityRecognizer {
  private nlp: ReturnType<typeof winkNLP> | null = null;
  private readonly organization: Set<string>;
  private readonly facility: Set<string>;
  private readonly geopoliticalSuffixes: Set<string>;
  private readonly places: Set<string>;

  constructor(gazetteer: Gazetteer) {
    this.organization = new Set(gazetteer.organizationKeywords);
    this.facility = new Set(gazetteer.facilityKeywords);
    this.geopoliticalSuffixes = new Set(gazetteer.geopoliticalSuffixes);
    this.places = new Set(gazetteer.places);
  }

  // Pipeline built on first use: tokenization → sbd → pos
  private ensureInitialized(): ReturnType<typeof winkNLP> {
    if (!this.nlp) {
      this.nlp = winkNLP(model, ["sbd", "pos"]);
      log.debug("wink pipeline initialized");
    }
    return this.nlp;
  }

  recognize(snippet: string): RecognizedEntity[] {
    const tokens = this.tokenize(snippet);
    const entities: RecognizedEntity[] = [];

    let i = 0;
    while (i < tokens.length) {
      if (!this.opensSpan(tokens[i])) {
        i++;
        continue;
      }

      let last = i;
      let j = i + 1;
      while (j < tokens.length && !tokens[j].sentenceInitial) {
        const t = tokens[j];
        if (isCapitalizedWord(t)) {
          last = j;
          j++;
        } else if (
          CONNECTORS.has(t.text.toLowerCase()) &&
          j + 1 < tokens.length &&
          isCapitalizedWord(tokens[j + 1])
        ) {
          j++;
        } else {
          break;
        }
      }

      const start = tokens[i].start;
      const end = tokens[last].end;
      const words = tokens.slice(i, last + 1).map((t) => t.text.toLowerCase());
      entities.push({
        text: snippet.slice(start, end),
        category: this.categorize(words),
        start,
        end,
      });
      i = last + 1;
    }

    return entities;
  }

  private opensSpan(token: Token): boolean {
    if (!isCapitalizedWord(token)) return false;
    return !token.sentenceInitial || token.pos === "PROPN";
  }

  private categorize(words: string[]): EntityCategory {
    if (words.some((w) => this.organization.has(w))) return "Organization";
    if (words.some((w) => this.facility.has(w))) return "Facility";
    if (this.places.has(words.join(" "))) return "GeopoliticalEntity";
    if (words.length > 1 && this.geopoliticalSuffixes.has(words[words.length - 1])) {
      return "GeopoliticalEntity";
    }
    return "Other";
  }

  private tokenize(text: string): Token[] {
    const nlp = this.ensureInitialized();
    const its = nlp.its;
    const doc = nlp.readDoc(text);
    const tokens: Token[] = [];

    // wink reports no character offsets; align token values with the text
    let cursor = 0;
    doc.sentences().each((sentence: ItemSentence) => {
      const values = strings(sentence.tokens().out());
      const pos = strings(sentence.tokens().out(its.pos));
      const types = strings(sentence.tokens().out(its.type));

      values.forEach((value, k) => {
        const found = text.indexOf(value, cursor);
        const start = found !== -1 ? found : cursor;
        const end = start + value.length;
        tokens.push({
          text: value,
          pos: pos[k] ?? "X",
          type: types[k] ?? "word",
          start,
          end,
          sentenceInitial: k === 0,
        });
        cursor = end;
      });
    });

    return tokens;
  }
}
