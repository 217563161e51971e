/**
 * Sentiment & urgency classifier.
 *
 * A lexical rule engine over three term sets (positive, negative, urgent).
 * The term sets are data (`data/lexicon.json`) and can be swapped by
 * passing another `Lexicon`. The result is triage information for
 * moderators; it never blocks or rejects a message.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import { contentText, type MessageContent, type Sentiment } from "../types.js";

export interface Lexicon {
  positive: ReadonlySet<string>;
  negative: ReadonlySet<string>;
  urgent: ReadonlySet<string>;
}

export interface Classification {
  sentiment: Sentiment;
  score: number;
  urgent: boolean;
  posCount: number;
  negCount: number;
}

export type Classifier = (text: string) => Classification;

const LexiconFileSchema = z.object({
  positive: z.array(z.string().min(1)),
  negative: z.array(z.string().min(1)),
  urgent: z.array(z.string().min(1)),
});

const toTermSet = (terms: string[]) => new Set(terms.map((t) => t.toLowerCase()));

export function parseLexicon(raw: unknown): Lexicon {
  const parsed = LexiconFileSchema.parse(raw);
  return {
    positive: toTermSet(parsed.positive),
    negative: toTermSet(parsed.negative),
    urgent: toTermSet(parsed.urgent),
  };
}

export function loadLexicon(path: string | URL): Lexicon {
  return parseLexicon(JSON.parse(readFileSync(path, "utf8")));
}

export const DEFAULT_LEXICON_URL = new URL("../../data/lexicon.json", import.meta.url);

export const defaultLexicon: Lexicon = loadLexicon(DEFAULT_LEXICON_URL);

const WORD = /[\p{L}\p{N}_]+/gu;

// A term counts once: as a token, or else as a substring of the raw text
// (multi-word terms, emoji, terms glued to punctuation).
function matchCount(terms: ReadonlySet<string>, tokens: ReadonlySet<string>, raw: string): number {
  let n = 0;
  for (const term of terms) {
    if (tokens.has(term) || raw.includes(term)) n++;
  }
  return n;
}

function hasMatch(terms: ReadonlySet<string>, tokens: ReadonlySet<string>, raw: string): boolean {
  for (const term of terms) {
    if (tokens.has(term) || raw.includes(term)) return true;
  }
  return false;
}

const TIE_EPSILON = 1e-9;

/** Round to `decimals` places, ties to the even neighbour (0.125 → 0.12). */
export function roundHalfEven(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  if (Math.abs(scaled - floor - 0.5) < TIE_EPSILON) {
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
  }
  return Math.round(scaled) / factor;
}

export function classify(text: string | null | undefined, lexicon: Lexicon = defaultLexicon): Classification {
  if (!text) {
    return { sentiment: "neutral", score: 0, urgent: false, posCount: 0, negCount: 0 };
  }

  const raw = text.toLowerCase();
  const tokens = new Set(raw.match(WORD) ?? []);

  const urgent = hasMatch(lexicon.urgent, tokens, raw);
  const posCount = matchCount(lexicon.positive, tokens, raw);
  const negCount = matchCount(lexicon.negative, tokens, raw);

  const total = posCount + negCount;
  if (total === 0) {
    return { sentiment: "neutral", score: 0, urgent, posCount, negCount };
  }

  const ratio = (posCount - negCount) / total;
  const sentiment: Sentiment = ratio > 0.2 ? "positive" : ratio < -0.2 ? "negative" : "neutral";

  return {
    sentiment,
    score: roundHalfEven(ratio, 2),
    urgent,
    posCount,
    negCount,
  };
}

/** Classify the text of a message, or its caption for media. */
export function classifyContent(content: MessageContent, classifier: Classifier = classify): Classification {
  return classifier(contentText(content));
}
