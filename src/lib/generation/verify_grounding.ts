import { REFUSAL_TEXT } from "./prompts";
import type { LabelledFact } from "./types";
import { foldText } from "@/src/lib/kg/text_normalize";

export type GroundingCheck = {
  ok: boolean;
  refused: boolean;
  cited: LabelledFact[];
  errors: string[];
};

const CITATION = /\[(F\d+)\]/g;
const HEADING_LINE = /^(?:#{1,6}\s|\*\*[^*]+\*\*:?$)|:$/;
// Caller-supplied text (a call outcome) is quoted, not claimed.
const QUOTE_LINE = /^>/;
const BULLET_PREFIX = /^(?:[-*•]|\d+[.)])\s+/;
const TIMEBOX_PREFIX = /^\d+\s*[-–]\s*\d+\s*min(?:utes)?\s*:\s*/i;
// A terminator (plus any tags right after it) ends a sentence unless a lower-case word follows.
const SENTENCE_END = /[.!?]+(?:\s*\[F\d+\])*(?=\s+[^a-z\s]|\s*$)/g;
const WORD = /[a-z0-9][a-z0-9'-]*/g;

// Greetings, sign-offs and agenda scaffolding say nothing about the client.
const COURTESY: RegExp[] = [
  /^(?:hi|hello|hey|dear|good (?:morning|afternoon|evening))\b.{0,80}[,!]$/,
  /^(?:thanks|thank you)(?: (?:so|very) much)?(?: again)?(?: for (?:your|the) (?:time|call|conversation|meeting|chat)(?: today| this (?:morning|afternoon|week))?)?[.!]?$/,
  /^(?:best|best regards|kind regards|warm regards|regards|sincerely|cheers|all the best)[,.!]?$/,
  /^\[your name\]$/,
  /^(?:i|we)(?: will|'ll) (?:follow up|be in touch)(?: soon| shortly| this week)?[.!]?$/,
  /^(?:i am |i'm )?looking forward to (?:our|the) next (?:call|conversation|meeting)[.!]?$/,
  /^(?:talk|speak) soon[.!]?$/,
  /^(?:check-in|introductions|confirm next steps|next steps|wrap-up|questions)[.!]?$/,
];

const STOP_WORDS = new Set([
  "the", "and", "but", "for", "with", "from", "into", "onto", "about", "over", "under",
  "her", "his", "him", "she", "they", "them", "their", "its", "you", "your",
  "are", "was", "were", "been", "being", "has", "have", "had",
  "that", "this", "these", "those", "when", "while", "until", "than", "then",
  "very", "more", "most", "also", "not",
]);

function citationsIn(text: string): string[] {
  return [...text.matchAll(CITATION)].map((match) => match[1]);
}

function foldForMatch(text: string) {
  return foldText(text).replace(/[’‘]/g, "'").replace(/\s+/g, " ").trim();
}

function isCourtesy(text: string) {
  const folded = foldForMatch(text.replace(CITATION, " "));
  return COURTESY.some((pattern) => pattern.test(folded));
}

function stem(word: string) {
  const base = word.replace(/'s$/, "").replace(/ies$/, "y");
  if (base.endsWith("ss")) return base;
  const match = /^(.{3,}?)(?:ings|ing|edly|ed|ly|es|s)$/.exec(base);
  return match ? match[1] : base;
}

function contentStems(text: string): Set<string> {
  const words = foldForMatch(text.replace(CITATION, " ")).match(WORD) ?? [];
  return new Set(words.filter((word) => word.length >= 3 && !STOP_WORDS.has(word)).map(stem));
}

/** True when the sentence restates at least one content word of the fact's value. */
export function sentenceSupports(sentence: string, item: LabelledFact): boolean {
  const wanted = contentStems(item.fact.value);
  if (wanted.size === 0) {
    return foldForMatch(sentence).includes(foldForMatch(item.fact.value));
  }
  const present = contentStems(sentence);
  for (const word of wanted) {
    if (present.has(word)) return true;
  }
  return false;
}

export function claimSentences(text: string): string[] {
  const sentences: string[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || HEADING_LINE.test(line) || QUOTE_LINE.test(line)) continue;
    const body = line.replace(BULLET_PREFIX, "").replace(TIMEBOX_PREFIX, "");
    // A greeting may hold periods of its own ("Hi Dr. Lee,").
    if (isCourtesy(body)) continue;

    let cursor = 0;
    for (const boundary of body.matchAll(SENTENCE_END)) {
      const end = (boundary.index ?? 0) + boundary[0].length;
      const sentence = body.slice(cursor, end).trim();
      if (sentence) sentences.push(sentence);
      cursor = end;
    }
    const tail = body.slice(cursor).trim();
    if (tail) sentences.push(tail);
  }
  return sentences;
}

/**
 * Checks that generated text only cites supplied facts, that every sentence
 * other than a greeting or sign-off carries a citation, and that each cited
 * sentence restates words from the facts it cites.
 */
export function verifyGrounding(text: string, labelled: LabelledFact[]): GroundingCheck {
  const trimmed = text.trim();
  if (trimmed === REFUSAL_TEXT) {
    return { ok: true, refused: true, cited: [], errors: [] };
  }
  if (!trimmed) {
    return { ok: false, refused: false, cited: [], errors: ["Output is empty."] };
  }

  const byLabel = new Map(labelled.map((item) => [item.label, item]));
  const errors: string[] = [];
  const cited: LabelledFact[] = [];
  const seen = new Set<string>();

  for (const label of citationsIn(trimmed)) {
    if (seen.has(label)) continue;
    seen.add(label);
    const item = byLabel.get(label);
    if (!item) {
      errors.push(`Unknown citation [${label}].`);
      continue;
    }
    cited.push(item);
  }

  if (seen.size === 0) {
    errors.push("Output cites no facts.");
  }

  for (const sentence of claimSentences(trimmed)) {
    const labels = citationsIn(sentence);
    if (labels.length === 0) {
      if (!isCourtesy(sentence)) errors.push(`Uncited claim: "${sentence.slice(0, 120)}"`);
      continue;
    }
    for (const label of new Set(labels)) {
      const item = byLabel.get(label);
      if (item && !sentenceSupports(sentence, item)) {
        errors.push(`Claim does not match [${label}]: "${sentence.slice(0, 120)}"`);
      }
    }
  }

  return { ok: errors.length === 0, refused: false, cited, errors };
}
