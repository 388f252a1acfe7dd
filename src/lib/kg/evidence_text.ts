import { collapseWhitespace } from "./text_normalize";

export const MIN_READABLE_CHARS = 25;
export const MIN_COMPLETE_MASK_SENTENCE_CHARS = 80;
export const MAX_DISPLAY_CHARS = 200;

const SECTION_LEAD_IN = /^(?:Behavioral\s+Characteristics\s+)?Based\s+on\s+[\w\s]+['’]s\s+responses[.,]?\s*/i;
const BASED_ON_RESPONSES = /Based\s+on\s+[\w\s]+['’]s\s+responses/i;
const MASK_SOME_OF = /mask\s+some\s+of/i;
const DO_DONT_PHRASE = /^(?:do|don['’]t)\s*:\s*.+/i;

function ensureEnding(text: string, maxChars: number) {
  if (text.length < 3) return text;
  if (DO_DONT_PHRASE.test(text) || /[.!?]$/.test(text)) return text;
  if (text.length >= maxChars || text.endsWith("...")) return text;
  return `${text}.`;
}

/** Strips report lead-ins, collapses whitespace, caps length at a word boundary. */
export function cleanEvidenceSnippet(snippet: string, maxChars = MAX_DISPLAY_CHARS): string {
  let text = collapseWhitespace(collapseWhitespace(snippet).replace(SECTION_LEAD_IN, ""));
  if (text.length > maxChars) {
    const head = text.slice(0, maxChars - 3);
    const cut = head.lastIndexOf(" ");
    text = `${cut > 0 ? head.slice(0, cut) : head}...`;
  }
  return ensureEnding(text, maxChars);
}

export function isAcceptableEvidence(snippet: string): boolean {
  const text = collapseWhitespace(snippet);
  if (!text) return false;
  if (text.length < MIN_READABLE_CHARS && !DO_DONT_PHRASE.test(text)) return false;
  // A lower-case start is a fragment cut out of a longer sentence.
  if (text[0] !== text[0].toUpperCase()) return false;
  if (BASED_ON_RESPONSES.test(text)) return false;
  if (MASK_SOME_OF.test(text) && text.length < MIN_COMPLETE_MASK_SENTENCE_CHARS) return false;
  return true;
}

/** Cleaned snippet ready for display, or null when it is not worth showing. */
export function prepareEvidenceForDisplay(snippet: string, maxChars = MAX_DISPLAY_CHARS): string | null {
  const cleaned = cleanEvidenceSnippet(snippet, maxChars);
  return isAcceptableEvidence(cleaned) ? cleaned : null;
}
