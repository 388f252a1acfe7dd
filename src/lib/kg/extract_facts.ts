/**
 * Fact Extractor
 *
 * Deterministic, pattern-based extraction of facts from a personality report.
 * Headings decide the category, trigger phrases decide the predicate, and the
 * clause after the trigger becomes the value. Bullets under a communication
 * heading with no trigger become do/don't facts. No model is involved.
 */

import { withContentHash } from "./content_hash";
import { readDocumentPages, type DocumentPage } from "./document_text";
import { KgError } from "./errors";
import { collapseWhitespace, foldPreservingOffsets, foldText } from "./text_normalize";
import type { ExtractionResult, Fact, FactCategory } from "./types";

export const MAX_VALUE_CHARS = 120;
export const MIN_VALUE_CHARS = 3;
export const MAX_SNIPPET_CHARS = 240;
const MAX_HEADING_WORDS = 6;

type HeadingRule = { category: FactCategory; phrases: string[] };
type TriggerRule = { predicate: string; pattern: RegExp };

// Order matters: the first rule whose phrase matches a heading line wins.
export const HEADING_RULES: HeadingRule[] = [
  {
    category: "behavioral",
    phrases: ["behavioral", "behavioural", "behavior", "behaviour", "key traits", "strengths"],
  },
  { category: "driving_force", phrases: ["driving forces", "driving force", "drivers"] },
  {
    category: "communication",
    phrases: ["communication", "do's and don'ts", "dos and don'ts", "do and don't", "checklist for communicating"],
  },
  { category: "motivator", phrases: ["motivators", "motivations", "preferences"] },
  {
    category: "risk",
    phrases: ["risks", "potential risks", "areas for improvement", "watch-outs", "blind spots"],
  },
  { category: "other", phrases: ["general notes", "other observations"] },
];

// Patterns run against folded (lower-case, accent-free) text.
export const TRIGGER_RULES: TriggerRule[] = [
  { predicate: "tends_to", pattern: /\btends?\s+to\b/g },
  { predicate: "tendency_to", pattern: /\btendency\s+to\b/g },
  { predicate: "likes_to", pattern: /\blikes?\s+to\b/g },
  { predicate: "often", pattern: /\boften\b/g },
  { predicate: "typically", pattern: /\btypically\b/g },
  { predicate: "prefers", pattern: /\bprefers?\b/g },
  { predicate: "motivated_by", pattern: /\bmotivated\s+by\b/g },
  { predicate: "driven_by", pattern: /\bdriven\s+by\b/g },
  { predicate: "values", pattern: /\bvalues\b/g },
  { predicate: "needs", pattern: /\bneeds\b/g },
  { predicate: "avoids", pattern: /\bavoids?\b/g },
  { predicate: "watch_for", pattern: /\bwatch\s+(?:out\s+)?for\b/g },
  { predicate: "struggles_with", pattern: /\bstruggles?\s+with\b/g },
  { predicate: "risk", pattern: /\brisks?\s*:/g },
  { predicate: "dont", pattern: /\bdon['’]?t\s*:/g },
  { predicate: "do", pattern: /\bdo\s*:/g },
];

type SectionSegment = {
  category: FactCategory;
  page: number;
  text: string;
};

type Span = { start: number; end: number };

type TriggerMatch = Span & { predicate: string; order: number };

// Terminal punctuation, blank lines, bullet starts, and Do:/Don't:/Risk: lines.
const SENTENCE_BOUNDARY =
  /[.!?]+(?=\s|$)|\n[ \t]*\n|\n(?=[ \t]*(?:[-*•]|\d+[.)])\s|[ \t]*don['’]?t\s*:|[ \t]*do\s*:|[ \t]*risks?\s*:)/gi;
const BULLET_PREFIX = /^(?:[-*•]|\d+[.)])\s+/;
const BULLET_LEAD = /^[ \t]*(?:[-*•]|\d+[.)])[ \t]*$/;
// A line that closes a sentence (or is blank) lets the next line open a section.
const LINE_CLOSED = /(?:^|[.!?:])["'”’)\]]*\s*$/;
const MARKED_HEADING = /^\s*#|:\s*$/;
const DONT_WORDING = /\b(?:avoid\w*|don['’]?t|do\s+not|never)\b/;
const LEADING_DO = /^(?:do\s+not|don['’]?t|do)\s+/;

function execAll(pattern: RegExp, text: string): RegExpExecArray[] {
  const re = new RegExp(pattern.source, pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`);
  const matches: RegExpExecArray[] = [];
  let match: RegExpExecArray | null;
  while ((match = re.exec(text)) !== null) {
    matches.push(match);
    if (match[0].length === 0) re.lastIndex += 1;
  }
  return matches;
}

export function matchHeading(line: string): FactCategory | null {
  const text = foldText(line)
    .replace(/’/g, "'")
    .trim()
    .replace(/^#+\s*/, "")
    .replace(/^\d+(?:\.\d+)*[.)]?\s+/, "")
    .replace(/\s*:\s*$/, "")
    .trim();
  if (!text || /[.!?]$/.test(text)) return null;
  if (text.split(/\s+/).length > MAX_HEADING_WORDS) return null;

  for (const rule of HEADING_RULES) {
    for (const phrase of rule.phrases) {
      if (text === phrase || text.startsWith(`${phrase} `)) return rule.category;
    }
  }
  return null;
}

// Every word of four letters or more is capitalised: "Driving Forces", "Areas for Improvement".
function isTitleCase(line: string) {
  const words = line
    .replace(/^[#\s]*/, "")
    .replace(/^\d+(?:\.\d+)*[.)]?\s+/, "")
    .split(/\s+/)
    .filter((word) => /\p{L}/u.test(word));
  if (words.length === 0) return false;
  return words.every((word, index) => {
    const first = word.replace(/^[^\p{L}]+/u, "").charAt(0);
    if (index > 0 && word.length < 4) return true;
    return first !== "" && first === first.toUpperCase() && first !== first.toLowerCase();
  });
}

/**
 * A heading must stand on its own: at the top of a page, after a blank line or
 * a closed sentence, or marked as one (`#`, trailing colon, title case). A
 * wrapped body line such as "communication about fees" stays body text.
 */
function headingAt(line: string, previous: string | null): FactCategory | null {
  const standalone = previous === null || LINE_CLOSED.test(previous);
  if (!standalone && !MARKED_HEADING.test(line) && !isTitleCase(line)) return null;
  return matchHeading(line);
}

function segmentSections(pages: DocumentPage[]): { segments: SectionSegment[]; sections_found: number } {
  const segments: SectionSegment[] = [];
  let current: FactCategory | null = null;
  let sectionsFound = 0;

  for (const page of pages) {
    let buffer: string[] = [];
    const flush = () => {
      if (current && buffer.length > 0) {
        segments.push({ category: current, page: page.page, text: buffer.join("\n") });
      }
      buffer = [];
    };

    let previous: string | null = null;
    for (const line of page.text.split("\n")) {
      const category = headingAt(line, previous);
      previous = line;
      if (category) {
        flush();
        sectionsFound += 1;
        current = category;
        // The heading itself closes the previous block.
        previous = "";
        continue;
      }
      if (current) buffer.push(line);
    }
    flush();
  }

  return { segments, sections_found: sectionsFound };
}

function trimSpan(text: string, start: number, end: number): Span | null {
  let s = start;
  while (s < end && /\s/.test(text[s])) s += 1;
  const bullet = BULLET_PREFIX.exec(text.slice(s, end));
  if (bullet) s += bullet[0].length;
  let e = end;
  while (e > s && /\s/.test(text[e - 1])) e -= 1;
  return e > s ? { start: s, end: e } : null;
}

export function splitSentences(text: string): Span[] {
  const spans: Span[] = [];
  let cursor = 0;
  for (const boundary of execAll(SENTENCE_BOUNDARY, text)) {
    const isBreak = boundary[0].startsWith("\n");
    const end = isBreak ? boundary.index : boundary.index + boundary[0].length;
    const span = trimSpan(text, cursor, end);
    if (span) spans.push(span);
    cursor = boundary.index + boundary[0].length;
  }
  const tail = trimSpan(text, cursor, text.length);
  if (tail) spans.push(tail);
  return spans;
}

function findTriggers(sentence: string): TriggerMatch[] {
  const folded = foldPreservingOffsets(sentence);
  const matches: TriggerMatch[] = [];
  TRIGGER_RULES.forEach((rule, order) => {
    for (const match of execAll(rule.pattern, folded)) {
      matches.push({
        start: match.index,
        end: match.index + match[0].length,
        predicate: rule.predicate,
        order,
      });
    }
  });
  // Leftmost wins; at the same start the longer phrase, then rule order.
  return matches.sort((a, b) => a.start - b.start || b.end - b.start - (a.end - a.start) || a.order - b.order);
}

function captureValue(sentence: string, from: number): { value: string; end: number } | null {
  let start = from;
  while (start < sentence.length && /[\s:\-–]/.test(sentence[start])) start += 1;

  let raw = sentence.slice(start).replace(/[.!?]+$/, "");
  if (raw.length > MAX_VALUE_CHARS) {
    const cut = raw.lastIndexOf(" ", MAX_VALUE_CHARS);
    raw = raw.slice(0, cut > 0 ? cut : MAX_VALUE_CHARS);
  }

  const value = collapseWhitespace(raw).replace(/[\s,;:]+$/, "");
  if (value.length < MIN_VALUE_CHARS) return null;
  return { value, end: start + raw.length };
}

function snippetFor(sentence: string, match: Span): string {
  if (sentence.length <= MAX_SNIPPET_CHARS) return sentence;
  const center = Math.floor((match.start + match.end) / 2);
  const end = Math.min(sentence.length, Math.max(0, center - MAX_SNIPPET_CHARS / 2) + MAX_SNIPPET_CHARS);
  const start = Math.max(0, end - MAX_SNIPPET_CHARS);
  return sentence.slice(start, end).trim();
}

function isBulletItem(text: string, span: Span) {
  const lineStart = text.lastIndexOf("\n", span.start - 1) + 1;
  return BULLET_LEAD.test(text.slice(lineStart, span.start));
}

function communicationBullet(sentence: string): { predicate: "do" | "dont"; value: string } | null {
  const folded = foldPreservingOffsets(sentence);
  const lead = LEADING_DO.exec(folded);
  const captured = captureValue(sentence, lead ? lead[0].length : 0);
  if (!captured) return null;
  return { predicate: DONT_WORDING.test(folded) ? "dont" : "do", value: captured.value };
}

function factsFromSegment(segment: SectionSegment, clientId: string): Fact[] {
  const facts: Fact[] = [];
  for (const span of splitSentences(segment.text)) {
    const sentence = segment.text.slice(span.start, span.end);
    const before = facts.length;
    let capturedUntil = -1;
    for (const match of findTriggers(sentence)) {
      if (match.start < capturedUntil) continue;
      const captured = captureValue(sentence, match.end);
      if (!captured) continue;
      capturedUntil = captured.end;
      facts.push(
        withContentHash({
          client_id: clientId,
          category: segment.category,
          predicate: match.predicate,
          value: captured.value,
          source_page: segment.page,
          source_snippet: snippetFor(sentence, match),
        })
      );
    }

    if (facts.length === before && segment.category === "communication" && isBulletItem(segment.text, span)) {
      const bullet = communicationBullet(sentence);
      if (bullet) {
        facts.push(
          withContentHash({
            client_id: clientId,
            category: segment.category,
            predicate: bullet.predicate,
            value: bullet.value,
            source_page: segment.page,
            source_snippet: snippetFor(sentence, { start: 0, end: sentence.length }),
          })
        );
      }
    }
  }
  return facts;
}

export function extractFactsFromPages(pages: DocumentPage[], clientId: string): ExtractionResult {
  const client_id = clientId.trim();
  if (!client_id) {
    throw new KgError({ code: "INVALID_CLIENT_ID", reason: "client_id must be a non-empty string." });
  }

  const { segments, sections_found } = segmentSections(pages);
  const facts = segments.flatMap((segment) => factsFromSegment(segment, client_id));

  return {
    client_id,
    facts,
    outcome: sections_found === 0 ? "no_recognized_headings" : facts.length === 0 ? "no_trigger_matches" : "facts_found",
    page_count: pages.length,
    sections_found,
  };
}

export function extractFacts(documentBytes: Uint8Array, clientId: string): ExtractionResult {
  return extractFactsFromPages(readDocumentPages(documentBytes), clientId);
}
