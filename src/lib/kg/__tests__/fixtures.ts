import { withContentHash } from "../content_hash";
import type { Fact, FactDraft } from "../types";

export const SAMPLE_REPORT_PAGES = [
  "Coaching Report for Dana\nPrepared for the sales team.",
  "Behavioral Characteristics\nDana tends to take charge in meetings. She prefers short written summaries.\n- Likes to close deals quickly",
  "Driving Forces:\nDana is motivated by recognition.",
  "## Communication\nDo: send the agenda a day early\nDon't: interrupt her while she is thinking",
  "Potential Risks\nShe avoids money talk until late in the process.",
];

export function sampleReportBytes(pages: string[] = SAMPLE_REPORT_PAGES) {
  return new TextEncoder().encode(pages.join("\f"));
}

/** Ten pages, one heading and one trigger sentence each. */
export function tenPageReportBytes() {
  const headings = ["Behavioral", "Driving Forces", "Communication", "Motivators", "Risks"];
  const pages = Array.from({ length: 10 }, (_, index) => {
    const heading = headings[index % headings.length];
    return `${heading}\nThe client tends to review option ${index + 1} carefully before agreeing.`;
  });
  return new TextEncoder().encode(pages.join("\f"));
}

export function makeFact(overrides: Partial<FactDraft> = {}): Fact {
  return withContentHash({
    client_id: "C1",
    category: "behavioral",
    predicate: "tends_to",
    value: "take charge in meetings",
    source_page: 1,
    source_snippet: "Dana tends to take charge in meetings.",
    ...overrides,
  });
}
