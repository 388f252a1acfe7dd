import type { GenerationOptions, GenerationTask, LabelledFact } from "./types";
import type { Fact } from "@/src/lib/kg/types";

export const REFUSAL_TEXT = "Not enough evidence in graph.";
export const MAX_PROMPT_SNIPPET_CHARS = 240;
export const DEFAULT_AGENDA_MINUTES = 20;

export const TASK_MAX_TOKENS: Record<GenerationTask, number> = {
  follow_up_email: 250,
  strategy_summary: 350,
  call_agenda: 250,
};

const SYSTEM_INSTRUCT = [
  "You are a writing assistant for a sales coach.",
  "Use ONLY the facts listed in the context; each fact has a tag such as [F1].",
  "Do not invent facts or add information that is not in the list.",
  "End every sentence that states something about the client with the tag of the fact it comes from, and reuse that fact's own words.",
  `If the facts are not enough for the task, respond with exactly: ${REFUSAL_TEXT}`,
].join(" ");

const STRICT_SUFFIX = [
  "Your previous draft was rejected because it was not traceable to the facts.",
  "Every sentence except a greeting or sign-off MUST carry at least one tag from the list, for example [F2], and must repeat words from the fact it cites.",
  "Never use a tag that is not in the list. Write fewer sentences rather than uncited ones.",
].join(" ");

const TASK_INSTRUCT: Record<GenerationTask, string> = {
  follow_up_email: "Write a short, professional follow-up email draft.",
  strategy_summary: "Write a bullet-point strategy summary for the coach.",
  call_agenda: "Write a timeboxed call agenda.",
};

export function labelFacts(facts: Fact[], maxFacts: number): LabelledFact[] {
  return facts.slice(0, maxFacts).map((fact, index) => ({ label: `F${index + 1}`, fact }));
}

// Tag-shaped text inside report content would read as a citation.
export function neutralizeCitations(text: string): string {
  return text.replace(/\[(F\d+)\]/g, "($1)");
}

function truncate(text: string, maxChars: number) {
  return text.length <= maxChars ? text : `${text.slice(0, maxChars - 3).trimEnd()}...`;
}

export function formatFactLines(labelled: LabelledFact[]): string {
  return labelled
    .map(({ label, fact }) => {
      const snippet = neutralizeCitations(truncate(fact.source_snippet, MAX_PROMPT_SNIPPET_CHARS));
      return `[${label}] ${fact.category} / ${fact.predicate}: ${neutralizeCitations(fact.value)} (page ${fact.source_page}; evidence: "${snippet}")`;
    })
    .join("\n");
}

export function buildSystemPrompt(task: GenerationTask, strict: boolean): string {
  const base = `${SYSTEM_INSTRUCT} ${TASK_INSTRUCT[task]}`;
  return strict ? `${base} ${STRICT_SUFFIX}` : base;
}

export function buildUserPrompt(task: GenerationTask, labelled: LabelledFact[], options: GenerationOptions = {}): string {
  const context = [`Facts:\n${formatFactLines(labelled)}`];
  if (options.client_name) context.unshift(`Client: ${neutralizeCitations(options.client_name)}`);

  if (task === "follow_up_email") {
    const outcome = options.call_outcome
      ? `\nCall outcome to reference, quoted on its own line starting with "> ": ${neutralizeCitations(options.call_outcome)}`
      : "";
    return `${context.join("\n\n")}${outcome}\n\nWrite a brief follow-up email (2-4 sentences) using only the facts above.`;
  }
  if (task === "strategy_summary") {
    return `${context.join("\n\n")}\n\nWrite a short bullet-point strategy summary (traits, drivers, risks, how to communicate). Use only the facts above.`;
  }
  const minutes = options.duration_min ?? DEFAULT_AGENDA_MINUTES;
  return `${context.join("\n\n")}\n\nWrite a ${minutes}-minute call agenda with timeboxes (e.g. 0-5 min: X). Use only the facts above.`;
}
