/**
 * Deterministic drafts for the `deterministic:templates` model id. Every
 * client-specific sentence is built from one labelled fact and carries its tag,
 * so these drafts pass the same grounding check as model output.
 */

import { DEFAULT_AGENDA_MINUTES, neutralizeCitations } from "./prompts";
import type { GenerationOptions, GenerationTask, LabelledFact } from "./types";
import type { FactCategory } from "@/src/lib/kg/types";

const SECOND_PERSON: Record<string, string> = {
  tends_to: "tend to",
  tendency_to: "have a tendency to",
  likes_to: "like to",
  often: "often",
  typically: "typically",
  prefers: "prefer",
  motivated_by: "are motivated by",
  driven_by: "are driven by",
  values: "value",
  needs: "need",
};

const BULLET_PHRASE: Record<string, string> = {
  tends_to: "Tends to",
  tendency_to: "Has a tendency to",
  likes_to: "Likes to",
  often: "Often",
  typically: "Typically",
  prefers: "Prefers",
  motivated_by: "Motivated by",
  driven_by: "Driven by",
  values: "Values",
  needs: "Needs",
  avoids: "Avoids",
  watch_for: "Watch for",
  struggles_with: "Struggles with",
  risk: "Risk:",
  do: "Do:",
  dont: "Don't:",
};

const SECTION_TITLES: Array<{ category: FactCategory; title: string }> = [
  { category: "behavioral", title: "Traits" },
  { category: "driving_force", title: "Drivers" },
  { category: "motivator", title: "Motivators" },
  { category: "communication", title: "Communication" },
  { category: "risk", title: "Risks" },
  { category: "other", title: "Other notes" },
];

// Fractions of the call taken from a 20-minute plan: 0-2, 2-6, 6-12, 12-18, 18-20.
const AGENDA_SPLITS = [0, 0.1, 0.3, 0.6, 0.9, 1];

function cite(item: LabelledFact) {
  return `[${item.label}]`;
}

function bulletPhrase(predicate: string) {
  return BULLET_PHRASE[predicate] ?? predicate.replace(/_/g, " ").replace(/^./, (c) => c.toUpperCase());
}

// Mid-sentence form: "Don't:" reads as "don't".
function inlinePhrase(predicate: string) {
  return bulletPhrase(predicate).replace(/:$/, "").toLowerCase();
}

function valueOf(item: LabelledFact) {
  return neutralizeCitations(item.fact.value);
}

function oneLine(text: string) {
  return neutralizeCitations(text.replace(/\s+/g, " ").trim());
}

function pick(labelled: LabelledFact[], categories: FactCategory[], exclude: Set<string>) {
  return labelled.find((item) => categories.includes(item.fact.category) && !exclude.has(item.label));
}

function renderEmail(labelled: LabelledFact[], options: GenerationOptions) {
  const name = options.client_name ? oneLine(options.client_name) : "there";
  const lines = [`Hi ${name},`, "", "Thanks for your time today."];
  if (options.call_outcome) lines.push(`> ${oneLine(options.call_outcome)}`);
  lines.push("");

  const positive = labelled.filter((item) => SECOND_PERSON[item.fact.predicate] !== undefined);
  const chosen = (positive.length > 0 ? positive : labelled).slice(0, 3);
  for (const item of chosen) {
    const phrase = SECOND_PERSON[item.fact.predicate];
    lines.push(
      phrase
        ? `I noted that you ${phrase} ${valueOf(item)} ${cite(item)}.`
        : `I kept in mind: ${inlinePhrase(item.fact.predicate)} ${valueOf(item)} ${cite(item)}.`
    );
  }

  lines.push("", "I will follow up soon.", "", "Best,", "[Your name]");
  return lines.join("\n");
}

function renderSummary(labelled: LabelledFact[]) {
  const lines = ["## Strategy summary"];
  for (const { category, title } of SECTION_TITLES) {
    const items = labelled.filter((item) => item.fact.category === category);
    if (items.length === 0) continue;
    lines.push("", `### ${title}`);
    for (const item of items) {
      lines.push(`- ${bulletPhrase(item.fact.predicate)} ${valueOf(item)} ${cite(item)}.`);
    }
  }
  return lines.join("\n");
}

function renderAgenda(labelled: LabelledFact[], options: GenerationOptions) {
  const minutes = options.duration_min ?? DEFAULT_AGENDA_MINUTES;
  const marks = AGENDA_SPLITS.map((share) => Math.round(minutes * share));
  const slot = (index: number) => `${marks[index]}-${marks[index + 1]} min`;

  const used = new Set<string>();
  const take = (categories: FactCategory[]) => {
    const item =
      pick(labelled, categories, used) ?? labelled.find((candidate) => !used.has(candidate.label)) ?? labelled[0];
    used.add(item.label);
    return item;
  };

  const driver = take(["driving_force", "motivator"]);
  const style = take(["communication", "behavioral"]);
  const risk = take(["risk"]);

  return [
    `## Call agenda (${minutes} min)`,
    `- ${slot(0)}: Check-in.`,
    `- ${slot(1)}: Open with what drives them: ${valueOf(driver)} ${cite(driver)}.`,
    `- ${slot(2)}: Main topic, framed for how they work: ${inlinePhrase(style.fact.predicate)} ${valueOf(style)} ${cite(style)}.`,
    `- ${slot(3)}: Address the watch-out: ${inlinePhrase(risk.fact.predicate)} ${valueOf(risk)} ${cite(risk)}.`,
    `- ${slot(4)}: Confirm next steps.`,
  ].join("\n");
}

export function renderTemplate(task: GenerationTask, labelled: LabelledFact[], options: GenerationOptions = {}): string {
  if (task === "follow_up_email") return renderEmail(labelled, options);
  if (task === "strategy_summary") return renderSummary(labelled);
  return renderAgenda(labelled, options);
}
