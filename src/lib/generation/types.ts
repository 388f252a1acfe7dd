import { z } from "zod";
import type { EvidenceRef, Fact } from "@/src/lib/kg/types";

export const GenerationTaskSchema = z.enum(["follow_up_email", "strategy_summary", "call_agenda"]);
export type GenerationTask = z.infer<typeof GenerationTaskSchema>;

export const GenerationOptionsSchema = z.object({
  client_name: z.string().min(1).optional(),
  call_outcome: z.string().min(1).optional(),
  duration_min: z.number().int().min(5).max(120).optional(),
});
export type GenerationOptions = z.infer<typeof GenerationOptionsSchema>;

/** A fact as presented to the writer, tagged `F1`, `F2`, … */
export type LabelledFact = {
  label: string;
  fact: Fact;
};

export type GenerationResult = {
  text: string;
  facts_used: EvidenceRef[];
  /** Facts labelled and shown to the writer; at most `max_prompt_facts`. */
  facts_offered: number;
  /** Facts passed in but left out of the prompt. */
  facts_dropped: number;
  attempts: number;
  insufficient_evidence: boolean;
  model_id: string;
};
