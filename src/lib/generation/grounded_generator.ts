/**
 * Grounded Generator
 *
 * Wraps a text writer (templates or a local model) so that whatever it returns
 * is checked against the facts it was given before anyone sees it. Drafts
 * that cite outside the supplied facts, make uncited claims, or cite a fact
 * they do not restate are logged and retried once with a stricter prompt; a
 * second failure is thrown.
 */

import { OpenAICompatibleClient, type CompletionClient } from "./completion_client";
import { buildSystemPrompt, buildUserPrompt, labelFacts, TASK_MAX_TOKENS } from "./prompts";
import { renderTemplate } from "./templates";
import type { GenerationOptions, GenerationResult, GenerationTask, LabelledFact } from "./types";
import { verifyGrounding } from "./verify_grounding";
import { KgError, UngroundedOutputError } from "@/src/lib/kg/errors";
import { KgEventLog } from "@/src/lib/kg/event_log";
import type { GeneratorConfig } from "@/src/lib/kg/kg_config";
import type { KgLogger } from "@/src/lib/kg/logger";
import { toEvidenceRef, type Fact } from "@/src/lib/kg/types";

const MAX_ATTEMPTS = 2;

type GroundedGeneratorParams = {
  config: GeneratorConfig;
  events?: KgEventLog;
  logger?: KgLogger;
  /** Overrides the client built from an `openai:` model id. */
  client?: CompletionClient;
};

export class GroundedGenerator {
  private config: GeneratorConfig;
  private events?: KgEventLog;
  private logger?: KgLogger;
  private client?: CompletionClient;

  constructor(params: GroundedGeneratorParams) {
    this.config = params.config;
    this.events = params.events;
    this.logger = params.logger;
    this.client = params.client;
  }

  get model_id() {
    return this.config.model_id;
  }

  private completionClient(): CompletionClient {
    if (this.client) return this.client;
    const model = this.config.model_id.replace(/^openai:/, "");
    this.client = new OpenAICompatibleClient(this.config, model);
    return this.client;
  }

  private async draft(
    task: GenerationTask,
    labelled: LabelledFact[],
    options: GenerationOptions,
    strict: boolean
  ): Promise<string> {
    const modelId = this.config.model_id;
    if (modelId.startsWith("deterministic:")) {
      return renderTemplate(task, labelled, options);
    }

    if (modelId.startsWith("openai:")) {
      try {
        return await this.completionClient().complete({
          system: buildSystemPrompt(task, strict),
          user: buildUserPrompt(task, labelled, options),
          max_tokens: TASK_MAX_TOKENS[task],
        });
      } catch (error) {
        throw new KgError({
          code: "GENERATOR_FAILED",
          reason: `Text model call failed: ${error instanceof Error ? error.message : String(error)}`,
          next_action: "Check that the local model server is running at KG_GENERATOR_BASE_URL, or use deterministic:templates.",
          cause: error,
        });
      }
    }

    throw new KgError({
      code: "GENERATOR_FAILED",
      reason: `Unsupported model provider in model_id: ${modelId}`,
      next_action: "Use a KG_GENERATOR_MODEL with the prefix deterministic: or openai:.",
    });
  }

  async generate(task: GenerationTask, facts: Fact[], options: GenerationOptions = {}): Promise<GenerationResult> {
    const model_id = this.config.model_id;
    if (facts.length === 0) {
      return { text: "", facts_used: [], facts_offered: 0, facts_dropped: 0, attempts: 0, insufficient_evidence: true, model_id };
    }

    const labelled = labelFacts(facts, this.config.max_prompt_facts);
    const facts_offered = labelled.length;
    const facts_dropped = facts.length - labelled.length;
    if (facts_dropped > 0) {
      this.logger?.warn(
        `Generation ${task} received ${facts.length} facts; only the first ${facts_offered} are offered to the writer.`
      );
    }
    const requestId = this.events?.newRequestId() ?? "";
    const startedAt = Date.now();

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt += 1) {
      let text: string;
      try {
        text = await this.draft(task, labelled, options, attempt > 1);
      } catch (error) {
        this.events?.logDuration(requestId, "generation_failed", startedAt, {
          task,
          model_id,
          attempt,
          error: KgEventLog.serializeError(error),
        });
        this.logger?.error(`Generation ${task} failed: ${error instanceof Error ? error.message : String(error)}`);
        throw error;
      }

      const check = verifyGrounding(text, labelled);
      if (check.ok) {
        const facts_used = check.cited.map((item) => toEvidenceRef(item.fact));
        this.events?.logDuration(requestId, "generation_completed", startedAt, {
          task,
          model_id,
          attempt,
          refused: check.refused,
          facts_used: facts_used.map((ref) => ref.fact_id),
          facts_dropped,
        });
        return {
          text: check.refused ? text.trim() : text,
          facts_used,
          facts_offered,
          facts_dropped,
          attempts: attempt,
          insufficient_evidence: check.refused,
          model_id,
        };
      }

      const error = new UngroundedOutputError(
        `Draft for ${task} is not traceable to the supplied facts (attempt ${attempt} of ${MAX_ATTEMPTS}).`,
        check.errors,
        text
      );
      this.events?.logEvent(requestId, "generation_ungrounded", {
        task,
        model_id,
        attempt,
        errors: check.errors,
        output_text: text,
      });
      this.logger?.warn(`${error.message} ${check.errors.join(" ")}`);
      if (attempt === MAX_ATTEMPTS) throw error;
    }

    // Unreachable: the last attempt either returns or throws.
    throw new KgError({ code: "GENERATOR_FAILED", reason: `Generation ${task} produced no result.` });
  }
}
