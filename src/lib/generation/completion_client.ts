import OpenAI from "openai";
import type { GeneratorConfig } from "@/src/lib/kg/kg_config";

export type CompletionRequest = {
  system: string;
  user: string;
  max_tokens: number;
};

/** The text model behind the grounded generator: prompt in, text out. */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

/**
 * Chat completions against an OpenAI-compatible endpoint, normally a local
 * model server. Temperature and seed come from config so drafts repeat.
 */
export class OpenAICompatibleClient implements CompletionClient {
  private client: OpenAI;
  readonly model: string;

  constructor(private config: GeneratorConfig, model: string) {
    this.model = model;
    this.client = new OpenAI({ apiKey: config.api_key, baseURL: config.base_url });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      temperature: this.config.temperature,
      seed: this.config.seed,
      max_tokens: Math.min(request.max_tokens, this.config.max_tokens),
      messages: [
        { role: "system", content: request.system },
        { role: "user", content: request.user },
      ],
    });
    return (response.choices[0]?.message?.content ?? "").trim();
  }
}
