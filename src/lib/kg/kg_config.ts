import path from "node:path";

export type KgConfig = {
  data_dir: string;
  facts_path: string;
  graph_path: string;
  db_path: string;
  events_path: string;
  rules_path: string;
  seed_path: string;
  signal_phrases_path: string;
  career_archetypes_path: string;
  business_archetypes_path: string;
  fit_top_n: number;
  similar_top_n: number;
  include_ingested_clients: boolean;
  write_graph_snapshot: boolean;
  log_echo: boolean;
  log_max_entries: number;
  generator: GeneratorConfig;
};

export type GeneratorConfig = {
  model_id: string;
  base_url: string;
  api_key: string;
  temperature: number;
  seed: number;
  max_tokens: number;
  max_prompt_facts: number;
};

function readNumber(value: string | undefined, fallback: number) {
  if (value === undefined) return fallback;
  const num = Number(value);
  return Number.isFinite(num) ? num : fallback;
}

function readBoolean(value: string | undefined, fallback: boolean) {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return fallback;
}

export function getKgConfig(env: NodeJS.ProcessEnv = process.env): KgConfig {
  const dataDir = env.KG_DATA_DIR ?? path.join(process.cwd(), "runs", "kg");
  const configDir = path.join(process.cwd(), "data", "kg");

  return {
    data_dir: dataDir,
    facts_path: path.join(dataDir, "facts.jsonl"),
    graph_path: path.join(dataDir, "graph.json"),
    db_path: path.join(dataDir, "kg.db"),
    events_path: path.join(dataDir, "events.jsonl"),
    rules_path: env.KG_RULES_PATH ?? path.join(configDir, "rules.json"),
    seed_path: env.KG_SEED_PATH ?? path.join(configDir, "clients_seed.json"),
    signal_phrases_path: env.KG_SIGNAL_PHRASES_PATH ?? path.join(configDir, "signal_phrases.json"),
    career_archetypes_path: env.KG_CAREER_ARCHETYPES_PATH ?? path.join(configDir, "career_archetypes.json"),
    business_archetypes_path: env.KG_BUSINESS_ARCHETYPES_PATH ?? path.join(configDir, "business_archetypes.json"),
    fit_top_n: Math.max(1, Math.trunc(readNumber(env.KG_FIT_TOP_N, 5))),
    similar_top_n: Math.max(1, Math.trunc(readNumber(env.KG_SIMILAR_TOP_N, 10))),
    include_ingested_clients: readBoolean(env.KG_INCLUDE_INGESTED_CLIENTS, true),
    write_graph_snapshot: readBoolean(env.KG_WRITE_GRAPH_SNAPSHOT, true),
    log_echo: readBoolean(env.KG_LOG_ECHO, true),
    log_max_entries: Math.max(1, Math.trunc(readNumber(env.KG_LOG_MAX_ENTRIES, 500))),
    generator: {
      model_id: env.KG_GENERATOR_MODEL ?? "deterministic:templates",
      // Ollama and llama.cpp both serve an OpenAI-compatible API locally.
      base_url: env.KG_GENERATOR_BASE_URL ?? "http://127.0.0.1:11434/v1",
      api_key: env.KG_GENERATOR_API_KEY ?? "local",
      temperature: readNumber(env.KG_GENERATOR_TEMPERATURE, 0),
      seed: Math.trunc(readNumber(env.KG_GENERATOR_SEED, 42)),
      max_tokens: Math.max(1, Math.trunc(readNumber(env.KG_GENERATOR_MAX_TOKENS, 350))),
      max_prompt_facts: 12,
    },
  };
}
