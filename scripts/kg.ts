import "dotenv/config";

import fs from "node:fs";
import minimist from "minimist";

import { GenerationOptionsSchema, GenerationTaskSchema } from "../src/lib/generation/types";
import { toFailureArtifact } from "../src/lib/kg/errors";
import { KnowledgeGraphService } from "../src/lib/kg/knowledge_graph_service";

const USAGE = `Usage: npm run kg -- <command> [options]

  ingest     --client <id> --file <report.txt> [--business-type <type>]
  facts      --client <id>
  similar    --client <id> [--top <n>]
  recommend  --client <id>
  signals    --client <id>
  ingestions --client <id>
  generate   --client <id> --task <follow_up_email|strategy_summary|call_agenda>
             [--facts <id,id,...>] [--client-name <name>] [--outcome <text>] [--minutes <n>]
  graph      [--client <id>] [--rebuild]
  fit        --client <id> [--top <n>]
  context    --client <id>`;

class UsageError extends Error {}

function requireString(value: unknown, flag: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new UsageError(`Missing --${flag}.\n\n${USAGE}`);
  }
  return value;
}

function optionalInteger(value: unknown, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const num = Number(value);
  if (!Number.isInteger(num)) throw new UsageError(`--${flag} must be an integer.`);
  return num;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function print(payload: unknown) {
  console.log(JSON.stringify(payload, null, 2));
}

async function run() {
  const args = minimist(process.argv.slice(2), {
    string: ["client", "file", "business-type", "task", "facts", "client-name", "outcome"],
    boolean: ["rebuild", "help"],
  });
  const command = args._[0];
  if (!command || args.help) {
    console.log(USAGE);
    return;
  }

  const service = new KnowledgeGraphService();
  try {
    switch (command) {
      case "ingest": {
        const filePath = requireString(args.file, "file");
        const bytes = fs.readFileSync(filePath);
        print(service.ingest(bytes, requireString(args.client, "client"), optionalString(args["business-type"])));
        return;
      }
      case "facts":
        print(service.factsFor(requireString(args.client, "client")));
        return;
      case "similar":
        print(service.similar(requireString(args.client, "client"), optionalInteger(args.top, "top")));
        return;
      case "recommend":
        print(service.recommend(requireString(args.client, "client")));
        return;
      case "signals":
        print(service.signals(requireString(args.client, "client")));
        return;
      case "ingestions":
        print(service.ingestions(requireString(args.client, "client")));
        return;
      case "generate": {
        const clientId = requireString(args.client, "client");
        const task = GenerationTaskSchema.safeParse(requireString(args.task, "task"));
        if (!task.success) throw new UsageError(`Unknown --task.\n\n${USAGE}`);
        const options = GenerationOptionsSchema.safeParse({
          client_name: optionalString(args["client-name"]),
          call_outcome: optionalString(args.outcome),
          duration_min: optionalInteger(args.minutes, "minutes"),
        });
        if (!options.success) {
          throw new UsageError(options.error.issues.map((issue) => `--${issue.path.join(".")}: ${issue.message}`).join("\n"));
        }
        const ids = optionalString(args.facts)
          ?.split(",")
          .map((id) => id.trim())
          .filter(Boolean);
        const factIds = ids ?? service.factsFor(clientId).map((fact) => fact.content_hash);
        print(await service.generate(task.data, factIds, options.data));
        return;
      }
      case "graph": {
        if (args.rebuild) service.rebuildGraph();
        const client = optionalString(args.client);
        print(client ? service.graph().clientSubgraph(client) : service.graph().snapshot());
        return;
      }
      case "fit":
        print(service.fit(requireString(args.client, "client"), optionalInteger(args.top, "top")));
        return;
      case "context":
        print(service.contextPack(requireString(args.client, "client")));
        return;
      default:
        throw new UsageError(`Unknown command: ${command}\n\n${USAGE}`);
    }
  } finally {
    service.close();
  }
}

run().catch((error: unknown) => {
  if (error instanceof UsageError) {
    console.error(error.message);
  } else {
    console.error(JSON.stringify(toFailureArtifact(error), null, 2));
  }
  process.exit(1);
});
