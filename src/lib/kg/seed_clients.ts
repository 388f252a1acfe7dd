import { z } from "zod";
import { deepFreeze, readJsonConfig } from "./config_file";
import type { FactCategory } from "./types";

const SeedEntrySchema = z.union([
  z.string().min(1),
  z.object({
    predicate: z.string().regex(/^[a-z][a-z0-9_]*$/),
    value: z.string().min(1),
  }),
]);

export const SeedClientSchema = z.object({
  client_id: z.string().min(1),
  business_type: z.string().min(1).nullable().optional(),
  traits: z.array(SeedEntrySchema).default([]),
  drivers: z.array(SeedEntrySchema).default([]),
  risks: z.array(SeedEntrySchema).default([]),
});

export const SeedFileSchema = z
  .array(SeedClientSchema)
  .superRefine((clients, ctx) => {
    const seen = new Set<string>();
    clients.forEach((client, index) => {
      if (seen.has(client.client_id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, "client_id"], message: `duplicate client_id ${client.client_id}` });
      }
      seen.add(client.client_id);
    });
  });

export type SeedClient = z.infer<typeof SeedClientSchema>;

export type ProfileAttribute = { category: FactCategory; predicate: string; value: string };

/** A comparison subject for the similarity engine, seeded or ingested. */
export type ClientProfile = {
  client_id: string;
  business_type: string | null;
  attributes: ProfileAttribute[];
};

// Plain strings in each list take the predicate the extractor most often emits there.
const SEED_LISTS = [
  { key: "traits", category: "behavioral", predicate: "tends_to" },
  { key: "drivers", category: "driving_force", predicate: "motivated_by" },
  { key: "risks", category: "risk", predicate: "avoids" },
] as const;

export function seedClientToProfile(client: SeedClient): ClientProfile {
  const attributes = SEED_LISTS.flatMap(({ key, category, predicate }) =>
    client[key].map((entry) =>
      typeof entry === "string"
        ? { category, predicate, value: entry }
        : { category, predicate: entry.predicate, value: entry.value }
    )
  );
  return { client_id: client.client_id, business_type: client.business_type ?? null, attributes };
}

/** Loads the seed population once; the result is frozen. */
export function loadSeedClients(filePath: string): readonly ClientProfile[] {
  const clients = readJsonConfig(filePath, SeedFileSchema, "Seed client file");
  return deepFreeze(clients.map(seedClientToProfile));
}
