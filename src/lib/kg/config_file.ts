import fs from "node:fs";
import type { z } from "zod";
import { KgConfigError } from "./errors";

function formatIssues(issues: z.ZodIssue[]) {
  return issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/** Reads a JSON config file and validates it; any problem is a KgConfigError. */
export function readJsonConfig<T extends z.ZodTypeAny>(filePath: string, schema: T, label: string): z.infer<T> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new KgConfigError(`Cannot read ${label} at ${filePath}.`, [String(error)]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw) as unknown;
  } catch (error) {
    throw new KgConfigError(`${label} at ${filePath} is not valid JSON.`, [String(error)]);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new KgConfigError(`${label} at ${filePath} failed validation.`, formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
