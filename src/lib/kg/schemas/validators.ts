import Ajv from "ajv";
import type { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import factRecordSchema from "./fact_record.schema.json";
import ingestionRecordSchema from "./ingestion_record.schema.json";
import { KgError } from "../errors";

const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });
addFormats(ajv);

export const validateFactRecord = ajv.compile(factRecordSchema);
export const validateIngestionRecord = ajv.compile(ingestionRecordSchema);

export function assertValid(validate: ValidateFunction, data: unknown, label: string): void {
  const ok = validate(data);
  if (!ok) {
    const errors = validate.errors?.map((e) => `${e.instancePath || "/"} ${e.message ?? "invalid"}`) ?? [];
    throw new KgError({
      code: "INVALID_FACT",
      reason: `Schema validation failed for ${label}: ${errors.join("; ")}`,
      details: errors,
    });
  }
}
