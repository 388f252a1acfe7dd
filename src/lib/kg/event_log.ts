import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";

export type KgEventType =
  | "ingest_started"
  | "ingest_duplicate"
  | "ingest_completed"
  | "ingest_failed"
  | "graph_rebuilt"
  | "generation_completed"
  | "generation_ungrounded"
  | "generation_failed";

export type KgEvent = {
  ts: string;
  request_id: string;
  type: KgEventType;
  duration_ms?: number;
  [key: string]: unknown;
};

/** Append-only JSONL trail of pipeline requests, kept for investigation. */
export class KgEventLog {
  readonly log_path: string;

  constructor(log_path: string) {
    this.log_path = log_path;
  }

  newRequestId() {
    return crypto.randomUUID();
  }

  logEvent(request_id: string, type: KgEventType, payload: Record<string, unknown> = {}) {
    const record: KgEvent = {
      ts: new Date().toISOString(),
      request_id,
      type,
      ...payload,
    };
    fs.mkdirSync(path.dirname(this.log_path), { recursive: true });
    fs.appendFileSync(this.log_path, `${JSON.stringify(record)}\n`);
    return record;
  }

  logDuration(request_id: string, type: KgEventType, startMs: number, payload: Record<string, unknown> = {}) {
    const duration_ms = Date.now() - startMs;
    return this.logEvent(request_id, type, { ...payload, duration_ms });
  }

  readEvents(): KgEvent[] {
    if (!fs.existsSync(this.log_path)) return [];
    return fs
      .readFileSync(this.log_path, "utf-8")
      .split(/\r?\n/)
      .filter(Boolean)
      .map((line) => JSON.parse(line) as KgEvent);
  }

  static serializeError(error: unknown) {
    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }
    return { name: "Error", message: String(error) };
  }
}
