export type KgLogLevel = "info" | "warn" | "error";

export type KgLogEntry = {
  at: string;
  level: KgLogLevel;
  message: string;
};

export type KgLogger = {
  entries: KgLogEntry[];
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export const DEFAULT_MAX_LOG_ENTRIES = 500;

/** In-memory logger; `entries` keeps only the most recent `max_entries`. */
export function createKgLogger(options: { echo?: boolean; max_entries?: number } = {}): KgLogger {
  const echo = options.echo ?? true;
  const maxEntries = Math.max(1, options.max_entries ?? DEFAULT_MAX_LOG_ENTRIES);
  const entries: KgLogEntry[] = [];

  const push = (level: KgLogLevel, message: string) => {
    const entry: KgLogEntry = {
      at: new Date().toISOString(),
      level,
      message,
    };
    entries.push(entry);
    if (entries.length > maxEntries) entries.splice(0, entries.length - maxEntries);
    if (!echo) return;

    if (level === "error") {
      console.error(`[kg:${level}] ${message}`);
      return;
    }
    if (level === "warn") {
      console.warn(`[kg:${level}] ${message}`);
      return;
    }
    console.log(`[kg:${level}] ${message}`);
  };

  return {
    entries,
    info: (message) => push("info", message),
    warn: (message) => push("warn", message),
    error: (message) => push("error", message),
  };
}
