type Level = "info" | "error";

export type LogEntry = {
  level: Level;
  msg: string;
  [key: string]: unknown;
};

export type BrewLogContext = {
  brew_id?: string;
  stage?: string;
};

type LogSettings = {
  threshold: Level | "silent";
  pretty: boolean;
};

const LEVEL_RANK: Record<Level | "silent", number> = { info: 0, error: 1, silent: 2 };

export function isTestRuntime(): boolean {
  return (
    process.env.NODE_ENV === "test" ||
    process.env.VITEST === "true" ||
    typeof process.env.VITEST_WORKER_ID === "string"
  );
}

// Read on every call so tests can stub LOG_LEVEL / LOG_FORMAT.
function readLogSettings(): LogSettings {
  const level = (process.env.LOG_LEVEL ?? "").toLowerCase();
  const format = (process.env.LOG_FORMAT ?? "").toLowerCase();
  const threshold =
    level === "info" || level === "error" || level === "silent"
      ? level
      : isTestRuntime()
        ? "silent"
        : "info";
  const pretty = format === "pretty" || (format !== "json" && isTestRuntime());
  return { threshold, pretty };
}

function renderField(key: string, value: unknown): string | null {
  if (value === undefined) return null;
  if (typeof value === "string") return `${key}="${value}"`;
  if (value === null || typeof value === "number" || typeof value === "boolean") {
    return `${key}=${String(value)}`;
  }
  try {
    return `${key}=${JSON.stringify(value)}`;
  } catch {
    return `${key}=[unserializable]`;
  }
}

/**
 * `LEVEL msg key=value ...` with keys sorted. Request entries lead with
 * `METHOD path -> status (Nms)` and keep only their brew context as fields.
 */
export function toPrettyLine(entry: LogEntry): string {
  const { level, msg, ...fields } = entry;
  let head = `${level.toUpperCase()} ${msg}`;
  let keys = Object.keys(fields).sort();
  if (msg === "request") {
    const { method, path, status, duration_ms } = fields;
    head = `${level.toUpperCase()} ${String(method)} ${String(path)} -> ${String(status)} (${String(duration_ms)}ms)`;
    keys = keys.filter((key) => key === "brew_id" || key === "stage");
  }
  const rendered = keys.map((key) => renderField(key, fields[key])).filter((f) => f !== null);
  return rendered.length ? `${head} ${rendered.join(" ")}` : head;
}

export function log(entry: LogEntry) {
  const { threshold, pretty } = readLogSettings();
  if (LEVEL_RANK[entry.level] < LEVEL_RANK[threshold]) return;
  console.log(pretty ? toPrettyLine(entry) : JSON.stringify(entry));
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function deriveBrewContext(body: unknown): BrewLogContext {
  if (!body || typeof body !== "object") return {};
  const brewId =
    ("brewId" in body ? nonEmptyString(body.brewId) : undefined) ??
    ("brew_id" in body ? nonEmptyString(body.brew_id) : undefined);
  const stage = "stage" in body ? nonEmptyString(body.stage) : undefined;
  return {
    ...(brewId !== undefined ? { brew_id: brewId } : {}),
    ...(stage !== undefined ? { stage } : {})
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function buildRequestLog(input: {
  method: string;
  path: string;
  status: number;
  duration_ms: number;
  body?: unknown;
}): LogEntry {
  const { body, ...request } = input;
  return { level: "info", msg: "request", ...request, ...deriveBrewContext(body) };
}
