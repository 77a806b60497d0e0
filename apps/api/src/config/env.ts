export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type PushTransportKind = "log" | "fcm";

export type ApiConfig = {
  port: number;
  mediaBaseUrl: string;
  deepLinkScheme: string;
  pushTransport: PushTransportKind;
  firebaseProjectId?: string;
  realtimeEnabled: boolean;
  brewStartRateLimit: number;
};

const DEFAULT_MEDIA_BASE_URL = "https://media.firstcrack.example";
const DEFAULT_DEEP_LINK_SCHEME = "firstcrack";
const DEFAULT_BREW_START_RATE_LIMIT = 10;

function requireEnv(env: NodeJS.ProcessEnv, key: string): string {
  const value = env[key];
  if (!value || value.trim() === "") {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function optionalEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === "") return undefined;
  return value.trim();
}

function parsePositiveInt(key: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${key} must be a positive integer, received: ${value}`);
  }
  return parsed;
}

function parseOptionalBool(
  key: string,
  value: string | undefined,
  fallback: boolean
): boolean {
  if (value === undefined) return fallback;
  const normalized = value.toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  throw new ConfigError(`${key} must be a boolean (true/false), received: ${value}`);
}

function parseMediaBaseUrl(value: string | undefined): string {
  if (value === undefined) return DEFAULT_MEDIA_BASE_URL;
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigError(`MEDIA_BASE_URL must be an absolute URL, received: ${value}`);
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new ConfigError(`MEDIA_BASE_URL must use http or https, received: ${value}`);
  }
  return value.replace(/\/+$/, "");
}

function parseScheme(value: string | undefined): string {
  if (value === undefined) return DEFAULT_DEEP_LINK_SCHEME;
  if (!/^[a-z][a-z0-9+.-]*$/.test(value)) {
    throw new ConfigError(`DEEP_LINK_SCHEME is not a valid URI scheme: ${value}`);
  }
  return value;
}

function parseTransport(value: string | undefined): PushTransportKind {
  if (value === undefined) return "log";
  const normalized = value.toLowerCase();
  if (normalized === "log" || normalized === "fcm") return normalized;
  throw new ConfigError(`PUSH_TRANSPORT must be "log" or "fcm", received: ${value}`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const port = parsePositiveInt("PORT", requireEnv(env, "PORT"));
  const rateLimit = optionalEnv(env, "BREW_START_RATE_LIMIT");
  const config: ApiConfig = {
    port,
    mediaBaseUrl: parseMediaBaseUrl(optionalEnv(env, "MEDIA_BASE_URL")),
    deepLinkScheme: parseScheme(optionalEnv(env, "DEEP_LINK_SCHEME")),
    pushTransport: parseTransport(optionalEnv(env, "PUSH_TRANSPORT")),
    realtimeEnabled: parseOptionalBool(
      "REALTIME_ENABLED",
      optionalEnv(env, "REALTIME_ENABLED"),
      true
    ),
    brewStartRateLimit: rateLimit
      ? parsePositiveInt("BREW_START_RATE_LIMIT", rateLimit)
      : DEFAULT_BREW_START_RATE_LIMIT
  };
  const firebaseProjectId = optionalEnv(env, "FIREBASE_PROJECT_ID");
  if (firebaseProjectId) config.firebaseProjectId = firebaseProjectId;
  return config;
}
