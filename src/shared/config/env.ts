export type Env = {
  PORTAL_BASE_URL: string;
  SESSION_STATE_FILE: string;
  STORES_FILE: string;
  OUTPUT_DIR: string;
  FORM_POST_URL?: string;
  FORM_FIELD_MAP_FILE: string;
  CHAT_WEBHOOK_URL?: string;
  PERFORMANCE_WEBHOOK_URL?: string;
  CHAT_STORE_PREFIX: string;
  MONGO_URI?: string;
  HARVEST_TIMEZONE: string;
  STATUS_PORT?: number;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const validateTimeZone = (name: string, value: string): string => {
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone: value });
  } catch {
    throw new Error(`${name} must be an IANA time zone. Received: ${value}`);
  }
  return value;
};

const optional = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const optionalUrl = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const value = optional(env[name]);
  return value === undefined ? undefined : validateHttpUrl(name, value);
};

const optionalPort = (env: NodeJS.ProcessEnv, name: string): number | undefined => {
  const raw = optional(env[name]);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || value > 65535) {
    throw new Error(`${name}=${raw} is out of allowed range [0..65535]`);
  }
  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const PORTAL_BASE_URL = validateHttpUrl("PORTAL_BASE_URL", optional(env.PORTAL_BASE_URL) ?? "http://localhost:3999");
  const CHAT_WEBHOOK_URL = optionalUrl(env, "CHAT_WEBHOOK_URL");

  return {
    PORTAL_BASE_URL,
    SESSION_STATE_FILE: optional(env.SESSION_STATE_FILE) ?? "state.json",
    STORES_FILE: optional(env.STORES_FILE) ?? "stores.csv",
    OUTPUT_DIR: optional(env.OUTPUT_DIR) ?? "output",
    FORM_POST_URL: optionalUrl(env, "FORM_POST_URL"),
    FORM_FIELD_MAP_FILE: optional(env.FORM_FIELD_MAP_FILE) ?? "config/form-fields.json",
    CHAT_WEBHOOK_URL,
    PERFORMANCE_WEBHOOK_URL: optionalUrl(env, "PERFORMANCE_WEBHOOK_URL") ?? CHAT_WEBHOOK_URL,
    CHAT_STORE_PREFIX: env.CHAT_STORE_PREFIX ?? "",
    MONGO_URI: optional(env.MONGO_URI),
    HARVEST_TIMEZONE: validateTimeZone("HARVEST_TIMEZONE", optional(env.HARVEST_TIMEZONE) ?? "Europe/London"),
    STATUS_PORT: optionalPort(env, "STATUS_PORT")
  };
};
