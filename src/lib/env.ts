import { ConfigurationError } from "@/lib/errors";

export const REQUIRED_ENV_VARS = ["AIRTABLE_API_KEY", "AIRTABLE_BASE_ID", "OPENAI_API_KEY"] as const;

export type RequiredEnvVar = (typeof REQUIRED_ENV_VARS)[number];

type EnvSource = Record<string, string | undefined>;

function flag(value: string | undefined): boolean {
  return (value ?? "").trim().toLowerCase() === "true";
}

export const env = {
  // Record storage (Airtable)
  AIRTABLE_API_KEY: process.env.AIRTABLE_API_KEY ?? "",
  AIRTABLE_BASE_ID: process.env.AIRTABLE_BASE_ID ?? "",

  // OpenAI
  OPENAI_API_KEY: process.env.OPENAI_API_KEY ?? "",

  // Diagnosis and answers to the customer
  OPENAI_MODEL_CHAT: process.env.OPENAI_MODEL_CHAT ?? "gpt-4o-mini",

  // Short classification calls (topic check, confidence score)
  OPENAI_MODEL_CLASSIFIER:
    process.env.OPENAI_MODEL_CLASSIFIER ?? process.env.OPENAI_MODEL_CHAT ?? "gpt-4o-mini",

  // Visits are offered and booked in this wall-clock zone
  SERVICE_TIMEZONE: process.env.SERVICE_TIMEZONE ?? "Europe/Warsaw",

  // documents.json / troubleshooting.json / usage.json
  KNOWLEDGE_DATA_DIR: process.env.KNOWLEDGE_DATA_DIR ?? "data",

  // Sessions live in memory unless a database is configured
  DATABASE_URL: process.env.DATABASE_URL ?? "",

  // Visit confirmation e-mails (optional)
  RESEND_API_KEY: process.env.RESEND_API_KEY ?? "",
  MAIL_FROM: process.env.MAIL_FROM ?? "Service Assistant <no-reply@example.com>",

  // Contact details shown to the customer
  BRAND_NAME: process.env.BRAND_NAME ?? "Vet-Eye",
  SERVICE_PHONE: process.env.SERVICE_PHONE ?? "+48 000 000 000",
  SERVICE_EMAIL: process.env.SERVICE_EMAIL ?? "service@example.com",
  SERVICE_HOURS: process.env.SERVICE_HOURS ?? "Monday to Friday, 8:00-16:00",

  DEBUG: flag(process.env.DEBUG),
  LOG_LEVEL: process.env.LOG_LEVEL ?? "",
  LOG_FILE: process.env.LOG_FILE ?? "",
};

/**
 * Names of the required variables that are unset or blank, in declaration order.
 */
export function getMissingRequiredEnv(source: EnvSource = process.env): RequiredEnvVar[] {
  return REQUIRED_ENV_VARS.filter((name) => !(source[name] ?? "").trim());
}

export function assertRequiredEnv(source: EnvSource = process.env): void {
  const missing = getMissingRequiredEnv(source);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing environment variables: ${missing.join(", ")}`, missing);
  }
}
