import { randomBytes } from "node:crypto";

const SESSION_ID_PATTERN = /^SA_\d{8}_[a-z0-9]{12}$/;

/**
 * Format: SA_YYYYMMDD_xxxxxxxxxxxx (UTC date, 12 random base36 chars).
 */
export function generateSessionId(date = new Date()): string {
  const yyyy = date.getUTCFullYear();
  const mm = String(date.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(date.getUTCDate()).padStart(2, "0");

  const alphabet = "abcdefghijklmnopqrstuvwxyz0123456789";
  const suffix = Array.from(randomBytes(12), (b) => alphabet[b % alphabet.length]).join("");

  return `SA_${yyyy}${mm}${dd}_${suffix}`;
}

export function isSessionId(value: string): boolean {
  return SESSION_ID_PATTERN.test(value);
}
