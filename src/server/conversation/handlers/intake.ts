import { isNo, isYes } from "@/lib/answers";
import { logger } from "@/lib/logger";
import {
  ASK_SERIAL,
  CONSENT_THANKS,
  CONSENT_UNCLEAR,
  consentDeclined,
  deviceNotFound,
  deviceVerified,
} from "../copy";
import { setState } from "../states";
import type { StateHandler } from "../types";

export const handleWelcome: StateHandler = async (ctx, message, deps) => {
  if (isYes(message)) {
    ctx.gdprConsent = true;
    if (setState(ctx, "device_verification")) return CONSENT_THANKS;
    return "Sorry, an error occurred while recording your consent. Please try again.";
  }

  if (isNo(message)) {
    return consentDeclined(deps.contact);
  }

  return ctx.gdprConsent ? ASK_SERIAL : CONSENT_UNCLEAR;
};

function looksLikeSerial(message: string): boolean {
  const lower = message.trim().toLowerCase();
  return lower.startsWith("sn:") || lower.startsWith("sn ");
}

export const handleDeviceVerification: StateHandler = async (ctx, message, deps) => {
  if (!looksLikeSerial(message)) return ASK_SERIAL;

  const result = await deps.records.getDeviceInfo(message);
  if (!result.ok) {
    return deviceNotFound(result.message);
  }

  ctx.verifiedDevice = result.device;
  logger.info(`Device verified for session ${ctx.id}`, { recordId: result.device.recordId });
  setState(ctx, "issue_analysis");

  return deviceVerified(result.device.model ?? "Unknown model", result.device.warrantyStatus ?? "No information");
};
