import { errorMessage } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { UNEXPECTED_ERROR } from "./copy";
import { handleCollectCustomerInfo, handleConfirmation, handleEnd } from "./handlers/booking";
import { handleCheckResolution, handleIssueAnalysis, handleIssueReported } from "./handlers/diagnosis";
import { handleDeviceVerification, handleWelcome } from "./handlers/intake";
import { handleServiceScheduling } from "./handlers/scheduling";
import type { ConversationContext, ConversationState } from "./states";
import type { AssistantDeps, StateHandler } from "./types";

const HANDLERS: Record<ConversationState, StateHandler> = {
  welcome: handleWelcome,
  device_verification: handleDeviceVerification,
  issue_analysis: handleIssueAnalysis,
  check_resolution: handleCheckResolution,
  issue_reported: handleIssueReported,
  service_scheduling: handleServiceScheduling,
  collect_customer_info: handleCollectCustomerInfo,
  confirmation: handleConfirmation,
  end: handleEnd,
};

/**
 * Runs one turn: records the user message, dispatches on the current state
 * and records the reply. Never throws; failures become an apology reply.
 */
export async function processMessage(
  ctx: ConversationContext,
  message: string,
  deps: AssistantDeps
): Promise<string> {
  const at = deps.now().toISOString();
  ctx.messages.push({ role: "user", content: message, at });

  logger.info(`Processing message in state: ${ctx.state}`, { sessionId: ctx.id });

  let reply: string;
  try {
    reply = await HANDLERS[ctx.state](ctx, message.trim(), deps);
  } catch (err) {
    logger.error(`Error processing message: ${errorMessage(err)}`, { sessionId: ctx.id, state: ctx.state });
    reply = UNEXPECTED_ERROR;
  }

  const repliedAt = deps.now().toISOString();
  ctx.messages.push({ role: "assistant", content: reply, at: repliedAt });
  ctx.updatedAt = repliedAt;
  return reply;
}
