import { isNo, isStillBroken, isYes } from "@/lib/answers";
import { errorMessage } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { findSolution } from "@/server/knowledge/knowledge-base";
import {
  ANALYSIS_FAILED,
  ASK_IF_SOLVED,
  LOW_CONFIDENCE_HINT,
  NEED_MORE_DETAIL,
  RESOLVED,
  VISIT_OFFER,
  VISIT_OFFER_ACCEPTED,
  VISIT_OFFER_DECLINED,
  VISIT_OFFER_UNCLEAR,
} from "../copy";
import { advancedFix, detectIssueCategory, extraFix, followUpQuestions } from "../diagnostics";
import { setState, type ConversationContext } from "../states";
import type { StateHandler } from "../types";

const LOW_CONFIDENCE = 0.3;
const MAX_REMOTE_ATTEMPTS = 2;

function isTooShort(message: string): boolean {
  const words = message.split(/\s+/).filter((w) => w.length > 1);
  return words.length < 3 && message.length < 20;
}

function appendAdditionalInfo(ctx: ConversationContext, message: string): void {
  ctx.additionalInfo = ctx.additionalInfo ? `${ctx.additionalInfo}\n${message}` : message;
}

export const handleIssueAnalysis: StateHandler = async (ctx, message, deps) => {
  try {
    const model = ctx.verifiedDevice?.model ?? "unknown";

    const topic = await deps.advisor.isOnTopic(message);
    if (!topic.isOnTopic) {
      logger.warn(`Detected off-topic question: ${message}`);
      return topic.response ?? `Sorry, I can only answer questions about ${deps.contact.brandName} devices.`;
    }

    const followingUp = ctx.clarificationAsked && ctx.issueDescription !== "";
    if (!followingUp && isTooShort(message)) {
      return NEED_MORE_DETAIL;
    }

    const issue = followingUp ? `${ctx.issueDescription}\n${message}` : message;
    const { solutions } = findSolution(deps.knowledge, model, issue);
    logger.info(`Found ${solutions.length} potential solutions`);

    // Nothing in the knowledge base yet: ask clarifying questions once before diagnosing.
    if (solutions.length === 0 && !ctx.clarificationAsked) {
      ctx.clarificationAsked = true;
      ctx.issueDescription = issue;
      return deps.advisor.analyzeIssue(issue);
    }

    const diagnosis = await deps.advisor.analyzeProblemWithKnowledge(model, issue, solutions);
    ctx.issueDescription = issue;
    ctx.diagnosisConfidence = diagnosis.confidenceScore;

    if (!setState(ctx, "check_resolution")) return ANALYSIS_FAILED;

    const parts = [diagnosis.solution];
    if (diagnosis.confidenceScore < LOW_CONFIDENCE) parts.push(LOW_CONFIDENCE_HINT);
    parts.push(ASK_IF_SOLVED);
    return parts.join("\n\n");
  } catch (err) {
    logger.error(`Error in handleIssueAnalysis: ${errorMessage(err)}`, { sessionId: ctx.id });
    return ANALYSIS_FAILED;
  }
};

export const handleCheckResolution: StateHandler = async (ctx, message) => {
  if (isYes(message)) {
    setState(ctx, "end");
    return RESOLVED;
  }

  const category = detectIssueCategory(ctx.issueDescription);

  if (isNo(message) || isStillBroken(message)) {
    if (!isNo(message)) appendAdditionalInfo(ctx, message);
    ctx.attempts += 1;

    if (ctx.attempts === 1) return followUpQuestions(category);
    if (ctx.attempts === MAX_REMOTE_ATTEMPTS) return advancedFix(category);

    setState(ctx, "issue_reported");
    return VISIT_OFFER;
  }

  // Neither yes nor no: treat the reply as diagnostic detail and suggest the next fix.
  appendAdditionalInfo(ctx, message);
  return extraFix(category);
};

export const handleIssueReported: StateHandler = async (ctx, message) => {
  if (isYes(message)) {
    setState(ctx, "service_scheduling");
    return VISIT_OFFER_ACCEPTED;
  }
  if (isNo(message)) {
    setState(ctx, "end");
    return VISIT_OFFER_DECLINED;
  }
  return VISIT_OFFER_UNCLEAR;
};
