import type { Completer } from "@/lib/openai";
import { errorMessage } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { formatSolutionsForPrompt, type Solution } from "@/server/knowledge/knowledge-base";
import {
  CONFIDENCE_SYSTEM_PROMPT,
  confidenceUserPrompt,
  diagnosisSystemPrompt,
  diagnosisUserPrompt,
  issueIntakeSystemPrompt,
  topicSystemPrompt,
} from "./prompts";

export type Diagnosis = {
  solution: string;
  confidenceScore: number;
};

export type TopicCheck = {
  isOnTopic: boolean;
  response?: string;
};

export interface Advisor {
  analyzeIssue(description: string): Promise<string>;
  analyzeProblemWithKnowledge(model: string, issue: string, solutions: Solution[]): Promise<Diagnosis>;
  isOnTopic(message: string): Promise<TopicCheck>;
  getServiceQuestions(): string[];
}

export const FALLBACK_INTAKE_QUESTIONS = `I understand the problem you reported. To help with the diagnosis I need a few more details:

1. When did the problem first occur?
2. Are any error messages shown?
3. Have any fixes been tried already?

Please share these details so I can understand the situation better.`;

export const DIAGNOSIS_FAILED =
  "Sorry, something went wrong while analysing the problem. Please contact the service team.";

export const SERVICE_QUESTIONS = [
  "When did the problem first occur?",
  "How often does the problem occur?",
  "Does the device show any error messages?",
  "Have any fixes been tried already?",
  "Does the problem occur under specific conditions?",
  "Is the device running in a fallback or safe mode?",
  "How urgent is the request?",
] as const;

const DEFAULT_CONFIDENCE = 0.5;
const FAILED_CONFIDENCE = 0.1;

/** "0.8" -> 0.8; anything that is not a bare number -> 0.5. Clamped to 0..1. */
export function parseConfidence(raw: string): number {
  const text = raw.trim();
  if (!/^-?\d*\.?\d+$/.test(text)) return DEFAULT_CONFIDENCE;
  const value = Number(text);
  if (!Number.isFinite(value)) return DEFAULT_CONFIDENCE;
  return Math.min(1, Math.max(0, value));
}

export function createAdvisor(deps: { completer: Completer; brandName: string }): Advisor {
  const { completer, brandName } = deps;
  const offTopicReply = `Sorry, I can only answer questions about ${brandName} devices.`;

  return {
    async analyzeIssue(description) {
      try {
        logger.debug(`Analyzing issue: ${description.slice(0, 100)}...`);
        const answer = await completer.complete({
          kind: "chat",
          system: issueIntakeSystemPrompt({ brandName }),
          user: `Device problem: ${description}`,
          temperature: 0.5,
          maxTokens: 500,
        });
        return answer.trim() || FALLBACK_INTAKE_QUESTIONS;
      } catch (err) {
        logger.error(`Error in analyzeIssue: ${errorMessage(err)}`);
        return FALLBACK_INTAKE_QUESTIONS;
      }
    },

    async analyzeProblemWithKnowledge(model, issue, solutions) {
      try {
        const solution = await completer.complete({
          kind: "chat",
          system: diagnosisSystemPrompt({ brandName }),
          user: diagnosisUserPrompt({ model, issue, knowledgeBlock: formatSolutionsForPrompt(solutions) }),
          temperature: 0.3,
          maxTokens: 1000,
        });

        const rawScore = await completer.complete({
          kind: "classifier",
          system: CONFIDENCE_SYSTEM_PROMPT,
          user: confidenceUserPrompt({ issue, answer: solution }),
          temperature: 0.1,
          maxTokens: 10,
        });

        return { solution, confidenceScore: parseConfidence(rawScore) };
      } catch (err) {
        logger.error(`Error in analyzeProblemWithKnowledge: ${errorMessage(err)}`);
        return { solution: DIAGNOSIS_FAILED, confidenceScore: FAILED_CONFIDENCE };
      }
    },

    async isOnTopic(message) {
      try {
        const verdict = await completer.complete({
          kind: "classifier",
          system: topicSystemPrompt({ brandName }),
          user: message,
          temperature: 0,
          maxTokens: 5,
        });

        if (verdict.trim().toUpperCase().startsWith("OFF_TOPIC")) {
          return { isOnTopic: false, response: offTopicReply };
        }
        return { isOnTopic: true };
      } catch (err) {
        logger.warn(`Topic check failed, treating message as on-topic: ${errorMessage(err)}`);
        return { isOnTopic: true };
      }
    },

    getServiceQuestions() {
      return [...SERVICE_QUESTIONS];
    },
  };
}
