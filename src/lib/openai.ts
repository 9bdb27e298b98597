import OpenAI from "openai";
import { env } from "./env";
import { logger } from "./logger";

export type AssistantModelKind = "chat" | "classifier";

/**
 * Model selection by task.
 * Source of truth: src/lib/env.ts
 */
export function selectAssistantModel(kind: AssistantModelKind): string {
  switch (kind) {
    case "classifier":
      return env.OPENAI_MODEL_CLASSIFIER;
    case "chat":
    default:
      return env.OPENAI_MODEL_CHAT;
  }
}

export type CompletionRequest = {
  kind: AssistantModelKind;
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
};

/** Single-turn text completion; the seam the advisor is written against. */
export interface Completer {
  complete(request: CompletionRequest): Promise<string>;
}

export function createOpenAiCompleter(client: OpenAI): Completer {
  return {
    async complete(request) {
      const model = selectAssistantModel(request.kind);
      const response = await client.chat.completions.create({
        model,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      });

      const content = response.choices?.[0]?.message?.content ?? "";
      logger.debug("OpenAI completion received", { model, chars: content.length });
      return content;
    },
  };
}

let client: OpenAI | null = null;

export function getOpenAiClient(): OpenAI {
  if (!client) {
    if (!env.OPENAI_API_KEY) {
      logger.warn("OPENAI_API_KEY is not set in environment variables.");
    }
    client = new OpenAI({ apiKey: env.OPENAI_API_KEY });
  }
  return client;
}
