import { createAirtableTables } from "@/lib/airtable";
import { generateSessionId } from "@/lib/chat-ids";
import { createResendMailer } from "@/lib/email-sender";
import { assertRequiredEnv, env } from "@/lib/env";
import { logger } from "@/lib/logger";
import { createOpenAiCompleter, getOpenAiClient } from "@/lib/openai";
import { createAdvisor } from "@/server/ai/advisor";
import { welcomeMessage, type ServiceContact } from "@/server/conversation/copy";
import { processMessage } from "@/server/conversation/engine";
import { createConversationContext, type ConversationContext } from "@/server/conversation/states";
import type { AssistantDeps } from "@/server/conversation/types";
import { getPool } from "@/server/db";
import { loadKnowledgeBase } from "@/server/knowledge/knowledge-base";
import { createServiceRecords } from "@/server/records/service-records";
import { createPgSessionStore } from "@/server/sessions/pg-session-store";
import { MemorySessionStore, type SessionStore } from "@/server/sessions/session-store";

export type TurnResult = {
  sessionId: string;
  state: ConversationContext["state"];
  reply: string;
};

/**
 * Session handling around the conversation engine. Routes talk to this, never
 * to the handlers directly.
 */
export class ServiceAssistant {
  constructor(
    private readonly deps: AssistantDeps,
    private readonly sessions: SessionStore
  ) {}

  newContext(id: string = generateSessionId(this.deps.now())): ConversationContext {
    return createConversationContext({ id, welcome: welcomeMessage(this.deps.contact), now: this.deps.now() });
  }

  /** Existing session, or a fresh one (saved) seeded with the welcome message. */
  async openSession(sessionId?: string): Promise<ConversationContext> {
    if (sessionId) {
      const existing = await this.sessions.load(sessionId);
      if (existing) return existing;
    }

    const ctx = this.newContext(sessionId);
    await this.sessions.save(ctx);
    return ctx;
  }

  async handleMessage(params: { sessionId?: string; message: string }): Promise<TurnResult> {
    const ctx = await this.openSession(params.sessionId);
    const reply = await processMessage(ctx, params.message, this.deps);
    await this.sessions.save(ctx);
    return { sessionId: ctx.id, state: ctx.state, reply };
  }

  async closeSession(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }
}

export function serviceContactFromEnv(): ServiceContact {
  return {
    brandName: env.BRAND_NAME,
    phone: env.SERVICE_PHONE,
    email: env.SERVICE_EMAIL,
    hours: env.SERVICE_HOURS,
  };
}

function createSessionStore(): SessionStore {
  if (env.DATABASE_URL) {
    logger.info("Using Postgres session storage");
    return createPgSessionStore(getPool());
  }
  return new MemorySessionStore();
}

const globalForAssistant = globalThis as unknown as {
  serviceAssistant?: Promise<ServiceAssistant>;
};

async function buildAssistant(): Promise<ServiceAssistant> {
  assertRequiredEnv();

  const contact = serviceContactFromEnv();
  const knowledge = await loadKnowledgeBase({ dataDir: env.KNOWLEDGE_DATA_DIR });
  const tables = createAirtableTables({ apiKey: env.AIRTABLE_API_KEY, baseId: env.AIRTABLE_BASE_ID });

  const deps: AssistantDeps = {
    records: createServiceRecords(tables),
    advisor: createAdvisor({ completer: createOpenAiCompleter(getOpenAiClient()), brandName: contact.brandName }),
    knowledge,
    mailer: env.RESEND_API_KEY ? createResendMailer({ apiKey: env.RESEND_API_KEY, from: env.MAIL_FROM }) : null,
    contact,
    timeZone: env.SERVICE_TIMEZONE,
    now: () => new Date(),
  };

  return new ServiceAssistant(deps, createSessionStore());
}

/**
 * Process-wide assistant. Throws ConfigurationError when required variables
 * are missing; a failed build is not cached.
 */
export function getAssistant(): Promise<ServiceAssistant> {
  if (!globalForAssistant.serviceAssistant) {
    globalForAssistant.serviceAssistant = buildAssistant().catch((err: unknown) => {
      globalForAssistant.serviceAssistant = undefined;
      throw err;
    });
  }
  return globalForAssistant.serviceAssistant;
}
