import type { VisitMailer } from "@/lib/email-sender";
import type { Advisor } from "@/server/ai/advisor";
import type { KnowledgeBase } from "@/server/knowledge/knowledge-base";
import type { ServiceRecords } from "@/server/records/service-records";
import type { ServiceContact } from "./copy";
import type { ConversationContext } from "./states";

/** Collaborators of the conversation handlers. */
export type AssistantDeps = {
  records: ServiceRecords;
  advisor: Advisor;
  knowledge: KnowledgeBase;
  /** null when confirmation e-mails are not configured */
  mailer: VisitMailer | null;
  contact: ServiceContact;
  timeZone: string;
  now: () => Date;
};

/** Handles one user message in the context's current state and returns the reply. */
export type StateHandler = (ctx: ConversationContext, message: string, deps: AssistantDeps) => Promise<string>;
