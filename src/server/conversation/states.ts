import { z } from "zod";
import { logger } from "@/lib/logger";

export const CONVERSATION_STATES = [
  "welcome",
  "device_verification",
  "issue_analysis",
  "check_resolution",
  "issue_reported",
  "service_scheduling",
  "collect_customer_info",
  "confirmation",
  "end",
] as const;

export const ConversationStateSchema = z.enum(CONVERSATION_STATES);
export type ConversationState = z.infer<typeof ConversationStateSchema>;

export const VALID_STATE_TRANSITIONS: Record<ConversationState, readonly ConversationState[]> = {
  welcome: ["device_verification"],
  device_verification: ["issue_analysis"],
  issue_analysis: ["check_resolution", "issue_reported"],
  check_resolution: ["end", "issue_reported"],
  issue_reported: ["service_scheduling", "end"],
  service_scheduling: ["collect_customer_info", "end"],
  collect_customer_info: ["confirmation", "service_scheduling"],
  confirmation: ["end", "service_scheduling", "collect_customer_info"],
  end: ["welcome"],
};

const ChatMessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  at: z.string(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

const VerifiedDeviceSchema = z.object({
  recordId: z.string(),
  serialNumber: z.string(),
  model: z.string().nullable(),
  warrantyStatus: z.string().nullable(),
  customerId: z.string().nullable(),
});

const LocalSlotSchema = z.object({
  year: z.number().int(),
  month: z.number().int(),
  day: z.number().int(),
  hour: z.number().int(),
});

const CustomerInfoSchema = z.object({
  name: z.string().optional(),
  phone: z.string().optional(),
  email: z.string().optional(),
  address: z.string().optional(),
});

export type CustomerInfo = z.infer<typeof CustomerInfoSchema>;

export const CollectionStepSchema = z.enum(["name", "phone", "email", "address"]);
export type CollectionStep = z.infer<typeof CollectionStepSchema>;

const SchedulingSchema = z.object({
  slots: z.array(LocalSlotSchema),
  showingSlots: z.boolean(),
  awaitingPreferredTime: z.boolean(),
  selectedSlot: LocalSlotSchema.nullable(),
});

const BookingSchema = z.object({
  calendarRecordId: z.string(),
  serviceRequestId: z.string().nullable(),
  customerUpdated: z.boolean(),
  emailSent: z.boolean(),
});

export type Booking = z.infer<typeof BookingSchema>;

/** Everything a session remembers; stored as JSON. */
export const ConversationContextSchema = z.object({
  id: z.string(),
  state: ConversationStateSchema,
  stateHistory: z.array(ConversationStateSchema),
  messages: z.array(ChatMessageSchema),
  gdprConsent: z.boolean(),
  verifiedDevice: VerifiedDeviceSchema.nullable(),
  issueDescription: z.string(),
  additionalInfo: z.string(),
  clarificationAsked: z.boolean(),
  attempts: z.number().int(),
  diagnosisConfidence: z.number().nullable(),
  scheduling: SchedulingSchema,
  customerInfo: CustomerInfoSchema,
  collectionStep: CollectionStepSchema,
  booking: BookingSchema.nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type ConversationContext = z.infer<typeof ConversationContextSchema>;

function emptyScheduling(): ConversationContext["scheduling"] {
  return { slots: [], showingSlots: false, awaitingPreferredTime: false, selectedSlot: null };
}

export function createConversationContext(params: {
  id: string;
  welcome: string;
  now: Date;
}): ConversationContext {
  const at = params.now.toISOString();
  return {
    id: params.id,
    state: "welcome",
    stateHistory: [],
    messages: [{ role: "assistant", content: params.welcome, at }],
    gdprConsent: false,
    verifiedDevice: null,
    issueDescription: "",
    additionalInfo: "",
    clarificationAsked: false,
    attempts: 0,
    diagnosisConfidence: null,
    scheduling: emptyScheduling(),
    customerInfo: {},
    collectionStep: "name",
    booking: null,
    createdAt: at,
    updatedAt: at,
  };
}

/**
 * Clears device, issue, scheduling and contact data for a new request.
 * Identity, transcript, state and consent are kept.
 */
export function resetRequestData(ctx: ConversationContext): void {
  ctx.verifiedDevice = null;
  ctx.issueDescription = "";
  ctx.additionalInfo = "";
  ctx.clarificationAsked = false;
  ctx.attempts = 0;
  ctx.diagnosisConfidence = null;
  ctx.scheduling = emptyScheduling();
  ctx.customerInfo = {};
  ctx.collectionStep = "name";
  ctx.booking = null;
}

export function isValidTransition(from: ConversationState, to: ConversationState): boolean {
  return VALID_STATE_TRANSITIONS[from].includes(to);
}

/**
 * Moves the conversation to `next` when the transition is allowed.
 * Returns false (and leaves the state unchanged) otherwise.
 */
export function setState(ctx: ConversationContext, next: ConversationState): boolean {
  const current = ctx.state;
  if (!isValidTransition(current, next)) {
    logger.warn(`Invalid state transition: ${current} -> ${next}`, { sessionId: ctx.id });
    return false;
  }

  ctx.stateHistory.push(current);
  ctx.state = next;
  logger.info(`State transition: ${current} -> ${next}`, { sessionId: ctx.id });
  return true;
}
