import { isNo, isYes } from "@/lib/answers";
import { errorMessage } from "@/lib/errors";
import { logger } from "@/lib/logger";
import {
  formatSlot,
  generateAvailableSlots,
  occupiedSlotsFromRecords,
  parsePreferredTime,
  slotsAround,
  type LocalSlot,
} from "@/server/scheduling/calendar";
import {
  ASK_PREFERRED_TIME,
  ASK_SHOW_SLOTS,
  NONE_NEAR_PREFERRED,
  NO_SLOTS,
  PICK_FROM_LIST,
  PICK_NUMBER_OR_OTHER,
  PREFERRED_TIME_UNRECOGNISED,
  SLOT_SELECTED,
  nearbySlotList,
  schedulingDeclined,
  schedulingUnavailable,
  slotList,
  slotOutOfRange,
} from "../copy";
import { setState, type ConversationContext } from "../states";
import type { AssistantDeps, StateHandler } from "../types";

const OTHER_WORDS = new Set(["other", "inne", "inny"]);
const SHOW_ALL_WORDS = new Set(["all", "show all", "wszystkie", "pokaż wszystkie"]);

async function loadOccupied(deps: AssistantDeps): Promise<LocalSlot[]> {
  const records = await deps.records.listCalendarRecords();
  return occupiedSlotsFromRecords(records, deps.timeZone);
}

async function listAllSlots(ctx: ConversationContext, deps: AssistantDeps): Promise<string> {
  try {
    const occupied = await loadOccupied(deps);
    const slots = generateAvailableSlots(deps.now(), occupied, deps.timeZone);
    if (slots.length === 0) return NO_SLOTS;

    ctx.scheduling.slots = slots;
    ctx.scheduling.showingSlots = true;
    ctx.scheduling.awaitingPreferredTime = false;
    return slotList(slots.map(formatSlot));
  } catch (err) {
    logger.error(`Error generating time slots: ${errorMessage(err)}`, { sessionId: ctx.id });
    return schedulingUnavailable(deps.contact);
  }
}

async function offerSlotsNearPreference(
  ctx: ConversationContext,
  message: string,
  deps: AssistantDeps
): Promise<string> {
  const now = deps.now();
  const preferred = parsePreferredTime(message, now, deps.timeZone);
  if (!preferred) return PREFERRED_TIME_UNRECOGNISED;

  try {
    const occupied = await loadOccupied(deps);
    const nearby = slotsAround(preferred, now, occupied, deps.timeZone);
    if (nearby.length === 0) return NONE_NEAR_PREFERRED;

    ctx.scheduling.slots = nearby;
    ctx.scheduling.showingSlots = true;
    ctx.scheduling.awaitingPreferredTime = false;
    return nearbySlotList(nearby.map(formatSlot));
  } catch (err) {
    logger.error(`Error checking preferred time: ${errorMessage(err)}`, { sessionId: ctx.id });
    return schedulingUnavailable(deps.contact);
  }
}

function selectSlot(ctx: ConversationContext, message: string): string {
  const slots = ctx.scheduling.slots;
  const n = Number(message);
  if (n < 1 || n > slots.length) return slotOutOfRange(slots.length);

  ctx.scheduling.selectedSlot = slots[n - 1];
  ctx.scheduling.showingSlots = false;
  ctx.collectionStep = "name";
  setState(ctx, "collect_customer_info");
  return SLOT_SELECTED;
}

export const handleServiceScheduling: StateHandler = async (ctx, message, deps) => {
  const text = message.trim().toLowerCase();

  if (isYes(text)) {
    return ctx.scheduling.showingSlots ? PICK_FROM_LIST : listAllSlots(ctx, deps);
  }

  if (isNo(text)) {
    setState(ctx, "end");
    return schedulingDeclined(deps.contact);
  }

  if (SHOW_ALL_WORDS.has(text)) {
    return listAllSlots(ctx, deps);
  }

  if (ctx.scheduling.awaitingPreferredTime) {
    return offerSlotsNearPreference(ctx, text, deps);
  }

  if (ctx.scheduling.showingSlots) {
    if (OTHER_WORDS.has(text)) {
      ctx.scheduling.awaitingPreferredTime = true;
      return ASK_PREFERRED_TIME;
    }
    if (/^\d+$/.test(text)) return selectSlot(ctx, text);
    return PICK_NUMBER_OR_OTHER;
  }

  return ASK_SHOW_SLOTS;
};
