import { z } from "zod";
import { isNo, isYes } from "@/lib/answers";
import { errorMessage } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { finalizeBooking } from "@/server/booking/finalizeBooking";
import { formatSlot } from "@/server/scheduling/calendar";
import {
  ASK_ADDRESS,
  ASK_EMAIL,
  ASK_PHONE,
  BOOKING_CONFIRMED,
  CONFIRMATION_UNCLEAR,
  INVALID_EMAIL,
  INVALID_PHONE,
  REENTER_DETAILS,
  SELECT_SLOT_FIRST,
  START_OVER,
  bookingFailed,
  confirmDetails,
  goodbye,
} from "../copy";
import { resetRequestData, setState } from "../states";
import type { StateHandler } from "../types";

const EmailSchema = z.string().trim().email();

const MIN_PHONE_CHARS = 9;

export function isValidPhone(value: string): boolean {
  return value.replace(/[\s-]/g, "").length >= MIN_PHONE_CHARS;
}

export function isValidEmail(value: string): boolean {
  return EmailSchema.safeParse(value).success;
}

export const handleCollectCustomerInfo: StateHandler = async (ctx, message) => {
  const value = message.trim();
  const info = ctx.customerInfo;

  switch (ctx.collectionStep) {
    case "name":
      info.name = value;
      ctx.collectionStep = "phone";
      return ASK_PHONE;

    case "phone":
      if (!isValidPhone(value)) return INVALID_PHONE;
      info.phone = value;
      ctx.collectionStep = "email";
      return ASK_EMAIL;

    case "email":
      if (!isValidEmail(value)) return INVALID_EMAIL;
      info.email = value;
      ctx.collectionStep = "address";
      return ASK_ADDRESS;

    case "address": {
      info.address = value;
      const slot = ctx.scheduling.selectedSlot;
      if (!slot) {
        setState(ctx, "service_scheduling");
        return SELECT_SLOT_FIRST;
      }

      setState(ctx, "confirmation");
      return confirmDetails({
        name: info.name ?? "",
        phone: info.phone ?? "",
        email: info.email ?? "",
        address: value,
        date: formatSlot(slot),
      });
    }
  }
};

export const handleConfirmation: StateHandler = async (ctx, message, deps) => {
  if (isYes(message)) {
    try {
      const outcome = await finalizeBooking(ctx, deps);
      if (!outcome.ok) return bookingFailed(outcome.message);

      ctx.booking = outcome.booking;
      setState(ctx, "end");
      return BOOKING_CONFIRMED;
    } catch (err) {
      logger.error(`Error scheduling service: ${errorMessage(err)}`, { sessionId: ctx.id });
      return bookingFailed(errorMessage(err));
    }
  }

  if (isNo(message)) {
    ctx.customerInfo = {};
    ctx.collectionStep = "name";
    setState(ctx, "collect_customer_info");
    return REENTER_DETAILS;
  }

  return CONFIRMATION_UNCLEAR;
};

export const handleEnd: StateHandler = async (ctx, message, deps) => {
  if (!isYes(message)) return goodbye(deps.contact);

  setState(ctx, "welcome");
  resetRequestData(ctx);
  // consent was already given in this session
  setState(ctx, "device_verification");
  return START_OVER;
};
