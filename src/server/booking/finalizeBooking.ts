import type { WritableFields } from "@/lib/airtable";
import { errorMessage } from "@/lib/errors";
import { logOperation } from "@/lib/logger";
import { formatSlot, toAirtableDateTime } from "@/server/scheduling/calendar";
import type { AssistantDeps } from "@/server/conversation/types";
import type { Booking, ConversationContext } from "@/server/conversation/states";

export type BookingOutcome = { ok: true; booking: Booking } | { ok: false; message: string };

type BookingDetails = {
  deviceRecordId: string;
  customerId: string | null;
  model: string;
  serialNumber: string;
  issue: string;
  name: string;
  phone: string;
  email: string;
  address: string;
};

function collectDetails(ctx: ConversationContext): BookingDetails | null {
  const device = ctx.verifiedDevice;
  const { name, phone, email, address } = ctx.customerInfo;
  if (!device || !name || !phone || !email || !address) return null;

  const issue = [ctx.issueDescription, ctx.additionalInfo].filter((s) => s.trim()).join("\n\n");

  return {
    deviceRecordId: device.recordId,
    customerId: device.customerId,
    model: device.model ?? "Unknown model",
    serialNumber: device.serialNumber,
    issue,
    name,
    phone,
    email,
    address,
  };
}

export function buildVisitDescription(d: BookingDetails): string {
  return [
    `Model: ${d.model}`,
    `SN: ${d.serialNumber}`,
    `Problem: ${d.issue}`,
    "",
    "Customer:",
    d.name,
    `Phone: ${d.phone}`,
    `E-mail: ${d.email}`,
    `Address: ${d.address}`,
  ].join("\n");
}

/**
 * Books the selected visit.
 *
 * The Calendar record is required; the service request, the customer update
 * and the confirmation e-mail are best effort and only logged when they fail.
 */
export async function finalizeBooking(ctx: ConversationContext, deps: AssistantDeps): Promise<BookingOutcome> {
  const operation = `booking:${ctx.id}`;
  const slot = ctx.scheduling.selectedSlot;
  const details = collectDetails(ctx);

  if (!slot || !details) {
    return { ok: false, message: "booking details are incomplete" };
  }

  logOperation.start(operation, "Booking service visit", { slot: formatSlot(slot) });

  const dateTime = toAirtableDateTime(slot, deps.timeZone);

  const calendarFields: WritableFields = {
    date_time: dateTime,
    summary: `Service visit - ${details.name}`,
    description: buildVisitDescription(details),
    device_model: details.model,
    serial_number: details.serialNumber,
    customer_name: details.name,
    customer_phone: details.phone,
    customer_email: details.email,
    customer_address: details.address,
  };

  const calendar = await deps.records.createCalendarRecord(calendarFields);
  if (!calendar.ok) {
    logOperation.error(operation, "Calendar record failed", calendar.message);
    return { ok: false, message: calendar.message };
  }
  logOperation.step(operation, "Calendar record created", { calendarRecordId: calendar.id });

  let serviceRequestId: string | null = null;
  const request = await deps.records.createServiceRequest({
    deviceId: details.deviceRecordId,
    issueDescription: details.issue,
    customerId: details.customerId,
  });
  if (request.ok) {
    const scheduled = await deps.records.scheduleService(request.id, dateTime);
    if (!scheduled.ok) logOperation.error(operation, "Scheduling service request failed", scheduled.message);
    serviceRequestId = request.id;
    logOperation.step(operation, "Service request created", { serviceRequestId });
  } else {
    logOperation.error(operation, "Service request failed", request.message);
  }

  let customerUpdated = false;
  if (details.customerId) {
    const update = await deps.records.updateCustomerInfo(details.customerId, {
      name: details.name,
      email: details.email,
      phone: details.phone,
      address: details.address,
    });
    customerUpdated = update.ok;
    if (!update.ok) logOperation.error(operation, "Customer update failed", update.message);
  }

  let emailSent = false;
  if (deps.mailer) {
    try {
      await deps.mailer.sendVisitConfirmation({
        to: details.email,
        customerName: details.name,
        visitDate: formatSlot(slot),
        deviceModel: details.model,
        serialNumber: details.serialNumber,
        issueDescription: details.issue,
        questions: deps.advisor.getServiceQuestions(),
        brandName: deps.contact.brandName,
        servicePhone: deps.contact.phone,
        serviceEmail: deps.contact.email,
      });
      emailSent = true;
    } catch (err) {
      logOperation.error(operation, `Confirmation e-mail failed: ${errorMessage(err)}`, err);
    }
  }

  const booking: Booking = {
    calendarRecordId: calendar.id,
    serviceRequestId,
    customerUpdated,
    emailSent,
  };

  logOperation.complete(operation, "Service visit booked", booking);
  return { ok: true, booking };
}
