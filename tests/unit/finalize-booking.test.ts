import { buildVisitDescription, finalizeBooking } from "@/server/booking/finalizeBooking";
import type { ConversationContext } from "@/server/conversation/states";
import { DEVICE_RECORD, FakeMailer, makeHarness, newContext } from "../helpers/fakes";

function readyToBook(overrides: Partial<ConversationContext> = {}): ConversationContext {
  return newContext({
    state: "confirmation",
    gdprConsent: true,
    verifiedDevice: {
      recordId: "recDev1",
      serialNumber: "AB123",
      model: "VE-Pro 2",
      warrantyStatus: "Active",
      customerId: "recCus1",
    },
    issueDescription: "No image on the screen",
    additionalInfo: "I cleaned the probe",
    scheduling: {
      slots: [],
      showingSlots: false,
      awaitingPreferredTime: false,
      selectedSlot: { year: 2026, month: 10, day: 20, hour: 9 },
    },
    customerInfo: {
      name: "Anna Nowak",
      phone: "600-100-200",
      email: "anna@example.com",
      address: "Lipowa 1, Lublin",
    },
    ...overrides,
  });
}

const DESCRIPTION = [
  "Model: VE-Pro 2",
  "SN: AB123",
  "Problem: No image on the screen\n\nI cleaned the probe",
  "",
  "Customer:",
  "Anna Nowak",
  "Phone: 600-100-200",
  "E-mail: anna@example.com",
  "Address: Lipowa 1, Lublin",
].join("\n");

describe("finalizeBooking", () => {
  it("writes one calendar record, the service request and the customer details", async () => {
    const { deps, tables } = makeHarness();

    const outcome = await finalizeBooking(readyToBook(), deps);

    expect(outcome).toEqual({
      ok: true,
      booking: {
        calendarRecordId: "recCalendar1",
        serviceRequestId: "recService_Requests1",
        customerUpdated: true,
        emailSent: true,
      },
    });
    expect(tables.Calendar.records).toEqual([
      {
        id: "recCalendar1",
        fields: {
          date_time: "2026-10-20T07:00:00Z",
          summary: "Service visit - Anna Nowak",
          description: DESCRIPTION,
          device_model: "VE-Pro 2",
          serial_number: "AB123",
          customer_name: "Anna Nowak",
          customer_phone: "600-100-200",
          customer_email: "anna@example.com",
          customer_address: "Lipowa 1, Lublin",
        },
      },
    ]);
    expect(tables.Service_Requests.records[0].fields).toEqual({
      Device: ["recDev1"],
      Description: "No image on the screen\n\nI cleaned the probe",
      Status: "Scheduled",
      Created: "2026-10-19T10:00:00.000Z",
      Customer: ["recCus1"],
      Scheduled_Date: "2026-10-20T07:00:00Z",
    });
    expect(tables.Customers.records[0].fields).toEqual({
      Name: "Anna Nowak",
      Email: "anna@example.com",
      Phone: "600-100-200",
      Address: "Lipowa 1, Lublin",
    });
  });

  it("sends the confirmation with the service questionnaire", async () => {
    const { deps, mailer } = makeHarness();

    await finalizeBooking(readyToBook(), deps);

    expect(mailer?.sent).toHaveLength(1);
    expect(mailer?.sent[0]).toMatchObject({
      to: "anna@example.com",
      customerName: "Anna Nowak",
      visitDate: "Tuesday, 20.10.2026 09:00",
      deviceModel: "VE-Pro 2",
      serialNumber: "AB123",
      brandName: "Vet-Eye",
    });
    expect(mailer?.sent[0]?.questions).toHaveLength(7);
  });

  it("refuses to book without a date or complete details", async () => {
    const { deps, tables } = makeHarness();

    const noSlot = readyToBook({
      scheduling: { slots: [], showingSlots: false, awaitingPreferredTime: false, selectedSlot: null },
    });
    const noEmail = readyToBook({ customerInfo: { name: "Anna Nowak", phone: "600100200", address: "Lipowa 1" } });

    expect(await finalizeBooking(noSlot, deps)).toEqual({ ok: false, message: "booking details are incomplete" });
    expect(await finalizeBooking(noEmail, deps)).toEqual({ ok: false, message: "booking details are incomplete" });
    expect(tables.Calendar.records).toHaveLength(0);
  });

  it("fails when the calendar record cannot be written", async () => {
    const { deps, tables, mailer } = makeHarness();
    tables.Calendar.failures.create = new Error("calendar down");

    expect(await finalizeBooking(readyToBook(), deps)).toEqual({ ok: false, message: "calendar down" });
    expect(tables.Service_Requests.records).toHaveLength(0);
    expect(mailer?.sent).toHaveLength(0);
  });

  it("still books when the follow-up writes and the e-mail fail", async () => {
    const mailer = new FakeMailer();
    mailer.failure = new Error("smtp down");
    const { deps, tables } = makeHarness({ mailer });
    tables.Service_Requests.failures.create = new Error("boom");
    tables.Customers.failures.update = new Error("locked");

    expect(await finalizeBooking(readyToBook(), deps)).toEqual({
      ok: true,
      booking: { calendarRecordId: "recCalendar1", serviceRequestId: null, customerUpdated: false, emailSent: false },
    });
  });

  it("skips the customer update and e-mail when neither applies", async () => {
    const { deps, tables } = makeHarness({ mailer: null });
    const ctx = readyToBook({
      verifiedDevice: {
        recordId: DEVICE_RECORD.id,
        serialNumber: "AB123",
        model: null,
        warrantyStatus: null,
        customerId: null,
      },
    });

    const outcome = await finalizeBooking(ctx, deps);

    expect(outcome).toEqual({
      ok: true,
      booking: {
        calendarRecordId: "recCalendar1",
        serviceRequestId: "recService_Requests1",
        customerUpdated: false,
        emailSent: false,
      },
    });
    expect(tables.Calendar.records[0].fields.device_model).toBe("Unknown model");
    expect(tables.Customers.records[0].fields).toEqual({ Name: "Anna Nowak", Email: "anna@example.com" });
  });
});

describe("buildVisitDescription", () => {
  it("lists the device, problem and customer", () => {
    expect(
      buildVisitDescription({
        deviceRecordId: "recDev1",
        customerId: null,
        model: "VE-Pro 2",
        serialNumber: "AB123",
        issue: "No image on the screen\n\nI cleaned the probe",
        name: "Anna Nowak",
        phone: "600-100-200",
        email: "anna@example.com",
        address: "Lipowa 1, Lublin",
      })
    ).toBe(DESCRIPTION);
  });
});
