import type { ServiceTables, StoredRecord, WritableFields } from "@/lib/airtable";
import { RecordStoreError, errorMessage } from "@/lib/errors";
import { logger } from "@/lib/logger";

export type DeviceRecord = {
  recordId: string;
  serialNumber: string;
  model: string | null;
  warrantyStatus: string | null;
  customerId: string | null;
};

export type CustomerRecord = {
  recordId: string;
  name: string | null;
  email: string | null;
  phone: string | null;
  address: string | null;
};

export type DeviceLookupResult =
  | { ok: true; device: DeviceRecord; customer: CustomerRecord | null }
  | { ok: false; message: string };

export type WriteResult =
  | { ok: true; id: string; fields: Record<string, unknown> }
  | { ok: false; message: string };

export type ServiceRequestInput = {
  deviceId?: string;
  issueDescription?: string;
  customerId?: string | null;
  scheduledDate?: string;
};

export type CustomerUpdate = {
  name?: string;
  email?: string;
  phone?: string;
  address?: string;
};

export interface ServiceRecords {
  getDeviceInfo(serialInput: string): Promise<DeviceLookupResult>;
  getCustomerById(customerId: string): Promise<CustomerRecord | null>;
  createServiceRequest(data: ServiceRequestInput): Promise<WriteResult>;
  scheduleService(serviceRequestId: string, scheduledDate: string): Promise<WriteResult>;
  updateCustomerInfo(customerId: string, data: CustomerUpdate): Promise<WriteResult>;
  createCalendarRecord(fields: WritableFields): Promise<WriteResult>;
  listCalendarRecords(): Promise<StoredRecord[]>;
}

const SERIAL_PATTERN = /SN[:.]?\s*(\w+)/i;

/**
 * "SN: AB123", "sn.AB123", "SN AB123" -> "AB123".
 * Without a recognisable prefix the input is returned with "SN:" removed and trimmed.
 */
export function normalizeSerial(input: string): string {
  const m = input.match(SERIAL_PATTERN);
  if (m?.[1]) return m[1];
  return input.replace("SN:", "").trim();
}

/** Text fields come back as strings, numbers or single-item link arrays. */
export function readField(fields: Record<string, unknown>, key: string): string | null {
  const v = fields[key];
  if (typeof v === "string") return v.trim() || null;
  if (typeof v === "number") return String(v);
  if (Array.isArray(v) && typeof v[0] === "string") return v[0];
  return null;
}

function toDevice(record: StoredRecord, serial: string): DeviceRecord {
  return {
    recordId: record.id,
    serialNumber: readField(record.fields, "serial_number") ?? serial,
    model: readField(record.fields, "model"),
    warrantyStatus: readField(record.fields, "warranty_status"),
    customerId: readField(record.fields, "customer_id"),
  };
}

function toCustomer(record: StoredRecord): CustomerRecord {
  return {
    recordId: record.id,
    name: readField(record.fields, "Name"),
    email: readField(record.fields, "Email"),
    phone: readField(record.fields, "Phone"),
    address: readField(record.fields, "Address"),
  };
}

export function createServiceRecords(
  tables: ServiceTables,
  now: () => Date = () => new Date()
): ServiceRecords {
  async function getCustomerById(customerId: string): Promise<CustomerRecord | null> {
    try {
      return toCustomer(await tables.Customers.find(customerId));
    } catch (err) {
      logger.error(`Error getting customer by ID ${customerId}: ${errorMessage(err)}`);
      return null;
    }
  }

  return {
    getCustomerById,

    async getDeviceInfo(serialInput) {
      try {
        const cleanSerial = normalizeSerial(serialInput);
        logger.debug(`Searching for device with SN: ${cleanSerial}`);

        const record = await tables.Devices.findFirstBy("serial_number", cleanSerial);
        if (!record) {
          logger.warn(`Device not found: ${cleanSerial}`);
          return { ok: false, message: `No device found with serial number: ${cleanSerial}` };
        }

        const device = toDevice(record, cleanSerial);
        const customer = device.customerId ? await getCustomerById(device.customerId) : null;

        logger.info(`Device found: ${device.recordId}`);
        return { ok: true, device, customer };
      } catch (err) {
        logger.error("Error getting device info", { error: errorMessage(err) });
        return { ok: false, message: "An error occurred while verifying the device." };
      }
    },

    async createServiceRequest(data) {
      const missing: string[] = [];
      if (!data.deviceId) missing.push("deviceId");
      if (!data.issueDescription) missing.push("issueDescription");
      if (!data.deviceId || !data.issueDescription) {
        return { ok: false, message: `Missing required fields: ${missing.join(", ")}` };
      }

      const fields: WritableFields = {
        Device: [data.deviceId],
        Description: data.issueDescription,
        Status: "New",
        Created: now().toISOString(),
      };
      if (data.customerId) fields.Customer = [data.customerId];
      if (data.scheduledDate) fields.Scheduled_Date = data.scheduledDate;

      try {
        const result = await tables.Service_Requests.create(fields);
        logger.info(`Service request created: ${result.id}`);
        return { ok: true, id: result.id, fields: result.fields };
      } catch (err) {
        logger.error("Error creating service request", { error: errorMessage(err) });
        return { ok: false, message: `Error while creating the service request: ${errorMessage(err)}` };
      }
    },

    async scheduleService(serviceRequestId, scheduledDate) {
      try {
        const result = await tables.Service_Requests.update(serviceRequestId, {
          Status: "Scheduled",
          Scheduled_Date: scheduledDate,
        });
        logger.info(`Service request ${serviceRequestId} scheduled for ${scheduledDate}`);
        return { ok: true, id: result.id, fields: result.fields };
      } catch (err) {
        logger.error("Error scheduling service", { error: errorMessage(err) });
        return { ok: false, message: `Error while updating the visit date: ${errorMessage(err)}` };
      }
    },

    async updateCustomerInfo(customerId, data) {
      const fields: WritableFields = {};
      if (data.name) fields.Name = data.name;
      if (data.email) fields.Email = data.email;
      if (data.phone) fields.Phone = data.phone;
      if (data.address) fields.Address = data.address;

      try {
        const result = await tables.Customers.update(customerId, fields);
        return { ok: true, id: result.id, fields: result.fields };
      } catch (err) {
        logger.error("Error updating customer info", { error: errorMessage(err) });
        return { ok: false, message: `Error while updating customer details: ${errorMessage(err)}` };
      }
    },

    async createCalendarRecord(fields) {
      try {
        const result = await tables.Calendar.create(fields);
        return { ok: true, id: result.id, fields: result.fields };
      } catch (err) {
        logger.error("Error creating calendar record", { error: errorMessage(err) });
        return { ok: false, message: errorMessage(err) };
      }
    },

    async listCalendarRecords() {
      try {
        return await tables.Calendar.list();
      } catch (err) {
        throw new RecordStoreError(tables.Calendar.name, "could not list calendar records", err);
      }
    },
  };
}
