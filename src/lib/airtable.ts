import Airtable from "airtable";

export type FieldValue = string | number | boolean | string[];
export type WritableFields = Record<string, FieldValue>;

export type StoredRecord = {
  id: string;
  fields: Record<string, unknown>;
};

/**
 * The slice of an Airtable table the app uses. Tests provide in-memory tables.
 */
export interface RecordTable {
  readonly name: string;
  findFirstBy(field: string, value: string): Promise<StoredRecord | null>;
  find(id: string): Promise<StoredRecord>;
  list(): Promise<StoredRecord[]>;
  create(fields: WritableFields): Promise<StoredRecord>;
  update(id: string, fields: WritableFields): Promise<StoredRecord>;
}

export const SERVICE_TABLE_NAMES = ["Devices", "Customers", "Service_Requests", "Calendar"] as const;

export type ServiceTableName = (typeof SERVICE_TABLE_NAMES)[number];

export type ServiceTables = Record<ServiceTableName, RecordTable>;

// filterByFormula string literal
export function formulaString(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

function toStored(record: { id: string; fields: Record<string, unknown> }): StoredRecord {
  return { id: record.id, fields: { ...record.fields } };
}

export function createAirtableTables(params: { apiKey: string; baseId: string }): ServiceTables {
  const base = new Airtable({ apiKey: params.apiKey }).base(params.baseId);

  const wrap = (name: ServiceTableName): RecordTable => {
    const table = base(name);

    return {
      name,
      async findFirstBy(field, value) {
        const records = await table
          .select({ filterByFormula: `{${field}} = ${formulaString(value)}`, maxRecords: 1 })
          .firstPage();
        const first = records[0];
        return first ? toStored(first) : null;
      },
      async find(id) {
        return toStored(await table.find(id));
      },
      async list() {
        const records = await table.select().all();
        return records.map((r) => toStored(r));
      },
      async create(fields) {
        return toStored(await table.create(fields));
      },
      async update(id, fields) {
        return toStored(await table.update(id, fields));
      },
    };
  };

  return {
    Devices: wrap("Devices"),
    Customers: wrap("Customers"),
    Service_Requests: wrap("Service_Requests"),
    Calendar: wrap("Calendar"),
  };
}
