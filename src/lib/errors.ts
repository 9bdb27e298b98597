export type AppErrorCode = "configuration" | "record_store" | "validation";

export class AppError extends Error {
  readonly code: AppErrorCode;

  constructor(code: AppErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends AppError {
  readonly missing: readonly string[];

  constructor(message: string, missing: readonly string[] = []) {
    super("configuration", message);
    this.missing = missing;
  }
}

/** Airtable call failed; `table` names the table that was being read or written. */
export class RecordStoreError extends AppError {
  readonly table: string;

  constructor(table: string, message: string, cause?: unknown) {
    super("record_store", `${table}: ${message}`, { cause });
    this.table = table;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super("validation", message);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "Unknown error";
}
