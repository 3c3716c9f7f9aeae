/**
 * Sync pipeline errors
 *
 * ExtractionError is scoped to one contact and never aborts a cycle.
 * FetchError, PersistenceError and BuildError abort the cycle they occur in;
 * the previously published cache stays authoritative.
 */

export type SyncErrorCode =
  | "EXTRACTION_ERROR"
  | "FETCH_ERROR"
  | "PERSISTENCE_ERROR"
  | "BUILD_ERROR"
  | "CONFIG_ERROR";

export abstract class SyncError extends Error {
  abstract readonly code: SyncErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ExtractedField = "contact" | "tagId" | "trainings";

const EXTRACTED_FIELD_LABELS: Record<ExtractedField, string> = {
  contact: "record",
  tagId: "TagId",
  trainings: "training labels",
};

export class ExtractionError extends SyncError {
  readonly code = "EXTRACTION_ERROR" as const;
  contactId: number | null;
  field: ExtractedField;

  constructor(
    message: string,
    field: ExtractedField,
    contactId: number | null = null
  ) {
    super(message);
    this.field = field;
    this.contactId = contactId;
  }

  /**
   * Attach the owning contact id to an error raised while reading one field.
   */
  forContact(contactId: number): ExtractionError {
    const label = EXTRACTED_FIELD_LABELS[this.field];
    return new ExtractionError(
      `error extracting ${label} for contact ${String(contactId)}: ${this.message}`,
      this.field,
      contactId
    );
  }
}

export class FetchError extends SyncError {
  readonly code = "FETCH_ERROR" as const;
  status: number | null;

  constructor(
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.status = options?.status ?? null;
  }
}

export class PersistenceError extends SyncError {
  readonly code = "PERSISTENCE_ERROR" as const;
}

export class BuildError extends SyncError {
  readonly code = "BUILD_ERROR" as const;
}

export class ConfigError extends SyncError {
  readonly code = "CONFIG_ERROR" as const;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
