/**
 * Field Extractor
 *
 * Validates one upstream contact record, then reads its tag id, training
 * labels and membership level. Field values arrive untyped; each is classified into
 * a {@link FieldValueShape} before use and any mismatch is an
 * {@link ExtractionError}, never a coercion.
 */

import { Value } from "@sinclair/typebox/value";

import { ExtractionError } from "../../errors.js";
import {
  ContactSchema,
  type Contact,
  type FieldValue,
} from "../../types/index.js";

import type { FieldNames } from "../../config.js";

// ============================================================================
// Types
// ============================================================================

export type FieldValueShape =
  | { kind: "absent" }
  | { kind: "string"; value: string }
  | { kind: "list"; items: unknown[] }
  | { kind: "other"; value: unknown };

interface ContactDataBase {
  contactId: number;
  tagId: number;
  membershipLevel: number;
}

/**
 * Extraction result for one contact. A training failure does not hide the
 * tag id; the caller decides what to do with a contact whose labels failed.
 */
export type ContactData = ContactDataBase &
  (
    | { labels: string[]; trainingError: null }
    | { labels: null; trainingError: ExtractionError }
  );

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;
const INTEGER_PATTERN = /^[+-]?\d+$/;

// ============================================================================
// Value classification
// ============================================================================

export function classifyValue(value: unknown): FieldValueShape {
  if (value === undefined || value === null) {
    return { kind: "absent" };
  }
  if (typeof value === "string") {
    return { kind: "string", value };
  }
  if (Array.isArray(value)) {
    return { kind: "list", items: value };
  }
  return { kind: "other", value };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function findField(contact: Contact, fieldName: string): FieldValue | undefined {
  return contact.FieldValues.find((field) => field.FieldName === fieldName);
}

// ============================================================================
// Contact record
// ============================================================================

function contactIdOf(raw: unknown): number | null {
  if (!isRecord(raw)) {
    return null;
  }
  const id = raw.Id;
  return typeof id === "number" && Number.isInteger(id) ? id : null;
}

/**
 * Validate one raw upstream record. The error carries the contact id
 * whenever the record has a usable one.
 */
export function parseContact(raw: unknown): Contact {
  if (Value.Check(ContactSchema, raw)) {
    return raw;
  }

  const first = Value.Errors(ContactSchema, raw).First();
  const path = first === undefined || first.path === "" ? "/" : first.path;
  const error = new ExtractionError(
    `contact is malformed at ${path}: ${first?.message ?? "invalid"}`,
    "contact"
  );
  const contactId = contactIdOf(raw);
  throw contactId === null ? error : error.forContact(contactId);
}

// ============================================================================
// Tag ID
// ============================================================================

/**
 * Parse the textual tag id. Blank means "no card issued" and yields 0;
 * anything else must be a positive 32-bit integer.
 */
export function parseTagId(raw: string): number {
  if (raw.length === 0) {
    return 0;
  }

  if (!INTEGER_PATTERN.test(raw)) {
    throw new ExtractionError(
      `failed to convert string TagId "${raw}" to int`,
      "tagId"
    );
  }

  const tagId = Number(raw);
  if (tagId < INT32_MIN || tagId > INT32_MAX) {
    throw new ExtractionError(`TagId "${raw}" is out of range`, "tagId");
  }

  if (tagId <= 0) {
    throw new ExtractionError("TagId value is non-positive", "tagId");
  }

  return tagId;
}

/**
 * Returns 0 when the tag field is missing, empty or null.
 */
export function extractTagId(contact: Contact, fields: FieldNames): number {
  const field = findField(contact, fields.tagIdField);
  if (field === undefined) {
    return 0;
  }

  const shape = classifyValue(field.Value);
  switch (shape.kind) {
    case "absent":
      return 0;
    case "string":
      return parseTagId(shape.value);
    case "list":
    case "other":
      throw new ExtractionError("TagId value is not a string", "tagId");
  }
}

// ============================================================================
// Training labels
// ============================================================================

/**
 * Labels of the selected trainings, in upstream order.
 * One malformed item rejects the whole set.
 */
export function extractTrainingLabels(
  contact: Contact,
  fields: FieldNames
): string[] {
  const field = findField(contact, fields.trainingField);
  if (field === undefined) {
    return [];
  }

  const shape = classifyValue(field.Value);
  if (shape.kind === "absent") {
    return [];
  }
  if (shape.kind !== "list") {
    throw new ExtractionError("training value is not a list", "trainings");
  }

  const labels: string[] = [];
  for (const item of shape.items) {
    if (!isRecord(item)) {
      throw new ExtractionError("training item is not a record", "trainings");
    }
    const label = item.Label;
    if (typeof label !== "string") {
      throw new ExtractionError("training label is not a string", "trainings");
    }
    labels.push(label);
  }

  return labels;
}

// ============================================================================
// Membership level
// ============================================================================

export function extractMembershipLevel(contact: Contact): number {
  const levelId = contact.MembershipLevel?.Id;
  if (levelId === undefined || !Number.isInteger(levelId) || levelId < 0) {
    return 0;
  }
  return levelId;
}

// ============================================================================
// Combined
// ============================================================================

/**
 * Extract everything reconciliation needs from one contact.
 * @throws ExtractionError when the tag id is malformed
 */
export function extractContactData(
  contact: Contact,
  fields: FieldNames
): ContactData {
  const contactId = contact.Id;

  let tagId: number;
  try {
    tagId = extractTagId(contact, fields);
  } catch (error) {
    if (error instanceof ExtractionError) {
      throw error.forContact(contactId);
    }
    throw error;
  }

  const membershipLevel = extractMembershipLevel(contact);

  try {
    const labels = extractTrainingLabels(contact, fields);
    return { contactId, tagId, membershipLevel, labels, trainingError: null };
  } catch (error) {
    if (error instanceof ExtractionError) {
      return {
        contactId,
        tagId,
        membershipLevel,
        labels: null,
        trainingError: error.forContact(contactId),
      };
    }
    throw error;
  }
}
