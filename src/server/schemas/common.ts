/**
 * Common TypeBox schemas for API validation
 */

import { Type, type TSchema } from "@sinclair/typebox";

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export const SnapshotMetaSchema = Type.Object({
  version: Type.Integer({ minimum: 1 }),
  builtAt: Type.String({ format: "date-time" }),
  entryCount: Type.Integer({ minimum: 0 }),
});

export function createSnapshotResponseSchema<T extends TSchema>(
  itemSchema: T
) {
  return Type.Object({
    data: Type.Array(itemSchema),
    meta: SnapshotMetaSchema,
  });
}

// ============================================================================
// Common Field Schemas
// ============================================================================

export const TagIdSchema = Type.Integer({ minimum: 1, maximum: 2_147_483_647 });

export const CycleStageSchema = Type.Union([
  Type.Literal("fetch"),
  Type.Literal("reconcile"),
  Type.Literal("build"),
]);

export const NullableDateTimeSchema = Type.Union([
  Type.String({ format: "date-time" }),
  Type.Null(),
]);
