/**
 * Wild Apricot API Types
 *
 * Only the parts of the contact payload the sync reads are described.
 * Field values stay `unknown` here; the extractor classifies them.
 */

import { Type, type Static } from "@sinclair/typebox";

// ============================================================================
// Contacts
// ============================================================================

export const FieldValueSchema = Type.Object({
  FieldName: Type.String(),
  Value: Type.Optional(Type.Unknown()),
  SystemCode: Type.Optional(Type.String()),
});

export type FieldValue = Static<typeof FieldValueSchema>;

export const MembershipLevelRefSchema = Type.Object({
  Id: Type.Number(),
  Name: Type.Optional(Type.String()),
  Url: Type.Optional(Type.String()),
});

export const ContactSchema = Type.Object({
  Id: Type.Integer(),
  FirstName: Type.Optional(Type.String()),
  LastName: Type.Optional(Type.String()),
  Email: Type.Optional(Type.String()),
  DisplayName: Type.Optional(Type.String()),
  Status: Type.Optional(Type.String()),
  MembershipLevel: Type.Optional(
    Type.Union([MembershipLevelRefSchema, Type.Null()])
  ),
  FieldValues: Type.Array(FieldValueSchema),
});

export type Contact = Static<typeof ContactSchema>;

// Records are checked one by one during reconciliation
export const ContactsResponseSchema = Type.Object({
  Contacts: Type.Array(Type.Unknown()),
});

// ============================================================================
// OAuth
// ============================================================================

export const TokenResponseSchema = Type.Object({
  access_token: Type.String({ minLength: 1 }),
  token_type: Type.Optional(Type.String()),
  expires_in: Type.Optional(Type.Number()),
});
