import type { Selectable } from "kysely";

// ============================================================================
// Table Types
// ============================================================================

export interface MembersTable {
  contact_id: number;
  tag_id: number; // 0 = no card issued
  membership_level: number;
}

export interface TrainingsTable {
  training_name: string;
}

export interface MembersTrainingsLinkTable {
  tag_id: number;
  training_name: string;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  members: MembersTable;
  trainings: TrainingsTable;
  members_trainings_link: MembersTrainingsLinkTable;
}

export type TableName = keyof Database;

export const TABLE_NAMES: readonly TableName[] = [
  "members",
  "trainings",
  "members_trainings_link",
];

// ============================================================================
// Row Types (for convenience)
// ============================================================================

export type Member = Selectable<MembersTable>;

export type Training = Selectable<TrainingsTable>;

export type MembershipTrainingLink = Selectable<MembersTrainingsLinkTable>;
