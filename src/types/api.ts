/**
 * API Request/Response Types
 */

// ============================================================================
// Common Response Types
// ============================================================================

export interface ApiResponse<T, M = SnapshotMeta> {
  data: T;
  meta: M;
}

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// ============================================================================
// Cache Types
// ============================================================================

export interface SnapshotMeta {
  version: number;
  builtAt: string;
  entryCount: number;
}

export interface DoorCacheEntryDto {
  tagId: number;
  membershipLevel: number;
}

export interface MachineCacheEntryDto {
  tagId: number;
  trainings: string[];
}
