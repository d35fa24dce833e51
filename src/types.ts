/**
 * Shared Types
 *
 * Re-exports branded types from time-date and defines entity ID types
 * used across multiple modules.
 */

export type { LocalDate, LocalTime, LocalDateTime, Clock } from './time-date'

// ============================================================================
// Branded ID Types
// ============================================================================

declare const __userId: unique symbol
declare const __petId: unique symbol
declare const __taskId: unique symbol
declare const __walkId: unique symbol

export type UserId = string & { readonly [__userId]: true }
export type PetId = string & { readonly [__petId]: true }
export type TaskId = string & { readonly [__taskId]: true }
export type WalkId = string & { readonly [__walkId]: true }

/** Entity kinds that draw ids from a per-kind sequence */
export type SequenceKind = 'pet' | 'task' | 'walk'

export function makeUserId(id: string): UserId {
  return id as UserId
}

export function makePetId(id: string): PetId {
  return id as PetId
}

export function makeTaskId(id: string): TaskId {
  return id as TaskId
}

export function makeWalkId(id: string): WalkId {
  return id as WalkId
}
