/**
 * Canonical Domain Types
 *
 * Single source of truth for the entity records. Entities reference each other
 * by id only; the adapter is the arena that owns them.
 */

import type { LocalDateTime } from './time-date'
import type { UserId, PetId, TaskId, WalkId } from './types'

// ============================================================================
// Enumerations
// ============================================================================

export const PRIORITY_RANK = {
  high: 0,
  medium: 1,
  low: 2,
} as const

/** Rank for any priority string outside the known set */
export const UNKNOWN_PRIORITY_RANK = 3

export type Priority = keyof typeof PRIORITY_RANK

/** Known priorities, plus any other string passed through unchanged */
export type TaskPriority = Priority | (string & {})

export const RECURRENCES = ['daily', 'weekly', 'none'] as const

export type Recurrence = (typeof RECURRENCES)[number]

export type WalkStatus = 'scheduled' | 'cancelled' | 'completed'

// ============================================================================
// Entities
// ============================================================================

export type User = {
  id: UserId
  name: string
  email: string
}

export type Pet = {
  id: PetId
  name: string
  breed: string
  age: number
  ownerId: UserId | null
}

export type Walk = {
  id: WalkId
  petId: PetId
  scheduledTime: LocalDateTime
  /** Minutes, positive integer */
  duration: number
  status: WalkStatus
}

export type Task = {
  id: TaskId
  description: string
  dueDate: LocalDateTime
  priority: TaskPriority
  isCompleted: boolean
  walkId?: WalkId
  userId?: UserId
  petId?: PetId
  recurrence?: Recurrence
}

// ============================================================================
// Conflicts
// ============================================================================

/** One existing walk that overlaps a proposed window */
export type WalkConflict = {
  petId: PetId
  petName: string
  taskId: TaskId
  description: string
  existingTime: LocalDateTime
  duration: number
  message: string
}

export type ConflictCheck = {
  conflict: boolean
  conflicts: WalkConflict[]
  reasons: string[]
}

/** One colliding pair found by the schedule-wide scan */
export type ScheduleConflict = {
  petId: PetId
  petName: string
  taskIds: [TaskId, TaskId]
  message: string
}
