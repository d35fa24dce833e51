/**
 * Walks
 *
 * Lifecycle transitions for a walk. Pure: each function returns the next
 * state of the record and leaves the argument untouched.
 */

import type { Walk } from './domain-types'
import type { LocalDateTime } from './time-date'
import { addMinutes, parseDateTime } from './time-date'
import { ValidationError } from './errors'

export { ValidationError } from './errors'

// ============================================================================
// Validation
// ============================================================================

/** Longest walk accepted, in minutes */
export const MAX_WALK_MINUTES = 24 * 60

export function validateDuration(duration: number): void {
  if (!Number.isInteger(duration) || duration <= 0) {
    throw new ValidationError(`Walk duration must be a positive whole number of minutes, got ${duration}`)
  }
  if (duration > MAX_WALK_MINUTES) {
    throw new ValidationError(`Walk duration must not exceed ${MAX_WALK_MINUTES} minutes, got ${duration}`)
  }
}

export function validateDateTime(value: string, field: string): LocalDateTime {
  const parsed = parseDateTime(value)
  if (!parsed.ok) throw new ValidationError(`Invalid ${field}: '${value}'`)
  return parsed.value
}

// ============================================================================
// Window
// ============================================================================

/** Exclusive end of the walk's window */
export function walkEnd(walk: Walk): LocalDateTime {
  return addMinutes(walk.scheduledTime, walk.duration)
}

// ============================================================================
// Transitions
// ============================================================================

export function rescheduleWalk(walk: Walk, time: LocalDateTime, duration: number): Walk {
  validateDuration(duration)
  return {
    ...walk,
    scheduledTime: validateDateTime(time, 'walk time'),
    duration,
    status: 'scheduled',
  }
}

export function cancelWalk(walk: Walk): Walk {
  if (walk.status === 'completed') {
    throw new ValidationError(`Walk '${walk.id}' is already completed and cannot be cancelled`)
  }
  return { ...walk, status: 'cancelled' }
}

export function completeWalk(walk: Walk): Walk {
  return { ...walk, status: 'completed' }
}
