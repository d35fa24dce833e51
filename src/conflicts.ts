/**
 * Conflict Detection
 *
 * Walk windows are half-open: [start, start + duration). Two windows overlap
 * when each starts before the other ends, so back-to-back walks never collide.
 *
 * Everything here is read-only. Whether a conflict blocks a write is the
 * scheduler's decision.
 */

import type { Adapter } from './adapter'
import type { ConflictCheck, Pet, ScheduleConflict, Task, Walk, WalkConflict } from './domain-types'
import type { LocalDateTime } from './time-date'
import { addMinutes, formatClockTime } from './time-date'
import type { PetId, UserId } from './types'
import { NotFoundError } from './errors'

// ============================================================================
// Interval Overlap
// ============================================================================

export function timesOverlap(
  startA: LocalDateTime,
  durA: number,
  startB: LocalDateTime,
  durB: number
): boolean {
  const endA = addMinutes(startA, durA)
  const endB = addMinutes(startB, durB)
  return startA < endB && startB < endA
}

// ============================================================================
// Active Walks
// ============================================================================

/** An open task together with the walk that gives it a window */
export type ActiveWalkTask = {
  task: Task
  walk: Walk
}

/**
 * The pet's open, walk-bearing tasks. A task's window starts at its due date
 * and lasts for its walk's duration. Walk status plays no part: a cancelled
 * walk keeps its window until the task is completed.
 */
export function getActiveWalkTasks(adapter: Adapter, petId: PetId): ActiveWalkTask[] {
  const result: ActiveWalkTask[] = []
  for (const task of adapter.getTasksByPet(petId)) {
    if (task.isCompleted || task.walkId == null) continue
    const walk = adapter.getWalk(task.walkId)
    if (walk) result.push({ task, walk })
  }
  return result
}

// ============================================================================
// Per-Pet Check
// ============================================================================

function describeWalkConflict(pet: Pet, entry: ActiveWalkTask): WalkConflict {
  const { task, walk } = entry
  return {
    petId: pet.id,
    petName: pet.name,
    taskId: task.id,
    description: task.description,
    existingTime: task.dueDate,
    duration: walk.duration,
    message:
      `Conflict: ${pet.name} already has "${task.description}" ` +
      `at ${formatClockTime(task.dueDate)} for ${walk.duration} minutes`,
  }
}

/** Every existing walk of the pet that overlaps the proposed window */
export function hasConflict(
  adapter: Adapter,
  petId: PetId,
  proposedStart: LocalDateTime,
  duration: number
): ConflictCheck {
  const pet = adapter.getPet(petId)
  if (!pet) throw new NotFoundError(`Pet '${petId}' not found`)

  const conflicts = getActiveWalkTasks(adapter, petId)
    .filter(({ task, walk }) => timesOverlap(proposedStart, duration, task.dueDate, walk.duration))
    .map((entry) => describeWalkConflict(pet, entry))

  if (conflicts.length === 0) {
    return {
      conflict: false,
      conflicts,
      reasons: [`No conflicts for ${pet.name} at ${formatClockTime(proposedStart)}`],
    }
  }

  return {
    conflict: true,
    conflicts,
    reasons: conflicts.map((c) => c.message),
  }
}

// ============================================================================
// Schedule-Wide Check
// ============================================================================

/** Compare each unordered pair of a pet's active walks once */
export function findPetConflicts(adapter: Adapter, pet: Pet): ScheduleConflict[] {
  const entries = getActiveWalkTasks(adapter, pet.id)
  const result: ScheduleConflict[] = []

  for (let i = 0; i < entries.length; i++) {
    for (let j = i + 1; j < entries.length; j++) {
      const a = entries[i]
      const b = entries[j]
      if (!timesOverlap(a.task.dueDate, a.walk.duration, b.task.dueDate, b.walk.duration)) continue
      result.push({
        petId: pet.id,
        petName: pet.name,
        taskIds: [a.task.id, b.task.id],
        message:
          `Conflict for ${pet.name}: "${a.task.description}" at ${formatClockTime(a.task.dueDate)} ` +
          `(${a.walk.duration} min) overlaps "${b.task.description}" at ` +
          `${formatClockTime(b.task.dueDate)} (${b.walk.duration} min)`,
      })
    }
  }

  return result
}

export function findAllConflicts(adapter: Adapter, userId: UserId): ScheduleConflict[] {
  return adapter.getPetsByOwner(userId).flatMap((pet) => findPetConflicts(adapter, pet))
}
