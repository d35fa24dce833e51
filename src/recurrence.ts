/**
 * Recurrence Engine
 *
 * Produces the successor of a recurring task. A successor copies the task's
 * description, priority, pet, user and recurrence, starts open, and never
 * carries the walk: walks are not cloned.
 */

import type { Recurrence, Task } from './domain-types'
import { RECURRENCES } from './domain-types'
import type { LocalDateTime } from './time-date'
import type { TaskId } from './types'
import { getNextOccurrence } from './tasks'
import { ValidationError } from './errors'

export function isRecurring(task: Task): boolean {
  return task.recurrence === 'daily' || task.recurrence === 'weekly'
}

export function parseRecurrence(value: string): Recurrence {
  const match = RECURRENCES.find((r) => r === value)
  if (match === undefined) {
    throw new ValidationError(`Unknown recurrence '${value}' (expected ${RECURRENCES.join(', ')})`)
  }
  return match
}

/** Copy of the task at a new due date under a new id */
export function cloneAt(task: Task, id: TaskId, dueDate: LocalDateTime): Task {
  const clone: Task = {
    id,
    description: task.description,
    dueDate,
    priority: task.priority,
    isCompleted: false,
  }
  if (task.userId != null) clone.userId = task.userId
  if (task.petId != null) clone.petId = task.petId
  if (task.recurrence != null) clone.recurrence = task.recurrence
  return clone
}

/** The next task in the series, or null when the task does not recur */
export function expandRecurrence(task: Task, id: TaskId): Task | null {
  const next = getNextOccurrence(task)
  if (next === null) return null
  return cloneAt(task, id, next)
}
