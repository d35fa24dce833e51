/**
 * Tasks
 *
 * Completion, priority ranking and due-date helpers for a single task.
 */

import type { Task, TaskPriority, Walk } from './domain-types'
import { PRIORITY_RANK, UNKNOWN_PRIORITY_RANK } from './domain-types'
import type { LocalDate, LocalDateTime } from './time-date'
import { addDaysToDateTime, dateOf } from './time-date'
import { completeWalk } from './walks'

// ============================================================================
// Completion
// ============================================================================

export type CompletedTask = {
  task: Task
  walk: Walk | null
}

/**
 * Mark a task complete. The task's walk, when given, moves to `completed`
 * with it. Completing twice yields the same state.
 */
export function markComplete(task: Task, walk: Walk | null): CompletedTask {
  return {
    task: { ...task, isCompleted: true },
    walk: walk ? completeWalk(walk) : null,
  }
}

// ============================================================================
// Recurrence Period
// ============================================================================

const PERIOD_DAYS = {
  daily: 1,
  weekly: 7,
} as const

/** Due date of the following occurrence, or null for a one-off task */
export function getNextOccurrence(task: Task): LocalDateTime | null {
  if (task.recurrence === 'daily' || task.recurrence === 'weekly') {
    return addDaysToDateTime(task.dueDate, PERIOD_DAYS[task.recurrence])
  }
  return null
}

// ============================================================================
// Priority
// ============================================================================

export function getPriority(task: Task): TaskPriority {
  return task.priority
}

export function priorityRank(priority: TaskPriority): number {
  switch (priority) {
    case 'high':
    case 'medium':
    case 'low':
      return PRIORITY_RANK[priority]
    default:
      return UNKNOWN_PRIORITY_RANK
  }
}

// ============================================================================
// Day Membership
// ============================================================================

export function isForToday(task: Task, today: LocalDate): boolean {
  return dateOf(task.dueDate) === today
}
