/**
 * Task Queries
 *
 * Pure filters and sorts over task lists. Inputs are never mutated; sorts are
 * stable, so tasks that tie keep their incoming order.
 */

import type { Pet, Task, TaskPriority } from './domain-types'
import type { LocalDate } from './time-date'
import { compareDateTimes } from './time-date'
import type { PetId } from './types'
import { isForToday, priorityRank } from './tasks'

/** Group key for tasks that belong to no pet */
export const GENERAL_GROUP = 'General'

// ============================================================================
// Filters
// ============================================================================

export function filterByPet(tasks: readonly Task[], petId: PetId): Task[] {
  return tasks.filter((t) => t.petId === petId)
}

export function filterByPriority(tasks: readonly Task[], priority: TaskPriority): Task[] {
  return tasks.filter((t) => t.priority === priority)
}

export function filterByStatus(tasks: readonly Task[], completed: boolean): Task[] {
  return tasks.filter((t) => t.isCompleted === completed)
}

/** Tasks of every pet whose name matches, ignoring case */
export function filterByPetName(tasks: readonly Task[], pets: readonly Pet[], name: string): Task[] {
  const wanted = name.toLowerCase()
  const petIds = new Set(pets.filter((p) => p.name.toLowerCase() === wanted).map((p) => p.id))
  return tasks.filter((t) => t.petId != null && petIds.has(t.petId))
}

export function filterToday(tasks: readonly Task[], today: LocalDate): Task[] {
  return tasks.filter((t) => !t.isCompleted && isForToday(t, today))
}

// ============================================================================
// Sorts
// ============================================================================

export function sortTasksByTime(tasks: readonly Task[]): Task[] {
  return [...tasks].sort((a, b) => compareDateTimes(a.dueDate, b.dueDate))
}

/** Priority rank first (high, medium, low, anything else), then due date */
export function sortTasksByPriority(tasks: readonly Task[]): Task[] {
  return [...tasks].sort(
    (a, b) => priorityRank(a.priority) - priorityRank(b.priority) || compareDateTimes(a.dueDate, b.dueDate)
  )
}

// ============================================================================
// Grouping
// ============================================================================

/**
 * Group tasks by the display name of their pet, keyed in first-seen order,
 * with each group sorted by priority then time.
 */
export function groupByPetName(tasks: readonly Task[], pets: readonly Pet[]): Map<string, Task[]> {
  const names = new Map(pets.map((p) => [p.id, p.name]))
  const groups = new Map<string, Task[]>()

  for (const task of tasks) {
    const key = (task.petId != null ? names.get(task.petId) : undefined) ?? GENERAL_GROUP
    const group = groups.get(key)
    if (group) group.push(task)
    else groups.set(key, [task])
  }

  for (const [key, group] of groups) {
    groups.set(key, sortTasksByPriority(group))
  }
  return groups
}
