/**
 * Public API Module
 *
 * Consumer-facing scheduler that ties the entity layer, conflict detection and
 * the recurrence engine together for one owner. Handles id generation,
 * validation and event emission.
 */

import type { Adapter } from './adapter'
import { createMockAdapter } from './adapter'
import type {
  ConflictCheck, Pet, ScheduleConflict, Task, TaskPriority, User, Walk,
} from './domain-types'
import type { Clock, LocalDateTime } from './time-date'
import { dateOf, systemClock } from './time-date'
import type { PetId, TaskId, UserId, WalkId } from './types'
import { makeTaskId, makeWalkId } from './types'
import { ensureUser, addPet as addPetToUser, getPets as getUserPets, type PetInput, type UserInput } from './users'
import { getScheduledWalks as getPetScheduledWalks } from './pets'
import { markComplete, getNextOccurrence } from './tasks'
import { cancelWalk as cancelWalkRecord, validateDateTime, validateDuration } from './walks'
import { hasConflict as checkPetConflict, findAllConflicts } from './conflicts'
import { cloneAt, expandRecurrence, parseRecurrence } from './recurrence'
import {
  filterByPet, filterByPetName, filterByPriority, filterByStatus, filterToday,
  groupByPetName, sortTasksByPriority, sortTasksByTime,
} from './task-queries'

// ============================================================================
// Error Classes
// ============================================================================

export { ValidationError, NotFoundError } from './errors'
import { ValidationError, NotFoundError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type { Adapter } from './adapter'
export type { PetInput, UserInput } from './users'

export type SchedulerConfig = {
  owner: UserInput
  /** Defaults to a fresh in-memory adapter */
  adapter?: Adapter
  /** Defaults to the system wall clock */
  clock?: Clock
}

export type WalkResult =
  | { walk: Walk; task: Task; reasons: string[] }
  | { walk: null; task: null; reasons: string[] }

export type TaskInput = {
  description: string
  dueDate: LocalDateTime
  priority: TaskPriority
  petId?: PetId
  recurrence?: string
  /** Attach a walk of this many minutes at the due date, without a conflict check */
  walkDuration?: number
}

export type RescheduledTask = {
  original: Task
  successor: Task
}

export type SchedulerEvents = {
  walkScheduled: [walk: Walk, task: Task]
  walkRejected: [reasons: string[]]
  taskCreated: [task: Task]
  taskCompleted: [task: Task]
  taskRescheduled: [original: Task, successor: Task]
}

export type SchedulerEventName = keyof SchedulerEvents

export type SchedulerEventHandler<E extends SchedulerEventName> = (...args: SchedulerEvents[E]) => void

export type Scheduler = {
  getUser(): User
  addPet(input: PetInput): Pet
  getPets(): Pet[]
  getPet(id: PetId): Pet | null
  getTask(id: TaskId): Task | null
  getWalk(id: WalkId): Walk | null
  getTasks(): Task[]
  getWalks(): Walk[]
  getTodaysTasks(): Task[]
  getScheduledWalks(petId: PetId): Walk[]
  hasConflict(petId: PetId, time: LocalDateTime, duration: number): ConflictCheck
  scheduleWalk(petId: PetId, time: LocalDateTime, duration: number): WalkResult
  cancelWalk(walkId: WalkId): Walk
  addTask(input: TaskInput): Task
  createRecurringTask(
    petId: PetId,
    description: string,
    startTime: LocalDateTime,
    priority: TaskPriority,
    recurrence: string
  ): Task
  completeTask(taskId: TaskId): Task | null
  getTasksByPet(petId: PetId): Task[]
  getTasksByPriority(priority: TaskPriority): Task[]
  getTasksByPetName(name: string): Task[]
  getTasksByStatus(completed: boolean): Task[]
  getPendingTasks(): Task[]
  sortTasksByTime(tasks: readonly Task[]): Task[]
  sortTasksByPriority(tasks: readonly Task[]): Task[]
  getOrganizedTodaysTasks(): Map<string, Task[]>
  checkAllConflicts(): ScheduleConflict[]
  rescheduleMissedTasks(): RescheduledTask[]
  on<E extends SchedulerEventName>(event: E, handler: SchedulerEventHandler<E>): void
}

type HandlerRegistry = { [E in SchedulerEventName]: SchedulerEventHandler<E>[] }

// ============================================================================
// Implementation
// ============================================================================

export function createScheduler(config: SchedulerConfig): Scheduler {
  if (!config.owner || typeof config.owner !== 'object') {
    throw new ValidationError('Owner is required')
  }

  const adapter = config.adapter ?? createMockAdapter()
  const clock = config.clock ?? systemClock
  const user = ensureUser(adapter, config.owner)
  const userId: UserId = user.id

  // ========== Events ==========

  const handlers: HandlerRegistry = {
    walkScheduled: [],
    walkRejected: [],
    taskCreated: [],
    taskCompleted: [],
    taskRescheduled: [],
  }

  function emit<E extends SchedulerEventName>(event: E, ...args: SchedulerEvents[E]): boolean {
    let hadErrors = false
    for (const handler of handlers[event]) {
      try { handler(...args) } catch (e) { hadErrors = true; console.error(`Event handler error on '${event}':`, e) }
    }
    return !hadErrors
  }

  function on<E extends SchedulerEventName>(event: E, handler: SchedulerEventHandler<E>) {
    handlers[event].push(handler)
  }

  // ========== Helpers ==========

  function nextTaskId(): TaskId {
    return makeTaskId(`task_${adapter.nextSequence('task')}`)
  }

  function nextWalkId(): WalkId {
    return makeWalkId(`walk_${adapter.nextSequence('walk')}`)
  }

  function requirePet(petId: PetId): Pet {
    const pet = adapter.getPet(petId)
    if (!pet || pet.ownerId !== userId) throw new NotFoundError(`Pet '${petId}' not found`)
    return pet
  }

  function requireTask(taskId: TaskId): Task {
    const task = adapter.getTask(taskId)
    if (!task) throw new NotFoundError(`Task '${taskId}' not found`)
    return task
  }

  function requireDescription(description: string): string {
    const trimmed = description.trim()
    if (trimmed === '') throw new ValidationError('Task description must not be empty')
    return trimmed
  }

  function userTasks(): Task[] {
    return adapter.getTasksByUser(userId)
  }

  // ========== Entities ==========

  function getUser(): User {
    return adapter.getUser(userId) ?? user
  }

  function addPet(input: PetInput): Pet {
    return addPetToUser(adapter, userId, input)
  }

  function getTodaysTasks(): Task[] {
    return filterToday(userTasks(), dateOf(clock()))
  }

  function getScheduledWalks(petId: PetId): Walk[] {
    requirePet(petId)
    return getPetScheduledWalks(adapter, petId)
  }

  // ========== Walks ==========

  function hasConflict(petId: PetId, time: LocalDateTime, duration: number): ConflictCheck {
    requirePet(petId)
    validateDuration(duration)
    return checkPetConflict(adapter, petId, validateDateTime(time, 'walk time'), duration)
  }

  function scheduleWalk(petId: PetId, time: LocalDateTime, duration: number): WalkResult {
    const result = adapter.transaction((): WalkResult => {
      const pet = requirePet(petId)
      validateDuration(duration)
      const start = validateDateTime(time, 'walk time')

      const check = checkPetConflict(adapter, petId, start, duration)
      if (check.conflict) {
        return { walk: null, task: null, reasons: check.reasons }
      }

      const walk: Walk = {
        id: nextWalkId(),
        petId,
        scheduledTime: start,
        duration,
        status: 'scheduled',
      }
      const task: Task = {
        id: nextTaskId(),
        description: `Walk ${pet.name}`,
        dueDate: start,
        priority: 'high',
        isCompleted: false,
        walkId: walk.id,
        userId,
        petId,
      }
      adapter.createWalk(walk)
      adapter.createTask(task)
      return { walk, task, reasons: check.reasons }
    })

    if (result.walk === null) emit('walkRejected', result.reasons)
    else emit('walkScheduled', result.walk, result.task)
    return result
  }

  function cancelWalk(walkId: WalkId): Walk {
    const walk = adapter.getWalk(walkId)
    if (!walk) throw new NotFoundError(`Walk '${walkId}' not found`)
    requirePet(walk.petId)
    const cancelled = cancelWalkRecord(walk)
    adapter.updateWalk(walkId, { status: cancelled.status })
    return cancelled
  }

  // ========== Tasks ==========

  function addTask(input: TaskInput): Task {
    const description = requireDescription(input.description)
    const dueDate = validateDateTime(input.dueDate, 'due date')
    const recurrence = input.recurrence != null ? parseRecurrence(input.recurrence) : undefined
    if (input.walkDuration != null) validateDuration(input.walkDuration)

    const task = adapter.transaction(() => {
      const pet = input.petId != null ? requirePet(input.petId) : null
      const created: Task = {
        id: nextTaskId(),
        description,
        dueDate,
        priority: input.priority,
        isCompleted: false,
        userId,
      }
      if (pet) created.petId = pet.id
      if (recurrence) created.recurrence = recurrence

      if (input.walkDuration != null) {
        if (!pet) throw new ValidationError('A walk needs a pet')
        const walk: Walk = {
          id: nextWalkId(),
          petId: pet.id,
          scheduledTime: dueDate,
          duration: input.walkDuration,
          status: 'scheduled',
        }
        adapter.createWalk(walk)
        created.walkId = walk.id
      }

      adapter.createTask(created)
      return created
    })

    emit('taskCreated', task)
    return task
  }

  function createRecurringTask(
    petId: PetId,
    description: string,
    startTime: LocalDateTime,
    priority: TaskPriority,
    recurrence: string
  ): Task {
    return addTask({ petId, description, dueDate: startTime, priority, recurrence })
  }

  /**
   * Complete a task and, when it recurs, register its successor.
   * Returns the successor, or null for a one-off or already completed task.
   */
  function completeTask(taskId: TaskId): Task | null {
    const outcome = adapter.transaction(() => {
      const task = requireTask(taskId)
      if (task.userId !== userId) throw new NotFoundError(`Task '${taskId}' not found`)
      if (task.isCompleted) return null

      const walk = task.walkId != null ? adapter.getWalk(task.walkId) : null
      const completed = markComplete(task, walk)
      adapter.updateTask(taskId, { isCompleted: true })
      if (completed.walk) adapter.updateWalk(completed.walk.id, { status: completed.walk.status })

      const successor = expandRecurrence(completed.task, nextTaskId())
      if (successor) adapter.createTask(successor)
      return { completed: completed.task, successor }
    })

    if (outcome === null) return null
    emit('taskCompleted', outcome.completed)
    if (outcome.successor) emit('taskCreated', outcome.successor)
    return outcome.successor
  }

  // ========== Queries ==========

  function getTasksByPet(petId: PetId): Task[] {
    return filterByPet(userTasks(), petId)
  }

  function getTasksByPriority(priority: TaskPriority): Task[] {
    return filterByPriority(userTasks(), priority)
  }

  function getTasksByPetName(name: string): Task[] {
    return filterByPetName(userTasks(), getUserPets(adapter, userId), name)
  }

  function getTasksByStatus(completed: boolean): Task[] {
    return filterByStatus(userTasks(), completed)
  }

  function getPendingTasks(): Task[] {
    return getTasksByStatus(false)
  }

  function getOrganizedTodaysTasks(): Map<string, Task[]> {
    return groupByPetName(getTodaysTasks(), getUserPets(adapter, userId))
  }

  function checkAllConflicts(): ScheduleConflict[] {
    return findAllConflicts(adapter, userId)
  }

  // ========== Missed Tasks ==========

  /**
   * Roll every overdue recurring task forward one period. The overdue task
   * takes the new due date and is marked complete; a fresh copy is created at
   * that same date. An attached walk follows the task and goes back to
   * `scheduled`. Overdue one-off tasks are left as they are.
   */
  function rescheduleMissedTasks(): RescheduledTask[] {
    const now = clock()

    const rescheduled = adapter.transaction(() => {
      const result: RescheduledTask[] = []
      for (const task of userTasks()) {
        if (task.isCompleted || !(task.dueDate < now)) continue
        const next = getNextOccurrence(task)
        if (next === null) continue

        const walk = task.walkId != null ? adapter.getWalk(task.walkId) : null
        const completed = markComplete({ ...task, dueDate: next }, walk)
        adapter.updateTask(task.id, { dueDate: next, isCompleted: true })

        const successor = cloneAt(completed.task, nextTaskId(), next)
        adapter.createTask(successor)

        if (completed.walk) {
          adapter.updateWalk(completed.walk.id, { scheduledTime: next, status: 'scheduled' })
        }
        result.push({ original: completed.task, successor })
      }
      return result
    })

    for (const { original, successor } of rescheduled) {
      emit('taskRescheduled', original, successor)
    }
    return rescheduled
  }

  return {
    getUser,
    addPet,
    getPets: () => getUserPets(adapter, userId),
    getPet: (id) => {
      const pet = adapter.getPet(id)
      return pet && pet.ownerId === userId ? pet : null
    },
    getTask: (id) => {
      const task = adapter.getTask(id)
      return task && task.userId === userId ? task : null
    },
    getWalk: (id) => {
      const walk = adapter.getWalk(id)
      return walk && adapter.getPet(walk.petId)?.ownerId === userId ? walk : null
    },
    getTasks: userTasks,
    getWalks: () => adapter.getWalksByOwner(userId),
    getTodaysTasks,
    getScheduledWalks,
    hasConflict,
    scheduleWalk,
    cancelWalk,
    addTask,
    createRecurringTask,
    completeTask,
    getTasksByPet,
    getTasksByPriority,
    getTasksByPetName,
    getTasksByStatus,
    getPendingTasks,
    sortTasksByTime,
    sortTasksByPriority,
    getOrganizedTodaysTasks,
    checkAllConflicts,
    rescheduleMissedTasks,
    on,
  }
}
