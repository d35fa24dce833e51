/**
 * pet-care-planner
 *
 * Public API exports
 */

// Error system (base class, codes and every error class)
export {
  PlannerError, PlannerErrorCode,
  DuplicateKeyError, NotFoundError, ForeignKeyError, InvalidDataError,
  ValidationError, ParseError,
} from './errors'
export type { PlannerErrorCode as PlannerErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date (branded types + utilities)
export type { LocalDate, LocalTime, LocalDateTime, Clock } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, parseTime, parseDateTime,
  makeDate, makeTime, makeDateTime,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf, dateOf, timeOf,
  formatClockTime,
  addDays, daysBetween, addDaysToDateTime, addMinutes, minutesBetween,
  compareDateTimes, dateTimeBefore,
  fromJSDate, systemClock, fixedClock,
} from './time-date'

// Branded ID types
export type { UserId, PetId, TaskId, WalkId, SequenceKind } from './types'
export { makeUserId, makePetId, makeTaskId, makeWalkId } from './types'

// Domain types
export type {
  User, Pet, Walk, Task,
  Priority, TaskPriority, Recurrence, WalkStatus,
  WalkConflict, ConflictCheck, ScheduleConflict,
} from './domain-types'
export { PRIORITY_RANK, UNKNOWN_PRIORITY_RANK, RECURRENCES } from './domain-types'

// Adapter (persistence interface + in-memory implementation)
export type { Adapter, WalkUpdate, TaskUpdate } from './adapter'
export { createMockAdapter } from './adapter'

// SQLite adapter
export type { SqliteAdapter, SqliteExtras } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Entity layer
export { MAX_WALK_MINUTES, validateDuration, walkEnd, rescheduleWalk, cancelWalk, completeWalk } from './walks'
export type { CompletedTask } from './tasks'
export { markComplete, getNextOccurrence, getPriority, priorityRank, isForToday } from './tasks'
export { getScheduledWalks, getPetDetails } from './pets'
export type { UserInput, PetInput } from './users'
export { ensureUser, addPet, getPets, getTodaysTasks } from './users'

// Conflict detection
export type { ActiveWalkTask } from './conflicts'
export { timesOverlap, getActiveWalkTasks, hasConflict, findPetConflicts, findAllConflicts } from './conflicts'

// Recurrence
export { isRecurring, parseRecurrence, cloneAt, expandRecurrence } from './recurrence'

// Task queries
export {
  GENERAL_GROUP,
  filterByPet, filterByPriority, filterByStatus, filterByPetName, filterToday,
  sortTasksByTime, sortTasksByPriority, groupByPetName,
} from './task-queries'

// High-level API (wraps all modules into a stateful scheduler object)
export type {
  Scheduler, SchedulerConfig, WalkResult, TaskInput, RescheduledTask,
  SchedulerEvents, SchedulerEventName, SchedulerEventHandler,
} from './public-api'
export { createScheduler } from './public-api'
