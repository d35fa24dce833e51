/**
 * Shared test fixtures: literal date-time helpers and a scheduler wired to a
 * frozen clock.
 */
import { createScheduler, type Scheduler } from '../../src/public-api'
import { createMockAdapter, type Adapter } from '../../src/adapter'
import { fixedClock, type LocalDate, type LocalDateTime } from '../../src/time-date'
import type { PetId, TaskId, WalkId } from '../../src/types'

export function date(iso: string): LocalDate {
  return iso as LocalDate
}

export function datetime(iso: string): LocalDateTime {
  return iso as LocalDateTime
}

export function petId(id: string): PetId {
  return id as PetId
}

export function taskId(id: string): TaskId {
  return id as TaskId
}

export function walkId(id: string): WalkId {
  return id as WalkId
}

/** Every scheduler test runs at 07:00 on this day unless it passes its own clock */
export const TODAY = '2025-03-10'

export function at(hhmm: string, day: string = TODAY): LocalDateTime {
  return `${day}T${hhmm}:00` as LocalDateTime
}

export type TestPlanner = {
  scheduler: Scheduler
  adapter: Adapter
  buddy: PetId
  whiskers: PetId
}

export function createTestPlanner(options: { now?: LocalDateTime; adapter?: Adapter } = {}): TestPlanner {
  const adapter = options.adapter ?? createMockAdapter()
  const scheduler = createScheduler({
    owner: { id: 'user_001', name: 'Sam', email: 'sam@example.com' },
    adapter,
    clock: fixedClock(options.now ?? at('07:00')),
  })
  const buddy = scheduler.addPet({ name: 'Buddy', breed: 'Golden Retriever', age: 3 }).id
  const whiskers = scheduler.addPet({ name: 'Whiskers', breed: 'Siamese', age: 2 }).id
  return { scheduler, adapter, buddy, whiskers }
}
