/**
 * Users
 *
 * The owner record and the views derived from it: pets, tasks and today's
 * open tasks. All ordering is the adapter's insertion order.
 */

import type { Adapter } from './adapter'
import type { Pet, Task, User } from './domain-types'
import type { LocalDate } from './time-date'
import type { PetId, UserId } from './types'
import { makePetId, makeUserId } from './types'
import { isForToday } from './tasks'
import { NotFoundError, ValidationError } from './errors'

export { NotFoundError, ValidationError } from './errors'

// ============================================================================
// Input Types
// ============================================================================

export type UserInput = {
  id: string
  name: string
  email: string
}

export type PetInput = {
  id?: string
  name: string
  breed: string
  age: number
}

// ============================================================================
// Validation
// ============================================================================

function requireText(value: string, field: string): string {
  const trimmed = value.trim()
  if (trimmed === '') throw new ValidationError(`${field} must not be empty`)
  return trimmed
}

// ============================================================================
// User
// ============================================================================

/** Load the user, creating it first when the adapter has never seen the id */
export function ensureUser(adapter: Adapter, input: UserInput): User {
  const id = makeUserId(requireText(input.id, 'User id'))
  const existing = adapter.getUser(id)
  if (existing) return existing

  const user: User = {
    id,
    name: requireText(input.name, 'User name'),
    email: requireText(input.email, 'User email'),
  }
  adapter.createUser(user)
  return user
}

function requireUser(adapter: Adapter, userId: UserId): User {
  const user = adapter.getUser(userId)
  if (!user) throw new NotFoundError(`User '${userId}' not found`)
  return user
}

// ============================================================================
// Pets
// ============================================================================

/**
 * Register a pet under a user. Without an explicit id the pet draws from the
 * `pet` sequence, skipping values a caller has already taken. Input is checked
 * before any id is drawn, and the draw rolls back with a failed create.
 */
export function addPet(adapter: Adapter, userId: UserId, input: PetInput): Pet {
  requireUser(adapter, userId)
  if (!Number.isInteger(input.age) || input.age < 0) {
    throw new ValidationError(`Pet age must be a non-negative whole number, got ${input.age}`)
  }
  const name = requireText(input.name, 'Pet name')
  const breed = requireText(input.breed, 'Pet breed')
  const explicitId = input.id != null ? makePetId(requireText(input.id, 'Pet id')) : null

  return adapter.transaction(() => {
    const pet: Pet = {
      id: explicitId ?? nextFreePetId(adapter),
      name,
      breed,
      age: input.age,
      ownerId: userId,
    }
    adapter.createPet(pet)
    return pet
  })
}

function nextFreePetId(adapter: Adapter): PetId {
  let id = makePetId(`pet_${adapter.nextSequence('pet')}`)
  while (adapter.getPet(id) !== null) {
    id = makePetId(`pet_${adapter.nextSequence('pet')}`)
  }
  return id
}

export function getPets(adapter: Adapter, userId: UserId): Pet[] {
  return adapter.getPetsByOwner(userId)
}

// ============================================================================
// Tasks
// ============================================================================

export function getTodaysTasks(adapter: Adapter, userId: UserId, today: LocalDate): Task[] {
  return adapter.getTasksByUser(userId).filter((t) => !t.isCompleted && isForToday(t, today))
}
