/**
 * Adapter
 *
 * Entity-arena persistence interface + in-memory implementation.
 * Every method is synchronous so that a conflict check and the write that
 * depends on it cannot interleave with another call.
 */

import type { Pet, Task, User, Walk } from './domain-types'
import type { PetId, SequenceKind, TaskId, UserId, WalkId } from './types'
import { DuplicateKeyError, ForeignKeyError, NotFoundError } from './errors'

export type { Pet, Task, User, Walk } from './domain-types'

// ============================================================================
// Error Classes
// ============================================================================

export { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError } from './errors'

// ============================================================================
// Update Types
// ============================================================================

export type WalkUpdate = Partial<Omit<Walk, 'id' | 'petId'>>

export type TaskUpdate = Partial<Omit<Task, 'id'>>

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  /** Run fn atomically; a thrown error rolls back every write made inside it */
  transaction<T>(fn: () => T): T

  /** Next value of a monotonic per-kind counter, starting at 1 */
  nextSequence(kind: SequenceKind): number

  // User
  createUser(user: User): void
  getUser(id: UserId): User | null

  // Pet
  createPet(pet: Pet): void
  getPet(id: PetId): Pet | null
  getPetsByOwner(ownerId: UserId): Pet[]

  // Walk
  createWalk(walk: Walk): void
  getWalk(id: WalkId): Walk | null
  updateWalk(id: WalkId, changes: WalkUpdate): void
  getWalksByOwner(ownerId: UserId): Walk[]

  // Task
  createTask(task: Task): void
  getTask(id: TaskId): Task | null
  updateTask(id: TaskId, changes: TaskUpdate): void
  getTasksByUser(userId: UserId): Task[]
  getTasksByPet(petId: PetId): Task[]

  // Lifecycle (persistent adapters only)
  close?(): void
}

// ============================================================================
// In-Memory Adapter
// ============================================================================

type State = {
  users: Map<string, User>
  pets: Map<string, Pet>
  walks: Map<string, Walk>
  tasks: Map<string, Task>
  sequences: Map<SequenceKind, number>
}

export function createMockAdapter(): Adapter {
  // ---- State ----
  // Maps iterate in insertion order, which is the order every list query returns.
  const state: State = {
    users: new Map(),
    pets: new Map(),
    walks: new Map(),
    tasks: new Map(),
    sequences: new Map(),
  }

  // ---- Transaction ----
  let txDepth = 0
  let snapshot: State | null = null

  function restoreState(snap: State) {
    Object.assign(state, snap)
  }

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function requireUser(id: UserId | null | undefined, context: string) {
    if (id != null && !state.users.has(id)) {
      throw new ForeignKeyError(`${context}: user '${id}' does not exist`)
    }
  }

  function requirePet(id: PetId | undefined, context: string) {
    if (id != null && !state.pets.has(id)) {
      throw new ForeignKeyError(`${context}: pet '${id}' does not exist`)
    }
  }

  function requireWalk(id: WalkId | undefined, context: string) {
    if (id != null && !state.walks.has(id)) {
      throw new ForeignKeyError(`${context}: walk '${id}' does not exist`)
    }
  }

  // ---- Adapter implementation ----
  const adapter: Adapter = {
    // ================================================================
    // Transaction
    // ================================================================
    transaction<T>(fn: () => T): T {
      const isOutermost = txDepth === 0
      if (isOutermost) {
        snapshot = clone(state)
      }
      txDepth++
      try {
        const result = fn()
        txDepth--
        if (txDepth === 0) snapshot = null
        return result
      } catch (e) {
        txDepth--
        if (txDepth === 0 && snapshot) {
          restoreState(snapshot)
          snapshot = null
        }
        throw e
      }
    },

    nextSequence(kind) {
      const next = (state.sequences.get(kind) ?? 0) + 1
      state.sequences.set(kind, next)
      return next
    },

    // ================================================================
    // User
    // ================================================================
    createUser(user) {
      if (state.users.has(user.id)) {
        throw new DuplicateKeyError(`User '${user.id}' already exists`)
      }
      state.users.set(user.id, clone(user))
    },

    getUser(id) {
      const u = state.users.get(id)
      return u ? clone(u) : null
    },

    // ================================================================
    // Pet
    // ================================================================
    createPet(pet) {
      if (state.pets.has(pet.id)) {
        throw new DuplicateKeyError(`Pet '${pet.id}' already exists`)
      }
      requireUser(pet.ownerId, `Pet '${pet.id}'`)
      state.pets.set(pet.id, clone(pet))
    },

    getPet(id) {
      const p = state.pets.get(id)
      return p ? clone(p) : null
    },

    getPetsByOwner(ownerId) {
      return [...state.pets.values()].filter((p) => p.ownerId === ownerId).map(clone)
    },

    // ================================================================
    // Walk
    // ================================================================
    createWalk(walk) {
      if (state.walks.has(walk.id)) {
        throw new DuplicateKeyError(`Walk '${walk.id}' already exists`)
      }
      requirePet(walk.petId, `Walk '${walk.id}'`)
      state.walks.set(walk.id, clone(walk))
    },

    getWalk(id) {
      const w = state.walks.get(id)
      return w ? clone(w) : null
    },

    updateWalk(id, changes) {
      const existing = state.walks.get(id)
      if (!existing) throw new NotFoundError(`Walk '${id}' not found`)
      state.walks.set(id, { ...existing, ...clone(changes) })
    },

    getWalksByOwner(ownerId) {
      return [...state.walks.values()]
        .filter((w) => state.pets.get(w.petId)?.ownerId === ownerId)
        .map(clone)
    },

    // ================================================================
    // Task
    // ================================================================
    createTask(task) {
      if (state.tasks.has(task.id)) {
        throw new DuplicateKeyError(`Task '${task.id}' already exists`)
      }
      requireUser(task.userId, `Task '${task.id}'`)
      requirePet(task.petId, `Task '${task.id}'`)
      requireWalk(task.walkId, `Task '${task.id}'`)
      state.tasks.set(task.id, clone(task))
    },

    getTask(id) {
      const t = state.tasks.get(id)
      return t ? clone(t) : null
    },

    updateTask(id, changes) {
      const existing = state.tasks.get(id)
      if (!existing) throw new NotFoundError(`Task '${id}' not found`)
      requirePet(changes.petId, `Task '${id}'`)
      requireWalk(changes.walkId, `Task '${id}'`)
      state.tasks.set(id, { ...existing, ...clone(changes) })
    },

    getTasksByUser(userId) {
      return [...state.tasks.values()].filter((t) => t.userId === userId).map(clone)
    },

    getTasksByPet(petId) {
      return [...state.tasks.values()].filter((t) => t.petId === petId).map(clone)
    },
  }

  return adapter
}
