/**
 * SQLite Adapter
 *
 * Durable implementation of the planner adapter using better-sqlite3.
 * better-sqlite3 is synchronous, so it satisfies the Adapter contract directly.
 */
import Database from 'better-sqlite3'
import type { Adapter, TaskUpdate, WalkUpdate } from './adapter'
import type { Pet, Recurrence, Task, User, Walk, WalkStatus } from './domain-types'
import type { LocalDateTime } from './time-date'
import { makePetId, makeTaskId, makeUserId, makeWalkId, type SequenceKind } from './types'
import { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError } from './errors'

export { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError }

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): string[]
  getSchemaVersion(): number
  inTransaction(): boolean
  close(): void
}

export type SqliteAdapter = Adapter & SqliteExtras

const SCHEMA_VERSION = 1

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS user (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    email TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS pet (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    breed TEXT NOT NULL,
    age INTEGER NOT NULL CHECK (age >= 0),
    owner_id TEXT REFERENCES user(id) ON DELETE SET NULL
  );
  CREATE INDEX IF NOT EXISTS idx_pet_owner ON pet(owner_id);

  CREATE TABLE IF NOT EXISTS walk (
    id TEXT PRIMARY KEY,
    pet_id TEXT NOT NULL REFERENCES pet(id) ON DELETE CASCADE,
    scheduled_time TEXT NOT NULL,
    duration INTEGER NOT NULL CHECK (duration > 0),
    status TEXT NOT NULL CHECK (status IN ('scheduled', 'cancelled', 'completed'))
  );
  CREATE INDEX IF NOT EXISTS idx_walk_pet ON walk(pet_id);

  CREATE TABLE IF NOT EXISTS task (
    id TEXT PRIMARY KEY,
    description TEXT NOT NULL,
    due_date TEXT NOT NULL,
    priority TEXT NOT NULL,
    is_completed INTEGER NOT NULL DEFAULT 0 CHECK (is_completed IN (0, 1)),
    walk_id TEXT REFERENCES walk(id) ON DELETE SET NULL,
    user_id TEXT REFERENCES user(id) ON DELETE SET NULL,
    pet_id TEXT REFERENCES pet(id) ON DELETE SET NULL,
    recurrence TEXT CHECK (recurrence IN ('daily', 'weekly', 'none'))
  );
  CREATE INDEX IF NOT EXISTS idx_task_user ON task(user_id);
  CREATE INDEX IF NOT EXISTS idx_task_pet ON task(pet_id);

  CREATE TABLE IF NOT EXISTS id_sequence (
    kind TEXT PRIMARY KEY,
    value INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/FOREIGN KEY constraint/i.test(msg)) throw new ForeignKeyError(msg)
  if (/CHECK constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type UserRow = {
  id: string
  name: string
  email: string
}

type PetRow = {
  id: string
  name: string
  breed: string
  age: number
  owner_id: string | null
}

type WalkRow = {
  id: string
  pet_id: string
  scheduled_time: string
  duration: number
  status: WalkStatus
}

type TaskRow = {
  id: string
  description: string
  due_date: string
  priority: string
  is_completed: number
  walk_id: string | null
  user_id: string | null
  pet_id: string | null
  recurrence: Recurrence | null
}

type SequenceRow = {
  value: number
}

type SchemaVersionRow = {
  v: number | null
}

type NameRow = {
  name: string
}

// ============================================================================
// Row → Domain Mappers
// ============================================================================

function toUser(row: UserRow): User {
  return { id: makeUserId(row.id), name: row.name, email: row.email }
}

function toPet(row: PetRow): Pet {
  return {
    id: makePetId(row.id),
    name: row.name,
    breed: row.breed,
    age: row.age,
    ownerId: row.owner_id != null ? makeUserId(row.owner_id) : null,
  }
}

function toWalk(row: WalkRow): Walk {
  return {
    id: makeWalkId(row.id),
    petId: makePetId(row.pet_id),
    scheduledTime: row.scheduled_time as LocalDateTime,
    duration: row.duration,
    status: row.status,
  }
}

function toTask(row: TaskRow): Task {
  return {
    id: makeTaskId(row.id),
    description: row.description,
    dueDate: row.due_date as LocalDateTime,
    priority: row.priority,
    isCompleted: row.is_completed === 1,
    ...(row.walk_id != null ? { walkId: makeWalkId(row.walk_id) } : {}),
    ...(row.user_id != null ? { userId: makeUserId(row.user_id) } : {}),
    ...(row.pet_id != null ? { petId: makePetId(row.pet_id) } : {}),
    ...(row.recurrence != null ? { recurrence: row.recurrence } : {}),
  }
}

// ============================================================================
// Domain → Column Mappers (for partial updates)
// ============================================================================

function walkColumns(changes: WalkUpdate): Record<string, string | number> {
  const cols: Record<string, string | number> = {}
  if (changes.scheduledTime !== undefined) cols['scheduled_time'] = changes.scheduledTime
  if (changes.duration !== undefined) cols['duration'] = changes.duration
  if (changes.status !== undefined) cols['status'] = changes.status
  return cols
}

function taskColumns(changes: TaskUpdate): Record<string, string | number> {
  const cols: Record<string, string | number> = {}
  if (changes.description !== undefined) cols['description'] = changes.description
  if (changes.dueDate !== undefined) cols['due_date'] = changes.dueDate
  if (changes.priority !== undefined) cols['priority'] = changes.priority
  if (changes.isCompleted !== undefined) cols['is_completed'] = changes.isCompleted ? 1 : 0
  if (changes.walkId !== undefined) cols['walk_id'] = changes.walkId
  if (changes.userId !== undefined) cols['user_id'] = changes.userId
  if (changes.petId !== undefined) cols['pet_id'] = changes.petId
  if (changes.recurrence !== undefined) cols['recurrence'] = changes.recurrence
  return cols
}

// ============================================================================
// Factory
// ============================================================================

export function createSqliteAdapter(path: string): SqliteAdapter {
  const db = new Database(path)
  db.exec('PRAGMA foreign_keys = ON')
  db.exec(SCHEMA_SQL)

  const ver = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  let _inTx = false

  function update(table: 'walk' | 'task', id: string, cols: Record<string, string | number>): void {
    const keys = Object.keys(cols)
    if (keys.length === 0) {
      const exists = db.prepare(`SELECT 1 FROM ${table} WHERE id = ?`).get(id)
      if (!exists) throw new NotFoundError(`${table} '${id}' not found`)
      return
    }
    const assignments = keys.map((k) => `${k} = @${k}`).join(', ')
    const info = safe(() =>
      db.prepare(`UPDATE ${table} SET ${assignments} WHERE id = @id`).run({ ...cols, id })
    )
    if (info.changes === 0) throw new NotFoundError(`${table} '${id}' not found`)
  }

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    transaction<T>(fn: () => T): T {
      if (_inTx) return fn()
      _inTx = true
      db.exec('BEGIN IMMEDIATE')
      try {
        const result = fn()
        db.exec('COMMIT')
        return result
      } catch (e) {
        db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    nextSequence(kind: SequenceKind) {
      const row = db.prepare<[SequenceKind], SequenceRow>(`
        INSERT INTO id_sequence (kind, value) VALUES (?, 1)
        ON CONFLICT(kind) DO UPDATE SET value = value + 1
        RETURNING value
      `).get(kind)
      if (!row) throw new InvalidDataError(`Sequence '${kind}' did not advance`)
      return row.value
    },

    // ================================================================
    // User
    // ================================================================
    createUser(user) {
      safe(() =>
        db.prepare('INSERT INTO user (id, name, email) VALUES (?, ?, ?)').run(user.id, user.name, user.email)
      )
    },

    getUser(id) {
      const row = db.prepare<[string], UserRow>('SELECT * FROM user WHERE id = ?').get(id)
      return row ? toUser(row) : null
    },

    // ================================================================
    // Pet
    // ================================================================
    createPet(pet) {
      safe(() =>
        db.prepare('INSERT INTO pet (id, name, breed, age, owner_id) VALUES (?, ?, ?, ?, ?)')
          .run(pet.id, pet.name, pet.breed, pet.age, pet.ownerId)
      )
    },

    getPet(id) {
      const row = db.prepare<[string], PetRow>('SELECT * FROM pet WHERE id = ?').get(id)
      return row ? toPet(row) : null
    },

    getPetsByOwner(ownerId) {
      return db.prepare<[string], PetRow>('SELECT * FROM pet WHERE owner_id = ? ORDER BY rowid')
        .all(ownerId)
        .map(toPet)
    },

    // ================================================================
    // Walk
    // ================================================================
    createWalk(walk) {
      safe(() =>
        db.prepare('INSERT INTO walk (id, pet_id, scheduled_time, duration, status) VALUES (?, ?, ?, ?, ?)')
          .run(walk.id, walk.petId, walk.scheduledTime, walk.duration, walk.status)
      )
    },

    getWalk(id) {
      const row = db.prepare<[string], WalkRow>('SELECT * FROM walk WHERE id = ?').get(id)
      return row ? toWalk(row) : null
    },

    updateWalk(id, changes) {
      update('walk', id, walkColumns(changes))
    },

    getWalksByOwner(ownerId) {
      return db.prepare<[string], WalkRow>(`
        SELECT walk.* FROM walk
        JOIN pet ON pet.id = walk.pet_id
        WHERE pet.owner_id = ?
        ORDER BY walk.rowid
      `).all(ownerId).map(toWalk)
    },

    // ================================================================
    // Task
    // ================================================================
    createTask(task) {
      safe(() =>
        db.prepare(`
          INSERT INTO task (id, description, due_date, priority, is_completed, walk_id, user_id, pet_id, recurrence)
          VALUES (@id, @description, @dueDate, @priority, @isCompleted, @walkId, @userId, @petId, @recurrence)
        `).run({
          id: task.id,
          description: task.description,
          dueDate: task.dueDate,
          priority: task.priority,
          isCompleted: task.isCompleted ? 1 : 0,
          walkId: task.walkId ?? null,
          userId: task.userId ?? null,
          petId: task.petId ?? null,
          recurrence: task.recurrence ?? null,
        })
      )
    },

    getTask(id) {
      const row = db.prepare<[string], TaskRow>('SELECT * FROM task WHERE id = ?').get(id)
      return row ? toTask(row) : null
    },

    updateTask(id, changes) {
      update('task', id, taskColumns(changes))
    },

    getTasksByUser(userId) {
      return db.prepare<[string], TaskRow>('SELECT * FROM task WHERE user_id = ? ORDER BY rowid')
        .all(userId)
        .map(toTask)
    },

    getTasksByPet(petId) {
      return db.prepare<[string], TaskRow>('SELECT * FROM task WHERE pet_id = ? ORDER BY rowid')
        .all(petId)
        .map(toTask)
    },

    // ================================================================
    // Introspection & Lifecycle
    // ================================================================
    listTables() {
      return db.prepare<[], NameRow>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
      ).all().map((r) => r.name)
    },

    getSchemaVersion() {
      const row = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
      return row?.v ?? 0
    },

    inTransaction() {
      return _inTx
    },

    close() {
      db.close()
    },
  }

  return adapter
}
