/**
 * Segment 08: Scheduler
 *
 * End-to-end behavior of the owner-scoped facade: walk scheduling with
 * conflict rejection, recurring completion, organized views, missed-task
 * roll-forward and events.
 */
import { describe, it, expect, beforeEach, vi } from 'vitest'
import { createScheduler, type Scheduler } from '../src/public-api'
import { NotFoundError, ValidationError } from '../src/errors'
import type { Task, Walk } from '../src/domain-types'
import { fixedClock } from '../src/time-date'
import type { PetId } from '../src/types'
import { at, createTestPlanner, petId, taskId, walkId, type TestPlanner } from './helpers/fixtures'

describe('Segment 08: Scheduler', () => {
  let planner: TestPlanner
  let scheduler: Scheduler
  let buddy: PetId
  let whiskers: PetId

  beforeEach(() => {
    planner = createTestPlanner()
    scheduler = planner.scheduler
    buddy = planner.buddy
    whiskers = planner.whiskers
  })

  describe('Owner and pets', () => {
    it('stores the owner', () => {
      expect(scheduler.getUser()).toEqual({ id: 'user_001', name: 'Sam', email: 'sam@example.com' })
    })

    it('lists the pets in the order they were added', () => {
      expect(scheduler.getPets().map((p) => p.id)).toEqual(['pet_1', 'pet_2'])
      expect(scheduler.getPet(buddy)?.name).toBe('Buddy')
    })

    it('reopening the same owner on the same adapter keeps the data', () => {
      const again = createScheduler({
        owner: { id: 'user_001', name: 'Ignored', email: 'ignored@example.com' },
        adapter: planner.adapter,
        clock: fixedClock(at('07:00')),
      })
      expect(again.getUser().name).toBe('Sam')
      expect(again.getPets()).toHaveLength(2)
    })

    it('hides other owners\' records', () => {
      scheduler.scheduleWalk(buddy, at('08:00'), 30)
      const other = createScheduler({
        owner: { id: 'user_002', name: 'Alex', email: 'alex@example.com' },
        adapter: planner.adapter,
        clock: fixedClock(at('07:00')),
      })
      expect(other.getPet(buddy)).toBeNull()
      expect(other.getTask(taskId('task_1'))).toBeNull()
      expect(other.getWalk(walkId('walk_1'))).toBeNull()
      expect(() => other.scheduleWalk(buddy, at('10:00'), 30)).toThrow(NotFoundError)
      expect(() => other.completeTask(taskId('task_1'))).toThrow(NotFoundError)
    })
  })

  describe('Walk scheduling', () => {
    it('accepts, rejects and accepts back-to-back', () => {
      const first = scheduler.scheduleWalk(buddy, at('08:00'), 30)
      expect(first.walk).toEqual({
        id: 'walk_1',
        petId: 'pet_1',
        scheduledTime: '2025-03-10T08:00:00',
        duration: 30,
        status: 'scheduled',
      })
      expect(first.task).toEqual({
        id: 'task_1',
        description: 'Walk Buddy',
        dueDate: '2025-03-10T08:00:00',
        priority: 'high',
        isCompleted: false,
        walkId: 'walk_1',
        userId: 'user_001',
        petId: 'pet_1',
      })
      expect(first.reasons).toEqual(['No conflicts for Buddy at 08:00'])

      const rejected = scheduler.scheduleWalk(buddy, at('08:15'), 30)
      expect(rejected).toEqual({
        walk: null,
        task: null,
        reasons: ['Conflict: Buddy already has "Walk Buddy" at 08:00 for 30 minutes'],
      })

      const second = scheduler.scheduleWalk(buddy, at('08:30'), 20)
      expect(second.walk?.id).toBe('walk_2')
      expect(second.task?.id).toBe('task_2')

      expect(scheduler.getScheduledWalks(buddy).map((w) => w.id)).toEqual(['walk_1', 'walk_2'])
      expect(scheduler.checkAllConflicts()).toEqual([])
    })

    it('a rejected walk writes nothing', () => {
      scheduler.scheduleWalk(buddy, at('08:00'), 30)
      scheduler.scheduleWalk(buddy, at('08:15'), 30)
      expect(scheduler.getTasks()).toHaveLength(1)
      expect(scheduler.getWalks()).toHaveLength(1)
    })

    it('walks of different pets never collide', () => {
      scheduler.scheduleWalk(buddy, at('08:00'), 30)
      expect(scheduler.scheduleWalk(whiskers, at('08:00'), 30).walk?.id).toBe('walk_2')
    })

    it('checks a window without writing', () => {
      scheduler.scheduleWalk(buddy, at('08:00'), 30)
      expect(scheduler.hasConflict(buddy, at('08:29'), 5).conflict).toBe(true)
      expect(scheduler.hasConflict(buddy, at('07:30'), 30).conflict).toBe(false)
      expect(scheduler.getWalks()).toHaveLength(1)
    })

    it('rejects invalid input without drawing ids', () => {
      expect(() => scheduler.scheduleWalk(buddy, at('08:00'), 0)).toThrow(ValidationError)
      expect(() => scheduler.scheduleWalk(buddy, at('08:00'), -5)).toThrow(ValidationError)
      expect(() => scheduler.hasConflict(buddy, at('08:00'), 1.5)).toThrow(
        'Walk duration must be a positive whole number of minutes, got 1.5'
      )
      expect(scheduler.scheduleWalk(buddy, at('08:00'), 30).walk?.id).toBe('walk_1')
    })

    it('rejects an unknown pet', () => {
      expect(() => scheduler.getScheduledWalks(petId('pet_404'))).toThrow(NotFoundError)
      expect(() => scheduler.scheduleWalk(petId('pet_404'), at('08:00'), 30)).toThrow("Pet 'pet_404' not found")
    })
  })

  describe('Cancelling walks', () => {
    it('marks the walk cancelled while its open task keeps the window', () => {
      scheduler.scheduleWalk(buddy, at('08:00'), 30)
      const cancelled = scheduler.cancelWalk(walkId('walk_1'))
      expect(cancelled.status).toBe('cancelled')
      expect(scheduler.getWalk(walkId('walk_1'))?.status).toBe('cancelled')
      expect(scheduler.getScheduledWalks(buddy).map((w) => w.id)).toEqual(['walk_1'])
      expect(scheduler.scheduleWalk(buddy, at('08:15'), 30).walk).toBeNull()
    })

    it('completing the task of a cancelled walk frees the window', () => {
      scheduler.scheduleWalk(buddy, at('08:00'), 30)
      scheduler.cancelWalk(walkId('walk_1'))
      scheduler.completeTask(taskId('task_1'))
      expect(scheduler.scheduleWalk(buddy, at('08:15'), 30).walk?.id).toBe('walk_2')
    })

    it('rejects a walk longer than a day', () => {
      expect(() => scheduler.scheduleWalk(buddy, at('08:00'), 100000)).toThrow(
        'Walk duration must not exceed 1440 minutes, got 100000'
      )
    })

    it('refuses a completed walk', () => {
      scheduler.scheduleWalk(buddy, at('08:00'), 30)
      scheduler.completeTask(taskId('task_1'))
      expect(() => scheduler.cancelWalk(walkId('walk_1'))).toThrow(ValidationError)
    })

    it('refuses an unknown walk', () => {
      expect(() => scheduler.cancelWalk(walkId('walk_404'))).toThrow("Walk 'walk_404' not found")
    })
  })

  describe('Tasks', () => {
    it('adds a plain task with the next task id', () => {
      const task = scheduler.addTask({ description: '  Buy food  ', dueDate: at('11:00'), priority: 'low' })
      expect(task).toEqual({
        id: 'task_1',
        description: 'Buy food',
        dueDate: '2025-03-10T11:00:00',
        priority: 'low',
        isCompleted: false,
        userId: 'user_001',
      })
    })

    it('rejects an empty description', () => {
      expect(() => scheduler.addTask({ description: ' ', dueDate: at('11:00'), priority: 'low' })).toThrow(
        'Task description must not be empty'
      )
    })

    it('rejects a malformed due date', () => {
      expect(() =>
        scheduler.addTask({ description: 'Vet', dueDate: at('25:00'), priority: 'high', petId: buddy })
      ).toThrow("Invalid due date: '2025-03-10T25:00:00'")
    })

    it('rejects an unknown recurrence', () => {
      expect(() => scheduler.createRecurringTask(buddy, 'Feed Buddy', at('08:00'), 'medium', 'monthly')).toThrow(
        ValidationError
      )
    })

    it('a walk task without a pet rolls back', () => {
      expect(() =>
        scheduler.addTask({ description: 'Walk', dueDate: at('08:00'), priority: 'high', walkDuration: 30 })
      ).toThrow('A walk needs a pet')
      expect(scheduler.addTask({ description: 'Vet', dueDate: at('09:00'), priority: 'high' }).id).toBe('task_1')
    })

    it('walk tasks added directly are not conflict-checked but show up in the scan', () => {
      scheduler.addTask({ description: 'Walk A', dueDate: at('08:00'), priority: 'high', petId: buddy, walkDuration: 30 })
      scheduler.addTask({ description: 'Walk B', dueDate: at('08:15'), priority: 'high', petId: buddy, walkDuration: 30 })

      expect(scheduler.checkAllConflicts()).toEqual([
        {
          petId: 'pet_1',
          petName: 'Buddy',
          taskIds: ['task_1', 'task_2'],
          message: 'Conflict for Buddy: "Walk A" at 08:00 (30 min) overlaps "Walk B" at 08:15 (30 min)',
        },
      ])
    })
  })

  describe('Completion and recurrence', () => {
    it('daily task rolls to the next day', () => {
      const feed = scheduler.createRecurringTask(buddy, 'Feed Buddy', at('08:00'), 'medium', 'daily')
      const next = scheduler.completeTask(feed.id)

      expect(next).toEqual({
        id: 'task_2',
        description: 'Feed Buddy',
        dueDate: '2025-03-11T08:00:00',
        priority: 'medium',
        isCompleted: false,
        userId: 'user_001',
        petId: 'pet_1',
        recurrence: 'daily',
      })
      expect(scheduler.getTask(feed.id)?.isCompleted).toBe(true)
    })

    it('weekly task rolls seven days', () => {
      const groom = scheduler.createRecurringTask(whiskers, 'Groom Whiskers', at('18:00'), 'low', 'weekly')
      expect(scheduler.completeTask(groom.id)?.dueDate).toBe('2025-03-17T18:00:00')
    })

    it('one-off task has no successor', () => {
      const vet = scheduler.addTask({ description: 'Vet visit', dueDate: at('10:00'), priority: 'high', petId: buddy })
      expect(scheduler.completeTask(vet.id)).toBeNull()
      expect(scheduler.getTasks()).toHaveLength(1)
    })

    it('completing twice does not create a second successor', () => {
      const feed = scheduler.createRecurringTask(buddy, 'Feed Buddy', at('08:00'), 'medium', 'daily')
      scheduler.completeTask(feed.id)
      expect(scheduler.completeTask(feed.id)).toBeNull()
      expect(scheduler.getTasks()).toHaveLength(2)
    })

    it('completing a walk task completes its walk and frees the window', () => {
      scheduler.scheduleWalk(buddy, at('08:00'), 30)
      scheduler.completeTask(taskId('task_1'))
      expect(scheduler.getWalk(walkId('walk_1'))?.status).toBe('completed')
      expect(scheduler.getScheduledWalks(buddy)).toEqual([])
      expect(scheduler.hasConflict(buddy, at('08:15'), 30).conflict).toBe(false)
    })

    it('the successor of a walk task carries no walk', () => {
      scheduler.addTask({
        description: 'Morning walk',
        dueDate: at('08:00'),
        priority: 'high',
        petId: buddy,
        recurrence: 'daily',
        walkDuration: 30,
      })
      const next = scheduler.completeTask(taskId('task_1'))
      expect(next?.walkId).toBeUndefined()
      expect(scheduler.getWalks()).toHaveLength(1)
    })

    it('rejects an unknown task', () => {
      expect(() => scheduler.completeTask(taskId('task_404'))).toThrow(NotFoundError)
    })
  })

  describe('Views', () => {
    beforeEach(() => {
      scheduler.addTask({ description: 'Vet', dueDate: at('09:00'), priority: 'medium', petId: buddy })
      scheduler.addTask({ description: 'Play', dueDate: at('10:00'), priority: 'low', petId: whiskers })
      scheduler.addTask({ description: 'Walk', dueDate: at('14:00'), priority: 'high', petId: buddy })
      scheduler.addTask({ description: 'Buy food', dueDate: at('11:00'), priority: 'low' })
      scheduler.addTask({ description: 'Tomorrow', dueDate: at('09:00', '2025-03-11'), priority: 'high', petId: buddy })
    })

    it('today excludes other days', () => {
      expect(scheduler.getTodaysTasks().map((t) => t.description)).toEqual(['Vet', 'Play', 'Walk', 'Buy food'])
    })

    it('organizes today by pet, high before medium', () => {
      const groups = scheduler.getOrganizedTodaysTasks()
      expect([...groups.keys()]).toEqual(['Buddy', 'Whiskers', 'General'])
      expect(groups.get('Buddy')?.map((t) => t.description)).toEqual(['Walk', 'Vet'])
    })

    it('filters by pet name ignoring case', () => {
      expect(scheduler.getTasksByPetName('BUDDY').map((t) => t.description)).toEqual(['Vet', 'Walk', 'Tomorrow'])
    })

    it('filters by pet and priority', () => {
      expect(scheduler.getTasksByPet(whiskers).map((t) => t.description)).toEqual(['Play'])
      expect(scheduler.getTasksByPriority('low').map((t) => t.description)).toEqual(['Play', 'Buy food'])
    })

    it('filters by status', () => {
      scheduler.completeTask(taskId('task_1'))
      expect(scheduler.getTasksByStatus(true).map((t) => t.description)).toEqual(['Vet'])
      expect(scheduler.getPendingTasks()).toHaveLength(4)
    })

    it('sorts by time and by priority', () => {
      const tasks = scheduler.getTasks()
      expect(scheduler.sortTasksByTime(tasks).map((t) => t.description)).toEqual([
        'Vet', 'Play', 'Buy food', 'Walk', 'Tomorrow',
      ])
      expect(scheduler.sortTasksByPriority(tasks).map((t) => t.description)).toEqual([
        'Walk', 'Tomorrow', 'Vet', 'Play', 'Buy food',
      ])
    })
  })

  describe('Missed tasks', () => {
    it('rolls overdue recurring tasks forward and leaves one-offs alone', () => {
      const { scheduler: late, buddy: lateBuddy } = createTestPlanner({ now: at('07:00', '2025-03-12') })
      late.createRecurringTask(lateBuddy, 'Feed Buddy', at('08:00'), 'medium', 'daily')
      late.addTask({ description: 'Vet', dueDate: at('09:00'), priority: 'high', petId: lateBuddy })
      late.createRecurringTask(lateBuddy, 'Evening feed', at('09:00', '2025-03-12'), 'medium', 'daily')

      const moved = late.rescheduleMissedTasks()

      expect(moved).toHaveLength(1)
      expect(moved[0]?.original.id).toBe('task_1')
      expect(moved[0]?.original.dueDate).toBe('2025-03-11T08:00:00')
      expect(moved[0]?.original.isCompleted).toBe(true)
      expect(moved[0]?.successor).toEqual({
        id: 'task_4',
        description: 'Feed Buddy',
        dueDate: '2025-03-11T08:00:00',
        priority: 'medium',
        isCompleted: false,
        userId: 'user_001',
        petId: 'pet_1',
        recurrence: 'daily',
      })
      expect(late.getTask(taskId('task_2'))?.isCompleted).toBe(false)
    })

    it('moves the attached walk with the task', () => {
      const late = createTestPlanner({ now: at('07:00', '2025-03-12') })
      late.scheduler.addTask({
        description: 'Morning walk',
        dueDate: at('08:00'),
        priority: 'high',
        petId: late.buddy,
        recurrence: 'daily',
        walkDuration: 30,
      })

      late.scheduler.rescheduleMissedTasks()

      expect(late.scheduler.getWalk(walkId('walk_1'))).toEqual({
        id: 'walk_1',
        petId: 'pet_1',
        scheduledTime: '2025-03-11T08:00:00',
        duration: 30,
        status: 'scheduled',
      })
    })

    it('does nothing when nothing is overdue', () => {
      scheduler.createRecurringTask(buddy, 'Feed Buddy', at('08:00'), 'medium', 'daily')
      expect(scheduler.rescheduleMissedTasks()).toEqual([])
    })
  })

  describe('Events', () => {
    it('reports scheduled and rejected walks', () => {
      const scheduled: Array<[Walk, Task]> = []
      const rejected: string[][] = []
      scheduler.on('walkScheduled', (walk, task) => scheduled.push([walk, task]))
      scheduler.on('walkRejected', (reasons) => rejected.push(reasons))

      scheduler.scheduleWalk(buddy, at('08:00'), 30)
      scheduler.scheduleWalk(buddy, at('08:10'), 30)

      expect(scheduled.map(([walk, task]) => [walk.id, task.id])).toEqual([['walk_1', 'task_1']])
      expect(rejected).toEqual([['Conflict: Buddy already has "Walk Buddy" at 08:00 for 30 minutes']])
    })

    it('reports completion before the successor', () => {
      const seen: string[] = []
      scheduler.on('taskCompleted', (task) => seen.push(`completed ${task.id}`))
      scheduler.on('taskCreated', (task) => seen.push(`created ${task.id}`))

      const feed = scheduler.createRecurringTask(buddy, 'Feed Buddy', at('08:00'), 'medium', 'daily')
      scheduler.completeTask(feed.id)

      expect(seen).toEqual(['created task_1', 'completed task_1', 'created task_2'])
    })

    it('reports rescheduled tasks', () => {
      const { scheduler: late, buddy: lateBuddy } = createTestPlanner({ now: at('07:00', '2025-03-12') })
      const pairs: string[] = []
      late.on('taskRescheduled', (original, successor) => pairs.push(`${original.id}->${successor.id}`))
      late.createRecurringTask(lateBuddy, 'Feed Buddy', at('08:00'), 'medium', 'daily')
      late.rescheduleMissedTasks()
      expect(pairs).toEqual(['task_1->task_2'])
    })

    it('a throwing handler does not stop the operation or other handlers', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
      const failure = new Error('handler failed')
      const seen: string[] = []
      scheduler.on('taskCreated', () => {
        throw failure
      })
      scheduler.on('taskCreated', (task) => seen.push(task.id))

      const task = scheduler.addTask({ description: 'Vet', dueDate: at('09:00'), priority: 'high' })

      expect(task.id).toBe('task_1')
      expect(seen).toEqual(['task_1'])
      expect(errorSpy).toHaveBeenCalledWith("Event handler error on 'taskCreated':", failure)
      errorSpy.mockRestore()
    })
  })
})
