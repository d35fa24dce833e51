/**
 * Property tests for walk-window overlap and the scheduling invariant that
 * accepted walks of one pet never collide.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { timesOverlap } from '../../../src/conflicts'
import { addMinutes, minutesBetween } from '../../../src/time-date'
import { createTestPlanner } from '../../helpers/fixtures'
import { durationGen, localDateTimeGen, sameDayDateTimeGen } from '../generators'

describe('Walk window overlap', () => {
  it('is symmetric', () => {
    fc.assert(
      fc.property(localDateTimeGen(), durationGen(), localDateTimeGen(), durationGen(), (a, da, b, db) => {
        expect(timesOverlap(a, da, b, db)).toBe(timesOverlap(b, db, a, da))
      })
    )
  })

  it('holds exactly when each window starts before the other ends', () => {
    fc.assert(
      fc.property(sameDayDateTimeGen(), durationGen(), sameDayDateTimeGen(), durationGen(), (a, da, b, db) => {
        const offset = minutesBetween(a, b)
        expect(timesOverlap(a, da, b, db)).toBe(-db < offset && offset < da)
      })
    )
  })

  it('back-to-back windows never overlap', () => {
    fc.assert(
      fc.property(localDateTimeGen(), durationGen(), durationGen(), (a, da, db) => {
        expect(timesOverlap(a, da, addMinutes(a, da), db)).toBe(false)
      })
    )
  })

  it('windows sharing a start always overlap', () => {
    fc.assert(
      fc.property(localDateTimeGen(), durationGen(), durationGen(), (a, da, db) => {
        expect(timesOverlap(a, da, a, db)).toBe(true)
      })
    )
  })
})

describe('Scheduling invariant', () => {
  const attemptGen = fc.record({
    second: fc.boolean(),
    start: sameDayDateTimeGen(),
    duration: fc.integer({ min: 5, max: 90 }),
  })

  it('accepted walks never conflict, and a walk is accepted exactly when the check passes', () => {
    fc.assert(
      fc.property(fc.array(attemptGen, { maxLength: 15 }), (attempts) => {
        const { scheduler, buddy, whiskers } = createTestPlanner()
        let accepted = 0

        for (const { second, start, duration } of attempts) {
          const pet = second ? whiskers : buddy
          const expectAccepted = !scheduler.hasConflict(pet, start, duration).conflict
          const result = scheduler.scheduleWalk(pet, start, duration)
          expect(result.walk !== null).toBe(expectAccepted)
          if (result.walk !== null) accepted++
        }

        expect(scheduler.checkAllConflicts()).toEqual([])
        expect(scheduler.getWalks()).toHaveLength(accepted)
        expect(scheduler.getTasks()).toHaveLength(accepted)
      })
    )
  })
})
