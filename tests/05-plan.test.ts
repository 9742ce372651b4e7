/**
 * Segment 05: Plan Generation & Schedule
 *
 * Greedy priority-then-duration selection under the owner's budget.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { generatePlan, selectWithinBudget } from '../src/plan'
import { validateSchedule, remainingMinutes, formatSchedule } from '../src/schedule'
import { createOwner, addSubject, getAllTasks, type Owner } from '../src/owner'
import { createCareSubject, addTask, type CareSubject } from '../src/care-subject'
import { completeTask, type Task } from '../src/task'
import { InvalidTaskError, ValidationError } from '../src/errors'
import { TODAY, makeTask, sequentialIds } from './helpers/fixtures'
import { assertScheduleInvariants } from './helpers/schedule-invariants'

describe('Segment 05: Plan Generation', () => {
  let owner: Owner
  let dog: CareSubject
  let cat: CareSubject

  beforeEach(() => {
    const ids = sequentialIds('plan')
    owner = createOwner({ name: 'Jordan', availableMinutes: 20 }, ids)
    dog = createCareSubject({ name: 'Max', species: 'Dog' }, ids)
    cat = createCareSubject({ name: 'Luna', species: 'Cat' }, ids)
    addSubject(owner, dog)
    addSubject(owner, cat)
  })

  function add(subject: CareSubject, task: Task): Task {
    addTask(subject, task)
    return task
  }

  // ========================================================================
  // Worked scenario
  // ========================================================================

  describe('budget shortfall scenario', () => {
    it('selects only B when A (higher priority) does not fit', () => {
      add(dog, makeTask({ name: 'A', priority: 5, durationMinutes: 30 }))
      const b = add(cat, makeTask({ name: 'B', priority: 3, durationMinutes: 10 }))

      const schedule = generatePlan(owner, TODAY)

      expect(schedule.tasks).toEqual([b])
      expect(schedule.totalDuration).toBe(10)
      expect(schedule.budget).toBe(20)
      expect(schedule.date).toBe('2026-02-15')
      expect(schedule.rationale).toEqual([
        'rejected A: duration=30 exceeds remaining=20',
        'accepted B: priority=3, duration=10, remaining=10',
      ])
      expect(schedule.skipped.map(t => t.name)).toEqual(['A'])
      expect(schedule.summary).toBe(
        'Scheduled 1 task(s) using 10/20 minutes available. ' +
        'Tasks were prioritized by importance (higher priority first), then by duration (shorter tasks first). ' +
        '1 task(s) could not fit in the available time: A.'
      )
      assertScheduleInvariants(schedule, getAllTasks(owner))
    })
  })

  // ========================================================================
  // Selection rules
  // ========================================================================

  describe('selection', () => {
    it('prefers shorter tasks among equal priority', () => {
      owner.availableMinutes = 25
      add(dog, makeTask({ name: 'long', priority: 4, durationMinutes: 20 }))
      add(dog, makeTask({ name: 'short', priority: 4, durationMinutes: 10 }))
      add(cat, makeTask({ name: 'mid', priority: 4, durationMinutes: 15 }))

      const schedule = generatePlan(owner, TODAY)
      expect(schedule.tasks.map(t => t.name)).toEqual(['short', 'mid'])
      expect(schedule.totalDuration).toBe(25)
      expect(remainingMinutes(schedule)).toBe(0)
    })

    it('excludes completed tasks from consideration', () => {
      const done = add(dog, makeTask({ name: 'done', priority: 5, durationMinutes: 5 }))
      add(dog, makeTask({ name: 'open', priority: 1, durationMinutes: 5 }))
      completeTask(done)

      const schedule = generatePlan(owner, TODAY)
      expect(schedule.tasks.map(t => t.name)).toEqual(['open'])
      expect(schedule.rationale).toEqual(['accepted open: priority=1, duration=5, remaining=15'])
    })

    it('continues past a rejected task', () => {
      add(dog, makeTask({ name: 'fits', priority: 5, durationMinutes: 15 }))
      add(dog, makeTask({ name: 'too big', priority: 4, durationMinutes: 10 }))
      add(dog, makeTask({ name: 'tiny', priority: 1, durationMinutes: 5 }))

      const schedule = generatePlan(owner, TODAY)
      expect(schedule.tasks.map(t => t.name)).toEqual(['fits', 'tiny'])
      expect(schedule.rationale).toEqual([
        'accepted fits: priority=5, duration=15, remaining=5',
        'rejected too big: duration=10 exceeds remaining=5',
        'accepted tiny: priority=1, duration=5, remaining=0',
      ])
    })

    it('is idempotent for unchanged input', () => {
      add(dog, makeTask({ name: 'a', priority: 2, durationMinutes: 10 }))
      add(cat, makeTask({ name: 'b', priority: 2, durationMinutes: 10 }))
      add(cat, makeTask({ name: 'c', priority: 2, durationMinutes: 10 }))
      const first = generatePlan(owner, TODAY)
      const second = generatePlan(owner, TODAY)
      expect(second.tasks).toEqual(first.tasks)
      expect(second.rationale).toEqual(first.rationale)
    })

    it('budget option overrides the owner budget', () => {
      add(dog, makeTask({ name: 'A', priority: 5, durationMinutes: 30 }))
      const schedule = generatePlan(owner, TODAY, { budget: 30 })
      expect(schedule.tasks.map(t => t.name)).toEqual(['A'])
      expect(schedule.budget).toBe(30)
    })
  })

  // ========================================================================
  // Edge cases
  // ========================================================================

  describe('edge cases', () => {
    it('zero budget rejects every task with an entry each', () => {
      owner.availableMinutes = 0
      add(dog, makeTask({ name: 'x', priority: 5, durationMinutes: 5 }))
      add(dog, makeTask({ name: 'y', priority: 4, durationMinutes: 1 }))

      const schedule = generatePlan(owner, TODAY)
      expect(schedule.tasks).toEqual([])
      expect(schedule.totalDuration).toBe(0)
      expect(schedule.rationale).toEqual([
        'rejected x: duration=5 exceeds remaining=0',
        'rejected y: duration=1 exceeds remaining=0',
      ])
      expect(schedule.summary).toBe(
        'Scheduled 0 task(s) using 0/0 minutes available. 2 task(s) could not fit in the available time: x, y.'
      )
    })

    it('empty task list gives an empty schedule with no entries', () => {
      const schedule = generatePlan(owner, TODAY)
      expect(schedule.tasks).toEqual([])
      expect(schedule.rationale).toEqual([])
      expect(schedule.summary).toBe('No incomplete tasks to schedule.')
    })

    it('never splits a task longer than the whole budget', () => {
      add(dog, makeTask({ name: 'marathon', priority: 5, durationMinutes: 21 }))
      const schedule = generatePlan(owner, TODAY)
      expect(schedule.tasks).toEqual([])
      expect(schedule.rationale).toEqual(['rejected marathon: duration=21 exceeds remaining=20'])
    })

    it('rejects a negative budget override', () => {
      expect(() => generatePlan(owner, TODAY, { budget: -1 })).toThrow(ValidationError)
    })

    it('fails fast on an invalid task', () => {
      const task = add(dog, makeTask({ name: 'ok' }))
      const broken = { ...task, priority: 9 }
      expect(() => selectWithinBudget([broken], 60, TODAY)).toThrow(InvalidTaskError)
    })
  })

  // ========================================================================
  // Schedule value
  // ========================================================================

  describe('Schedule', () => {
    it('is frozen', () => {
      add(dog, makeTask({ name: 'A', durationMinutes: 5 }))
      const schedule = generatePlan(owner, TODAY)
      expect(Object.isFrozen(schedule)).toBe(true)
      expect(Object.isFrozen(schedule.tasks)).toBe(true)
      expect(Object.isFrozen(schedule.rationale)).toBe(true)
    })

    it('references the owner tasks rather than copies', () => {
      const a = add(dog, makeTask({ name: 'A', durationMinutes: 5 }))
      expect(generatePlan(owner, TODAY).tasks[0]).toBe(a)
    })

    it('validateSchedule holds for generated plans', () => {
      add(dog, makeTask({ name: 'A', durationMinutes: 15 }))
      add(dog, makeTask({ name: 'B', durationMinutes: 15 }))
      expect(validateSchedule(generatePlan(owner, TODAY))).toBe(true)
    })

    it('formats an empty plan', () => {
      expect(formatSchedule(generatePlan(owner, TODAY))).toBe('Schedule for 2026-02-15: No tasks scheduled')
    })

    it('formats a populated plan', () => {
      add(dog, makeTask({ name: 'A', priority: 5, durationMinutes: 30 }))
      add(cat, makeTask({ name: 'B', priority: 3, durationMinutes: 10 }))
      const schedule = generatePlan(owner, TODAY)
      const rule = '-'.repeat(50)
      expect(formatSchedule(schedule)).toBe([
        'Schedule for 2026-02-15:',
        'Total Duration: 10 minutes',
        rule,
        '1. ○ B (walk) - 10min [Priority: 3]',
        rule,
        `Reasoning: ${schedule.summary}`,
      ].join('\n'))
    })
  })
})
