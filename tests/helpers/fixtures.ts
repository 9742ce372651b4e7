/**
 * Test fixtures: deterministic ids, date/time shorthands and a task builder.
 */
import type { LocalDate, MinuteOfDay } from '../../src/time-date'
import { parseDate, parseTimeOfDay } from '../../src/time-date'
import type { Task, TaskInput } from '../../src/task'
import { createTask } from '../../src/task'
import type { IdGenerator } from '../../src/types'
import { TaskCategory } from '../../src/types'

export function date(s: string): LocalDate {
  const result = parseDate(s)
  if (!result.ok) throw new Error(`bad test date: ${s}`)
  return result.value
}

export function at(hhmm: string): MinuteOfDay {
  const result = parseTimeOfDay(hhmm)
  if (!result.ok) throw new Error(`bad test time: ${hhmm}`)
  return result.value
}

export const TODAY = date('2026-02-15')

/** Ids of the form `${prefix}-1`, `${prefix}-2`, ... */
export function sequentialIds(prefix = 'id'): IdGenerator {
  let n = 0
  return () => `${prefix}-${++n}`
}

const fixtureIds = sequentialIds('task')

export type TaskOverrides = Partial<TaskInput> & { name: string }

export function makeTask(overrides: TaskOverrides, idGenerator: IdGenerator = fixtureIds): Task {
  return createTask(
    {
      category: TaskCategory.WALK,
      durationMinutes: 15,
      priority: 3,
      ...overrides,
    },
    { today: TODAY, idGenerator }
  )
}
