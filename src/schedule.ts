/**
 * Schedule
 *
 * The planner's output value: the selected tasks in selection order, their
 * total duration, and the decision trace that produced them. Schedules are
 * frozen on creation; tasks are referenced, not copied.
 */

import type { Task } from './task'
import { describeTask } from './task'
import type { LocalDate } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type Schedule = {
  readonly date: LocalDate
  readonly tasks: readonly Task[]
  readonly totalDuration: number
  /** Budget the selection was made against */
  readonly budget: number
  /** One entry per considered task, in consideration order */
  readonly rationale: readonly string[]
  readonly skipped: readonly Task[]
  readonly summary: string
}

export type ScheduleParts = {
  date: LocalDate
  tasks: Task[]
  budget: number
  rationale: string[]
  skipped: Task[]
  summary: string
}

// ============================================================================
// Construction
// ============================================================================

export function createSchedule(parts: ScheduleParts): Schedule {
  const totalDuration = parts.tasks.reduce((sum, t) => sum + t.durationMinutes, 0)
  return Object.freeze({
    date: parts.date,
    tasks: Object.freeze([...parts.tasks]),
    totalDuration,
    budget: parts.budget,
    rationale: Object.freeze([...parts.rationale]),
    skipped: Object.freeze([...parts.skipped]),
    summary: parts.summary,
  })
}

// ============================================================================
// Queries
// ============================================================================

export function validateSchedule(schedule: Schedule): boolean {
  return schedule.totalDuration <= schedule.budget
}

export function remainingMinutes(schedule: Schedule): number {
  return schedule.budget - schedule.totalDuration
}

const RULE = '-'.repeat(50)

export function formatSchedule(schedule: Schedule): string {
  if (schedule.tasks.length === 0) {
    return `Schedule for ${schedule.date}: No tasks scheduled`
  }

  const lines = [
    `Schedule for ${schedule.date}:`,
    `Total Duration: ${schedule.totalDuration} minutes`,
    RULE,
    ...schedule.tasks.map((t, i) => `${i + 1}. ${describeTask(t)}`),
  ]
  if (schedule.summary) {
    lines.push(RULE, `Reasoning: ${schedule.summary}`)
  }
  return lines.join('\n')
}
