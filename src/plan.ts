/**
 * Plan Generation
 *
 * Greedy budgeted selection. Incomplete tasks are considered in priority
 * order and each is accepted while it still fits the remaining budget. There
 * is no backtracking and no task splitting, so a high-priority task that is
 * longer than what is left is skipped in favour of shorter ones behind it.
 */

import type { Task } from './task'
import { fits } from './task'
import type { Owner } from './owner'
import { getAllIncompleteTasks } from './owner'
import type { Schedule } from './schedule'
import { createSchedule } from './schedule'
import type { LocalDate } from './time-date'
import { orderByPriority } from './ordering'
import { assertValidTasks } from './validation'
import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type PlanOptions = {
  /** Overrides the owner's available minutes */
  budget?: number
}

// ============================================================================
// Public API
// ============================================================================

export function generatePlan(owner: Owner, date: LocalDate, options: PlanOptions = {}): Schedule {
  const budget = options.budget ?? owner.availableMinutes
  return selectWithinBudget(getAllIncompleteTasks(owner), budget, date)
}

/**
 * Select from `tasks` under `budget`. Completed tasks are ignored.
 */
export function selectWithinBudget(tasks: readonly Task[], budget: number, date: LocalDate): Schedule {
  if (!Number.isInteger(budget) || budget < 0) {
    throw new ValidationError(`Budget must be a non-negative integer, got ${budget}`)
  }
  const candidates = tasks.filter(t => !t.completed)
  assertValidTasks(candidates)

  const accepted: Task[] = []
  const skipped: Task[] = []
  const rationale: string[] = []
  let remaining = budget

  for (const task of orderByPriority(candidates)) {
    if (fits(task, remaining)) {
      remaining -= task.durationMinutes
      accepted.push(task)
      rationale.push(
        `accepted ${task.name}: priority=${task.priority}, duration=${task.durationMinutes}, remaining=${remaining}`
      )
    } else {
      skipped.push(task)
      rationale.push(
        `rejected ${task.name}: duration=${task.durationMinutes} exceeds remaining=${remaining}`
      )
    }
  }

  return createSchedule({
    date,
    tasks: accepted,
    budget,
    rationale,
    skipped,
    summary: explainSelection(candidates.length, accepted, skipped, budget),
  })
}

// ============================================================================
// Helpers
// ============================================================================

function explainSelection(candidateCount: number, accepted: Task[], skipped: Task[], budget: number): string {
  if (candidateCount === 0) return 'No incomplete tasks to schedule.'

  const used = accepted.reduce((sum, t) => sum + t.durationMinutes, 0)
  const parts = [`Scheduled ${accepted.length} task(s) using ${used}/${budget} minutes available.`]
  if (accepted.length > 0) {
    parts.push('Tasks were prioritized by importance (higher priority first), then by duration (shorter tasks first).')
  }
  if (skipped.length > 0) {
    parts.push(
      `${skipped.length} task(s) could not fit in the available time: ${skipped.map(t => t.name).join(', ')}.`
    )
  }
  return parts.join(' ')
}
