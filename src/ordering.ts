/**
 * Task Ordering
 *
 * Pure, stable orderings over a task snapshot. Inputs are never mutated.
 */

import type { Task } from './task'

/**
 * Ascending by scheduled time of day. Unscheduled tasks follow every
 * scheduled one; ties keep input order.
 */
export function orderByTime<T extends Task>(tasks: readonly T[]): T[] {
  return [...tasks].sort((a, b) => {
    if (a.scheduledTime === undefined) return b.scheduledTime === undefined ? 0 : 1
    if (b.scheduledTime === undefined) return -1
    return a.scheduledTime - b.scheduledTime
  })
}

/**
 * Selection order for budgeted planning: priority descending, then duration
 * ascending. Shortest-first among equals is a greedy heuristic, not an
 * optimal packing.
 */
export function orderByPriority(tasks: readonly Task[]): Task[] {
  return [...tasks].sort((a, b) =>
    b.priority - a.priority || a.durationMinutes - b.durationMinutes
  )
}
