/**
 * Task Filters
 *
 * Linear, order-preserving predicates over a task sequence. Each returns a
 * new array.
 */

import type { Task } from './task'
import type { LocalDate } from './time-date'
import type { SubjectId, TaskCategory } from './types'

export function filterByStatus(tasks: readonly Task[], completed: boolean): Task[] {
  return tasks.filter(t => t.completed === completed)
}

export function filterBySubject(tasks: readonly Task[], subjectId: SubjectId | string): Task[] {
  return tasks.filter(t => t.subjectId === subjectId)
}

export function filterByCategory(tasks: readonly Task[], category: TaskCategory): Task[] {
  return tasks.filter(t => t.category === category)
}

export function filterByDueDate(tasks: readonly Task[], date: LocalDate): Task[] {
  return tasks.filter(t => t.dueDate === date)
}
