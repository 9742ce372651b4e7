/**
 * Task Entity
 *
 * The schedulable unit. A task knows how to describe itself, whether it fits
 * a remaining budget, and how to derive its next occurrence. Ownership is a
 * subject identifier, not a live reference; appending a successor to its
 * subject is the owning aggregate's job.
 */

import type { LocalDate, MinuteOfDay } from './time-date'
import { addDays, formatMinuteOfDay } from './time-date'
import type { TaskId, SubjectId, TaskCategory, IdGenerator } from './types'
import { Recurrence, uuid } from './types'
import { assertValidTask } from './validation'

// ============================================================================
// Types
// ============================================================================

export type Task = {
  readonly id: TaskId
  readonly name: string
  readonly category: TaskCategory
  readonly durationMinutes: number
  readonly priority: number
  readonly recurrence: Recurrence
  readonly scheduledTime?: MinuteOfDay
  readonly dueDate: LocalDate
  readonly notes?: string
  subjectId?: SubjectId
  completed: boolean
}

export type TaskInput = {
  id?: string
  name: string
  category: TaskCategory
  durationMinutes: number
  priority: number
  recurrence?: Recurrence
  scheduledTime?: MinuteOfDay
  dueDate?: LocalDate
  notes?: string
}

export type TaskContext = {
  /** Default due date for tasks that do not name one */
  today: LocalDate
  idGenerator?: IdGenerator
}

export type CompletionOutcome = {
  /** False when the task was already complete */
  changed: boolean
  successor: Task | null
}

// ============================================================================
// Construction
// ============================================================================

export function createTask(input: TaskInput, ctx: TaskContext): Task {
  const task: Task = {
    id: (input.id ?? (ctx.idGenerator ?? uuid)()) as TaskId,
    name: input.name,
    category: input.category,
    durationMinutes: input.durationMinutes,
    priority: input.priority,
    recurrence: input.recurrence ?? Recurrence.NONE,
    ...(input.scheduledTime !== undefined ? { scheduledTime: input.scheduledTime } : {}),
    dueDate: input.dueDate ?? ctx.today,
    ...(input.notes !== undefined ? { notes: input.notes } : {}),
    completed: false,
  }
  assertValidTask(task)
  return task
}

// ============================================================================
// Queries
// ============================================================================

export function fits(task: Task, remainingMinutes: number): boolean {
  return task.durationMinutes <= remainingMinutes
}

export function isScheduled(task: Task): task is Task & { scheduledTime: MinuteOfDay } {
  return task.scheduledTime !== undefined
}

export function isRecurring(task: Task): boolean {
  return task.recurrence !== Recurrence.NONE
}

/** Due date of the next occurrence, or null for one-off tasks */
export function nextDueDate(task: Task): LocalDate | null {
  switch (task.recurrence) {
    case Recurrence.DAILY:
      return addDays(task.dueDate, 1)
    case Recurrence.WEEKLY:
      return addDays(task.dueDate, 7)
    case Recurrence.NONE:
      return null
  }
}

export function describeTask(task: Task): string {
  const status = task.completed ? '✓' : '○'
  const time = isScheduled(task) ? ` @ ${formatMinuteOfDay(task.scheduledTime)}` : ''
  return `${status} ${task.name} (${task.category}) - ${task.durationMinutes}min [Priority: ${task.priority}]${time}`
}

// ============================================================================
// Completion
// ============================================================================

/**
 * Mark a task complete and derive its successor.
 *
 * A successor exists only for a recurring task that belongs to a subject and
 * was not already complete. The caller appends it to the subject.
 */
export function completeTask(task: Task, idGenerator: IdGenerator = uuid): CompletionOutcome {
  if (task.completed) {
    return { changed: false, successor: null }
  }
  task.completed = true

  const due = nextDueDate(task)
  if (due === null || task.subjectId === undefined) {
    return { changed: true, successor: null }
  }

  const successor: Task = {
    id: idGenerator() as TaskId,
    name: task.name,
    category: task.category,
    durationMinutes: task.durationMinutes,
    priority: task.priority,
    recurrence: task.recurrence,
    ...(task.scheduledTime !== undefined ? { scheduledTime: task.scheduledTime } : {}),
    dueDate: due,
    ...(task.notes !== undefined ? { notes: task.notes } : {}),
    subjectId: task.subjectId,
    completed: false,
  }
  return { changed: true, successor }
}
