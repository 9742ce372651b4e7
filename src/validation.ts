/**
 * Input Validation
 *
 * The boundary where raw caller data becomes typed task, subject and owner
 * input. Zod schemas convert `HH:MM` strings and date strings into the closed
 * core types. `assertValidTask` is the fail-fast guard the scheduler runs on
 * every task it is handed.
 */

import { z } from 'zod'
import type { Task, TaskInput } from './task'
import type { SubjectInput } from './care-subject'
import type { OwnerInput } from './owner'
import type { LocalDate, MinuteOfDay } from './time-date'
import { parseDate, parseTimeOfDay, isMinuteOfDay } from './time-date'
import { TaskCategory, Recurrence, TASK_CATEGORIES, RECURRENCES, MIN_PRIORITY, MAX_PRIORITY } from './types'
import { ValidationError, InvalidTaskError } from './errors'

export { ValidationError, InvalidTaskError } from './errors'

// ============================================================================
// Field Schemas
// ============================================================================

const nameSchema = z.string().trim().min(1, 'must not be empty')

/** `HH:MM`, a minute-of-day number, or empty/null for an unscheduled task */
export const timeOfDaySchema = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value, ctx): MinuteOfDay | undefined => {
    if (value === undefined || value === null || value === '') return undefined
    if (typeof value === 'number') {
      if (isMinuteOfDay(value)) return value
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `minute of day out of range: ${value}` })
      return z.NEVER
    }
    const parsed = parseTimeOfDay(value)
    if (parsed.ok) return parsed.value
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message })
    return z.NEVER
  })

export const localDateSchema = z.string().transform((value, ctx): LocalDate => {
  const parsed = parseDate(value)
  if (parsed.ok) return parsed.value
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message })
  return z.NEVER
})

// ============================================================================
// Entity Schemas
// ============================================================================

export const taskInputSchema = z.object({
  id: z.string().min(1).optional(),
  name: nameSchema,
  category: z.nativeEnum(TaskCategory),
  durationMinutes: z.number().int().positive(),
  priority: z.number().int().min(MIN_PRIORITY).max(MAX_PRIORITY),
  recurrence: z.nativeEnum(Recurrence).optional(),
  scheduledTime: timeOfDaySchema,
  dueDate: localDateSchema.optional(),
  notes: z.string().optional(),
})

export const subjectInputSchema = z.object({
  id: z.string().min(1).optional(),
  name: nameSchema,
  species: nameSchema,
  age: z.number().int().nonnegative().optional(),
  specialNeeds: z.string().optional(),
})

export const ownerInputSchema = z.object({
  id: z.string().min(1).optional(),
  name: nameSchema,
  availableMinutes: z.number().int().nonnegative(),
})

// ============================================================================
// Parsing
// ============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
    return `${path}: ${issue.message}`
  })
}

function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown, label: string): z.output<S> {
  const result = schema.safeParse(raw)
  if (!result.success) {
    const issues = formatIssues(result.error)
    throw new ValidationError(`Invalid ${label}: ${issues.join('; ')}`, issues)
  }
  return result.data
}

export function parseTaskInput(raw: unknown): TaskInput {
  const data = parseWith(taskInputSchema, raw, 'task')
  return {
    ...(data.id !== undefined ? { id: data.id } : {}),
    name: data.name,
    category: data.category,
    durationMinutes: data.durationMinutes,
    priority: data.priority,
    ...(data.recurrence !== undefined ? { recurrence: data.recurrence } : {}),
    ...(data.scheduledTime !== undefined ? { scheduledTime: data.scheduledTime } : {}),
    ...(data.dueDate !== undefined ? { dueDate: data.dueDate } : {}),
    ...(data.notes !== undefined ? { notes: data.notes } : {}),
  }
}

export function parseSubjectInput(raw: unknown): SubjectInput {
  const data = parseWith(subjectInputSchema, raw, 'care subject')
  return {
    ...(data.id !== undefined ? { id: data.id } : {}),
    name: data.name,
    species: data.species,
    ...(data.age !== undefined ? { age: data.age } : {}),
    ...(data.specialNeeds !== undefined ? { specialNeeds: data.specialNeeds } : {}),
  }
}

export function parseOwnerInput(raw: unknown): OwnerInput {
  const data = parseWith(ownerInputSchema, raw, 'owner')
  return {
    ...(data.id !== undefined ? { id: data.id } : {}),
    name: data.name,
    availableMinutes: data.availableMinutes,
  }
}

// ============================================================================
// Fail-fast Guard
// ============================================================================

export function assertValidTask(task: Task): void {
  const label = `Task '${task.name}' (${task.id})`
  if (task.name.trim() === '') {
    throw new InvalidTaskError(`Task ${task.id} has an empty name`)
  }
  if (!Number.isInteger(task.durationMinutes) || task.durationMinutes <= 0) {
    throw new InvalidTaskError(`${label} has invalid duration: ${task.durationMinutes}`)
  }
  if (!Number.isInteger(task.priority) || task.priority < MIN_PRIORITY || task.priority > MAX_PRIORITY) {
    throw new InvalidTaskError(`${label} has priority outside ${MIN_PRIORITY}-${MAX_PRIORITY}: ${task.priority}`)
  }
  if (task.scheduledTime !== undefined && !isMinuteOfDay(task.scheduledTime)) {
    throw new InvalidTaskError(`${label} has invalid time of day: ${task.scheduledTime}`)
  }
  if (!TASK_CATEGORIES.includes(task.category)) {
    throw new InvalidTaskError(`${label} has unknown category: ${task.category}`)
  }
  if (!RECURRENCES.includes(task.recurrence)) {
    throw new InvalidTaskError(`${label} has unknown recurrence: ${task.recurrence}`)
  }
  if (!parseDate(task.dueDate).ok) {
    throw new InvalidTaskError(`${label} has invalid due date: ${task.dueDate}`)
  }
}

export function assertValidTasks(tasks: readonly Task[]): void {
  for (const task of tasks) assertValidTask(task)
}
