/**
 * Shared Types
 *
 * Branded identifiers and the closed enumerations that the task model is
 * built from.
 */

import { randomUUID } from 'node:crypto'

export type { LocalDate, MinuteOfDay } from './time-date'

// ============================================================================
// Branded ID Types
// ============================================================================

declare const __taskId: unique symbol
declare const __subjectId: unique symbol
declare const __ownerId: unique symbol

export type TaskId = string & { readonly [__taskId]: true }
export type SubjectId = string & { readonly [__subjectId]: true }
export type OwnerId = string & { readonly [__ownerId]: true }

// ============================================================================
// Enumerations
// ============================================================================

export const TaskCategory = {
  WALK: 'walk',
  FEEDING: 'feeding',
  MEDICATION: 'medication',
  GROOMING: 'grooming',
  ENRICHMENT: 'enrichment',
  VET_VISIT: 'vetVisit',
} as const

export type TaskCategory = (typeof TaskCategory)[keyof typeof TaskCategory]

export const TASK_CATEGORIES: readonly TaskCategory[] = Object.values(TaskCategory)

export const Recurrence = {
  NONE: 'none',
  DAILY: 'daily',
  WEEKLY: 'weekly',
} as const

export type Recurrence = (typeof Recurrence)[keyof typeof Recurrence]

export const RECURRENCES: readonly Recurrence[] = Object.values(Recurrence)

export const MIN_PRIORITY = 1
export const MAX_PRIORITY = 5

// ============================================================================
// ID Generation
// ============================================================================

export type IdGenerator = () => string

export function uuid(): string {
  return randomUUID()
}
