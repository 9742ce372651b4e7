/**
 * Conflict Detection
 *
 * Flags pairs of scheduled, incomplete tasks whose time ranges overlap.
 * Pairs are checked across subjects as well as within one, because the
 * owner is the one bound by the clock.
 *
 * Ranges are minute-of-day and do not wrap into the next day: an end past
 * 23:59 is clamped to 23:59 and the interval is marked `clamped`. Boundaries
 * that only touch are not a conflict.
 *
 * Sorting is O(n log n) and the pair scan O(n²), which is fine for the tens
 * of tasks a household schedules.
 */

import type { Task } from './task'
import { isScheduled } from './task'
import type { MinuteOfDay } from './time-date'
import { END_OF_DAY, formatMinuteOfDay } from './time-date'
import type { SubjectId, TaskId } from './types'
import { orderByTime } from './ordering'
import { assertValidTasks } from './validation'

// ============================================================================
// Types
// ============================================================================

export type TimeInterval = {
  start: MinuteOfDay
  end: number
  /** True when start + duration ran past the end of the day */
  clamped: boolean
}

export type ConflictParty = {
  taskId: TaskId
  name: string
  subjectId?: SubjectId
  subjectName: string
  interval: TimeInterval
}

export type Conflict = {
  first: ConflictParty
  second: ConflictParty
  description: string
}

export type ConflictReport = {
  ok: boolean
  count: number
  conflicts: Conflict[]
  descriptions: string[]
  text: string
}

export type ConflictOptions = {
  /** Subject id → display name */
  subjectNames?: ReadonlyMap<string, string>
}

const UNKNOWN_SUBJECT = 'Unknown'

// ============================================================================
// Intervals
// ============================================================================

export function taskInterval(task: Task & { scheduledTime: MinuteOfDay }): TimeInterval {
  const rawEnd = task.scheduledTime + task.durationMinutes
  const clamped = rawEnd > END_OF_DAY
  return {
    start: task.scheduledTime,
    end: clamped ? END_OF_DAY : rawEnd,
    clamped,
  }
}

export function intervalsOverlap(a: TimeInterval, b: TimeInterval): boolean {
  return a.start < b.end && b.start < a.end
}

function formatInterval(interval: TimeInterval): string {
  const end = formatMinuteOfDay(interval.end) + (interval.clamped ? '*' : '')
  return `${formatMinuteOfDay(interval.start)}-${end}`
}

// ============================================================================
// Detection
// ============================================================================

export function detectConflicts(tasks: readonly Task[], options: ConflictOptions = {}): Conflict[] {
  const eligible = orderByTime(tasks.filter(isScheduled).filter(t => !t.completed))
  assertValidTasks(eligible)

  const parties: ConflictParty[] = []
  for (const task of eligible) {
    parties.push({
      taskId: task.id,
      name: task.name,
      ...(task.subjectId !== undefined ? { subjectId: task.subjectId } : {}),
      subjectName: resolveSubjectName(task, options.subjectNames),
      interval: taskInterval(task),
    })
  }

  const conflicts: Conflict[] = []
  for (let i = 0; i < parties.length; i++) {
    for (let j = i + 1; j < parties.length; j++) {
      const first = parties[i]
      const second = parties[j]
      if (!first || !second) continue
      if (intervalsOverlap(first.interval, second.interval)) {
        conflicts.push({ first, second, description: describeConflict(first, second) })
      }
    }
  }
  return conflicts
}

function resolveSubjectName(task: Task, names: ReadonlyMap<string, string> | undefined): string {
  if (task.subjectId === undefined) return UNKNOWN_SUBJECT
  return names?.get(task.subjectId) ?? task.subjectId
}

function describeConflict(first: ConflictParty, second: ConflictParty): string {
  const base =
    `CONFLICT: '${first.name}' (${first.subjectName}) ${formatInterval(first.interval)}` +
    ` overlaps '${second.name}' (${second.subjectName}) ${formatInterval(second.interval)}`
  const clamped = first.interval.clamped || second.interval.clamped
  return clamped ? `${base} [end clamped to ${formatMinuteOfDay(END_OF_DAY)}]` : base
}

// ============================================================================
// Reporting
// ============================================================================

export function formatConflictReport(conflicts: readonly Conflict[]): string {
  if (conflicts.length === 0) return '✅ No scheduling conflicts detected.'
  return [
    `⚠️ SCHEDULING CONFLICTS DETECTED: ${conflicts.length}`,
    ...conflicts.map((c, i) => `${i + 1}. ⚠️ ${c.description}`),
  ].join('\n')
}

export function buildConflictReport(conflicts: readonly Conflict[]): ConflictReport {
  return {
    ok: conflicts.length === 0,
    count: conflicts.length,
    conflicts: [...conflicts],
    descriptions: conflicts.map(c => c.description),
    text: formatConflictReport(conflicts),
  }
}
