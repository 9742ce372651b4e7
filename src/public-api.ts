/**
 * Public API Module
 *
 * Stateful facade over one Owner aggregate. Validates raw input at the
 * boundary, routes completions through lookup-and-append so successors land
 * in the right subject, logs through pino, and emits events.
 *
 * All operations are synchronous; the facade is the single writer for its
 * owner.
 */

import type { Logger } from 'pino'
import type { LocalDate } from './time-date'
import { parseDate } from './time-date'
import type { Task, CompletionOutcome } from './task'
import { createTask, completeTask as completeTaskEntity } from './task'
import type { CareSubject } from './care-subject'
import { createCareSubject } from './care-subject'
import type { Owner } from './owner'
import {
  createOwner, addSubject as addSubjectToOwner, appendToOwningSubject,
  requireSubject, findTask, getAllTasks, subjectNames,
  setAvailableMinutes as setOwnerBudget,
} from './owner'
import type { Schedule } from './schedule'
import { generatePlan as generateOwnerPlan, type PlanOptions } from './plan'
import type { Conflict, ConflictReport } from './conflicts'
import { detectConflicts as detectTaskConflicts, buildConflictReport } from './conflicts'
import { orderByTime } from './ordering'
import { filterByStatus, filterBySubject, filterByCategory, filterByDueDate } from './filters'
import type { SubjectId, TaskCategory, TaskId } from './types'
import { uuid } from './types'
import { parseTaskInput, parseSubjectInput } from './validation'
import { resolvePlannerConfig, type PlannerConfig } from './config'
import { makeLogger } from './logger'
import { NotFoundError, ValidationError } from './errors'

export type { PlannerConfig } from './config'

// ============================================================================
// Types
// ============================================================================

export type PlannerEventArgs = {
  taskAdded: [task: Task]
  taskCompleted: [task: Task]
  taskRecurred: [successor: Task, completed: Task]
  planGenerated: [schedule: Schedule]
  conflictsDetected: [conflicts: readonly Conflict[]]
}

export type PlannerEvent = keyof PlannerEventArgs

export type PlannerEventHandler<E extends PlannerEvent> = (...args: PlannerEventArgs[E]) => void

export type CarePlanner = {
  getOwner(): Owner
  setAvailableMinutes(minutes: number): void
  addSubject(input: unknown): CareSubject
  getSubject(id: SubjectId | string): CareSubject
  getSubjects(): CareSubject[]
  addTask(subjectId: SubjectId | string, input: unknown): Task
  getTask(id: TaskId | string): Task
  getTasks(): Task[]
  /** Mark complete; returns the successor appended to the subject, if any */
  completeTask(id: TaskId | string): Task | null
  generatePlan(date: LocalDate | string, options?: PlanOptions): Schedule
  sortByTime(): Task[]
  filterByStatus(completed: boolean): Task[]
  filterBySubject(subjectId: SubjectId | string): Task[]
  filterByCategory(category: TaskCategory): Task[]
  filterByDueDate(date: LocalDate | string): Task[]
  detectConflicts(): Conflict[]
  getConflictsReport(): ConflictReport
  on<E extends PlannerEvent>(event: E, handler: PlannerEventHandler<E>): void
}

// ============================================================================
// Helpers
// ============================================================================

const MAX_ID_ATTEMPTS = 8

function toLocalDate(value: LocalDate | string, field: string): LocalDate {
  const parsed = parseDate(value)
  if (!parsed.ok) throw new ValidationError(`Invalid ${field}: ${parsed.error.message}`)
  return parsed.value
}

// ============================================================================
// Implementation
// ============================================================================

export function createCarePlanner(config: PlannerConfig): CarePlanner {
  const resolved = resolvePlannerConfig(config)
  const idGenerator = resolved.idGenerator ?? uuid
  const owner = createOwner(resolved.owner, idGenerator)
  const log: Logger = (resolved.logger ?? makeLogger()).child({ ownerId: owner.id })

  // Event handlers
  const eventHandlers: { [E in PlannerEvent]: PlannerEventHandler<E>[] } = {
    taskAdded: [],
    taskCompleted: [],
    taskRecurred: [],
    planGenerated: [],
    conflictsDetected: [],
  }

  function emit<E extends PlannerEvent>(event: E, ...args: PlannerEventArgs[E]): void {
    const handlers: PlannerEventHandler<E>[] = eventHandlers[event]
    for (const handler of handlers) {
      try {
        handler(...args)
      } catch (err) {
        log.error({ err, event }, 'event handler failed')
      }
    }
  }

  function on<E extends PlannerEvent>(event: E, handler: PlannerEventHandler<E>): void {
    const handlers: PlannerEventHandler<E>[] = eventHandlers[event]
    handlers.push(handler)
  }

  // ========== Owner & Subjects ==========

  function getSubject(id: SubjectId | string): CareSubject {
    return requireSubject(owner, id)
  }

  function addSubject(input: unknown): CareSubject {
    const subject = createCareSubject(parseSubjectInput(input), idGenerator)
    addSubjectToOwner(owner, subject)
    log.debug({ subjectId: subject.id, name: subject.name }, 'subject added')
    return subject
  }

  function setAvailableMinutes(minutes: number): void {
    setOwnerBudget(owner, minutes)
    log.debug({ availableMinutes: minutes }, 'budget updated')
  }

  // ========== Tasks ==========

  function getTask(id: TaskId | string): Task {
    const task = findTask(owner, id)
    if (!task) throw new NotFoundError(`Task '${id}' not found`)
    return task
  }

  function addTask(subjectId: SubjectId | string, input: unknown): Task {
    const subject = requireSubject(owner, subjectId)
    const parsed = parseTaskInput(input)
    const today = parsed.dueDate ?? resolved.today
    if (today === undefined) {
      throw new ValidationError(`Task '${parsed.name}' needs a dueDate: the planner has no reference date`)
    }
    const task = createTask(parsed, { today, idGenerator })
    if (findTask(owner, task.id)) {
      throw new ValidationError(`Task ${task.id} already exists`)
    }
    task.subjectId = subject.id
    appendToOwningSubject(owner, task)
    log.debug({ taskId: task.id, subjectId: subject.id, name: task.name }, 'task added')
    emit('taskAdded', task)
    return task
  }

  /** Next generated id not already held by a task of this owner */
  function freshTaskId(): string {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const candidate = idGenerator()
      if (!findTask(owner, candidate)) return candidate
    }
    throw new ValidationError(`Id generator produced ${MAX_ID_ATTEMPTS} task ids already in use`)
  }

  function completeTask(id: TaskId | string): Task | null {
    const task = getTask(id)
    const wasCompleted = task.completed
    let outcome: CompletionOutcome
    try {
      outcome = completeTaskEntity(task, freshTaskId)
      if (outcome.successor !== null) appendToOwningSubject(owner, outcome.successor)
    } catch (err) {
      // Nothing committed: the completion can be retried
      task.completed = wasCompleted
      throw err
    }
    if (!outcome.changed) {
      log.debug({ taskId: task.id }, 'task already complete')
      return null
    }
    log.info({ taskId: task.id, name: task.name }, 'task completed')
    emit('taskCompleted', task)

    if (outcome.successor === null) return null
    log.info(
      { taskId: outcome.successor.id, previousId: task.id, dueDate: outcome.successor.dueDate },
      'recurring task recreated'
    )
    emit('taskRecurred', outcome.successor, task)
    return outcome.successor
  }

  // ========== Scheduling ==========

  function generatePlan(date: LocalDate | string, options: PlanOptions = {}): Schedule {
    const schedule = generateOwnerPlan(owner, toLocalDate(date, 'plan date'), options)
    log.debug(
      {
        date: schedule.date,
        selected: schedule.tasks.length,
        skipped: schedule.skipped.length,
        totalDuration: schedule.totalDuration,
        budget: schedule.budget,
      },
      'plan generated'
    )
    emit('planGenerated', schedule)
    return schedule
  }

  function detectConflicts(): Conflict[] {
    const conflicts = detectTaskConflicts(getAllTasks(owner), { subjectNames: subjectNames(owner) })
    if (conflicts.length > 0) {
      log.warn({ count: conflicts.length }, 'scheduling conflicts detected')
      emit('conflictsDetected', Object.freeze([...conflicts]))
    }
    return conflicts
  }

  return {
    getOwner: () => owner,
    setAvailableMinutes,
    addSubject,
    getSubject,
    getSubjects: () => [...owner.subjects],
    addTask,
    getTask,
    getTasks: () => getAllTasks(owner),
    completeTask,
    generatePlan,
    sortByTime: () => orderByTime(getAllTasks(owner)),
    filterByStatus: completed => filterByStatus(getAllTasks(owner), completed),
    filterBySubject: subjectId => filterBySubject(getAllTasks(owner), subjectId),
    filterByCategory: category => filterByCategory(getAllTasks(owner), category),
    filterByDueDate: date => filterByDueDate(getAllTasks(owner), toLocalDate(date, 'due date')),
    detectConflicts,
    getConflictsReport: () => buildConflictReport(detectConflicts()),
    on,
  }
}
