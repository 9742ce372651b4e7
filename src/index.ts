/**
 * care-planner
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  CarePlannerError, CarePlannerErrorCode,
  ValidationError, ConfigError, NotFoundError, InvalidTaskError, ParseError,
} from './errors'
export type { CarePlannerErrorCode as CarePlannerErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, MinuteOfDay } from './time-date'
export {
  END_OF_DAY,
  isLeapYear, daysInMonth,
  parseDate, parseTimeOfDay, isMinuteOfDay,
  makeDate, makeMinuteOfDay, yearOf, monthOf, dayOf,
  formatMinuteOfDay, addDays,
} from './time-date'

// Ids & enumerations
export type { TaskId, SubjectId, OwnerId, IdGenerator } from './types'
export {
  TaskCategory, TASK_CATEGORIES, Recurrence, RECURRENCES,
  MIN_PRIORITY, MAX_PRIORITY,
} from './types'

// Input boundary
export {
  taskInputSchema, subjectInputSchema, ownerInputSchema,
  parseTaskInput, parseSubjectInput, parseOwnerInput,
  assertValidTask, assertValidTasks,
} from './validation'

// Task entity
export type { Task, TaskInput, TaskContext, CompletionOutcome } from './task'
export {
  createTask, fits, isScheduled, isRecurring, nextDueDate, describeTask, completeTask,
} from './task'

// Aggregates
export type { CareSubject, SubjectInput } from './care-subject'
export {
  createCareSubject, addTask, getTasks, getIncompleteTasks, describeSubject,
} from './care-subject'
export type { Owner, OwnerInput } from './owner'
export {
  createOwner, addSubject, setAvailableMinutes, appendToOwningSubject,
  getAllTasks, getAllIncompleteTasks, findSubject, requireSubject,
  findTask, subjectNames, describeOwner,
} from './owner'

// Scheduler
export { orderByTime, orderByPriority } from './ordering'
export { filterByStatus, filterBySubject, filterByCategory, filterByDueDate } from './filters'
export type { PlanOptions } from './plan'
export { generatePlan, selectWithinBudget } from './plan'
export type { Schedule } from './schedule'
export { validateSchedule, remainingMinutes, formatSchedule } from './schedule'
export type {
  TimeInterval, ConflictParty, Conflict, ConflictReport, ConflictOptions,
} from './conflicts'
export {
  taskInterval, intervalsOverlap, detectConflicts,
  buildConflictReport, formatConflictReport,
} from './conflicts'

// Configuration & logging
export type { LoggingConfig, PlannerConfig } from './config'
export { loadLoggingConfig } from './config'
export type { Logger } from './logger'
export { makeLogger, makeNoopLogger } from './logger'

// High-level API (stateful planner over one owner)
export type {
  CarePlanner, PlannerEvent, PlannerEventArgs, PlannerEventHandler,
} from './public-api'
export { createCarePlanner } from './public-api'
