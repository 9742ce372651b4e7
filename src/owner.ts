/**
 * Owner Aggregate
 *
 * The actor with a daily time budget and the care subjects it looks after.
 * Exposes the flattened task view the scheduler reads, and the
 * lookup-and-append path that files a successor task under its subject.
 */

import type { Task } from './task'
import type { CareSubject } from './care-subject'
import { addTask, getIncompleteTasks } from './care-subject'
import type { OwnerId, SubjectId, TaskId, IdGenerator } from './types'
import { uuid } from './types'
import { ValidationError, NotFoundError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type Owner = {
  readonly id: OwnerId
  name: string
  availableMinutes: number
  readonly subjects: CareSubject[]
}

export type OwnerInput = {
  id?: string
  name: string
  availableMinutes: number
}

// ============================================================================
// Construction
// ============================================================================

export function createOwner(input: OwnerInput, idGenerator: IdGenerator = uuid): Owner {
  assertBudget(input.availableMinutes)
  return {
    id: (input.id ?? idGenerator()) as OwnerId,
    name: input.name,
    availableMinutes: input.availableMinutes,
    subjects: [],
  }
}

function assertBudget(minutes: number): void {
  if (!Number.isInteger(minutes) || minutes < 0) {
    throw new ValidationError(`Available minutes must be a non-negative integer, got ${minutes}`)
  }
}

// ============================================================================
// Mutation
// ============================================================================

export function addSubject(owner: Owner, subject: CareSubject): void {
  if (owner.subjects.some(s => s.id === subject.id)) {
    throw new ValidationError(`Subject ${subject.id} is already registered`)
  }
  owner.subjects.push(subject)
}

export function setAvailableMinutes(owner: Owner, minutes: number): void {
  assertBudget(minutes)
  owner.availableMinutes = minutes
}

/** Append a task to the subject named by its `subjectId` */
export function appendToOwningSubject(owner: Owner, task: Task): CareSubject {
  if (task.subjectId === undefined) {
    throw new ValidationError(`Task '${task.name}' has no owning subject`)
  }
  const subject = requireSubject(owner, task.subjectId)
  addTask(subject, task)
  return subject
}

// ============================================================================
// Queries
// ============================================================================

export function getAllTasks(owner: Owner): Task[] {
  return owner.subjects.flatMap(s => s.tasks)
}

export function getAllIncompleteTasks(owner: Owner): Task[] {
  return owner.subjects.flatMap(s => getIncompleteTasks(s))
}

export function findSubject(owner: Owner, subjectId: SubjectId | string): CareSubject | undefined {
  return owner.subjects.find(s => s.id === subjectId)
}

export function requireSubject(owner: Owner, subjectId: SubjectId | string): CareSubject {
  const subject = findSubject(owner, subjectId)
  if (!subject) throw new NotFoundError(`Subject '${subjectId}' not found`)
  return subject
}

export function findTask(owner: Owner, taskId: TaskId | string): Task | undefined {
  for (const subject of owner.subjects) {
    const task = subject.tasks.find(t => t.id === taskId)
    if (task) return task
  }
  return undefined
}

/** Subject id → subject name, for rendering conflict reports */
export function subjectNames(owner: Owner): Map<SubjectId, string> {
  return new Map(owner.subjects.map(s => [s.id, s.name]))
}

export function describeOwner(owner: Owner): string {
  const count = owner.subjects.length
  return `${owner.name} - ${owner.availableMinutes} min available, ${count} ${count === 1 ? 'pet' : 'pets'}`
}
