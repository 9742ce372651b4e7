/**
 * Care Subject Aggregate
 *
 * A pet (or any other cared-for subject) and the ordered list of tasks it
 * owns. Every task in the list carries this subject's id.
 */

import type { Task } from './task'
import type { SubjectId, TaskId, IdGenerator } from './types'
import { uuid } from './types'
import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type CareSubject = {
  readonly id: SubjectId
  readonly name: string
  readonly species: string
  readonly age?: number
  readonly specialNeeds?: string
  readonly tasks: Task[]
}

export type SubjectInput = {
  id?: string
  name: string
  species: string
  age?: number
  specialNeeds?: string
}

// ============================================================================
// Construction
// ============================================================================

export function createCareSubject(input: SubjectInput, idGenerator: IdGenerator = uuid): CareSubject {
  return {
    id: (input.id ?? idGenerator()) as SubjectId,
    name: input.name,
    species: input.species,
    ...(input.age !== undefined ? { age: input.age } : {}),
    ...(input.specialNeeds !== undefined ? { specialNeeds: input.specialNeeds } : {}),
    tasks: [],
  }
}

// ============================================================================
// Mutation
// ============================================================================

/** Append a task, claiming it for this subject. Insertion order is kept. */
export function addTask(subject: CareSubject, task: Task): void {
  if (task.subjectId !== undefined && task.subjectId !== subject.id) {
    throw new ValidationError(`Task '${task.name}' already belongs to subject ${task.subjectId}`)
  }
  if (subject.tasks.some(t => t.id === task.id)) {
    throw new ValidationError(`Task ${task.id} is already in subject '${subject.name}'`)
  }
  task.subjectId = subject.id
  subject.tasks.push(task)
}

// ============================================================================
// Queries
// ============================================================================

export function getTasks(subject: CareSubject): Task[] {
  return [...subject.tasks]
}

export function getIncompleteTasks(subject: CareSubject): Task[] {
  return subject.tasks.filter(t => !t.completed)
}

export function findTask(subject: CareSubject, taskId: TaskId | string): Task | undefined {
  return subject.tasks.find(t => t.id === taskId)
}

export function describeSubject(subject: CareSubject): string {
  const age = subject.age !== undefined ? `, ${subject.age} years old` : ''
  const needs = subject.specialNeeds ? ` (Special needs: ${subject.specialNeeds})` : ''
  return `${subject.name} - ${subject.species}${age}${needs}`
}
