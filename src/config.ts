/**
 * Configuration
 *
 * Zod schemas for the planner facade's configuration and for the logging
 * settings read from the environment. Both fail fast with ConfigError.
 */

import { z } from 'zod'
import type { Logger } from 'pino'
import type { LocalDate } from './time-date'
import type { IdGenerator } from './types'
import { ownerInputSchema, localDateSchema } from './validation'
import { ConfigError } from './errors'

export { ConfigError } from './errors'

// ============================================================================
// Logging (environment)
// ============================================================================

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const loggingEnvSchema = z.object({
  // Host-owned; only compared against 'test'
  NODE_ENV: z.string().optional(),
  VITEST: z.string().optional(),
  CARE_PLANNER_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  CARE_PLANNER_SERVICE_NAME: z.string().min(1).default('care-planner'),
})

export type LoggingConfig = {
  level: (typeof LOG_LEVELS)[number]
  enabled: boolean
  serviceName: string
}

export function loadLoggingConfig(env: Record<string, string | undefined>): LoggingConfig {
  const result = loggingEnvSchema.safeParse(env)
  if (!result.success) {
    const fields = result.error.issues.map(i => i.path.join('.')).join(', ')
    throw new ConfigError(`Invalid logging environment: ${fields}`)
  }
  const parsed = result.data
  // Silence logs under test tooling
  const isTestTooling = parsed.VITEST === 'true' || parsed.NODE_ENV === 'test'
  return {
    level: parsed.CARE_PLANNER_LOG_LEVEL,
    enabled: !isTestTooling,
    serviceName: parsed.CARE_PLANNER_SERVICE_NAME,
  }
}

// ============================================================================
// Planner
// ============================================================================

const plannerConfigSchema = z.object({
  owner: ownerInputSchema,
  today: localDateSchema.optional(),
})

export type PlannerConfig = {
  owner: { id?: string; name: string; availableMinutes: number }
  /** Default due date for tasks added without one */
  today?: LocalDate | string
  logger?: Logger
  idGenerator?: IdGenerator
}

export type ResolvedPlannerConfig = {
  owner: { id?: string; name: string; availableMinutes: number }
  today?: LocalDate
  logger?: Logger
  idGenerator?: IdGenerator
}

export function resolvePlannerConfig(config: PlannerConfig): ResolvedPlannerConfig {
  const result = plannerConfigSchema.safeParse({ owner: config.owner, today: config.today })
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    throw new ConfigError(`Invalid planner config: ${issues.join('; ')}`)
  }
  const { owner, today } = result.data
  return {
    owner: {
      ...(owner.id !== undefined ? { id: owner.id } : {}),
      name: owner.name,
      availableMinutes: owner.availableMinutes,
    },
    ...(today !== undefined ? { today } : {}),
    ...(config.logger !== undefined ? { logger: config.logger } : {}),
    ...(config.idGenerator !== undefined ? { idGenerator: config.idGenerator } : {}),
  }
}
