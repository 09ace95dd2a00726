/**
 * rental-repairs-core - Settings
 *
 * Parsed from an environment-like record. Nothing reads `process.env`
 * implicitly; hosts call `loadSettings()` once and pass the result along.
 *
 * @module application/config/settings
 */

import { z } from 'zod';
import { ValidationException } from '../../domain/exceptions';
import type { GeneralFallbackPolicy } from '../../domain/specialization';
import { collectIssues } from '../../domain/validation';

const GeneralFallbackPolicySchema = z.enum(['never', 'when-no-exact-match', 'always']);

export const EnvironmentSchema = z.object({
  MAINTENANCE_MAX_CONCURRENT_ASSIGNMENTS: z.coerce.number().int().positive().default(3),
  MAINTENANCE_GENERAL_FALLBACK: GeneralFallbackPolicySchema.default('when-no-exact-match'),
  MAINTENANCE_CONFLICT_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(3),
  MAINTENANCE_CONFLICT_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(25),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
});

export type LogLevel = z.infer<typeof EnvironmentSchema>['LOG_LEVEL'];

export interface MaintenanceSettings {
  /** Active assignments one worker may hold */
  readonly maxConcurrentAssignments: number;
  readonly generalFallback: GeneralFallbackPolicy;
  readonly conflictRetry: {
    readonly maxAttempts: number;
    readonly delayMs: number;
  };
  readonly logLevel: LogLevel;
}

/**
 * @throws ValidationException keyed by variable name
 *
 * @example
 * ```typescript
 * const settings = loadSettings({ MAINTENANCE_MAX_CONCURRENT_ASSIGNMENTS: '5' });
 * settings.maxConcurrentAssignments; // 5
 * ```
 */
export function loadSettings(
  env: Readonly<Record<string, string | undefined>> = process.env,
): MaintenanceSettings {
  const result = EnvironmentSchema.safeParse(env);
  if (!result.success) {
    throw new ValidationException('Invalid maintenance configuration', collectIssues(result.error));
  }
  const parsed = result.data;
  return {
    maxConcurrentAssignments: parsed.MAINTENANCE_MAX_CONCURRENT_ASSIGNMENTS,
    generalFallback: parsed.MAINTENANCE_GENERAL_FALLBACK,
    conflictRetry: {
      maxAttempts: parsed.MAINTENANCE_CONFLICT_RETRY_ATTEMPTS,
      delayMs: parsed.MAINTENANCE_CONFLICT_RETRY_DELAY_MS,
    },
    logLevel: parsed.LOG_LEVEL,
  };
}

export const DEFAULT_SETTINGS: MaintenanceSettings = loadSettings({});
