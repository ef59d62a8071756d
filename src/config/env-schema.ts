/**
 * Environment Variable Schema & Validation
 *
 * Central registry of the environment variables read by the scheduler package.
 * Values are validated with zod; defaults apply to anything unset or empty.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/scheduler-errors.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export const LOG_FORMATS = ['text', 'json'] as const;

export interface EnvVarDef {
  /** Environment variable name */
  name: string;
  /** Expected value type */
  type: 'string' | 'boolean' | 'enum';
  /** Default value (as string, since env vars are always strings) */
  default: string;
  description: string;
}

export const ENV_SCHEMA: EnvVarDef[] = [
  {
    name: 'LOG_LEVEL',
    type: 'enum',
    default: 'info',
    description: `Minimum log level (${LOG_LEVELS.join(', ')})`,
  },
  {
    name: 'LOG_FORMAT',
    type: 'enum',
    default: 'text',
    description: 'Log output format (text, json)',
  },
  {
    name: 'TIMED_SCHEDULER_WORKER_PREFIX',
    type: 'string',
    default: 'timed-scheduler-worker',
    description: 'Name prefix of scheduler worker contexts',
  },
  {
    name: 'TIMED_SCHEDULER_DAEMON',
    type: 'boolean',
    default: 'false',
    description: 'Pending wakeups do not keep the process alive',
  },
];

// Unset and empty variables both fall back to the default
const blankAsUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

export const SchedulerEnvSchema = z.object({
  LOG_LEVEL: z.preprocess(blankAsUndefined, z.enum(LOG_LEVELS).default('info')),
  LOG_FORMAT: z.preprocess(blankAsUndefined, z.enum(LOG_FORMATS).default('text')),
  TIMED_SCHEDULER_WORKER_PREFIX: z.preprocess(
    blankAsUndefined,
    z
      .string()
      .regex(/^[\w.-]+$/, 'may only contain letters, digits, ".", "_" and "-"')
      .default('timed-scheduler-worker')
  ),
  TIMED_SCHEDULER_DAEMON: z.preprocess(
    (value) => {
      const blank = blankAsUndefined(value);
      return typeof blank === 'string' ? blank.toLowerCase() : blank;
    },
    booleanFlag.default('false')
  ),
});

export type SchedulerEnv = z.infer<typeof SchedulerEnvSchema>;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Validate the environment without throwing
 */
export function validateEnv(env: Record<string, string | undefined> = process.env): ValidationResult {
  const result = SchedulerEnvSchema.safeParse(env);
  return result.success
    ? { valid: true, errors: [] }
    : { valid: false, errors: formatIssues(result.error) };
}

/**
 * Parse the environment with `schema`, throwing a ConfigurationError listing
 * every invalid variable. Pass a `pick` of SchedulerEnvSchema to check only the
 * variables a caller actually reads.
 */
export function parseEnv<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  env: Record<string, string | undefined> = process.env
): T {
  const result = schema.safeParse(env);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, issues, result.error);
  }
  return result.data;
}

export function loadSchedulerEnv(env: Record<string, string | undefined> = process.env): SchedulerEnv {
  return parseEnv(SchedulerEnvSchema, env);
}

export function getEnvDef(name: string): EnvVarDef | undefined {
  return ENV_SCHEMA.find((def) => def.name === name);
}
