export {
  ENV_SCHEMA,
  LOG_LEVELS,
  LOG_FORMATS,
  SchedulerEnvSchema,
  getEnvDef,
  loadSchedulerEnv,
  parseEnv,
  validateEnv,
  type EnvVarDef,
  type SchedulerEnv,
  type ValidationResult,
} from './env-schema.js';
export { resolveSchedulerConfig } from './scheduler-config.js';
