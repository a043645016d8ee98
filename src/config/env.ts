import { resolve } from 'node:path';
import { z } from 'zod';
import type { RecorderConfig } from '../schemas/config.schema.js';
import { ConfigError } from '../recorder/errors.js';

export const DEFAULT_LOG_DIR = './logs';

const FlagSchema = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(['1', '0', 'true', 'false', 'yes', 'no', '']))
  .transform((v) => v === '1' || v === 'true' || v === 'yes');

const RecorderEnvSchema = z.object({
  ACTION_LOG_DIR: z.string().optional(),
  ACTION_LOG_SESSION_ID: z.string().optional(),
  ACTION_LOG_ELEMENT_DETAILS: FlagSchema.optional(),
});

export interface RunConfig {
  recorder: RecorderConfig;
  taskFile: string;
}

/**
 * Reads recorder settings from environment variables. This is the only place
 * the environment is consulted; the recorder itself takes a RecorderConfig.
 */
export function loadRecorderConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): RecorderConfig {
  const parsed = RecorderEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`);
  }

  const { ACTION_LOG_DIR, ACTION_LOG_SESSION_ID, ACTION_LOG_ELEMENT_DETAILS } = parsed.data;
  const logDir = ACTION_LOG_DIR?.trim() ? ACTION_LOG_DIR.trim() : DEFAULT_LOG_DIR;

  return {
    logDirectory: resolve(cwd, logDir),
    ...(ACTION_LOG_SESSION_ID?.trim() ? { sessionId: ACTION_LOG_SESSION_ID.trim() } : {}),
    ...(ACTION_LOG_ELEMENT_DETAILS ? { sinks: { elementDetails: true } } : {}),
  };
}

export function loadRunConfigFromEnv(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): RunConfig {
  const taskFile = env.TASK_FILE?.trim();
  if (!taskFile) {
    throw new ConfigError('TASK_FILE is not set');
  }
  return {
    recorder: loadRecorderConfigFromEnv(env, cwd),
    taskFile: resolve(cwd, taskFile),
  };
}
