import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export const LogLevel = z.enum(['error', 'info', 'debug']);
export type LogLevelName = z.infer<typeof LogLevel>;

export const ConfigSchema = z.object({
  VECTORSTEG_LOG_LEVEL: LogLevel.default('info'),
  VECTORSTEG_SPINNER: z.enum(['auto', 'off']).default('auto'),
});

export interface Config {
  logLevel: LogLevelName;
  spinner: 'auto' | 'off';
}

/**
 * Read configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse({
    VECTORSTEG_LOG_LEVEL: env.VECTORSTEG_LOG_LEVEL || undefined,
    VECTORSTEG_SPINNER: env.VECTORSTEG_SPINNER || undefined,
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = issue ? String(issue.path[0]) : 'environment';
    throw new ConfigurationError(variable, issue?.message ?? 'invalid value');
  }

  return {
    logLevel: result.data.VECTORSTEG_LOG_LEVEL,
    spinner: result.data.VECTORSTEG_SPINNER,
  };
}
