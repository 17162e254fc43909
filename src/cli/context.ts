import { loadConfig, type Config } from '../config/index.js';
import { createLogger, type Logger } from './logger.js';

export interface CommandContext {
  config: Config;
  logger: Logger;
}

export function createContext(env: NodeJS.ProcessEnv = process.env): CommandContext {
  const config = loadConfig(env);
  return { config, logger: createLogger(config.logLevel) };
}
