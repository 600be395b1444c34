import { PinoLogger } from '@mastra/loggers';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return LEVELS.find((level) => level === raw) ?? 'info';
}

export type Logger = PinoLogger;

export function createLogger(name: string, level: LogLevel = levelFromEnv()): Logger {
  return new PinoLogger({ name, level });
}
