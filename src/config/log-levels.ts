import { LogLevel } from '@nestjs/common';

// Most severe first; a threshold enables itself and everything above it
const ORDERED_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

export const LOG_LEVEL_NAMES = ['error', 'warn', 'log', 'debug', 'verbose'] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

export function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVEL_NAMES.some((name) => name === value);
}

export function resolveLogLevels(threshold: LogLevelName): LogLevel[] {
  return ORDERED_LEVELS.slice(0, ORDERED_LEVELS.indexOf(threshold) + 1);
}
