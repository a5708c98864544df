import { Logger } from 'tslog'

// tslog numeric levels
const LOG_LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
}

export function resolveMinLevel(env: NodeJS.ProcessEnv = process.env): number {
  const envLevel = env.LOG_LEVEL?.trim().toLowerCase()
  if (envLevel && envLevel in LOG_LEVELS) {
    return LOG_LEVELS[envLevel]
  }

  // Default based on environment
  return env.NODE_ENV === 'production' ? LOG_LEVELS.info : LOG_LEVELS.debug
}

export const logger = new Logger({
  minLevel: resolveMinLevel(),
  type: process.env.NODE_ENV === 'production' ? 'json' : 'pretty',
  name: 'trivia-client',
})
