import { createConsola, LogLevels } from 'consola'
import process from 'node:process'

function resolveLevel(): number {
  return process.env.LOG_LEVEL === 'debug' ? LogLevels.debug : LogLevels.info
}

/**
 * Default logger instance, debug output is enabled with LOG_LEVEL=debug
 */
export const logger = createConsola({
  level: resolveLevel(),
})

/**
 * Creates a named logger for a specific module or component
 * @param name - The name of the module or component
 * @returns A logger instance with the specified name
 */
export function createLogger(name: string) {
  return logger.withTag(name)
}

