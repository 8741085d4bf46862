import * as fs from 'node:fs'
import * as path from 'node:path'
import process from 'node:process'

import { createLogger } from './logger'

const logger = createLogger('Files')

/**
 * Reads a file shipped with the project (SQL, static pages), relative to the project root
 * @returns The file contents, or undefined when it does not exist
 */
export function readProjectFile(relativePath: string, projectRoot = process.cwd()): string | undefined {
  const filePath = path.join(projectRoot, relativePath)

  if (!fs.existsSync(filePath)) {
    logger.warn(`Project file not found: ${filePath}`)

    return undefined
  }

  return fs.readFileSync(filePath, 'utf8')
}
