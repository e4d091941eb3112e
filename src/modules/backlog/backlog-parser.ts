/**
 * Backlog file and string parser.
 *
 * Reads YAML or JSON backlog files/strings and validates them against
 * BacklogFileSchema. Format is determined by file extension for file-based
 * loading, or explicitly specified for string-based loading.
 */

import { readFileSync } from 'node:fs'
import { extname } from 'node:path'
import { load as parseYaml } from 'js-yaml'
import { BacklogParseError } from '../../core/errors.js'
import { BacklogFileSchema, type BacklogFile } from './schemas.js'

export type BacklogFormat = 'yaml' | 'json'

function detectFormat(filePath: string): BacklogFormat {
  return extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml'
}

/**
 * Parse and validate a backlog from a string.
 *
 * @throws {BacklogParseError} on syntax errors or schema violations
 */
export function parseBacklogString(content: string, format: BacklogFormat): BacklogFile {
  let parsed: unknown

  try {
    parsed = format === 'json' ? (JSON.parse(content) as unknown) : parseYaml(content)
  } catch (err) {
    const original = err instanceof Error ? err : new Error(String(err))
    throw new BacklogParseError(`${format.toUpperCase()} parse error: ${original.message}`, {
      format,
    })
  }

  const result = BacklogFileSchema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`)
      .join('\n')
    throw new BacklogParseError(`Invalid backlog:\n${issues}`, { format, issues: result.error.issues })
  }

  return result.data
}

/**
 * Read a backlog file and parse its contents.
 * `.json` files are parsed as JSON; anything else as YAML.
 *
 * @throws {BacklogParseError} on read errors, syntax errors or schema violations
 */
export function parseBacklogFile(filePath: string): BacklogFile {
  let content: string

  try {
    content = readFileSync(filePath, 'utf-8')
  } catch (err) {
    const original = err instanceof Error ? err : new Error(String(err))
    throw new BacklogParseError(`Failed to read backlog file: ${original.message}`, { filePath })
  }

  try {
    return parseBacklogString(content, detectFormat(filePath))
  } catch (err) {
    if (err instanceof BacklogParseError) {
      throw new BacklogParseError(`${filePath}: ${err.message}`, { ...err.context, filePath })
    }
    throw err
  }
}
