/**
 * Domain list files
 *
 * Input lists are newline-delimited text, one domain per line. Blank lines are
 * kept as empty entries so line numbers in reports match the file; callers skip
 * them. Lines starting with `#` are comments and become blank.
 * `-` as a path reads from stdin.
 */

import fs from 'node:fs'
import path from 'node:path'
import { FileNotFoundError } from './errors.js'

export const STDIN_PATH = '-'

/**
 * Split file content into lines, blanking comments
 */
export function parseDomainList(content: string): string[] {
  const lines = content.split(/\r?\n/)
  // A trailing newline is not an extra entry
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop()
  }
  return lines.map(line => (line.trim().startsWith('#') ? '' : line))
}

/**
 * Read a domain list from disk
 */
export function readDomainFile(filePath: string): string[] {
  const resolved = path.resolve(filePath)
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isFile()) {
    throw new FileNotFoundError(filePath)
  }
  return parseDomainList(fs.readFileSync(resolved, 'utf-8'))
}

/**
 * Read a domain list piped on stdin
 */
export async function readDomainStdin(): Promise<string[]> {
  return new Promise((resolve, reject) => {
    let data = ''

    process.stdin.setEncoding('utf8')
    process.stdin.on('data', chunk => {
      data += chunk
    })
    process.stdin.on('end', () => {
      resolve(parseDomainList(data))
    })
    process.stdin.on('error', reject)
  })
}

/**
 * Read from a path, or from stdin when the path is `-`
 */
export async function readDomainSource(source: string): Promise<string[]> {
  if (source === STDIN_PATH) {
    return readDomainStdin()
  }
  return readDomainFile(source)
}

/**
 * Write an artifact, creating parent directories
 */
export function writeOutputFile(filePath: string, content: string): string {
  const resolved = path.resolve(filePath)
  fs.mkdirSync(path.dirname(resolved), { recursive: true })
  fs.writeFileSync(resolved, content, 'utf-8')
  return resolved
}
