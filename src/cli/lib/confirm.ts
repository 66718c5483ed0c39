/**
 * Interactive y/N confirmation for destructive commands
 */

import * as readline from 'node:readline'
import type { Readable, Writable } from 'node:stream'

export interface PromptStreams {
  input?: Readable
  output?: Writable
}

/**
 * Whether a reply counts as yes ("y" or "yes", any case)
 */
export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase()
  return normalized === 'y' || normalized === 'yes'
}

/**
 * Prompt user for interactive confirmation. The prompt goes to stderr so
 * stdout stays clean for data.
 */
export async function promptConfirmation(message: string, streams: PromptStreams = {}): Promise<boolean> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: streams.input ?? process.stdin,
      output: streams.output ?? process.stderr
    })

    let answered = false
    rl.question(message, (answer) => {
      answered = true
      rl.close()
      resolve(isAffirmative(answer))
    })

    // EOF before an answer is a no
    rl.on('close', () => {
      if (!answered) resolve(false)
    })
  })
}

/**
 * A prompt can only be answered when both ends are terminals
 */
export function isInteractive(): boolean {
  return (process.stdin.isTTY ?? false) && (process.stderr.isTTY ?? false)
}
