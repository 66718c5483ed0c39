/**
 * Tests for the CLI commands
 *
 * Commands run against a shared MemorySetBackend; stdout and stderr are
 * captured through spies, so the tests check what a user would see.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { MemorySetBackend } from '../../src/lib/set-backend.js'
import { buildContext, type CliContext, type GlobalOptions } from '../../src/cli/lib/create-client.js'
import { stripAnsi } from '../../src/cli/lib/colors.js'
import { runAdd } from '../../src/cli/commands/add.js'
import { runRemove } from '../../src/cli/commands/remove.js'
import { runExport } from '../../src/cli/commands/export.js'
import { runPrint, runCount, runProjects } from '../../src/cli/commands/print.js'
import { runDelete, type DeletePrompt } from '../../src/cli/commands/delete.js'
import { runConfig } from '../../src/cli/commands/config.js'
import {
  BatchInterruptedError,
  ConfirmationRequiredError,
  FileNotFoundError,
  InvalidOptionError,
  MissingInputError
} from '../../src/lib/errors.js'
import type { Logger } from '../../src/types.js'

const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
}

let tempDir: string
let backend: MemorySetBackend
let stdout: string[]
let stderr: string[]

function context(options: GlobalOptions = {}): CliContext {
  return buildContext(options, { cwd: tempDir, env: {}, backend, logger: silentLogger })
}

function writeList(name: string, lines: string[]): string {
  const file = path.join(tempDir, name)
  fs.writeFileSync(file, lines.join('\n') + '\n')
  return file
}

function stdoutText(): string {
  return stdout.join('')
}

function stderrLines(): string[] {
  return stderr.map(line => stripAnsi(line))
}

function prompt(interactive: boolean, answer: boolean): DeletePrompt & { asked: string[] } {
  const asked: string[] = []
  return {
    asked,
    interactive: () => interactive,
    ask: async (message: string) => {
      asked.push(message)
      return answer
    }
  }
}

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'domainset-cli-test-'))
  backend = new MemorySetBackend()
  stdout = []
  stderr = []
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk))
    return true
  })
  vi.spyOn(console, 'error').mockImplementation((message?: unknown) => {
    stderr.push(String(message))
  })
})

afterEach(() => {
  vi.restoreAllMocks()
  process.exitCode = undefined
  fs.rmSync(tempDir, { recursive: true, force: true })
})

describe('add', () => {
  it('should add a file and print the summary to stderr', async () => {
    const file = writeList('domains.txt', ['a.com', 'b.com', 'a.com', '*abc.com', ''])

    const report = await runAdd(context(), { file, validate: true })

    expect(report).toMatchObject({ added: 2, duplicate: 1, invalid: 1 })
    expect(stdoutText()).toBe('')
    expect(stderrLines()).toContainEqual(expect.stringContaining('Processed 3 domains: 2 new, 1 duplicates (33.33%)'))
    expect(stderrLines()).toContainEqual(expect.stringContaining('Skipped 1 invalid domains'))
  })

  it('should skip comment lines without counting them as invalid', async () => {
    const file = writeList('domains.txt', ['# scope for acme', 'a.com', '  # trailing note'])

    const report = await runAdd(context(), { file, validate: false })

    expect(report).toMatchObject({ processed: 1, added: 1, invalid: 0 })
    await backend.connect()
    expect(await backend.members('domains')).toEqual(['a.com'])
  })

  it('should list rejected lines with --verbose', async () => {
    const file = writeList('domains.txt', ['localhost'])

    await runAdd(context({ verbose: true }), { file, validate: true })

    expect(stderrLines()).toContain("[domainset] line 1: 'localhost' (needs at least two labels)")
  })

  it('should print the report as JSON', async () => {
    const file = writeList('domains.txt', ['a.com'])

    await runAdd(context({ json: true }), { file, validate: true })

    expect(JSON.parse(stdoutText())).toEqual({
      collection: '(global)',
      processed: 1,
      added: 1,
      duplicate: 0,
      invalid: 0,
      invalidEntries: [],
      failures: []
    })
  })

  it('should skip validation with --no-validate', async () => {
    const file = writeList('domains.txt', ['localhost'])

    const report = await runAdd(context(), { file, validate: false })

    expect(report.added).toBe(1)
  })

  it('should add to the project collection', async () => {
    const file = writeList('domains.txt', ['a.com'])

    await runAdd(context({ project: 'acme' }), { file, validate: true })

    await backend.connect()
    expect(await backend.members('domains:acme')).toEqual(['a.com'])
    expect(await backend.exists('domains')).toBe(false)
  })

  it('should fail for a missing file without touching the store', async () => {
    await expect(runAdd(context(), { file: path.join(tempDir, 'missing.txt'), validate: true }))
      .rejects.toThrow(FileNotFoundError)
    expect(backend.isConnected()).toBe(false)
  })

  it('should print the partial report when the connection drops', async () => {
    const file = writeList('domains.txt', ['a.com', 'b.com'])
    const original = backend.addMember.bind(backend)
    vi.spyOn(backend, 'addMember').mockImplementation(async (key: string, member: string) => {
      if (member === 'b.com') throw new Error('Connection is closed.')
      return original(key, member)
    })

    await expect(runAdd(context(), { file, validate: true })).rejects.toThrow(BatchInterruptedError)
    expect(stderrLines()).toContainEqual(expect.stringContaining('Processed 1 domains: 1 new, 0 duplicates (0.00%)'))
  })
})

describe('remove', () => {
  beforeEach(async () => {
    await backend.connect()
    await backend.addMember('domains', 'a.com')
    await backend.addMember('domains', 'b.com')
    await backend.disconnect()
  })

  it('should remove a file of domains', async () => {
    const file = writeList('remove.txt', ['a.com', 'zzz.com'])

    await runRemove(context(), { file })

    expect(stderrLines()).toContainEqual(expect.stringContaining('Processed 2 domains: 1 removed, 1 not found'))
    await backend.connect()
    expect(await backend.members('domains')).toEqual(['b.com'])
  })

  it('should name not-found domains with --verbose', async () => {
    const file = writeList('remove.txt', ['zzz.com'])

    await runRemove(context({ verbose: true }), { file })

    expect(stderrLines()).toContain("[domainset] Domain 'zzz.com' not found in (global)")
  })

  it('should remove a single domain', async () => {
    await runRemove(context(), { domain: 'a.com' })

    expect(stderrLines()).toContainEqual(expect.stringContaining("Domain 'a.com' removed from (global)"))
    expect(process.exitCode).toBeUndefined()
  })

  it('should exit 1 when the single domain is absent', async () => {
    await runRemove(context(), { domain: 'zzz.com' })

    expect(stderrLines()).toContainEqual(expect.stringContaining("Domain 'zzz.com' not found in (global)"))
    expect(process.exitCode).toBe(1)
  })

  it('should print single removal as JSON', async () => {
    await runRemove(context({ json: true }), { domain: 'a.com' })

    expect(JSON.parse(stdoutText())).toEqual({ collection: '(global)', domain: 'a.com', removed: true })
  })

  it('should require a file or a domain', async () => {
    await expect(runRemove(context(), {})).rejects.toThrow(MissingInputError)
  })
})

describe('export', () => {
  beforeEach(async () => {
    await backend.connect()
    await backend.addMember('domains', 'b.com')
    await backend.addMember('domains', 'a.com')
    await backend.disconnect()
  })

  it('should write sorted text to a file', async () => {
    const file = path.join(tempDir, 'out', 'domains.txt')

    await runExport(context(), { file })

    expect(fs.readFileSync(file, 'utf-8')).toBe('a.com\nb.com\n')
    expect(stderrLines()).toContainEqual(expect.stringContaining(`Exported 2 domains to ${file} (text format)`))
  })

  it('should write JSON', async () => {
    const file = path.join(tempDir, 'domains.json')

    await runExport(context(), { file, format: 'json' })

    const document: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'))
    expect(document).toMatchObject({ domain_count: 2, domains: ['a.com', 'b.com'] })
  })

  it('should write to stdout with -f -', async () => {
    await runExport(context(), { file: '-' })

    expect(stdoutText()).toBe('a.com\nb.com\n')
  })

  it('should warn on an empty collection and still write the file', async () => {
    const file = path.join(tempDir, 'empty.txt')

    await runExport(context({ project: 'empty' }), { file })

    expect(fs.readFileSync(file, 'utf-8')).toBe('')
    expect(stderrLines()).toContainEqual(expect.stringContaining('No domains found in empty'))
  })

  it('should reject unknown formats before connecting', async () => {
    await expect(runExport(context(), { file: '-', format: 'csv' })).rejects.toThrow(InvalidOptionError)
  })
})

describe('print, count and projects', () => {
  beforeEach(async () => {
    await backend.connect()
    await backend.addMember('domains', 'b.com')
    await backend.addMember('domains', 'a.com')
    await backend.addMember('domains:acme', 'acme.com')
    await backend.disconnect()
  })

  it('should print sorted domains', async () => {
    const domains = await runPrint(context())

    expect(domains).toEqual(['a.com', 'b.com'])
    expect(stdoutText()).toBe('a.com\nb.com\n')
  })

  it('should print a JSON array', async () => {
    await runPrint(context({ json: true }))
    expect(JSON.parse(stdoutText())).toEqual(['a.com', 'b.com'])
  })

  it('should warn instead of printing an empty collection', async () => {
    await runPrint(context({ project: 'empty' }))

    expect(stdoutText()).toBe('')
    expect(stderrLines()).toContainEqual(expect.stringContaining('No domains found in empty'))
  })

  it('should print the count', async () => {
    expect(await runCount(context())).toBe(2)
    expect(stdoutText()).toBe('2\n')
  })

  it('should print 0 for a missing collection', async () => {
    await runCount(context({ project: 'missing' }))
    expect(stdoutText()).toBe('0\n')
  })

  it('should print the count as JSON', async () => {
    await runCount(context({ project: 'acme', json: true }))
    expect(JSON.parse(stdoutText())).toEqual({ collection: 'acme', count: 1 })
  })

  it('should list project names outside a terminal', async () => {
    await runProjects(context(), { tty: false })
    expect(stdoutText()).toBe('acme\n')
  })

  it('should draw a table of projects in a terminal', async () => {
    await runProjects(context(), { tty: true })

    const table = stripAnsi(stdoutText())
    expect(table).toContain('PROJECT')
    expect(table).toContain('DOMAINS')
    expect(table).toContain('acme')
  })

  it('should print project summaries as JSON', async () => {
    await runProjects(context({ json: true }))
    expect(JSON.parse(stdoutText())).toEqual([{ project: 'acme', count: 1 }])
  })
})

describe('delete', () => {
  beforeEach(async () => {
    await backend.connect()
    await backend.addMember('domains', 'a.com')
    await backend.addMember('domains', 'b.com')
    await backend.disconnect()
  })

  async function remaining(): Promise<number> {
    await backend.connect()
    return backend.cardinality('domains')
  }

  it('should refuse in a non-interactive session without --confirm', async () => {
    const noTerminal = prompt(false, true)

    await expect(runDelete(context(), {}, noTerminal)).rejects.toThrow(ConfirmationRequiredError)
    expect(noTerminal.asked).toEqual([])
    expect(await remaining()).toBe(2)
  })

  it('should ask with the current count and delete on yes', async () => {
    const yes = prompt(true, true)

    const result = await runDelete(context(), {}, yes)

    expect(yes.asked).toEqual(['Are you sure you want to delete ALL 2 domains from (global)? (y/N): '])
    expect(result).toEqual({ collection: '(global)', deleted: true, count: 2 })
    expect(await remaining()).toBe(0)
  })

  it('should cancel on no without failing', async () => {
    const result = await runDelete(context(), {}, prompt(true, false))

    expect(result).toBeNull()
    expect(process.exitCode).toBeUndefined()
    expect(stderrLines()).toContainEqual(expect.stringContaining('Delete operation cancelled. No domains were deleted.'))
    expect(await remaining()).toBe(2)
  })

  it('should skip the prompt with --confirm or --force', async () => {
    const never = prompt(true, false)

    await runDelete(context(), { confirm: true }, never)
    expect(await remaining()).toBe(0)

    await backend.addMember('domains', 'c.com')
    await backend.disconnect()
    await runDelete(context(), { force: true }, never)

    expect(never.asked).toEqual([])
    expect(await remaining()).toBe(0)
  })

  it('should report a collection that did not exist', async () => {
    await runDelete(context({ project: 'missing' }), { confirm: true }, prompt(false, false))
    expect(stderrLines()).toContainEqual(expect.stringContaining('No domains existed in missing'))
  })

  it('should print the result as JSON', async () => {
    await runDelete(context({ json: true }), { confirm: true }, prompt(false, false))
    expect(JSON.parse(stdoutText())).toEqual({ collection: '(global)', deleted: true, count: 2 })
  })
})

describe('config', () => {
  it('should print defaults with the collection key', async () => {
    await runConfig(context({ project: 'acme' }))

    expect(stderrLines()).toContain('Config file: (defaults)')
    expect(stderrLines()).toContain('Collection key: domains:acme')
    expect(stdoutText()).toContain('project: acme')
  })

  it('should mask the password', async () => {
    const configDir = path.join(tempDir, '.domainset')
    fs.mkdirSync(configDir)
    fs.writeFileSync(path.join(configDir, 'config.yaml'), 'redis:\n  password: test-secret\n')

    const masked = await runConfig(context({ json: true }))

    expect(masked.redis.password).toBe('***')
    expect(stdoutText()).not.toContain('test-secret')
    expect(JSON.parse(stdoutText())).toMatchObject({ source: path.join(configDir, 'config.yaml') })
  })
})
