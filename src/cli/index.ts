#!/usr/bin/env node
/**
 * domainset CLI
 *
 * Deduplicated domain lists for recon scope, stored in Redis sets
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { createProgram, reportError } from './program.js'

// Version is injected at build time or read from package.json
const VERSION = process.env.DOMAINSET_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  // Walk up from dist/cli (or src/cli) to the package root
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
      return undefined
    }
    dir = path.dirname(dir)
  }
  return undefined
}

async function main(): Promise<void> {
  const program = createProgram({ version: VERSION })
  const verbose = process.argv.includes('-v') || process.argv.includes('--verbose')

  try {
    await program.parseAsync(process.argv)
  } catch (err) {
    process.exitCode = reportError(err, verbose)
  }
}

process.on('SIGINT', () => {
  // Entries already written stay written
  console.error('\nOperation cancelled by user')
  process.exit(1)
})

main().catch(err => {
  process.exitCode = reportError(err, false)
})
