/**
 * Tests for domain-file.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import {
  parseDomainList,
  readDomainFile,
  readDomainSource,
  writeOutputFile
} from '../../src/lib/domain-file.js'
import { FileNotFoundError } from '../../src/lib/errors.js'

describe('domain-file', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'domainset-file-test-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('parseDomainList', () => {
    it('should split lines and drop the trailing newline', () => {
      expect(parseDomainList('a.com\nb.com\n')).toEqual(['a.com', 'b.com'])
    })

    it('should tolerate CRLF', () => {
      expect(parseDomainList('a.com\r\nb.com\r\n')).toEqual(['a.com', 'b.com'])
    })

    it('should keep blank lines so line numbers match the file', () => {
      expect(parseDomainList('a.com\n\nb.com')).toEqual(['a.com', '', 'b.com'])
    })

    it('should blank out comment lines', () => {
      expect(parseDomainList('# scope\na.com\n  # note\nb.com\n')).toEqual(['', 'a.com', '', 'b.com'])
    })

    it('should return nothing for empty content', () => {
      expect(parseDomainList('')).toEqual([])
    })
  })

  describe('readDomainFile', () => {
    it('should read a list from disk', () => {
      const file = path.join(tempDir, 'domains.txt')
      fs.writeFileSync(file, 'example.com\n*.example.org\n')
      expect(readDomainFile(file)).toEqual(['example.com', '*.example.org'])
    })

    it('should throw FileNotFoundError for a missing file', () => {
      expect(() => readDomainFile(path.join(tempDir, 'missing.txt'))).toThrow(FileNotFoundError)
    })

    it('should throw FileNotFoundError for a directory', () => {
      expect(() => readDomainFile(tempDir)).toThrow(FileNotFoundError)
    })
  })

  describe('readDomainSource', () => {
    it('should read files by path', async () => {
      const file = path.join(tempDir, 'domains.txt')
      fs.writeFileSync(file, 'a.com\n')
      await expect(readDomainSource(file)).resolves.toEqual(['a.com'])
    })
  })

  describe('writeOutputFile', () => {
    it('should create parent directories and return the resolved path', () => {
      const target = path.join(tempDir, 'out', 'nested', 'domains.txt')
      const written = writeOutputFile(target, 'a.com\n')

      expect(written).toBe(path.resolve(target))
      expect(fs.readFileSync(target, 'utf-8')).toBe('a.com\n')
    })

    it('should overwrite an existing file', () => {
      const target = path.join(tempDir, 'domains.txt')
      fs.writeFileSync(target, 'old.com\n')
      writeOutputFile(target, '')
      expect(fs.readFileSync(target, 'utf-8')).toBe('')
    })
  })
})
