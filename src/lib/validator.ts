/**
 * Domain validator
 *
 * Classifies a single input line as a domain, a wildcard pattern or a
 * service-record name, or rejects it with a reason code. Pure: no I/O, never throws.
 *
 * Accepted forms:
 *   example.com, sub.example.com       literal labels
 *   *.example.com, test.*.example.com  standalone wildcard label
 *   svc-*.example.com                  wildcard combined with literal characters
 *   _service.example.com               underscore-prefixed service label
 */

import type { InvalidReason, ValidationResult } from '../types.js'
import { InvalidDomainError } from './errors.js'

const MAX_DOMAIN_LENGTH = 253
const MAX_LABEL_LENGTH = 63

const LITERAL_LABEL = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/
const SERVICE_LABEL = /^_[a-z0-9-]+$/
const WILDCARD_LABEL = /^[a-z0-9*](?:[a-z0-9*-]*[a-z0-9*])?$/
const TLD_LABEL = /^[a-z]{2,63}$/

export const INVALID_REASONS: readonly InvalidReason[] = [
  'protocol_or_path',
  'empty_label',
  'bad_label',
  'bad_tld',
  'malformed_wildcard',
  'too_long',
  'too_few_labels'
] as const

const REASON_DESCRIPTIONS: Record<InvalidReason, string> = {
  protocol_or_path: 'contains a URL scheme or path',
  empty_label: 'contains an empty label',
  bad_label: 'contains an invalid label',
  bad_tld: 'top-level domain must be alphabetic and at least 2 characters',
  malformed_wildcard: 'wildcard must be its own label and be followed by a domain',
  too_long: 'domain or label exceeds the maximum length',
  too_few_labels: 'needs at least two labels'
}

/**
 * Human-readable text for a reason code
 */
export function describeReason(reason: InvalidReason): string {
  return REASON_DESCRIPTIONS[reason]
}

function invalid(input: string, reason: InvalidReason): ValidationResult {
  return { valid: false, reason, input }
}

/**
 * Check one non-final label, returning the failure reason or null when acceptable
 */
function checkLabel(label: string): InvalidReason | null {
  if (label.length > MAX_LABEL_LENGTH) return 'too_long'

  if (label.startsWith('_')) {
    return SERVICE_LABEL.test(label) ? null : 'bad_label'
  }

  if (label.includes('*')) {
    if (label === '*') return null
    // `*abc` - a leading wildcard glued to literal characters
    if (label.startsWith('*')) return 'malformed_wildcard'
    return WILDCARD_LABEL.test(label) ? null : 'bad_label'
  }

  return LITERAL_LABEL.test(label) ? null : 'bad_label'
}

// Only A-Z folds: String#toLowerCase maps some non-ASCII letters (U+212A KELVIN SIGN) onto ASCII
function lowercaseAscii(value: string): string {
  return value.replace(/[A-Z]+/g, letters => letters.toLowerCase())
}

/**
 * Classify a single input line
 *
 * Blank lines come back as `{ valid: false, skipped: true }` and must not be
 * counted as invalid by callers.
 */
export function classify(line: string): ValidationResult {
  const input = line.trim()
  if (input === '') {
    return { valid: false, skipped: true }
  }

  if (input.includes('://') || input.includes('/')) {
    return invalid(input, 'protocol_or_path')
  }

  const domain = lowercaseAscii(input)
  if (domain.length > MAX_DOMAIN_LENGTH) {
    return invalid(input, 'too_long')
  }

  const labels = domain.split('.')
  if (labels.some(label => label === '')) {
    return invalid(input, 'empty_label')
  }

  if (labels.length < 2) {
    return invalid(input, domain.includes('*') ? 'malformed_wildcard' : 'too_few_labels')
  }

  const tld = labels[labels.length - 1]
  const hosts = labels.slice(0, -1)

  for (const label of hosts) {
    const reason = checkLabel(label)
    if (reason) return invalid(input, reason)
  }

  if (tld.includes('*')) {
    return invalid(input, 'malformed_wildcard')
  }
  if (!TLD_LABEL.test(tld)) {
    return invalid(input, 'bad_tld')
  }

  // A wildcard needs at least one concrete label between it and the TLD
  let lastWildcard = -1
  for (let i = 0; i < hosts.length; i++) {
    if (hosts[i].includes('*')) lastWildcard = i
  }
  if (lastWildcard !== -1 && lastWildcard > labels.length - 3) {
    return invalid(input, 'malformed_wildcard')
  }

  return { valid: true, domain }
}

/**
 * Boolean shorthand for classify()
 */
export function isValidDomain(line: string): boolean {
  return classify(line).valid
}

/**
 * Trim and lowercase without validating (used when validation is disabled)
 */
export function normalizeDomain(line: string): string {
  return line.trim().toLowerCase()
}

/**
 * Normalized domain, or InvalidDomainError for a rejected or blank line
 */
export function assertValidDomain(line: string): string {
  const result = classify(line)
  if (result.valid) return result.domain
  if ('skipped' in result) throw new InvalidDomainError(line, 'empty_label')
  throw new InvalidDomainError(result.input, result.reason)
}
