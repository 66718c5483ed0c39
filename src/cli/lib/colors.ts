/**
 * domainset CLI - Colors Utility
 *
 * Teal palette on ANSI 256 codes.
 * Honors NO_COLOR and FORCE_COLOR; otherwise colors only on a TTY.
 */

// Check if colors should be enabled
const isColorEnabled = (): boolean => {
  // Respect NO_COLOR standard
  if (process.env.NO_COLOR !== undefined) return false
  // Respect FORCE_COLOR
  if (process.env.FORCE_COLOR !== undefined) return true
  // Messages go to stderr, so that is the stream that decides
  return process.stderr.isTTY ?? false
}

const enabled = isColorEnabled()

/**
 * Teal palette (ANSI 256)
 *
 * - 37:  Teal        (#00AFAF) — info
 * - 44:  Aqua        (#00D7D7) — domains
 * - 30:  Deep teal   (#008787) — bullets
 * - 116: Pale aqua   (#87D7D7) — values
 * - 245: Medium gray (#8A8A8A) — muted text
 */
const ansi = {
  // Styles
  bold: (s: string) => enabled ? `\x1b[1m${s}\x1b[22m` : s,
  dim: (s: string) => enabled ? `\x1b[2m${s}\x1b[22m` : s,

  teal: (s: string) => enabled ? `\x1b[38;5;37m${s}\x1b[39m` : s,
  aqua: (s: string) => enabled ? `\x1b[38;5;44m${s}\x1b[39m` : s,
  deepTeal: (s: string) => enabled ? `\x1b[38;5;30m${s}\x1b[39m` : s,
  paleAqua: (s: string) => enabled ? `\x1b[38;5;116m${s}\x1b[39m` : s,

  // Neutrals
  white: (s: string) => enabled ? `\x1b[97m${s}\x1b[39m` : s,
  gray: (s: string) => enabled ? `\x1b[38;5;245m${s}\x1b[39m` : s,

  // Semantic
  red: (s: string) => enabled ? `\x1b[91m${s}\x1b[39m` : s,
  green: (s: string) => enabled ? `\x1b[92m${s}\x1b[39m` : s,
  yellow: (s: string) => enabled ? `\x1b[93m${s}\x1b[39m` : s,
}

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '')
}

// Semantic colors
export const c = {
  domain: (text: string) => ansi.aqua(text),
  value: (text: string) => ansi.paleAqua(text),
  count: (text: string) => ansi.bold(ansi.white(text)),

  // Status
  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),
  info: (text: string) => ansi.teal(text),

  // Structure
  header: (text: string) => ansi.bold(ansi.white(text)),
  label: (text: string) => ansi.gray(text),
  muted: (text: string) => ansi.dim(text),
}

export const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  info: enabled ? ansi.teal('ℹ') : '[INFO]',
  bullet: enabled ? ansi.deepTeal('•') : '*',
}

// Format a labeled value
export function labeled(label: string, value: string): string {
  return `${c.label(label + ':')} ${value}`
}

// Print utilities. All of them write to stderr: stdout carries data only.
export const print = {
  success: (msg: string) => console.error(`${symbols.success} ${c.success(msg)}`),
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
  warning: (msg: string) => console.error(`${symbols.warning} ${c.warning(msg)}`),
  info: (msg: string) => console.error(`${symbols.info} ${c.info(msg)}`),

  // Print a list item
  item: (text: string) => console.error(`  ${symbols.bullet} ${text}`),
}
