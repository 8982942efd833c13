/**
 * Line classifier
 *
 * Pure, stateless checks over a single line of a minutes comment. Matching is
 * done with explicit prefix/delimiter scanning rather than regular expressions
 * so the accepted shapes are exactly the ones listed here.
 */

import {
  INLINE_STATUS_PATTERNS,
  SECTION_HEADER_PATTERNS,
  matchesInlinePattern,
} from './status.js'
import type { Status } from './types.js'

export interface ProposalEntry {
  issueNumber: number
  title: string
}

export type LineKind =
  | { kind: 'section'; status: Status }
  | { kind: 'proposal'; issueNumber: number; title: string }
  | { kind: 'indicator'; status: Status }
  | { kind: 'prose' }

// ─── Scanning helpers ─────────────────────────────────────────────────────────

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9'
}

/** `YYYY-MM-DD` shape check: digits everywhere except dashes at 4 and 7. */
function isDateShape(s: string): boolean {
  if (s.length !== 10) return false
  for (let i = 0; i < 10; i++) {
    if (i === 4 || i === 7) {
      if (s[i] !== '-') return false
    } else if (!isDigit(s[i])) {
      return false
    }
  }
  return true
}

function parseIssueNumber(digits: string): number | null {
  if (digits.length === 0) return null
  for (const ch of digits) {
    if (!isDigit(ch)) return null
  }
  const n = Number.parseInt(digits, 10)
  return Number.isSafeInteger(n) && n > 0 ? n : null
}

function isIndented(line: string): boolean {
  return line.startsWith(' ') || line.startsWith('\t')
}

/**
 * Reads `**title**` starting at `start`. The title is the shortest non-empty
 * run of characters before the next `**`.
 */
function readBold(line: string, start: number): { title: string; end: number } | null {
  if (!line.startsWith('**', start)) return null
  const close = line.indexOf('**', start + 3)
  if (close < 0) return null
  return { title: line.slice(start + 2, close), end: close + 2 }
}

/** Reads `[#NNN](url)` starting at `start`. */
function readIssueLink(line: string, start: number): { issueNumber: number; end: number } | null {
  if (!line.startsWith('[#', start)) return null
  const closeBracket = line.indexOf(']', start + 2)
  if (closeBracket < 0) return null
  const issueNumber = parseIssueNumber(line.slice(start + 2, closeBracket))
  if (issueNumber === null) return null
  if (line[closeBracket + 1] !== '(') return null
  const closeParen = line.indexOf(')', closeBracket + 2)
  // the url must be non-empty
  if (closeParen <= closeBracket + 2) return null
  return { issueNumber, end: closeParen + 1 }
}

// ─── Classifiers ──────────────────────────────────────────────────────────────

/**
 * Meeting date from a header line, either `**2019-08-20** / @rsc, ...` or
 * `2019-08-20 / **@rsc, ...**`. The date is only shape-checked here.
 */
export function extractMeetingDate(line: string): string | null {
  if (line.startsWith('**')) {
    const candidate = line.slice(2, 12)
    return isDateShape(candidate) ? candidate : null
  }

  const candidate = line.slice(0, 10)
  if (!isDateShape(candidate)) return null
  const rest = line.slice(10).trimStart()
  return rest.startsWith('/') ? candidate : null
}

export function detectSectionHeader(line: string): Status | null {
  if (!line.startsWith('**')) return null
  const lowered = line.trim().toLowerCase()
  for (const pattern of SECTION_HEADER_PATTERNS) {
    if (lowered.startsWith(pattern.keyword)) return pattern.status
  }
  return null
}

/**
 * Proposal entry lines, tried in order:
 *   - [#NNNNN](url) **title**
 *   - #NNNNN **title**
 *   - **title** [#NNNNN](url)
 */
export function parseProposalLine(line: string): ProposalEntry | null {
  if (!line.startsWith('- ')) return null

  // - [#NNNNN](url) **title**
  const link = readIssueLink(line, 2)
  if (link) {
    if (line[link.end] !== ' ') return null
    const bold = readBold(line, link.end + 1)
    return bold ? { issueNumber: link.issueNumber, title: bold.title } : null
  }

  // - #NNNNN **title**
  if (line[2] === '#') {
    const space = line.indexOf(' ', 3)
    if (space < 0) return null
    const issueNumber = parseIssueNumber(line.slice(3, space))
    if (issueNumber === null) return null
    const bold = readBold(line, space + 1)
    return bold ? { issueNumber, title: bold.title } : null
  }

  // - **title** [#NNNNN](url)
  const bold = readBold(line, 2)
  if (bold && line[bold.end] === ' ') {
    const trailing = readIssueLink(line, bold.end + 1)
    if (trailing) return { issueNumber: trailing.issueNumber, title: bold.title }
  }

  return null
}

/** Inline status on an indented action line; top-level lines never match. */
export function detectStatusInLine(line: string): Status | null {
  if (!isIndented(line)) return null
  const lowered = line.toLowerCase()
  for (const pattern of INLINE_STATUS_PATTERNS) {
    if (matchesInlinePattern(lowered, pattern)) return pattern.status
  }
  return null
}

export function classifyLine(line: string): LineKind {
  const section = detectSectionHeader(line)
  if (section) return { kind: 'section', status: section }

  const entry = parseProposalLine(line)
  if (entry) return { kind: 'proposal', ...entry }

  const indicator = detectStatusInLine(line)
  if (indicator) return { kind: 'indicator', status: indicator }

  return { kind: 'prose' }
}
