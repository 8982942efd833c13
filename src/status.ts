/**
 * Status vocabulary for the proposal review minutes.
 *
 * Minutes have used two conventions over the years: a bold section heading
 * (`**Accepted**`) that sets the status of every proposal listed below it,
 * and an indented action line under a single proposal that states its status
 * inline (`  - **likely accept**; last call for comments ⏳`). Each convention
 * gets its own table.
 */

import { STATUSES, type Status } from './types.js'

export function isStatus(value: unknown): value is Status {
  return STATUSES.some((s) => s === value)
}

// ─── Section headers ──────────────────────────────────────────────────────────

export interface SectionHeaderPattern {
  keyword: string  // lowercased, including the closing **
  status: Status
}

export const SECTION_HEADER_PATTERNS: readonly SectionHeaderPattern[] = [
  { keyword: '**accepted**', status: 'accepted' },
  { keyword: '**declined**', status: 'declined' },
  { keyword: '**likely accept**', status: 'likely_accept' },
  { keyword: '**likely decline**', status: 'likely_decline' },
  { keyword: '**active**', status: 'active' },
  { keyword: '**hold**', status: 'hold' },
  { keyword: '**discussions**', status: 'discussions' },
  { keyword: '**discussion**', status: 'discussions' },
]

// ─── Inline indicators ────────────────────────────────────────────────────────

export interface InlineStatusPattern {
  keywords: readonly string[]  // all must be present in the lowercased line
  status: Status
  atEnd?: boolean              // the line must end with the (single) keyword
}

// Most specific first: a line can satisfy several of these.
export const INLINE_STATUS_PATTERNS: readonly InlineStatusPattern[] = [
  { keywords: ['**no final comments; accepted'], status: 'accepted' },
  { keywords: ['**accepted**'], status: 'accepted' },
  { keywords: ['accepted 🎉'], status: 'accepted' },
  { keywords: ['accepted🎉'], status: 'accepted' },

  { keywords: ['**no final comments; declined'], status: 'declined' },
  { keywords: ['retracted', '**declined**'], status: 'declined' },
  { keywords: ['**declined**'], status: 'declined' },
  { keywords: ['**closed**'], status: 'declined' },

  // the closing ** is often missing: "**likely accept; last call for comments"
  { keywords: ['**likely accept'], status: 'likely_accept' },
  { keywords: ['**likely decline'], status: 'likely_decline' },

  { keywords: ['put on hold'], status: 'hold' },
  { keywords: ['on hold'], status: 'hold', atEnd: true },

  { keywords: ['**active**'], status: 'active' },

  { keywords: ['discussion ongoing'], status: 'discussions' },
]

export function matchesInlinePattern(lowered: string, pattern: InlineStatusPattern): boolean {
  if (pattern.atEnd) {
    return pattern.keywords.every((k) => lowered.endsWith(k))
  }
  return pattern.keywords.every((k) => lowered.includes(k))
}
