/**
 * Minutes parser
 *
 * Turns one review-meeting comment into the list of proposals whose status it
 * states. Two passes over the lines:
 *   1. Seek   — the first valid meeting-date header
 *   2. Scan   — a reduce over the lines carrying the open proposal and the
 *               status of the section it sits in
 *
 * Comments without a date header are discussion, not minutes, and yield [].
 * `previousStatus` is not known here; see reconcile.ts.
 */

import { isValid, parse } from 'date-fns'
import { classifyLine, extractMeetingDate } from './line-classifier.js'
import type { ProposalMention, Status } from './types.js'

export const PREVIEW_LENGTH = 100

interface OpenProposal {
  issueNumber: number
  title: string
  status: Status | null
}

interface ParserState {
  meetingDate: Date
  current: OpenProposal | null
  sectionStatus: Status | null
  mentions: ProposalMention[]
}

export function preview(text: string, max = PREVIEW_LENGTH): string {
  return text.length <= max ? text : `${text.slice(0, max)}...`
}

/** Calendar date at UTC midnight, or null when the date does not exist (2019-02-30). */
export function parseMeetingDate(dateStr: string): Date | null {
  const local = parse(dateStr, 'yyyy-MM-dd', new Date())
  if (!isValid(local)) return null
  return new Date(Date.UTC(local.getFullYear(), local.getMonth(), local.getDate()))
}

function findMeetingDate(lines: string[]): Date | null {
  for (const line of lines) {
    const dateStr = extractMeetingDate(line)
    if (!dateStr) continue

    const date = parseMeetingDate(dateStr)
    if (date) return date
    console.warn(`  ⚠ Invalid date in minutes header — still looking: ${preview(line)}`)
  }
  return null
}

// Closes the open proposal; it only becomes a mention if it gathered a status.
function flush(state: ParserState): ProposalMention[] {
  const open = state.current
  if (!open || !open.status) return state.mentions
  return [
    ...state.mentions,
    {
      issueNumber: open.issueNumber,
      title: open.title,
      currentStatus: open.status,
      changedAt: state.meetingDate,
    },
  ]
}

function step(state: ParserState, line: string): ParserState {
  const kind = classifyLine(line)

  switch (kind.kind) {
    case 'section':
      return { ...state, mentions: flush(state), current: null, sectionStatus: kind.status }

    case 'proposal':
      return {
        ...state,
        mentions: flush(state),
        current: { issueNumber: kind.issueNumber, title: kind.title, status: state.sectionStatus },
      }

    case 'indicator':
      // Inline indicators only count when no section heading governs the entry.
      if (!state.current || state.sectionStatus) return state
      return { ...state, current: { ...state.current, status: kind.status } }

    case 'prose':
      return state
  }
}

/**
 * Extracts proposal status mentions from a minutes comment.
 *
 * `changedAt` on every mention is the meeting date from the header, not
 * `commentedAt`; the comment timestamp only drives ordering upstream.
 */
export function parseMinutes(body: string, commentedAt: Date): ProposalMention[] {
  if (body === '') return []

  const lines = body.split(/\r?\n/)
  const meetingDate = findMeetingDate(lines)
  if (!meetingDate) {
    console.warn(
      `  ⚠ No meeting date header in comment from ${commentedAt.toISOString()} — skipped: ` +
        JSON.stringify(preview(body)),
    )
    return []
  }

  const initial: ParserState = { meetingDate, current: null, sectionStatus: null, mentions: [] }
  const final = lines.reduce(step, initial)
  return flush(final)
}
