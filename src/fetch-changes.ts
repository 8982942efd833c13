/**
 * Fetch pipeline
 *
 *   1. Collect   — new comments since the persisted pointer (or only the newest
 *                  one on a fresh bootstrap)
 *   2. Baseline  — parse the comment just before the batch into a status map
 *   3. Parse     — every new comment, oldest first
 *   4. Reconcile — keep real transitions, find the next pointer
 *
 * Nothing is written here. The caller persists `nextState` only after the
 * changes file is safely on disk, so a failed batch is retried in full.
 */

import type { CommentSource } from './github.js'
import { parseMinutes } from './minutes-parser.js'
import {
  baselineFromMentions,
  reconcile,
  selectUnprocessed,
  sortComments,
  type ParsedComment,
} from './reconcile.js'
import type { MeetingComment, PersistentState, ProposalChange, Status } from './types.js'

export interface FetchChangesOptions {
  signal?: AbortSignal
}

export interface FetchChangesResult {
  changes: ProposalChange[]
  nextState: PersistentState | null  // null when there was nothing new
}

async function collectNewComments(
  source: CommentSource,
  state: PersistentState,
  signal?: AbortSignal,
): Promise<MeetingComment[]> {
  if (state.isFresh) {
    console.log('  Fresh state — fetching only the latest comment')
    const latest = await source.fetchLatestComment(signal)
    return latest ? [latest] : []
  }

  console.log(
    `  Fetching comments since ${state.lastProcessedAt.toISOString()} ` +
      `(last comment ${state.lastCommentId || 'none'})`,
  )
  const comments = await source.listCommentsSince(state.lastProcessedAt, signal)
  return selectUnprocessed(comments, state)
}

async function loadBaseline(
  source: CommentSource,
  earliest: MeetingComment,
  signal?: AbortSignal,
): Promise<Map<number, Status>> {
  let previous: MeetingComment | null
  try {
    previous = await source.fetchPreviousComment(earliest.id, signal)
  } catch (err) {
    signal?.throwIfAborted()
    console.warn(`  ⚠ Previous comment unavailable — continuing without baseline: ${(err as Error).message}`)
    return new Map()
  }

  if (!previous) {
    console.log('  No previous comment found — every status counts as new')
    return new Map()
  }

  const baseline = baselineFromMentions(parseMinutes(previous.body, previous.createdAt))
  console.log(`  Baseline: comment ${previous.id} → ${baseline.size} proposal status(es)`)
  return baseline
}

// A comment that throws contributes no mentions but still advances the pointer.
function parseBatch(comments: MeetingComment[]): ParsedComment[] {
  return comments.map((comment) => {
    try {
      return { comment, mentions: parseMinutes(comment.body, comment.createdAt) }
    } catch (err) {
      console.warn(`  ⚠ Comment ${comment.id} could not be parsed — skipped: ${(err as Error).message}`)
      return { comment, mentions: [] }
    }
  })
}

export async function fetchChanges(
  source: CommentSource,
  state: PersistentState,
  options: FetchChangesOptions = {},
): Promise<FetchChangesResult> {
  const { signal } = options

  const newComments = sortComments(await collectNewComments(source, state, signal))
  console.log(`  → ${newComments.length} new comment(s)`)
  if (newComments.length === 0) return { changes: [], nextState: null }

  signal?.throwIfAborted()
  const baseline = await loadBaseline(source, newComments[0], signal)

  const { changes, latest } = reconcile(baseline, parseBatch(newComments))
  console.log(`  → ${changes.length} status change(s)`)

  const nextState: PersistentState | null = latest
    ? { lastProcessedAt: latest.effectiveAt, lastCommentId: String(latest.id), isFresh: false }
    : null

  return { changes, nextState }
}
