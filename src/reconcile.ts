/**
 * Baseline reconciliation
 *
 * Minutes restate statuses that did not change, so a comment cannot tell us
 * on its own what moved. We diff against a running status map seeded from the
 * comment immediately preceding the batch, and keep only real transitions.
 *
 * Everything here is pure: the map goes in and comes back out.
 */

import type {
  CommentPointer,
  MeetingComment,
  PersistentState,
  ProposalChange,
  ProposalMention,
  Status,
} from './types.js'

export interface ParsedComment {
  comment: MeetingComment
  mentions: ProposalMention[]
}

export interface ReconcileResult {
  statuses: Map<number, Status>
  changes: ProposalChange[]
  latest: CommentPointer | null
}

// ─── Ordering ─────────────────────────────────────────────────────────────────

export function effectiveTime(comment: Pick<MeetingComment, 'createdAt' | 'updatedAt'>): Date {
  return comment.updatedAt ?? comment.createdAt
}

export function compareComments(a: MeetingComment, b: MeetingComment): number {
  const byTime = effectiveTime(a).getTime() - effectiveTime(b).getTime()
  return byTime !== 0 ? byTime : a.id - b.id
}

/** Chronological order; the running map in `reconcile` depends on it. */
export function sortComments(comments: readonly MeetingComment[]): MeetingComment[] {
  return [...comments].sort(compareComments)
}

/**
 * Drops comments already covered by the persisted pointer. GitHub's `since`
 * filter works on `updated_at`, so an edited comment comes back with a newer
 * effective time and is processed again.
 */
export function selectUnprocessed(
  comments: readonly MeetingComment[],
  state: Pick<PersistentState, 'lastProcessedAt' | 'lastCommentId'>,
): MeetingComment[] {
  const lastAt = state.lastProcessedAt.getTime()
  const lastId = Number.parseInt(state.lastCommentId, 10) || 0

  return comments.filter((c) => {
    const at = effectiveTime(c).getTime()
    if (at < lastAt) return false
    if (at === lastAt && c.id <= lastId) return false
    return true
  })
}

function isLater(candidate: CommentPointer, current: CommentPointer | null): boolean {
  if (!current) return true
  const diff = candidate.effectiveAt.getTime() - current.effectiveAt.getTime()
  return diff > 0 || (diff === 0 && candidate.id > current.id)
}

// ─── Reconciliation ───────────────────────────────────────────────────────────

export function baselineFromMentions(mentions: readonly ProposalMention[]): Map<number, Status> {
  return new Map(mentions.map((m) => [m.issueNumber, m.currentStatus]))
}

/**
 * Assigns `previousStatus` to every mention in the batch and drops the ones
 * that restate the status already in the map. The batch must already be in
 * `sortComments` order.
 */
export function reconcile(
  baseline: ReadonlyMap<number, Status>,
  batch: readonly ParsedComment[],
): ReconcileResult {
  const statuses = new Map(baseline)
  const changes: ProposalChange[] = []
  let latest: CommentPointer | null = null

  for (const { comment, mentions } of batch) {
    for (const mention of mentions) {
      const previousStatus = statuses.get(mention.issueNumber) ?? ''
      if (mention.currentStatus === previousStatus) continue

      changes.push({
        ...mention,
        previousStatus,
        commentUrl: comment.htmlUrl,
        relatedIssues: [],
      })
      statuses.set(mention.issueNumber, mention.currentStatus)
    }

    const pointer = { id: comment.id, effectiveAt: effectiveTime(comment) }
    if (isLater(pointer, latest)) latest = pointer
  }

  return { statuses, changes, latest }
}
