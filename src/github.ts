import { Octokit } from '@octokit/rest'
import { compareComments } from './reconcile.js'
import type { MeetingComment } from './types.js'

// golang/go#33502 — "proposal: review meeting minutes"
export const MINUTES_OWNER = 'golang'
export const MINUTES_REPO = 'go'
export const MINUTES_ISSUE_NUMBER = 33502

export const PER_PAGE = 100
const LATEST_WINDOW_DAYS = 7
const PREVIOUS_WINDOW_DAYS = 30
const DAY_MS = 24 * 60 * 60 * 1000

/** What the fetch pipeline needs from the comment thread. */
export interface CommentSource {
  listCommentsSince(since: Date, signal?: AbortSignal): Promise<MeetingComment[]>
  fetchLatestComment(signal?: AbortSignal): Promise<MeetingComment | null>
  fetchPreviousComment(beforeId: number, signal?: AbortSignal): Promise<MeetingComment | null>
}

export interface GitHubCommentSourceOptions {
  token?: string
  baseUrl?: string
  owner?: string
  repo?: string
  issueNumber?: number
  now?: () => Date
}

interface GHComment {
  id: number
  body?: string
  created_at: string
  updated_at: string
  html_url: string
}

type Headers = Record<string, string | number | undefined>

export function toMeetingComment(c: GHComment): MeetingComment {
  return {
    id: c.id,
    body: c.body ?? '',
    createdAt: new Date(c.created_at),
    updatedAt: c.updated_at ? new Date(c.updated_at) : null,
    htmlUrl: c.html_url,
  }
}

function isNotModified(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'status' in err && err.status === 304
}

function logRateLimit(headers: Headers): void {
  const remaining = headers['x-ratelimit-remaining']
  if (remaining === undefined) return
  if (Number(remaining) === 0) {
    const reset = Number(headers['x-ratelimit-reset'])
    const at = Number.isFinite(reset) ? new Date(reset * 1000).toISOString() : 'unknown'
    console.warn(`  ⚠ GitHub rate limit exhausted — resets at ${at}`)
  } else {
    console.log(`  rate limit remaining: ${remaining}`)
  }
}

export class GitHubCommentSource implements CommentSource {
  private octokit: Octokit
  private owner: string
  private repo: string
  private issueNumber: number
  private now: () => Date
  // page-1 ETags, keyed by the `since` they were fetched with
  private etags = new Map<string, string>()

  constructor(options: GitHubCommentSourceOptions = {}) {
    this.octokit = new Octokit({
      auth: options.token || undefined,
      ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
    })
    this.owner = options.owner ?? MINUTES_OWNER
    this.repo = options.repo ?? MINUTES_REPO
    this.issueNumber = options.issueNumber ?? MINUTES_ISSUE_NUMBER
    this.now = options.now ?? (() => new Date())
  }

  // ─── Paging ───────────────────────────────────────────────────────────────

  private async fetchPage(
    since: Date,
    page: number,
    signal?: AbortSignal,
  ): Promise<{ comments: MeetingComment[]; hasMore: boolean }> {
    const etag = page === 1 ? this.etags.get(since.toISOString()) : undefined

    const response = await this.octokit.rest.issues
      .listComments({
        owner: this.owner,
        repo: this.repo,
        issue_number: this.issueNumber,
        since: since.toISOString(),
        per_page: PER_PAGE,
        page,
        headers: etag ? { 'if-none-match': etag } : {},
        request: { signal },
      })
      .catch((err: unknown) => {
        // 304: nothing changed since the stored ETag
        if (isNotModified(err)) return null
        throw new Error(`GitHub comments request failed (page ${page})`, { cause: err })
      })
    if (!response) return { comments: [], hasMore: false }

    logRateLimit(response.headers)
    const newEtag = response.headers.etag
    if (page === 1 && newEtag) this.etags.set(since.toISOString(), newEtag)

    return {
      comments: response.data.map(toMeetingComment),
      hasMore: response.data.length === PER_PAGE,
    }
  }

  async listCommentsSince(since: Date, signal?: AbortSignal): Promise<MeetingComment[]> {
    const all: MeetingComment[] = []
    for (let page = 1; ; page++) {
      signal?.throwIfAborted()
      const { comments, hasMore } = await this.fetchPage(since, page, signal)
      all.push(...comments)
      if (!hasMore) break
    }
    return all
  }

  private daysAgo(days: number): Date {
    return new Date(this.now().getTime() - days * DAY_MS)
  }

  // ─── Lookups ──────────────────────────────────────────────────────────────

  async fetchLatestComment(signal?: AbortSignal): Promise<MeetingComment | null> {
    const comments = await this.listCommentsSince(this.daysAgo(LATEST_WINDOW_DAYS), signal)
    return [...comments].sort(compareComments).at(-1) ?? null
  }

  /** The comment with the largest id below `beforeId` in the last 30 days. */
  async fetchPreviousComment(beforeId: number, signal?: AbortSignal): Promise<MeetingComment | null> {
    const comments = await this.listCommentsSince(this.daysAgo(PREVIOUS_WINDOW_DAYS), signal)
    let previous: MeetingComment | null = null
    for (const c of comments) {
      if (c.id < beforeId && (!previous || c.id > previous.id)) previous = c
    }
    return previous
  }

  /** Body of a proposal issue in the same repository, truncated for prompting. */
  async fetchIssueBody(issueNumber: number, maxLength = 4000): Promise<string> {
    const { data } = await this.octokit.rest.issues.get({
      owner: this.owner,
      repo: this.repo,
      issue_number: issueNumber,
    })
    return (data.body ?? '').slice(0, maxLength)
  }
}
