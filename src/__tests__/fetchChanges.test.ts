import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { fetchChanges } from '../fetch-changes.js'
import type { CommentSource } from '../github.js'
import { freshState } from '../state.js'
import type { MeetingComment, PersistentState } from '../types.js'

// --- fixtures ------------------------------------------------------------------

function comment(id: number, createdAt: string, body: string): MeetingComment {
  return {
    id,
    body,
    createdAt: new Date(createdAt),
    updatedAt: null,
    htmlUrl: `https://github.com/golang/go/issues/33502#issuecomment-${id}`,
  }
}

const c100 = comment(
  100,
  '2024-01-10T00:00:00Z',
  ['**2024-01-03** / **@rsc, @ianlancetaylor**', '', '**Likely Accept**', '', '- [#1](https://go.dev/issue/1) **io: add Foo**'].join('\n'),
)

const c101 = comment(
  101,
  '2024-01-11T00:00:00Z',
  ['**2024-01-10** / **@rsc**', '', '**Accepted**', '', '- [#1](https://go.dev/issue/1) **io: add Foo**'].join('\n'),
)

const c102 = comment(
  102,
  '2024-01-12T00:00:00Z',
  [
    '**2024-01-17** / **@rsc**',
    '',
    '**Accepted**',
    '',
    '- [#1](https://go.dev/issue/1) **io: add Foo**',
    '',
    '**Declined**',
    '',
    '- [#2](https://go.dev/issue/2) **os: remove Bar**',
  ].join('\n'),
)

function fakeSource(overrides: Partial<CommentSource> = {}) {
  return {
    listCommentsSince: vi.fn(async (): Promise<MeetingComment[]> => []),
    fetchLatestComment: vi.fn(async (): Promise<MeetingComment | null> => null),
    fetchPreviousComment: vi.fn(async (): Promise<MeetingComment | null> => null),
    ...overrides,
  } satisfies CommentSource
}

const pointerAt100: PersistentState = {
  lastProcessedAt: new Date('2024-01-10T00:00:00Z'),
  lastCommentId: '100',
  isFresh: false,
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

// --- tests ---------------------------------------------------------------------

describe('fetchChanges — fresh bootstrap', () => {
  it('processes only the latest comment against the one before it', async () => {
    const source = fakeSource({
      fetchLatestComment: vi.fn(async () => c101),
      fetchPreviousComment: vi.fn(async () => c100),
    })

    const { changes, nextState } = await fetchChanges(source, freshState())

    expect(source.listCommentsSince).not.toHaveBeenCalled()
    expect(source.fetchPreviousComment).toHaveBeenCalledWith(101, undefined)
    expect(changes).toEqual([
      {
        issueNumber: 1,
        title: 'io: add Foo',
        previousStatus: 'likely_accept',
        currentStatus: 'accepted',
        changedAt: new Date('2024-01-10T00:00:00Z'),
        commentUrl: c101.htmlUrl,
        relatedIssues: [],
      },
    ])
    expect(nextState).toEqual({
      lastProcessedAt: new Date('2024-01-11T00:00:00Z'),
      lastCommentId: '101',
      isFresh: false,
    })
  })
})

describe('fetchChanges — incremental', () => {
  it('skips the processed comment, sorts the rest and reports real transitions', async () => {
    const source = fakeSource({
      listCommentsSince: vi.fn(async () => [c100, c102, c101]),
      fetchPreviousComment: vi.fn(async () => c100),
    })

    const { changes, nextState } = await fetchChanges(source, pointerAt100)

    expect(source.listCommentsSince).toHaveBeenCalledWith(pointerAt100.lastProcessedAt, undefined)
    expect(source.fetchPreviousComment).toHaveBeenCalledWith(101, undefined)
    expect(changes.map((c) => [c.issueNumber, c.previousStatus, c.currentStatus, c.commentUrl])).toEqual([
      [1, 'likely_accept', 'accepted', c101.htmlUrl],
      [2, '', 'declined', c102.htmlUrl],
    ])
    expect(nextState).toEqual({
      lastProcessedAt: new Date('2024-01-12T00:00:00Z'),
      lastCommentId: '102',
      isFresh: false,
    })
  })

  it('returns no state when nothing is new', async () => {
    const source = fakeSource({ listCommentsSince: vi.fn(async () => [c100]) })

    expect(await fetchChanges(source, pointerAt100)).toEqual({ changes: [], nextState: null })
    expect(source.fetchPreviousComment).not.toHaveBeenCalled()
  })

  it('counts every status as new when the baseline cannot be fetched', async () => {
    const source = fakeSource({
      listCommentsSince: vi.fn(async () => [c101]),
      fetchPreviousComment: vi.fn(async (): Promise<MeetingComment | null> => {
        throw new Error('rate limited')
      }),
    })

    const { changes } = await fetchChanges(source, pointerAt100)

    expect(changes.map((c) => [c.issueNumber, c.previousStatus, c.currentStatus])).toEqual([[1, '', 'accepted']])
    expect(console.warn).toHaveBeenCalledWith(
      '  ⚠ Previous comment unavailable — continuing without baseline: rate limited',
    )
  })

  it('still advances past comments that are not minutes', async () => {
    const chatter = comment(103, '2024-01-13T00:00:00Z', 'LGTM, thanks!')
    const source = fakeSource({ listCommentsSince: vi.fn(async () => [chatter]) })

    const { changes, nextState } = await fetchChanges(source, pointerAt100)

    expect(changes).toEqual([])
    expect(nextState?.lastCommentId).toBe('103')
  })

  it('propagates cancellation instead of continuing without a baseline', async () => {
    const controller = new AbortController()
    const source = fakeSource({
      listCommentsSince: vi.fn(async () => [c101]),
      fetchPreviousComment: vi.fn(async (): Promise<MeetingComment | null> => {
        controller.abort()
        throw new Error('request aborted')
      }),
    })

    await expect(fetchChanges(source, pointerAt100, { signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    })
  })
})
