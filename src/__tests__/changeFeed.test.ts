import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, readdirSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  ChangesFileError,
  buildChangesOutput,
  dedupeLatestPerIssue,
  groupByWeek,
  isoWeekKey,
  isoWeekOf,
  parseChangesOutput,
  serializeChangesOutput,
  writeChangesFile,
} from '../change-feed.js'
import type { ProposalChange, Status } from '../types.js'

function change(
  issueNumber: number,
  date: string,
  currentStatus: Status = 'accepted',
  title = `proposal ${issueNumber}`,
): ProposalChange {
  return {
    issueNumber,
    title,
    previousStatus: '',
    currentStatus,
    changedAt: new Date(`${date}T00:00:00Z`),
    commentUrl: `https://github.com/golang/go/issues/33502#issuecomment-${issueNumber}`,
    relatedIssues: [],
  }
}

describe('isoWeekOf', () => {
  it('computes the ISO week of a meeting date', () => {
    expect(isoWeekOf(new Date('2019-08-20T00:00:00Z'))).toEqual({ year: 2019, week: 34 })
    expect(isoWeekKey(new Date('2019-08-20T00:00:00Z'))).toBe('2019-W34')
  })

  it('uses the ISO week-numbering year at year boundaries', () => {
    expect(isoWeekKey(new Date('2021-01-01T00:00:00Z'))).toBe('2020-W53')
    expect(isoWeekKey(new Date('2024-12-30T00:00:00Z'))).toBe('2025-W01')
  })

  it('follows the UTC calendar day', () => {
    // Sunday 23:30 UTC still belongs to the week that started on Monday
    expect(isoWeekKey(new Date('2019-08-25T23:30:00Z'))).toBe('2019-W34')
    expect(isoWeekKey(new Date('2019-08-26T00:30:00Z'))).toBe('2019-W35')
  })
})

describe('groupByWeek', () => {
  it('buckets changes by ISO week in chronological order', () => {
    const weeks = groupByWeek([change(3, '2024-01-15'), change(1, '2024-01-08'), change(2, '2024-01-14')])
    expect([...weeks.keys()]).toEqual(['2024-W02', '2024-W03'])
    expect(weeks.get('2024-W02')?.map((c) => c.issueNumber)).toEqual([1, 2])
    expect(weeks.get('2024-W03')?.map((c) => c.issueNumber)).toEqual([3])
  })
})

describe('dedupeLatestPerIssue', () => {
  it('keeps the latest record per issue, the later one on a tie', () => {
    const result = dedupeLatestPerIssue([
      change(1, '2024-01-08', 'likely_accept'),
      change(1, '2024-01-10', 'accepted'),
      change(2, '2024-01-09', 'hold'),
      change(3, '2024-01-10', 'active', 'first'),
      change(3, '2024-01-10', 'declined', 'second'),
    ])

    expect(result.map((c) => [c.issueNumber, c.currentStatus, c.title])).toEqual([
      [2, 'hold', 'proposal 2'],
      [1, 'accepted', 'proposal 1'],
      [3, 'declined', 'second'],
    ])
  })
})

describe('buildChangesOutput', () => {
  it('labels the output with the week of the latest change', () => {
    const output = buildChangesOutput([change(2, '2024-01-15'), change(1, '2024-01-08')])
    expect(output.week).toBe('2024-W03')
    expect(output.changes.map((c) => c.issueNumber)).toEqual([1, 2])
  })

  it('falls back to the current week when there are no changes', () => {
    expect(buildChangesOutput([], new Date('2024-01-15T12:00:00Z'))).toEqual({ week: '2024-W03', changes: [] })
  })
})

describe('changes.json format', () => {
  const sample: ProposalChange = {
    issueNumber: 25530,
    title: 'cmd/go: add GOFLAGS',
    previousStatus: 'likely_accept',
    currentStatus: 'accepted',
    changedAt: new Date('2019-08-20T00:00:00Z'),
    commentUrl: 'https://github.com/golang/go/issues/33502#issuecomment-523084208',
    relatedIssues: [],
  }

  it('serializes with snake_case keys, second-precision timestamps and a trailing newline', () => {
    const text = serializeChangesOutput({ week: '2019-W34', changes: [sample] })
    expect(text.endsWith('}\n')).toBe(true)
    expect(JSON.parse(text)).toEqual({
      week: '2019-W34',
      changes: [
        {
          issue_number: 25530,
          title: 'cmd/go: add GOFLAGS',
          previous_status: 'likely_accept',
          current_status: 'accepted',
          changed_at: '2019-08-20T00:00:00Z',
          comment_url: 'https://github.com/golang/go/issues/33502#issuecomment-523084208',
          related_issues: [],
        },
      ],
    })
  })

  it('reads back what it writes', () => {
    const output = { week: '2019-W34', changes: [sample] }
    expect(parseChangesOutput(serializeChangesOutput(output))).toEqual(output)
  })

  it('treats null arrays as empty', () => {
    expect(parseChangesOutput('{"week":"2024-W02","changes":null}')).toEqual({ week: '2024-W02', changes: [] })

    const raw = JSON.stringify({
      week: '2024-W02',
      changes: [
        {
          issue_number: 1,
          title: 't',
          previous_status: '',
          current_status: 'hold',
          changed_at: '2024-01-10T00:00:00Z',
          comment_url: 'u',
          related_issues: null,
        },
      ],
    })
    expect(parseChangesOutput(raw).changes[0].relatedIssues).toEqual([])
  })

  it('rejects invalid JSON and unknown statuses', () => {
    expect(() => parseChangesOutput('{')).toThrow(ChangesFileError)

    const raw = JSON.stringify({
      week: '2024-W02',
      changes: [
        {
          issue_number: 1,
          title: 't',
          previous_status: '',
          current_status: 'closed',
          changed_at: '2024-01-10T00:00:00Z',
          comment_url: 'u',
        },
      ],
    })
    expect(() => parseChangesOutput(raw)).toThrow(ChangesFileError)
  })
})

describe('writeChangesFile', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'changes-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('creates parent directories and leaves no temp file behind', () => {
    const path = join(dir, 'out', 'changes.json')
    const output = buildChangesOutput([change(1, '2024-01-10')])

    writeChangesFile(path, output)

    expect(readFileSync(path, 'utf-8')).toBe(serializeChangesOutput(output))
    expect(readdirSync(join(dir, 'out'))).toEqual(['changes.json'])
  })
})
