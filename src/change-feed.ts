import { renameSync, writeFileSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import { getISOWeek, getISOWeekYear } from 'date-fns'
import { z } from 'zod'
import { STATUSES, type ProposalChange } from './types.js'

export class ChangesFileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ChangesFileError'
  }
}

// ─── ISO weeks ────────────────────────────────────────────────────────────────

export interface IsoWeek {
  year: number
  week: number
}

// date-fns works in local time; rebuild the UTC calendar day locally so the
// week never depends on the machine's timezone.
function utcCalendarDay(date: Date): Date {
  return new Date(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate())
}

export function isoWeekOf(date: Date): IsoWeek {
  const day = utcCalendarDay(date)
  return { year: getISOWeekYear(day), week: getISOWeek(day) }
}

export function formatWeekKey({ year, week }: IsoWeek): string {
  return `${year}-W${String(week).padStart(2, '0')}`
}

export function isoWeekKey(date: Date): string {
  return formatWeekKey(isoWeekOf(date))
}

// ─── Ordering and grouping ────────────────────────────────────────────────────

/** Stable sort by meeting date, oldest first. */
export function sortChanges(changes: readonly ProposalChange[]): ProposalChange[] {
  return [...changes].sort((a, b) => a.changedAt.getTime() - b.changedAt.getTime())
}

export function groupByWeek(changes: readonly ProposalChange[]): Map<string, ProposalChange[]> {
  const weeks = new Map<string, ProposalChange[]>()
  for (const change of sortChanges(changes)) {
    const key = isoWeekKey(change.changedAt)
    const bucket = weeks.get(key)
    if (bucket) bucket.push(change)
    else weeks.set(key, [change])
  }
  return weeks
}

/**
 * One record per issue: the latest `changedAt` wins, and on a tie the record
 * that comes later in the input (the later comment) wins.
 */
export function dedupeLatestPerIssue(changes: readonly ProposalChange[]): ProposalChange[] {
  const byIssue = new Map<number, ProposalChange>()
  for (const change of changes) {
    const existing = byIssue.get(change.issueNumber)
    if (!existing || change.changedAt.getTime() >= existing.changedAt.getTime()) {
      byIssue.set(change.issueNumber, change)
    }
  }
  return sortChanges([...byIssue.values()])
}

// ─── changes.json ─────────────────────────────────────────────────────────────

const wireChangeSchema = z.object({
  issue_number: z.number().int().positive(),
  title: z.string(),
  previous_status: z.union([z.enum(STATUSES), z.literal('')]),
  current_status: z.enum(STATUSES),
  changed_at: z.string().datetime({ offset: true }),
  comment_url: z.string(),
  related_issues: z.array(z.number().int()).nullable().default([]),
})

export const changesOutputSchema = z.object({
  week: z.string().regex(/^\d{4}-W\d{2}$/),
  changes: z.array(wireChangeSchema).nullable().default([]),
})

export type WireChange = z.infer<typeof wireChangeSchema>

export interface ChangesOutput {
  week: string
  changes: ProposalChange[]
}

export function toWireChange(change: ProposalChange): WireChange {
  return {
    issue_number: change.issueNumber,
    title: change.title,
    previous_status: change.previousStatus,
    current_status: change.currentStatus,
    changed_at: change.changedAt.toISOString().replace('.000Z', 'Z'),
    comment_url: change.commentUrl,
    related_issues: change.relatedIssues,
  }
}

export function fromWireChange(wire: WireChange): ProposalChange {
  return {
    issueNumber: wire.issue_number,
    title: wire.title,
    previousStatus: wire.previous_status,
    currentStatus: wire.current_status,
    changedAt: new Date(wire.changed_at),
    commentUrl: wire.comment_url,
    relatedIssues: wire.related_issues ?? [],
  }
}

/** Sorted changes, labelled with the ISO week of the latest one (or of `now`). */
export function buildChangesOutput(changes: readonly ProposalChange[], now = new Date()): ChangesOutput {
  const sorted = sortChanges(changes)
  const latest = sorted.at(-1)
  return {
    week: isoWeekKey(latest ? latest.changedAt : now),
    changes: sorted,
  }
}

export function serializeChangesOutput(output: ChangesOutput): string {
  const wire = { week: output.week, changes: output.changes.map(toWireChange) }
  return JSON.stringify(wire, null, 2) + '\n'
}

export function parseChangesOutput(raw: string): ChangesOutput {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (err) {
    throw new ChangesFileError('changes file is not valid JSON', { cause: err })
  }

  const result = changesOutputSchema.safeParse(json)
  if (!result.success) {
    throw new ChangesFileError(`changes file has an unexpected shape: ${result.error.message}`)
  }
  return {
    week: result.data.week,
    changes: (result.data.changes ?? []).map(fromWireChange),
  }
}

/** Writes next to the target and renames, so readers never see half a file. */
export function writeFileAtomic(path: string, data: string): void {
  mkdirSync(dirname(path), { recursive: true })
  const tmp = `${path}.${process.pid}.tmp`
  writeFileSync(tmp, data, 'utf-8')
  renameSync(tmp, path)
}

export function writeChangesFile(path: string, output: ChangesOutput): void {
  try {
    writeFileAtomic(path, serializeChangesOutput(output))
  } catch (err) {
    throw new ChangesFileError(`failed to write ${path}`, { cause: err })
  }
}
