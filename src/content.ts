/**
 * Weekly content store
 *
 * One markdown file per proposal per ISO week:
 *
 *   content/2019/W34/proposal-25530.md
 *
 * YAML frontmatter carries the change record; the body carries the summary
 * and the related links. Files for a week are merged, never replaced, so a
 * second run in the same week keeps what the first one wrote.
 */

import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from 'fs'
import { join } from 'path'
import matter from 'gray-matter'
import { z } from 'zod'
import { isoWeekOf } from './change-feed.js'
import { STATUSES } from './types.js'
import type { Link, ProposalChange, ProposalContent, WeeklyContent } from './types.js'

export const SUMMARY_MIN_LENGTH = 200
export const SUMMARY_MAX_LENGTH = 500

const SUMMARY_HEADING = '## Summary'
const LINKS_HEADING = '## Related links'
const ISSUE_URL_PREFIX = 'https://github.com/golang/go/issues/'

export class ContentFileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ContentFileError'
  }
}

export interface ContentManagerOptions {
  baseDir?: string
  summariesDir?: string
}

// ─── File format ──────────────────────────────────────────────────────────────

const frontmatterSchema = z.object({
  issue_number: z.number().int().positive(),
  title: z.string().min(1),
  previous_status: z
    .union([z.enum(STATUSES), z.literal(''), z.null()])
    .transform((s) => s ?? ''),
  current_status: z.enum(STATUSES),
  // YAML turns an unquoted RFC 3339 timestamp into a Date
  changed_at: z.union([z.date(), z.string().datetime({ offset: true }).transform((s) => new Date(s))]),
  comment_url: z.string().min(1),
  related_issues: z
    .array(z.object({ title: z.string(), url: z.string() }))
    .nullable()
    .default([]),
})

export function issueUrl(issueNumber: number): string {
  return `${ISSUE_URL_PREFIX}${issueNumber}`
}

export function weekDirPath(year: number, week: number): string {
  return join(String(year), `W${String(week).padStart(2, '0')}`)
}

export function proposalFilename(issueNumber: number): string {
  return `proposal-${issueNumber}.md`
}

export function generateMarkdown(p: ProposalContent): string {
  const lines = [
    '---',
    `issue_number: ${p.issueNumber}`,
    `title: ${JSON.stringify(p.title)}`,
    `previous_status: ${JSON.stringify(p.previousStatus)}`,
    `current_status: ${p.currentStatus}`,
    `changed_at: ${p.changedAt.toISOString().replace('.000Z', 'Z')}`,
    `comment_url: ${JSON.stringify(p.commentUrl)}`,
    'related_issues:',
    ...p.links.flatMap((l) => [`  - title: ${JSON.stringify(l.title)}`, `    url: ${JSON.stringify(l.url)}`]),
    '---',
    '',
    SUMMARY_HEADING,
    '',
  ]
  if (p.summary) lines.push(p.summary, '')
  lines.push(LINKS_HEADING, '')
  lines.push(...p.links.map((l) => `- [${l.title}](${l.url})`))
  return lines.join('\n') + '\n'
}

function extractSummary(body: string): string {
  const kept: string[] = []
  for (const line of body.split(/\r?\n/)) {
    if (line.startsWith(SUMMARY_HEADING)) continue
    if (line.startsWith(LINKS_HEADING)) break
    kept.push(line)
  }
  return kept.join('\n').trim()
}

function readFrontmatter(raw: string, source: string) {
  try {
    return matter(raw)
  } catch (err) {
    throw new ContentFileError(`${source}: invalid frontmatter`, { cause: err })
  }
}

export function parseProposalMarkdown(raw: string, source = 'proposal file'): ProposalContent {
  const parsed = readFrontmatter(raw, source)
  const result = frontmatterSchema.safeParse(parsed.data)
  if (!result.success) {
    throw new ContentFileError(`${source}: ${result.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`)
  }

  const fm = result.data
  return {
    issueNumber: fm.issue_number,
    title: fm.title,
    previousStatus: fm.previous_status,
    currentStatus: fm.current_status,
    changedAt: fm.changed_at,
    commentUrl: fm.comment_url,
    summary: extractSummary(parsed.content),
    links: fm.related_issues ?? [],
  }
}

// ─── Summary helpers ──────────────────────────────────────────────────────────

export function mergeLinks(existing: readonly Link[], added: readonly Link[]): Link[] {
  const byUrl = new Map<string, Link>()
  for (const link of [...existing, ...added]) byUrl.set(link.url, link)
  return [...byUrl.values()]
}

/** GitHub issue links (optionally with an #issuecomment anchor) found in a summary. */
export function extractLinksFromMarkdown(text: string): Link[] {
  const linkRe = /\[([^\]]+)\]\((https:\/\/github\.com\/golang\/go\/issues\/\d+(?:#issuecomment-\d+)?)\)/g
  return [...text.matchAll(linkRe)].map((m) => ({ title: m[1], url: m[2] }))
}

/** Drops a summary's own "## Related links" section; the file writes its own. */
export function stripRelatedLinksSection(text: string): string {
  const kept: string[] = []
  let inLinks = false
  for (const line of text.split('\n')) {
    if (line.startsWith(LINKS_HEADING)) {
      inLinks = true
      continue
    }
    if (inLinks && line.startsWith('## ')) inLinks = false
    if (!inLinks) kept.push(line)
  }
  return kept.join('\n').trim()
}

export function fallbackSummary(p: ProposalContent): string {
  if (!p.previousStatus) {
    return `Proposal #${p.issueNumber} "${p.title}" entered the review as ${p.currentStatus}.`
  }
  return `Proposal #${p.issueNumber} "${p.title}" moved from ${p.previousStatus} to ${p.currentStatus}.`
}

export function validateSummaryLength(summary: string): { ok: boolean; reason: string } {
  const length = [...summary].length
  if (length < SUMMARY_MIN_LENGTH) {
    return { ok: false, reason: `summary too short: ${length} characters (minimum: ${SUMMARY_MIN_LENGTH})` }
  }
  if (length > SUMMARY_MAX_LENGTH) {
    return { ok: false, reason: `summary too long: ${length} characters (maximum: ${SUMMARY_MAX_LENGTH})` }
  }
  return { ok: true, reason: '' }
}

function mergeProposal(existing: ProposalContent, incoming: ProposalContent): ProposalContent {
  return {
    ...incoming,
    previousStatus: existing.previousStatus,
    summary: incoming.summary || existing.summary,
    links: mergeLinks(existing.links, incoming.links),
  }
}

// ─── Manager ──────────────────────────────────────────────────────────────────

export class ContentManager {
  readonly baseDir: string
  readonly summariesDir: string

  constructor(options: ContentManagerOptions = {}) {
    this.baseDir = options.baseDir ?? 'content'
    this.summariesDir = options.summariesDir ?? 'summaries'
  }

  /** Week of the first change; callers group by week before calling this. */
  prepareContent(changes: readonly ProposalChange[], now = new Date()): WeeklyContent {
    if (changes.length === 0) {
      return { year: 0, week: 0, proposals: [], createdAt: null }
    }

    const { year, week } = isoWeekOf(changes[0].changedAt)
    const proposals = changes.map((change) => ({
      issueNumber: change.issueNumber,
      title: change.title,
      previousStatus: change.previousStatus,
      currentStatus: change.currentStatus,
      changedAt: change.changedAt,
      commentUrl: change.commentUrl,
      summary: '',
      links: [
        { title: 'proposal issue', url: issueUrl(change.issueNumber) },
        ...change.relatedIssues.map((n) => ({ title: 'related discussion', url: issueUrl(n) })),
      ],
    }))

    return { year, week, proposals, createdAt: now }
  }

  writeContent(content: WeeklyContent): void {
    if (content.proposals.length === 0) return

    const dir = join(this.baseDir, weekDirPath(content.year, content.week))
    try {
      mkdirSync(dir, { recursive: true })
      for (const proposal of content.proposals) {
        writeFileSync(join(dir, proposalFilename(proposal.issueNumber)), generateMarkdown(proposal), 'utf-8')
      }
    } catch (err) {
      throw new ContentFileError(`failed to write content under ${dir}`, { cause: err })
    }
  }

  readExistingContent(year: number, week: number): WeeklyContent | null {
    const dir = join(this.baseDir, weekDirPath(year, week))
    if (!existsSync(dir)) return null

    const proposals = readdirSync(dir, { withFileTypes: true })
      .filter((e) => e.isFile() && e.name.startsWith('proposal-') && e.name.endsWith('.md'))
      .map((e) => e.name)
      .sort()
      .map((name) => {
        const path = join(dir, name)
        return parseProposalMarkdown(readFileSync(path, 'utf-8'), path)
      })

    if (proposals.length === 0) return null
    return { year, week, proposals, createdAt: null }
  }

  /**
   * Same-week merge: the incoming status wins, the first recorded
   * `previousStatus` is kept, and an empty incoming summary keeps the old one.
   */
  mergeContent(existing: WeeklyContent | null, incoming: WeeklyContent): WeeklyContent {
    if (!existing) return incoming

    const byIssue = new Map(existing.proposals.map((p) => [p.issueNumber, p]))
    for (const proposal of incoming.proposals) {
      const old = byIssue.get(proposal.issueNumber)
      byIssue.set(proposal.issueNumber, old ? mergeProposal(old, proposal) : proposal)
    }

    return {
      year: incoming.year,
      week: incoming.week,
      proposals: [...byIssue.values()],
      createdAt: existing.createdAt ?? incoming.createdAt,
    }
  }

  writeContentWithMerge(content: WeeklyContent): WeeklyContent {
    if (content.proposals.length === 0) return content
    const merged = this.mergeContent(this.readExistingContent(content.year, content.week), content)
    this.writeContent(merged)
    return merged
  }

  /** `summaries/<issue>.md` → summary text, keyed by issue number. */
  readSummaries(): Map<number, string> {
    const summaries = new Map<number, string>()
    if (!existsSync(this.summariesDir)) return summaries

    for (const entry of readdirSync(this.summariesDir, { withFileTypes: true })) {
      const match = entry.isFile() ? /^(\d+)\.md$/.exec(entry.name) : null
      if (!match) continue
      const text = readFileSync(join(this.summariesDir, entry.name), 'utf-8').trim()
      summaries.set(Number(match[1]), text)
    }
    return summaries
  }

  integrateSummaries(content: WeeklyContent, summaries: ReadonlyMap<number, string>): WeeklyContent {
    return {
      ...content,
      proposals: content.proposals.map((p) => {
        const summary = summaries.get(p.issueNumber)
        if (!summary) return p
        return {
          ...p,
          summary: stripRelatedLinksSection(summary),
          links: mergeLinks(p.links, extractLinksFromMarkdown(summary)),
        }
      }),
    }
  }

  applyFallback(content: WeeklyContent): WeeklyContent {
    return {
      ...content,
      proposals: content.proposals.map((p) => (p.summary ? p : { ...p, summary: fallbackSummary(p) })),
    }
  }

  /** Every `YYYY/Www` directory under the base dir, newest week first. */
  listAllWeeks(): WeeklyContent[] {
    if (!existsSync(this.baseDir)) return []

    const weeks: WeeklyContent[] = []
    for (const yearEntry of readdirSync(this.baseDir, { withFileTypes: true })) {
      if (!yearEntry.isDirectory() || !/^\d{4}$/.test(yearEntry.name)) continue
      const year = Number(yearEntry.name)

      for (const weekEntry of readdirSync(join(this.baseDir, yearEntry.name), { withFileTypes: true })) {
        const match = weekEntry.isDirectory() ? /^W(\d{2})$/.exec(weekEntry.name) : null
        if (!match) continue
        const content = this.readExistingContent(year, Number(match[1]))
        if (content) weeks.push(content)
      }
    }

    return weeks.sort((a, b) => b.year - a.year || b.week - a.week)
  }
}
