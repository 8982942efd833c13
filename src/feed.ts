import RSS from 'rss'
import type { WeeklyContent } from './types.js'

export const MAX_FEED_ITEMS = 20
const SUMMARY_EXCERPT_LENGTH = 200

export interface FeedOptions {
  siteUrl: string
  title?: string
  description?: string
  now?: Date
}

/** Returns the URL unchanged when it is http(s) with a host. */
export function validateSiteUrl(raw: string): string {
  let url: URL
  try {
    url = new URL(raw)
  } catch (err) {
    throw new Error(`invalid SITE_URL: ${raw}`, { cause: err })
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`SITE_URL must use http or https: ${raw}`)
  }
  if (!url.host) throw new Error(`SITE_URL must include a host: ${raw}`)
  return raw
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

/** Code-point aware; appends "..." when cut. */
export function truncate(s: string, max: number): string {
  const chars = [...s]
  if (chars.length <= max) return s
  if (max <= 3) return '...'
  return chars.slice(0, max - 3).join('') + '...'
}

export function weekPath(year: number, week: number): string {
  return `${year}/w${String(week).padStart(2, '0')}`
}

export function buildDescription(week: WeeklyContent): string {
  const parts = [`<p>Go proposal updates for ${weekLabel(week)}</p>`]

  if (week.proposals.length === 0) {
    parts.push('<p>No updates this week.</p>')
    return parts.join('')
  }

  parts.push('<ul>')
  for (const p of week.proposals) {
    const from = p.previousStatus || 'new'
    let item = `<li><strong>#${p.issueNumber}</strong>: ${escapeHtml(p.title)}`
    item += ` (<code>${from}</code> → <code>${p.currentStatus}</code>)`
    if (p.summary) item += `<br/>${escapeHtml(truncate(p.summary, SUMMARY_EXCERPT_LENGTH))}`
    parts.push(item + '</li>')
  }
  parts.push('</ul>')
  return parts.join('')
}

function weekLabel(week: WeeklyContent): string {
  return `${week.year} week ${week.week}`
}

function publishedAt(week: WeeklyContent): Date {
  let latest = week.createdAt ?? new Date(0)
  for (const p of week.proposals) {
    if (p.changedAt > latest) latest = p.changedAt
  }
  return latest
}

/** RSS 2.0 feed with one item per week, newest first, at most MAX_FEED_ITEMS. */
export function generateFeed(weeks: readonly WeeklyContent[], options: FeedOptions): string {
  const siteUrl = options.siteUrl.replace(/\/+$/, '')

  const feed = new RSS({
    title: options.title ?? 'Go Proposal Weekly Digest',
    description: options.description ?? 'Weekly digest of the Go proposal review meeting minutes',
    site_url: `${siteUrl}/`,
    feed_url: `${siteUrl}/feed.xml`,
    language: 'en',
    pubDate: options.now ?? new Date(),
  })

  const newestFirst = [...weeks].sort((a, b) => b.year - a.year || b.week - a.week)
  for (const week of newestFirst.slice(0, MAX_FEED_ITEMS)) {
    const path = weekPath(week.year, week.week)
    feed.item({
      title: `Go proposal updates — ${weekLabel(week)}`,
      description: buildDescription(week),
      url: `${siteUrl}/${path}/`,
      guid: `${siteUrl}/${path}`,
      date: publishedAt(week),
    })
  }

  return feed.xml({ indent: true })
}
