import Anthropic from '@anthropic-ai/sdk'
import { SUMMARY_MAX_LENGTH, SUMMARY_MIN_LENGTH, issueUrl, validateSummaryLength } from './content.js'
import type { ProposalChange } from './types.js'

const MODEL = 'claude-sonnet-4-5'
const MAX_TOKENS = 1024

// ─── System prompt ────────────────────────────────────────────────────────────

const SYSTEM_PROMPT = `You write the per-proposal entries of a weekly digest of the Go proposal review meeting.

Each entry explains, for a Go developer who has not followed the issue:
- what the proposal changes (package, API or tool, with the concrete names)
- why it was proposed
- what the status change means for them (accepted → it will land; likely accept → final comment period; declined → it will not happen; hold → waiting on something)

Rules:
- ${SUMMARY_MIN_LENGTH}–${SUMMARY_MAX_LENGTH} characters of GitHub-flavored markdown prose, no headings
- Link other golang/go issues you mention as [#NNNNN](https://github.com/golang/go/issues/NNNNN)
- No marketing language, no speculation beyond the issue text
- Output the summary only — no preamble, no code fences`

const STATUS_LABELS: Record<ProposalChange['currentStatus'], string> = {
  discussions: 'under discussion',
  likely_accept: 'likely accept',
  likely_decline: 'likely decline',
  accepted: 'accepted',
  declined: 'declined',
  hold: 'on hold',
  active: 'active',
}

// ─── User prompt builder ──────────────────────────────────────────────────────

export function buildSummaryPrompt(change: ProposalChange, issueBody: string): string {
  const transition = change.previousStatus
    ? `${STATUS_LABELS[change.previousStatus]} → ${STATUS_LABELS[change.currentStatus]}`
    : `newly listed as ${STATUS_LABELS[change.currentStatus]}`

  const parts = [
    `Summarize proposal **#${change.issueNumber}: ${change.title}**.`,
    '',
    `- Status change: ${transition}`,
    `- Meeting date: ${change.changedAt.toISOString().slice(0, 10)}`,
    `- Issue: ${issueUrl(change.issueNumber)}`,
    `- Minutes: ${change.commentUrl}`,
    '',
  ]

  if (issueBody.trim()) {
    parts.push('## Issue description', issueBody.trim(), '')
  } else {
    parts.push('## Issue description', '_Not available — rely on the title only._', '')
  }

  return parts.join('\n')
}

/** Claude sometimes wraps output in fences despite instructions. */
export function cleanSummary(raw: string): string {
  return raw
    .trim()
    .replace(/^```(?:markdown|md)?\s*/i, '')
    .replace(/\s*```$/i, '')
    .trim()
}

// ─── Main export ──────────────────────────────────────────────────────────────

export async function generateSummary(change: ProposalChange, issueBody: string): Promise<string> {
  const client = new Anthropic()

  const message = await client.messages.create({
    model: MODEL,
    max_tokens: MAX_TOKENS,
    system: SYSTEM_PROMPT,
    messages: [{ role: 'user', content: buildSummaryPrompt(change, issueBody) }],
  })

  const block = message.content[0]
  const summary = cleanSummary(block && block.type === 'text' ? block.text : '')

  const { ok, reason } = validateSummaryLength(summary)
  if (!ok) console.warn(`  ⚠ #${change.issueNumber}: ${reason}`)

  return summary
}
