/**
 * proposal-digest — summarize step
 *
 * Writes a Claude-generated summary for every proposal in changes.json that
 * does not have one yet. Runs between parse and integrate; a proposal whose
 * summary fails is left to the integrate step's generated sentence.
 *
 * Env vars:
 *   ANTHROPIC_API_KEY   required
 *   GITHUB_TOKEN        optional, used to read the proposal issue bodies
 *   CHANGES_PATH        default: changes.json
 *   SUMMARIES_DIR       default: summaries
 *   DRY_RUN             "true" → print summaries, write nothing
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs'
import { join } from 'path'
import { dedupeLatestPerIssue, parseChangesOutput } from './change-feed.js'
import { generateSummary } from './generate-summary.js'
import { GitHubCommentSource } from './github.js'

async function main() {
  const changesPath = process.env.CHANGES_PATH?.trim() || 'changes.json'
  const summariesDir = process.env.SUMMARIES_DIR?.trim() || 'summaries'
  const isDryRun = process.env.DRY_RUN === 'true'

  console.log('\n✍️  proposal-digest — summarize')
  console.log(`   Mode: ${isDryRun ? 'dry run' : 'live'}`)

  if (!process.env.ANTHROPIC_API_KEY) {
    console.error('❌ ANTHROPIC_API_KEY is not set')
    process.exit(1)
  }
  console.log()

  const { changes } = parseChangesOutput(readFileSync(changesPath, 'utf-8'))
  const pending = dedupeLatestPerIssue(changes).filter(
    (c) => !existsSync(join(summariesDir, `${c.issueNumber}.md`)),
  )
  console.log(`   ${pending.length} proposal(s) without a summary`)
  if (pending.length === 0) {
    console.log('\n✓ Done (nothing to summarize).')
    return
  }

  const github = new GitHubCommentSource({ token: process.env.GITHUB_TOKEN })
  if (!isDryRun) mkdirSync(summariesDir, { recursive: true })

  let written = 0
  for (const change of pending) {
    console.log(`   → #${change.issueNumber} ${change.title}`)
    try {
      const issueBody = await github.fetchIssueBody(change.issueNumber)
      const summary = await generateSummary(change, issueBody)
      if (!summary) {
        console.warn(`     ⚠ Empty summary — skipped`)
        continue
      }

      if (isDryRun) {
        console.log(`\n${summary}\n`)
      } else {
        writeFileSync(join(summariesDir, `${change.issueNumber}.md`), summary + '\n', 'utf-8')
        written++
      }
    } catch (err) {
      console.warn(`     ⚠ Summary failed — skipped: ${(err as Error).message}`)
    }
  }

  console.log(`\n✓ ${isDryRun ? 'Dry run complete — no files written.' : `Done (${written} written).`}`)
}

main().catch((err) => {
  console.error('\n❌ Fatal:', err)
  process.exit(1)
})
