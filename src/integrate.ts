/**
 * proposal-digest — integrate step
 *
 * Turns changes.json into weekly content files:
 *   1. Group    — changes by ISO week, latest record per issue
 *   2. Enrich   — summaries/<issue>.md where present, a generated sentence otherwise
 *   3. Write    — content/YYYY/Www/proposal-<issue>.md, merged with what is there
 *
 * Env vars:
 *   CHANGES_PATH    default: changes.json
 *   CONTENT_DIR     default: content
 *   SUMMARIES_DIR   default: summaries
 */

import { readFileSync } from 'fs'
import { dedupeLatestPerIssue, groupByWeek, parseChangesOutput } from './change-feed.js'
import { ContentManager } from './content.js'

async function main() {
  const changesPath = process.env.CHANGES_PATH?.trim() || 'changes.json'
  const manager = new ContentManager({
    baseDir: process.env.CONTENT_DIR?.trim() || 'content',
    summariesDir: process.env.SUMMARIES_DIR?.trim() || 'summaries',
  })

  console.log('\n🗂  proposal-digest — integrate')

  const { changes } = parseChangesOutput(readFileSync(changesPath, 'utf-8'))
  console.log(`   Loaded ${changes.length} change(s) from ${changesPath}`)
  if (changes.length === 0) {
    console.log('\n✓ Done (no changes).')
    return
  }

  // ── 1. Group ───────────────────────────────────────────────────────────────
  const weeks = groupByWeek(changes)
  console.log(`   Grouped into ${weeks.size} week(s)`)

  // ── 2. Enrich ──────────────────────────────────────────────────────────────
  const summaries = manager.readSummaries()
  console.log(`   Loaded ${summaries.size} summary file(s)`)
  console.log()

  // ── 3. Write ───────────────────────────────────────────────────────────────
  for (const [key, weekChanges] of weeks) {
    const deduped = dedupeLatestPerIssue(weekChanges)
    console.log(`   ${key}: ${weekChanges.length} change(s)`)
    if (deduped.length !== weekChanges.length) {
      console.log(`     Deduplicated to ${deduped.length}`)
    }

    let content = manager.prepareContent(deduped)
    content = manager.integrateSummaries(content, summaries)
    content = manager.applyFallback(content)
    const written = manager.writeContentWithMerge(content)
    console.log(`     Written ${written.proposals.length} proposal file(s)`)
  }

  console.log('\n✓ Done.')
}

main().catch((err) => {
  console.error('\n❌ Fatal:', err)
  process.exit(1)
})
