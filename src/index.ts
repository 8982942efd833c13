/**
 * proposal-digest — parse step
 *
 * Polls the review-meeting minutes thread and writes the status changes it
 * finds to changes.json:
 *   1. Load     — persisted pointer (absent file = fresh bootstrap)
 *   2. Fetch    — new comments + the comment preceding them as baseline
 *   3. Write    — changes.json, then the advanced pointer
 *
 * Prints `has_changes=<bool>` and `changes_count=<n>` for the workflow, also
 * appended to $GITHUB_OUTPUT when it is set.
 *
 * Env vars:
 *   GITHUB_TOKEN     optional, raises the API rate limit
 *   GITHUB_API_URL   default: https://api.github.com
 *   STATE_PATH       default: content/state.json
 *   CHANGES_PATH     default: changes.json
 *   DRY_RUN          "true" → print changes, write nothing
 */

import { appendFileSync } from 'fs'
import { buildChangesOutput, serializeChangesOutput, writeChangesFile } from './change-feed.js'
import { fetchChanges } from './fetch-changes.js'
import { GitHubCommentSource } from './github.js'
import { DEFAULT_STATE_PATH, loadState, saveState } from './state.js'

async function main() {
  const statePath = process.env.STATE_PATH?.trim() || DEFAULT_STATE_PATH
  const changesPath = process.env.CHANGES_PATH?.trim() || 'changes.json'
  const isDryRun = process.env.DRY_RUN === 'true'

  console.log('\n📋 proposal-digest — parse')
  console.log(`   Mode: ${isDryRun ? 'dry run' : 'live'}`)
  if (!process.env.GITHUB_TOKEN) {
    console.warn('⚠  GITHUB_TOKEN not set — unauthenticated rate limits apply')
  }
  console.log()

  const controller = new AbortController()
  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.once(sig, () => {
      console.warn(`\n⚠  ${sig} received — stopping after the current request`)
      controller.abort()
    })
  }

  // ── 1. Load ────────────────────────────────────────────────────────────────
  console.log(`1/3  Loading state from ${statePath}...`)
  const state = loadState(statePath)
  console.log(
    state.isFresh
      ? '     No state file — bootstrap from the latest comment'
      : `     Last processed: ${state.lastProcessedAt.toISOString()} (comment ${state.lastCommentId})`,
  )
  console.log()

  // ── 2. Fetch ───────────────────────────────────────────────────────────────
  console.log('2/3  Fetching minutes...')
  const source = new GitHubCommentSource({
    token: process.env.GITHUB_TOKEN,
    baseUrl: process.env.GITHUB_API_URL?.trim() || undefined,
  })
  const { changes, nextState } = await fetchChanges(source, state, { signal: controller.signal })
  console.log()

  const output = buildChangesOutput(changes)

  if (isDryRun) {
    console.log('─'.repeat(72))
    console.log(serializeChangesOutput(output))
    console.log('─'.repeat(72))
    console.log('\n✓ Dry run complete — no files written.')
  } else {
    // ── 3. Write ─────────────────────────────────────────────────────────────
    // changes.json first: the pointer only moves once the batch is on disk.
    console.log('3/3  Writing results...')
    writeChangesFile(changesPath, output)
    console.log(`     Written: ${changesPath} (${output.week}, ${changes.length} change(s))`)
    if (nextState) {
      saveState(statePath, nextState)
      console.log(`     State: comment ${nextState.lastCommentId} at ${nextState.lastProcessedAt.toISOString()}`)
    }
    console.log('\n✓ Done.')
  }

  const summary = [`has_changes=${changes.length > 0}`, `changes_count=${changes.length}`]
  console.log(summary.join('\n'))
  if (process.env.GITHUB_OUTPUT && !isDryRun) {
    appendFileSync(process.env.GITHUB_OUTPUT, summary.join('\n') + '\n', 'utf-8')
  }
}

main().catch((err) => {
  console.error('\n❌ Fatal:', err)
  process.exit(1)
})
