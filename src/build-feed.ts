/**
 * proposal-digest — feed step
 *
 * Reads every week under the content directory and writes dist/feed.xml.
 *
 * Env vars:
 *   CONTENT_DIR   default: content
 *   DIST_DIR      default: dist
 *   SITE_URL      default: https://example.com (http/https with a host)
 */

import { existsSync, statSync } from 'fs'
import { join } from 'path'
import { writeFileAtomic } from './change-feed.js'
import { ContentManager } from './content.js'
import { generateFeed, validateSiteUrl } from './feed.js'

async function main() {
  const contentDir = process.env.CONTENT_DIR?.trim() || 'content'
  const distDir = process.env.DIST_DIR?.trim() || 'dist'
  const siteUrl = validateSiteUrl(process.env.SITE_URL?.trim() || 'https://example.com')

  console.log('\n📡 proposal-digest — feed')
  console.log(`   Content: ${contentDir}`)
  console.log(`   Output : ${distDir}`)
  console.log(`   Site   : ${siteUrl}`)
  console.log()

  if (!existsSync(contentDir) || !statSync(contentDir).isDirectory()) {
    throw new Error(`content directory does not exist: ${contentDir}`)
  }

  const weeks = new ContentManager({ baseDir: contentDir }).listAllWeeks()
  console.log(`   Found ${weeks.length} week(s) of content`)

  const outPath = join(distDir, 'feed.xml')
  writeFileAtomic(outPath, generateFeed(weeks, { siteUrl }))
  console.log(`   Written: ${outPath}`)

  console.log('\n✓ Done.')
}

main().catch((err) => {
  console.error('\n❌ Fatal:', err)
  process.exit(1)
})
