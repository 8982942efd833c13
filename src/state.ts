import { existsSync, readFileSync } from 'fs'
import { z } from 'zod'
import { writeFileAtomic } from './change-feed.js'
import type { PersistentState } from './types.js'

export const DEFAULT_STATE_PATH = 'content/state.json'

export class StateFileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StateFileError'
  }
}

const stateFileSchema = z.object({
  lastProcessedAt: z.string().datetime({ offset: true }),
  lastCommentId: z.string(),
})

export function freshState(): PersistentState {
  return { lastProcessedAt: new Date(0), lastCommentId: '', isFresh: true }
}

/**
 * A missing file is the bootstrap state, not an error: the next run then
 * processes only the newest comment instead of the whole history.
 */
export function loadState(path: string): PersistentState {
  if (!existsSync(path)) return freshState()

  let json: unknown
  try {
    json = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (err) {
    throw new StateFileError(`failed to read state file ${path}`, { cause: err })
  }

  const result = stateFileSchema.safeParse(json)
  if (!result.success) {
    throw new StateFileError(`state file ${path} has an unexpected shape: ${result.error.message}`)
  }

  return {
    lastProcessedAt: new Date(result.data.lastProcessedAt),
    lastCommentId: result.data.lastCommentId,
    isFresh: false,
  }
}

export function saveState(path: string, state: PersistentState): void {
  const data = {
    lastProcessedAt: state.lastProcessedAt.toISOString().replace('.000Z', 'Z'),
    lastCommentId: state.lastCommentId,
  }
  try {
    writeFileAtomic(path, JSON.stringify(data, null, 2) + '\n')
  } catch (err) {
    throw new StateFileError(`failed to write state file ${path}`, { cause: err })
  }
}
