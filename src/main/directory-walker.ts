import type { Dirent } from 'fs'
import fs from 'fs/promises'
import path from 'path'
import { DEFAULT_IGNORES } from '../shared/constants'
import { FifoQueue } from '../shared/fifo-queue'
import { FileEntry, PlanWarning } from '../shared/types'
import { ScanError, ensureError } from './errors'
import { logger } from './logger'

const log = logger.child('walker')

export interface WalkOptions {
  exclusions?: string[]
  maxFiles?: number | null
}

export interface WalkResult {
  entries: FileEntry[]
  warnings: PlanWarning[]
  // true when maxFiles stopped the walk early
  truncated: boolean
}

function shouldIgnore(name: string, exclusions: string[]): boolean {
  if (DEFAULT_IGNORES.has(name)) return true
  return exclusions.includes(name)
}

/**
 * Breadth-first walk over the given roots. Symlinks are never followed.
 * Only a root that cannot be read at all is fatal.
 */
export async function walkDirectories(roots: string[], options: WalkOptions = {}): Promise<WalkResult> {
  const exclusions = options.exclusions ?? []
  const maxFiles = options.maxFiles ?? null
  const dirQueue = new FifoQueue<string>()
  const entries: FileEntry[] = []
  const warnings: PlanWarning[] = []

  for (const root of roots) {
    const absolute = path.resolve(root)
    try {
      const stats = await fs.stat(absolute)
      if (!stats.isDirectory()) {
        throw new ScanError(`Not a directory: ${absolute}`, absolute)
      }
    } catch (err: unknown) {
      if (err instanceof ScanError) throw err
      throw new ScanError(`Cannot read root ${absolute}`, absolute, { cause: ensureError(err) })
    }
    dirQueue.enqueue(absolute)
  }

  log.info('Walking directories', { roots: dirQueue.toArray() })

  while (!dirQueue.isEmpty) {
    const dirPath = dirQueue.dequeue()
    if (dirPath === undefined) break

    let dirents: Dirent[]
    try {
      dirents = await fs.readdir(dirPath, { withFileTypes: true })
    } catch (err: unknown) {
      const message = ensureError(err).message
      log.warn('Skipping unreadable directory', { path: dirPath, error: message })
      warnings.push({ kind: 'WALK_ERROR', path: dirPath, message })
      continue
    }

    // Sorted so repeated walks list files in the same order
    dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

    for (const entry of dirents) {
      if (shouldIgnore(entry.name, exclusions)) continue
      const fullPath = path.join(dirPath, entry.name)

      if (entry.isDirectory()) {
        dirQueue.enqueue(fullPath)
      } else if (entry.isFile()) {
        try {
          const stats = await fs.stat(fullPath)
          entries.push({ path: fullPath, sizeBytes: stats.size, mtimeMs: stats.mtimeMs })
        } catch (err: unknown) {
          // Vanished between readdir and stat
          const message = ensureError(err).message
          warnings.push({ kind: 'WALK_ERROR', path: fullPath, message })
          continue
        }

        if (maxFiles !== null && entries.length >= maxFiles) {
          log.info('File cap reached, stopping walk', { maxFiles })
          return { entries, warnings, truncated: true }
        }
      }
    }
  }

  log.info('Walk complete', { files: entries.length, warnings: warnings.length })
  return { entries, warnings, truncated: false }
}
