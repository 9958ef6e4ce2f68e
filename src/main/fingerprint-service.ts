import { createReadStream } from 'fs'
import crypto from 'crypto'
import path from 'path'
import { v5 as uuidv5 } from 'uuid'
import {
  HASH_CHUNK_BYTES,
  HASH_MIN_BYTES_PER_MS,
  HASH_TIMEOUT_BASE_MS,
  ID_NAMESPACE,
  IMAGE_EXTENSIONS,
  PERCEPTUAL_GRID_HEIGHT,
  PERCEPTUAL_GRID_WIDTH,
  SENTINEL_DIGEST
} from '../shared/constants'
import { FifoQueue } from '../shared/fifo-queue'
import { FileEntry, FileRecord, PlanWarning, ScanErrorMarker } from '../shared/types'
import { ensureError } from './errors'
import { logger } from './logger'
import { ImageDecoder, differenceHash, sharpDecoder } from './perceptual-hash'

const log = logger.child('fingerprint')

export interface FingerprintOptions {
  concurrency: number
  decoder?: ImageDecoder
  // Base read deadline per file; grows with the file's size
  hashTimeoutMs?: number
}

export interface FingerprintRunOptions {
  // Checked before each file is started
  isExpired?: () => boolean
  onProgress?: (done: number, total: number) => void
}

export interface FingerprintOutcome {
  record: FileRecord
  warnings: PlanWarning[]
}

export interface FingerprintBatch {
  // Same relative order as the input entries
  records: FileRecord[]
  warnings: PlanWarning[]
  truncated: boolean
}

export function recordId(filePath: string): string {
  return uuidv5(filePath, ID_NAMESPACE)
}

export function isImagePath(filePath: string): boolean {
  return IMAGE_EXTENSIONS.has(path.extname(filePath).toLowerCase())
}

/**
 * Read deadline for one file: the base plus the time a slow disk
 * (HASH_MIN_BYTES_PER_MS) needs for `sizeBytes`. Only stalled reads hit it.
 */
export function hashDeadlineMs(sizeBytes: number, baseMs = HASH_TIMEOUT_BASE_MS): number {
  return baseMs + Math.ceil(Math.max(0, sizeBytes) / HASH_MIN_BYTES_PER_MS)
}

interface DigestResult {
  digest: string
  bytesRead: number
}

export class FingerprintService {
  private readonly concurrency: number
  private readonly decoder: ImageDecoder
  private readonly hashTimeoutMs: number

  constructor(options: FingerprintOptions) {
    this.concurrency = Math.max(1, options.concurrency)
    this.decoder = options.decoder ?? sharpDecoder
    this.hashTimeoutMs = options.hashTimeoutMs ?? HASH_TIMEOUT_BASE_MS
  }

  /**
   * Never rejects: unreadable and empty files come back with the sentinel
   * digest and an error marker.
   */
  async fingerprintFile(entry: FileEntry): Promise<FingerprintOutcome> {
    const base = {
      id: recordId(entry.path),
      path: entry.path,
      name: path.basename(entry.path),
      sizeBytes: entry.sizeBytes,
      mtimeMs: entry.mtimeMs
    }

    let digested: DigestResult
    try {
      digested = await this.digestFile(entry.path, hashDeadlineMs(entry.sizeBytes, this.hashTimeoutMs))
    } catch (err: unknown) {
      const message = ensureError(err).message
      log.warn('Cannot digest file', { path: entry.path, error: message })
      return this.withError(base, { code: 'UNREADABLE', message })
    }

    if (digested.bytesRead === 0) {
      return this.withError(base, { code: 'EMPTY', message: 'File is empty' })
    }

    const warnings: PlanWarning[] = []
    let perceptualDigest: string | undefined
    if (isImagePath(entry.path)) {
      try {
        perceptualDigest = await this.perceptualDigest(entry.path)
      } catch (err: unknown) {
        const message = ensureError(err).message
        log.warn('Perceptual hash failed, continuing with exact digest only', {
          path: entry.path,
          error: message
        })
        warnings.push({ kind: 'PERCEPTUAL_HASH_FAILED', path: entry.path, message })
      }
    }

    const record: FileRecord = perceptualDigest
      ? { ...base, digest: digested.digest, perceptualDigest }
      : { ...base, digest: digested.digest }
    return { record: Object.freeze(record), warnings }
  }

  /**
   * Runs up to `concurrency` files at once. Stops dispatching when the
   * deadline passes; files not started are left out and `truncated` is set.
   */
  async fingerprintAll(entries: FileEntry[], options: FingerprintRunOptions = {}): Promise<FingerprintBatch> {
    const queue = new FifoQueue<{ index: number; entry: FileEntry }>()
    queue.enqueueAll(entries.map((entry, index) => ({ index, entry })))

    const results: Array<FingerprintOutcome | undefined> = new Array(entries.length)
    let done = 0
    let truncated = false

    log.info(`Fingerprinting ${entries.length} files`, { concurrency: this.concurrency })

    const lane = async (): Promise<void> => {
      for (;;) {
        if (options.isExpired?.()) {
          if (!queue.isEmpty) truncated = true
          return
        }
        const item = queue.dequeue()
        if (!item) return
        results[item.index] = await this.fingerprintFile(item.entry)
        done++
        options.onProgress?.(done, entries.length)
      }
    }

    const lanes = Math.min(this.concurrency, entries.length)
    await Promise.all(Array.from({ length: lanes }, () => lane()))

    const records: FileRecord[] = []
    const warnings: PlanWarning[] = []
    for (const outcome of results) {
      if (!outcome) continue
      records.push(outcome.record)
      warnings.push(...outcome.warnings)
    }

    log.info('Fingerprinting complete', {
      records: records.length,
      errors: records.filter((r) => r.error).length,
      truncated
    })
    return { records, warnings, truncated }
  }

  private withError(base: Omit<FileRecord, 'digest'>, error: ScanErrorMarker): FingerprintOutcome {
    const record: FileRecord = { ...base, digest: SENTINEL_DIGEST, error }
    return {
      record: Object.freeze(record),
      warnings: [{ kind: 'SCAN_ERROR', path: base.path, message: `${error.code}: ${error.message}` }]
    }
  }

  private async perceptualDigest(filePath: string): Promise<string> {
    const pixels = await this.decoder.decodeGrayscale(filePath, PERCEPTUAL_GRID_WIDTH, PERCEPTUAL_GRID_HEIGHT)
    return differenceHash(pixels)
  }

  private digestFile(filePath: string, deadlineMs: number): Promise<DigestResult> {
    return new Promise<DigestResult>((resolve, reject) => {
      const hash = crypto.createHash('sha256')
      const stream = createReadStream(filePath, { highWaterMark: HASH_CHUNK_BYTES })
      let bytesRead = 0

      const timeout = setTimeout(() => {
        stream.destroy()
        reject(new Error(`Hashing timed out after ${deadlineMs}ms`))
      }, deadlineMs)

      stream.on('error', (err) => {
        clearTimeout(timeout)
        reject(err)
      })

      stream.on('data', (chunk) => {
        bytesRead += chunk.length
        hash.update(chunk)
      })

      stream.on('end', () => {
        clearTimeout(timeout)
        resolve({ digest: hash.digest('hex'), bytesRead })
      })
    })
  }
}
