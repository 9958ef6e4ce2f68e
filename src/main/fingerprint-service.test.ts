import crypto from 'crypto'
import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { MIB, SENTINEL_DIGEST } from '../shared/constants'
import { FileEntry } from '../shared/types'
import { FingerprintService, hashDeadlineMs, isImagePath, recordId } from './fingerprint-service'
import { ImageDecoder } from './perceptual-hash'

const falling = (): Uint8Array => {
  const pixels = new Uint8Array(72)
  for (let i = 0; i < 72; i++) pixels[i] = 200 - (i % 9) * 10
  return pixels
}

const fakeDecoder = () => ({
  decodeGrayscale: vi.fn(async (_filePath: string, _width: number, _height: number) => falling())
})

describe('FingerprintService', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sweepwise-fp-'))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  async function writeEntry(name: string, content: string | Buffer): Promise<FileEntry> {
    const filePath = path.join(dir, name)
    await fs.writeFile(filePath, content)
    return { path: filePath, sizeBytes: Buffer.byteLength(content), mtimeMs: 1_700_000_000_000 }
  }

  it('digests content with sha256', async () => {
    const entry = await writeEntry('notes.txt', 'hello sweepwise\n')
    const service = new FingerprintService({ concurrency: 1, decoder: fakeDecoder() })

    const { record, warnings } = await service.fingerprintFile(entry)

    expect(record.digest).toBe(crypto.createHash('sha256').update('hello sweepwise\n').digest('hex'))
    expect(record.id).toBe(recordId(entry.path))
    expect(record.name).toBe('notes.txt')
    expect(record.mtimeMs).toBe(1_700_000_000_000)
    expect(record.perceptualDigest).toBeUndefined()
    expect(record.error).toBeUndefined()
    expect(warnings).toEqual([])
    expect(Object.isFrozen(record)).toBe(true)
  })

  it('gives identical content the same digest', async () => {
    const a = await writeEntry('a.bin', 'same bytes')
    const b = await writeEntry('b.bin', 'same bytes')
    const c = await writeEntry('c.bin', 'other bytes')
    const service = new FingerprintService({ concurrency: 2 })

    const [ra, rb, rc] = await Promise.all([a, b, c].map((e) => service.fingerprintFile(e)))
    expect(ra.record.digest).toBe(rb.record.digest)
    expect(ra.record.digest).not.toBe(rc.record.digest)
    expect(ra.record.id).not.toBe(rb.record.id)
  })

  it('marks an empty file', async () => {
    const entry = await writeEntry('empty.txt', '')
    const service = new FingerprintService({ concurrency: 1 })

    const { record, warnings } = await service.fingerprintFile(entry)

    expect(record.digest).toBe(SENTINEL_DIGEST)
    expect(record.error).toEqual({ code: 'EMPTY', message: 'File is empty' })
    expect(warnings).toEqual([{ kind: 'SCAN_ERROR', path: entry.path, message: 'EMPTY: File is empty' }])
  })

  it('marks an unreadable file instead of throwing', async () => {
    const entry: FileEntry = { path: path.join(dir, 'gone.txt'), sizeBytes: 10, mtimeMs: 0 }
    const service = new FingerprintService({ concurrency: 1 })

    const { record, warnings } = await service.fingerprintFile(entry)

    expect(record.digest).toBe(SENTINEL_DIGEST)
    expect(record.error?.code).toBe('UNREADABLE')
    expect(warnings).toHaveLength(1)
    expect(warnings[0].kind).toBe('SCAN_ERROR')
    expect(warnings[0].message.startsWith('UNREADABLE: ')).toBe(true)
  })

  it('adds a perceptual digest for images', async () => {
    const entry = await writeEntry('photo.JPG', 'pretend jpeg bytes')
    const decoder = fakeDecoder()
    const service = new FingerprintService({ concurrency: 1, decoder })

    const { record, warnings } = await service.fingerprintFile(entry)

    expect(decoder.decodeGrayscale).toHaveBeenCalledWith(entry.path, 9, 8)
    expect(record.perceptualDigest).toBe('ffffffffffffffff')
    expect(warnings).toEqual([])
  })

  it('keeps the exact digest when image decoding fails', async () => {
    const entry = await writeEntry('photo.png', 'not an image')
    const decoder: ImageDecoder = {
      decodeGrayscale: vi.fn(async () => {
        throw new Error('unsupported image format')
      })
    }
    const service = new FingerprintService({ concurrency: 1, decoder })

    const { record, warnings } = await service.fingerprintFile(entry)

    expect(record.digest).toBe(crypto.createHash('sha256').update('not an image').digest('hex'))
    expect(record.perceptualDigest).toBeUndefined()
    expect(record.error).toBeUndefined()
    expect(warnings).toEqual([
      { kind: 'PERCEPTUAL_HASH_FAILED', path: entry.path, message: 'unsupported image format' }
    ])
  })

  it('survives a corrupt image with the default decoder', async () => {
    const entry = await writeEntry('broken.png', 'this is not really a png image')
    const service = new FingerprintService({ concurrency: 1 })

    const { record, warnings } = await service.fingerprintFile(entry)

    expect(record.error).toBeUndefined()
    expect(record.perceptualDigest).toBeUndefined()
    expect(warnings).toHaveLength(1)
    expect(warnings[0].kind).toBe('PERCEPTUAL_HASH_FAILED')
  })

  it('never decodes non-image files', async () => {
    const entry = await writeEntry('report.pdf', 'pdf-ish')
    const decoder = fakeDecoder()
    await new FingerprintService({ concurrency: 1, decoder }).fingerprintFile(entry)
    expect(decoder.decodeGrayscale).not.toHaveBeenCalled()
  })

  it('recognises image extensions case-insensitively', () => {
    expect(isImagePath('/x/a.JPEG')).toBe(true)
    expect(isImagePath('/x/a.webp')).toBe(true)
    expect(isImagePath('/x/a.txt')).toBe(false)
  })

  it('grows the read deadline with file size', () => {
    expect(hashDeadlineMs(0)).toBe(30_000)
    expect(hashDeadlineMs(64 * MIB, 5)).toBe(65_541)
    expect(hashDeadlineMs(1, 5)).toBe(6)
  })

  it('digests a large file even with a short base deadline', async () => {
    const content = Buffer.alloc(8 * MIB, 7)
    const entry = await writeEntry('big.bin', content)

    const { record, warnings } = await new FingerprintService({ concurrency: 1, hashTimeoutMs: 5 }).fingerprintFile(entry)

    expect(record.error).toBeUndefined()
    expect(record.digest).toBe(crypto.createHash('sha256').update(content).digest('hex'))
    expect(warnings).toEqual([])
  })

  describe('fingerprintAll', () => {
    it('keeps input order and bounds concurrency', async () => {
      const entries: FileEntry[] = []
      for (let i = 0; i < 5; i++) entries.push(await writeEntry(`img_${i}.png`, `image ${i}`))

      let inFlight = 0
      let peak = 0
      const decoder: ImageDecoder = {
        async decodeGrayscale() {
          inFlight++
          peak = Math.max(peak, inFlight)
          await new Promise((resolve) => setTimeout(resolve, 10))
          inFlight--
          return falling()
        }
      }
      const progress: number[] = []
      const service = new FingerprintService({ concurrency: 2, decoder })

      const batch = await service.fingerprintAll(entries, { onProgress: (done) => progress.push(done) })

      expect(batch.records.map((r) => r.path)).toEqual(entries.map((e) => e.path))
      expect(batch.truncated).toBe(false)
      expect(peak).toBeLessThanOrEqual(2)
      expect(progress).toEqual([1, 2, 3, 4, 5])
    })

    it('stops dispatching once expired', async () => {
      const entries: FileEntry[] = []
      for (let i = 0; i < 4; i++) entries.push(await writeEntry(`f_${i}.txt`, `file ${i}`))

      let done = 0
      const service = new FingerprintService({ concurrency: 1 })
      const batch = await service.fingerprintAll(entries, {
        isExpired: () => done >= 2,
        onProgress: (count) => {
          done = count
        }
      })

      expect(batch.records.map((r) => r.name)).toEqual(['f_0.txt', 'f_1.txt'])
      expect(batch.truncated).toBe(true)
    })

    it('queues a very large batch without overflowing the stack', async () => {
      const entries: FileEntry[] = Array.from({ length: 200_000 }, (_, i) => ({
        path: `/nowhere/file-${i}.txt`,
        sizeBytes: 1,
        mtimeMs: 0
      }))

      const batch = await new FingerprintService({ concurrency: 4 }).fingerprintAll(entries, { isExpired: () => true })

      expect(batch.records).toEqual([])
      expect(batch.truncated).toBe(true)
    })

    it('collects warnings from every file', async () => {
      const entries = [await writeEntry('a.txt', ''), await writeEntry('b.txt', 'x')]
      const batch = await new FingerprintService({ concurrency: 2 }).fingerprintAll(entries)
      expect(batch.records).toHaveLength(2)
      expect(batch.warnings).toEqual([
        { kind: 'SCAN_ERROR', path: entries[0].path, message: 'EMPTY: File is empty' }
      ])
    })
  })
})
