import fs from 'fs/promises'
import path from 'path'

const DAY_MS = 24 * 60 * 60 * 1000

export interface FixtureOptions {
  count?: number
  // Reference time for the mtimes written
  now?: number
}

export interface FixtureSummary {
  root: string
  files: number
  duplicates: number
  stale: number
}

async function writeWithAge(filePath: string, content: string | Buffer, mtimeMs: number): Promise<void> {
  await fs.writeFile(filePath, content)
  const when = new Date(mtimeMs)
  await fs.utimes(filePath, when, when)
}

/**
 * Builds a cleanup fixture: `count` text files in folders of ten, a copy of
 * every 10th file, every file with i % 7 === 3 aged 400 days, plus one empty
 * file and a corrupt image with an identical copy. Stale files are padded
 * past 32 KiB so only their age separates them from fresh ones.
 */
export async function generateFixtureTree(root: string, options: FixtureOptions = {}): Promise<FixtureSummary> {
  const count = options.count ?? 1000
  const now = options.now ?? Date.now()
  const recent = now - 10 * DAY_MS
  const newer = now - 5 * DAY_MS
  const old = now - 400 * DAY_MS

  await fs.mkdir(root, { recursive: true })
  let files = 0
  let duplicates = 0
  let stale = 0

  for (let i = 0; i < count; i++) {
    const folderPath = path.join(root, `folder_${Math.floor(i / 10)}`)
    if (i % 10 === 0) {
      await fs.mkdir(folderPath, { recursive: true })
    }

    const filename = `file_${i}.txt`
    const isStale = i % 7 === 3
    const line = `This is fixture file number ${i}\n`
    const content = isStale ? line + 'stale filler line\n'.repeat(2000) : line
    await writeWithAge(path.join(folderPath, filename), content, isStale ? old : recent)
    files++
    if (isStale) stale++

    if (i % 10 === 0) {
      await writeWithAge(path.join(folderPath, `copy_${filename}`), content, newer)
      files++
      duplicates++
    }
  }

  await writeWithAge(path.join(root, 'empty.txt'), '', recent)
  const notAnImage = Buffer.from('this is not really a png image')
  await writeWithAge(path.join(root, 'broken.png'), notAnImage, recent)
  await writeWithAge(path.join(root, 'broken-copy.png'), notAnImage, recent)
  files += 3
  duplicates++

  return { root, files, duplicates, stale }
}

if (require.main === module) {
  const target = process.argv[2] || './fixture-files'
  const count = parseInt(process.argv[3] || '1000', 10)
  generateFixtureTree(target, { count })
    .then((summary) => {
      console.log(`Generated ${summary.files} files in ${summary.root}`)
    })
    .catch((err: unknown) => {
      console.error(err)
      process.exitCode = 1
    })
}
