import path from 'path'
import fs from 'fs/promises'
import { SETTINGS_FILENAME, SCHEMA_VERSION } from '../shared/constants'
import { EngineConfig, defaultConfig, parseConfig } from './config'
import { ConfigError, ensureError, errorCode } from './errors'
import { logger } from './logger'

const log = logger.child('settings')

export interface SettingsFile extends EngineConfig {
  schemaVersion: number
}

function readVersion(raw: unknown): number | null {
  if (typeof raw !== 'object' || raw === null || !('schemaVersion' in raw)) return null
  return typeof raw.schemaVersion === 'number' ? raw.schemaVersion : null
}

function withoutVersion(raw: object): Record<string, unknown> {
  const rest: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(raw)) {
    if (key !== 'schemaVersion') rest[key] = value
  }
  return rest
}

export class SettingsStore {
  readonly filePath: string
  private settings: EngineConfig | null = null

  private isSaving = false
  private pendingSave: EngineConfig | null = null
  private saveWaiters: Array<{ resolve: () => void; reject: (error: Error) => void }> = []

  constructor(filePath?: string) {
    this.filePath = filePath ?? path.join(process.cwd(), SETTINGS_FILENAME)
  }

  /**
   * Missing file means defaults. A file that exists but does not parse or
   * validate is a ConfigError. Never writes to disk.
   */
  async load(): Promise<EngineConfig> {
    if (this.settings) return this.settings

    let data: string
    try {
      data = await fs.readFile(this.filePath, 'utf-8')
    } catch (error: unknown) {
      if (errorCode(error) !== 'ENOENT') {
        throw new ConfigError(`Cannot read settings from ${this.filePath}`, [], {
          cause: ensureError(error)
        })
      }
      log.debug('No settings file, using defaults', { filePath: this.filePath })
      this.settings = defaultConfig()
      return this.settings
    }

    let raw: unknown
    try {
      raw = JSON.parse(data)
    } catch (error: unknown) {
      throw new ConfigError(`Settings file ${this.filePath} is not valid JSON`, [], {
        cause: ensureError(error)
      })
    }
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new ConfigError(`Settings file ${this.filePath} must contain a JSON object`)
    }

    const version = readVersion(raw)
    const config = parseConfig(withoutVersion(raw), this.filePath)

    // Older files are upgraded in memory; only an explicit save rewrites them
    if (version !== SCHEMA_VERSION) {
      log.warn(`Settings use schema v${version ?? 'none'}, run init-config to upgrade to v${SCHEMA_VERSION}`, {
        filePath: this.filePath
      })
    }

    this.settings = config
    return this.settings
  }

  /**
   * Writes are serialised: a save issued while another is in flight replaces
   * any queued one, and the promise resolves once the latest state is on disk.
   */
  async save(next: EngineConfig): Promise<void> {
    this.settings = next

    if (this.isSaving) {
      this.pendingSave = next
      return new Promise<void>((resolve, reject) => this.saveWaiters.push({ resolve, reject }))
    }

    this.isSaving = true
    let current: EngineConfig | null = next
    try {
      while (current) {
        await this.writeToDisk(current)
        current = this.pendingSave
        this.pendingSave = null
      }
    } catch (error: unknown) {
      this.pendingSave = null
      this.settleWaiters(ensureError(error))
      throw error
    } finally {
      this.isSaving = false
    }
    this.settleWaiters(null)
  }

  private settleWaiters(error: Error | null): void {
    const waiters = this.saveWaiters
    this.saveWaiters = []
    for (const waiter of waiters) {
      if (error) waiter.reject(error)
      else waiter.resolve()
    }
  }

  private async writeToDisk(config: EngineConfig): Promise<void> {
    const payload: SettingsFile = { schemaVersion: SCHEMA_VERSION, ...config }
    const tempPath = `${this.filePath}.tmp`
    await fs.mkdir(path.dirname(this.filePath), { recursive: true })
    await fs.writeFile(tempPath, JSON.stringify(payload, null, 2), 'utf-8')
    await fs.rename(tempPath, this.filePath)
    log.info('Settings saved', { filePath: this.filePath })
  }
}
