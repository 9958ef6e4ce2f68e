export const SETTINGS_FILENAME = 'sweepwise.config.json'
export const REPORT_PREFIX = 'cleanup_plan'
export const COMPARISON_PREFIX = 'cleanup_comparison'
export const SCHEMA_VERSION = 1

export const DAY_MS = 24 * 60 * 60 * 1000
export const KIB = 1024
export const MIB = 1024 * 1024

// Defaults
export const DEFAULT_STALE_DAYS = 180
export const DEFAULT_SIMILARITY_THRESHOLD = 8
export const DEFAULT_CONCURRENCY = 4

// Fingerprinting
export const HASH_CHUNK_BYTES = 1024 * 1024
export const SENTINEL_DIGEST = '0'.repeat(64)
export const PERCEPTUAL_BITS = 64
// dHash compares horizontal neighbours, so one extra column
export const PERCEPTUAL_GRID_WIDTH = 9
export const PERCEPTUAL_GRID_HEIGHT = 8

export const IMAGE_EXTENSIONS = new Set<string>([
  '.png',
  '.jpg',
  '.jpeg',
  '.bmp',
  '.gif',
  '.webp',
  '.tif',
  '.tiff'
])

export const DEFAULT_IGNORES = new Set<string>(['node_modules', '.git', '.DS_Store', 'Thumbs.db'])

// Namespace for deterministic record and cluster ids
export const ID_NAMESPACE = '6f1c2b4e-7d3a-4f58-9a0e-2c4b8d1e5f73'

// Read deadline per file: base plus size at ~1 MiB/s
export const HASH_TIMEOUT_BASE_MS = 30_000
export const HASH_MIN_BYTES_PER_MS = 1024
