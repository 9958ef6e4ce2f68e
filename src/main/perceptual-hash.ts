import sharp from 'sharp'
import { PERCEPTUAL_BITS, PERCEPTUAL_GRID_HEIGHT, PERCEPTUAL_GRID_WIDTH } from '../shared/constants'

export interface ImageDecoder {
  /** Row-major grayscale bytes of the image scaled to exactly width x height. */
  decodeGrayscale(filePath: string, width: number, height: number): Promise<Uint8Array>
}

export const sharpDecoder: ImageDecoder = {
  async decodeGrayscale(filePath, width, height) {
    const { data, info } = await sharp(filePath, { failOn: 'error', sequentialRead: true })
      .flatten({ background: '#ffffff' })
      .grayscale()
      .resize(width, height, { fit: 'fill' })
      .raw()
      .toBuffer({ resolveWithObject: true })

    if (info.width !== width || info.height !== height) {
      throw new Error(`Unexpected decode size ${info.width}x${info.height}`)
    }
    if (info.channels === 1) return data

    const pixels = new Uint8Array(width * height)
    for (let i = 0; i < pixels.length; i++) {
      pixels[i] = data[i * info.channels]
    }
    return pixels
  }
}

const POPCOUNT_NIBBLE = [0, 1, 1, 2, 1, 2, 2, 3, 1, 2, 2, 3, 2, 3, 3, 4]

/**
 * Difference hash over a (bits/rows + 1) x rows grid: one bit per horizontal
 * neighbour pair, set when the left pixel is brighter. Rendered as hex.
 */
export function differenceHash(
  pixels: Uint8Array,
  width = PERCEPTUAL_GRID_WIDTH,
  height = PERCEPTUAL_GRID_HEIGHT
): string {
  if (pixels.length !== width * height) {
    throw new Error(`Expected ${width * height} pixels, got ${pixels.length}`)
  }

  let hex = ''
  let nibble = 0
  let bitsInNibble = 0
  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width - 1; col++) {
      const left = pixels[row * width + col]
      const right = pixels[row * width + col + 1]
      nibble = (nibble << 1) | (left > right ? 1 : 0)
      bitsInNibble++
      if (bitsInNibble === 4) {
        hex += nibble.toString(16)
        nibble = 0
        bitsInNibble = 0
      }
    }
  }
  return hex
}

export function hammingDistance(a: string, b: string): number {
  if (a.length !== b.length) {
    throw new Error(`Digest length mismatch: ${a.length} vs ${b.length}`)
  }
  let distance = 0
  for (let i = 0; i < a.length; i++) {
    distance += POPCOUNT_NIBBLE[parseInt(a[i], 16) ^ parseInt(b[i], 16)]
  }
  return distance
}

function toBits(hex: string): string {
  let bits = ''
  for (const ch of hex) bits += parseInt(ch, 16).toString(2).padStart(4, '0')
  return bits
}

/**
 * Splits the digest into `bands` contiguous bit ranges and returns one key per
 * band. Two digests within distance `bands - 1` agree on at least one band.
 */
export function bandKeys(hex: string, bands: number): string[] {
  const bits = toBits(hex)
  const count = Math.max(1, Math.min(bands, PERCEPTUAL_BITS))
  const keys: string[] = []
  let start = 0
  for (let band = 0; band < count; band++) {
    const end = Math.round(((band + 1) * bits.length) / count)
    keys.push(`${band}:${bits.slice(start, end)}`)
    start = end
  }
  return keys
}
