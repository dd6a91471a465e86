import fs from 'node:fs/promises'
import path from 'node:path'
import { ACCEPTED_AUDIO_FORMATS, ACCEPTED_VIDEO_FORMATS } from './constants'
import { ConfigurationError, UnsupportedFormatError, describeError } from './errors'

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function includes(list: readonly string[], value: string): boolean {
  return list.includes(value)
}

/**
 * Check whether the input is a video (MP4) or audio (WAV, MP3, FLAC) file.
 * Any other extension is rejected.
 */
export function isVideoFile(inputFile: string): boolean {
  const extension = path.extname(inputFile).toLowerCase()
  if (includes(ACCEPTED_VIDEO_FORMATS, extension)) return true
  if (includes(ACCEPTED_AUDIO_FORMATS, extension)) return false
  throw new UnsupportedFormatError(extension)
}

/**
 * System instructions are given either inline or as a path to a `.txt` file.
 */
export async function readSystemInstructions(systemInstructions: string): Promise<string> {
  const extension = path.extname(systemInstructions)
  if (extension !== '.txt' && (!/^\.[A-Za-z0-9]+$/.test(extension) || /\s/.test(systemInstructions))) {
    return systemInstructions
  }
  if (extension !== '.txt') {
    throw new ConfigurationError(`Unsupported system instructions file type: ${extension}`)
  }
  try {
    return await fs.readFile(systemInstructions, 'utf-8')
  } catch (error) {
    throw new ConfigurationError(
      `System instructions file not found: ${systemInstructions} (${describeError(error)})`,
    )
  }
}

/** Stable base name for artifacts derived from the input file. */
export function baseNameOf(filePath: string): string {
  return path.basename(filePath, path.extname(filePath))
}

export function nowIso(): string {
  return new Date().toISOString()
}
