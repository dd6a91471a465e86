import type { Segmenter } from '../../core/dubbing-engine/types'
import type { TimeSpan } from '../../core/dubbing-engine/utterances'
import { runCommand } from './command'

export interface SilenceInterval {
  start: number
  end: number
}

export interface SilenceSegmenterOptions {
  ffmpegPath?: string
  /** Noise floor passed to silencedetect, e.g. `-30dB`. */
  noiseThreshold?: string
  /** Minimum silence length in seconds that splits two utterances. */
  minSilenceSeconds?: number
  /** Speech spans shorter than this are dropped. */
  minSpanSeconds?: number
  timeoutMs?: number
}

export function parseDurationFromLine(line: string): number | null {
  const matched = line.match(/Duration:\s*(\d+):(\d+):(\d+(?:\.\d+)?)/i)
  if (!matched) return null
  const hours = Number(matched[1])
  const minutes = Number(matched[2])
  const seconds = Number(matched[3])
  if ([hours, minutes, seconds].some((value) => Number.isNaN(value))) return null
  return hours * 3600 + minutes * 60 + seconds
}

/**
 * Collect silencedetect intervals from ffmpeg stderr lines. A trailing `silence_start`
 * without an end runs to `totalDuration`.
 */
export function parseSilenceLines(lines: readonly string[], totalDuration: number): SilenceInterval[] {
  const intervals: SilenceInterval[] = []
  let openStart: number | null = null
  for (const line of lines) {
    const started = line.match(/silence_start:\s*(-?\d+(?:\.\d+)?)/)
    if (started) {
      openStart = Math.max(0, Number(started[1]))
      continue
    }
    const ended = line.match(/silence_end:\s*(\d+(?:\.\d+)?)/)
    if (ended) {
      intervals.push({ start: openStart ?? 0, end: Number(ended[1]) })
      openStart = null
    }
  }
  if (openStart !== null) intervals.push({ start: openStart, end: totalDuration })
  return intervals
}

/** Turn silence intervals into the speech spans between them. */
export function spansFromSilence(
  silences: readonly SilenceInterval[],
  totalDuration: number,
  minSpanSeconds = 0,
): TimeSpan[] {
  const spans: TimeSpan[] = []
  let cursor = 0
  const ordered = [...silences].sort((left, right) => left.start - right.start)
  for (const silence of ordered) {
    if (silence.start > cursor) spans.push({ start: cursor, end: silence.start })
    cursor = Math.max(cursor, silence.end)
  }
  if (totalDuration > cursor) spans.push({ start: cursor, end: totalDuration })
  return spans.filter((span) => span.end - span.start >= minSpanSeconds && span.end > span.start)
}

/**
 * Splits vocals into utterance spans at silences found by ffmpeg's silencedetect filter.
 */
export class SilenceSegmenter implements Segmenter {
  constructor(private readonly options: SilenceSegmenterOptions = {}) {}

  async segment(params: { audioFile: string; numberOfSpeakers: number }): Promise<TimeSpan[]> {
    const noise = this.options.noiseThreshold ?? '-30dB'
    const minSilence = this.options.minSilenceSeconds ?? 0.5
    const lines: string[] = []
    await runCommand({
      command: this.options.ffmpegPath ?? 'ffmpeg',
      args: ['-hide_banner', '-i', params.audioFile, '-af', `silencedetect=noise=${noise}:d=${minSilence}`, '-f', 'null', '-'],
      timeoutMs: this.options.timeoutMs,
      onStderrLine: (line) => lines.push(line),
    })

    let totalDuration: number | null = null
    for (const line of lines) {
      totalDuration = parseDurationFromLine(line)
      if (totalDuration !== null) break
    }
    if (totalDuration === null) {
      throw new Error(`Unable to read the duration of ${params.audioFile}`)
    }
    return spansFromSilence(parseSilenceLines(lines, totalDuration), totalDuration, this.options.minSpanSeconds ?? 0.2)
  }
}
