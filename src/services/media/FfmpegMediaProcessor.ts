import fs from 'node:fs/promises'
import path from 'node:path'
import type { LogSink, MediaProcessor } from '../../core/dubbing-engine/types'
import type { DubbedUtterance, TimeSpan } from '../../core/dubbing-engine/utterances'
import { baseNameOf } from '../../core/dubbing-engine/utils'
import { runCommand } from './command'

export interface FfmpegMediaProcessorOptions {
  ffmpegPath?: string
  /** Python interpreter with demucs installed. */
  pythonPath?: string
  demucsModel?: string
  timeoutMs?: number
  onLog?: LogSink
}

function formatSeconds(value: number): string {
  return value.toFixed(3)
}

/**
 * Build the ffmpeg filter graph that delays every dubbed clip to its start offset and
 * mixes the clips over the background (input 0). Clip `i` is input `i + 1`.
 */
export function buildMixFilter(utterances: ReadonlyArray<Pick<DubbedUtterance, 'start'>>): string {
  if (utterances.length === 0) {
    return '[0:a]anull[out]'
  }
  const delayed = utterances.map((utterance, index) => {
    const delayMs = Math.max(0, Math.round(utterance.start * 1000))
    return `[${index + 1}:a]adelay=${delayMs}|${delayMs}[d${index + 1}]`
  })
  const labels = utterances.map((_utterance, index) => `[d${index + 1}]`).join('')
  return `${delayed.join(';')};[0:a]${labels}amix=inputs=${utterances.length + 1}:duration=first:normalize=0[out]`
}

/**
 * Media operations backed by the ffmpeg and demucs command line tools.
 */
export class FfmpegMediaProcessor implements MediaProcessor {
  private readonly ffmpegPath: string
  private readonly pythonPath: string
  private readonly demucsModel: string

  constructor(private readonly options: FfmpegMediaProcessorOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg'
    this.pythonPath = options.pythonPath ?? 'python3'
    this.demucsModel = options.demucsModel ?? 'htdemucs'
  }

  async splitAudioVideo(params: {
    videoFile: string
    outputDirectory: string
  }): Promise<{ videoFile: string; audioFile: string }> {
    const baseName = baseNameOf(params.videoFile)
    const videoFile = path.join(params.outputDirectory, `${baseName}_video_file.mp4`)
    const audioFile = path.join(params.outputDirectory, `${baseName}_audio_file.wav`)
    await this.ffmpeg(['-y', '-i', params.videoFile, '-an', '-c:v', 'copy', videoFile])
    await this.ffmpeg(['-y', '-i', params.videoFile, '-vn', '-acodec', 'pcm_s16le', '-ar', '44100', '-ac', '2', audioFile])
    return { videoFile, audioFile }
  }

  async separateVocals(params: {
    audioFile: string
    outputDirectory: string
  }): Promise<{ vocalsFile: string; backgroundFile: string }> {
    await runCommand({
      command: this.pythonPath,
      args: ['-m', 'demucs', '--two-stems', 'vocals', '-n', this.demucsModel, '-o', params.outputDirectory, params.audioFile],
      timeoutMs: this.options.timeoutMs,
      onStderrLine: (line) => this.options.onLog?.('info', line),
    })
    const stemDirectory = path.join(params.outputDirectory, this.demucsModel, baseNameOf(params.audioFile))
    const vocalsFile = path.join(stemDirectory, 'vocals.wav')
    const backgroundFile = path.join(stemDirectory, 'no_vocals.wav')
    await this.assertProduced([vocalsFile, backgroundFile], 'demucs')
    return { vocalsFile, backgroundFile }
  }

  async cutUtterances(params: {
    audioFile: string
    spans: readonly TimeSpan[]
    outputDirectory: string
  }): Promise<string[]> {
    const paths: string[] = []
    for (const [index, span] of params.spans.entries()) {
      const chunkFile = path.join(
        params.outputDirectory,
        `chunk_${String(index).padStart(3, '0')}_${formatSeconds(span.start)}_${formatSeconds(span.end)}.wav`,
      )
      await this.ffmpeg([
        '-y',
        '-i',
        params.audioFile,
        '-ss',
        formatSeconds(span.start),
        '-to',
        formatSeconds(span.end),
        '-acodec',
        'pcm_s16le',
        chunkFile,
      ])
      paths.push(chunkFile)
    }
    return paths
  }

  async mixDubbedAudio(params: {
    utterances: readonly DubbedUtterance[]
    backgroundFile: string
    outputDirectory: string
    targetLanguage: string
  }): Promise<string> {
    const outputFile = path.join(params.outputDirectory, `dubbed_audio_${params.targetLanguage}.mp3`)
    const inputs = [params.backgroundFile, ...params.utterances.map((utterance) => utterance.dubbedAudioPath)]
    await this.ffmpeg([
      '-y',
      ...inputs.flatMap((input) => ['-i', input]),
      '-filter_complex',
      buildMixFilter(params.utterances),
      '-map',
      '[out]',
      outputFile,
    ])
    return outputFile
  }

  async combineAudioVideo(params: {
    videoFile: string
    audioFile: string
    outputDirectory: string
    targetLanguage: string
  }): Promise<string> {
    const outputFile = path.join(params.outputDirectory, `dubbed_video_${params.targetLanguage}.mp4`)
    await this.ffmpeg([
      '-y',
      '-i',
      params.videoFile,
      '-i',
      params.audioFile,
      '-map',
      '0:v',
      '-map',
      '1:a',
      '-c:v',
      'copy',
      '-c:a',
      'aac',
      '-shortest',
      outputFile,
    ])
    return outputFile
  }

  private async ffmpeg(args: string[]): Promise<void> {
    await runCommand({ command: this.ffmpegPath, args, timeoutMs: this.options.timeoutMs })
  }

  private async assertProduced(files: string[], tool: string): Promise<void> {
    for (const file of files) {
      try {
        await fs.access(file)
      } catch {
        throw new Error(`${tool} finished but did not produce ${file}`)
      }
    }
  }
}
