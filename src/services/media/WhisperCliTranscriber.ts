import fs from 'node:fs/promises'
import path from 'node:path'
import type { LogSink, Transcriber } from '../../core/dubbing-engine/types'
import { baseNameOf } from '../../core/dubbing-engine/utils'
import { runCommand } from './command'

export interface WhisperCliTranscriberOptions {
  pythonPath?: string
  model?: string
  device?: 'cpu' | 'cuda' | 'mps'
  timeoutMs?: number
  onLog?: LogSink
}

/** Language tags such as `en-US` become the bare code whisper expects. */
export function toWhisperLanguage(languageHint: string): string {
  return languageHint.split(/[-_]/)[0]?.toLowerCase() ?? languageHint
}

/**
 * Transcribes one utterance chunk with the openai-whisper command line tool. The advertiser
 * name, when given, is passed as the initial prompt so brand names are spelled correctly.
 */
export class WhisperCliTranscriber implements Transcriber {
  constructor(private readonly options: WhisperCliTranscriberOptions = {}) {}

  async transcribe(params: { audioFile: string; languageHint: string; advertiserName?: string }): Promise<string> {
    const outputDir = path.dirname(params.audioFile)
    const device = this.options.device ?? 'cpu'
    const args = [
      '-m',
      'whisper',
      params.audioFile,
      '--model',
      this.options.model ?? 'base',
      '--device',
      device,
      '--output_dir',
      outputDir,
      '--output_format',
      'txt',
      '--language',
      toWhisperLanguage(params.languageHint),
    ]
    if (params.advertiserName) {
      args.push('--initial_prompt', params.advertiserName)
    }
    if (device === 'cpu') {
      args.push('--fp16', 'False')
    }

    const stderrLines: string[] = []
    await runCommand({
      command: this.options.pythonPath ?? 'python3',
      args,
      timeoutMs: this.options.timeoutMs,
      onStderrLine: (line) => {
        stderrLines.push(line)
        this.options.onLog?.('info', line)
      },
    })

    const transcriptPath = path.join(outputDir, `${baseNameOf(params.audioFile)}.txt`)
    let transcript: string
    try {
      transcript = await fs.readFile(transcriptPath, 'utf-8')
    } catch {
      const detail = stderrLines.slice(-12).join(' | ')
      throw new Error(
        detail
          ? `Whisper finished but ${transcriptPath} was not produced. stderr: ${detail}`
          : `Whisper finished but ${transcriptPath} was not produced`,
      )
    }
    return transcript
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean)
      .join(' ')
  }
}
