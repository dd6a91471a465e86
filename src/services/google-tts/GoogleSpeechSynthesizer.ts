import fs from 'node:fs/promises'
import path from 'node:path'
import type { SpeechSynthesizer } from '../../core/dubbing-engine/types'
import type { GoogleTtsClient } from './GoogleTtsClient'

export class GoogleSpeechSynthesizer implements SpeechSynthesizer {
  constructor(private readonly client: GoogleTtsClient) {}

  async synthesize(params: {
    text: string
    voice: string
    targetLanguage: string
    outputFile: string
  }): Promise<string> {
    const audio = await this.client.synthesize({
      text: params.text,
      voiceName: params.voice,
      languageCode: params.targetLanguage,
    })
    await fs.mkdir(path.dirname(params.outputFile), { recursive: true })
    await fs.writeFile(params.outputFile, audio)
    return params.outputFile
  }
}
