import type { Translator } from '../../core/dubbing-engine/types'
import type { TranscribedUtterance } from '../../core/dubbing-engine/utterances'
import type { GeminiClient } from './GeminiClient'

export const SCRIPT_BREAK = '<BREAK>'

/** Join utterance texts into a single script separated by break markers. */
export function generateScript(utterances: readonly TranscribedUtterance[]): string {
  return utterances.map((utterance) => utterance.text.trim()).join(SCRIPT_BREAK)
}

export function buildTranslationPrompt(params: {
  script: string
  targetLanguage: string
  advertiserName?: string
  instructions?: string
}): string {
  return [
    `Translate the script below into ${params.targetLanguage}.`,
    `Keep every ${SCRIPT_BREAK} marker; the output must contain exactly as many ${SCRIPT_BREAK} markers as the input.`,
    params.advertiserName ? `The advertiser is ${params.advertiserName}. Do not translate the advertiser name.` : '',
    params.instructions?.trim() ? `Additional instructions: ${params.instructions.trim()}` : '',
    `Script: ${params.script}`,
  ]
    .filter(Boolean)
    .join('\n')
}

/** Split a translated script on break markers. */
export function splitTranslatedScript(translatedScript: string): string[] {
  return translatedScript
    .trim()
    .split(SCRIPT_BREAK)
    .map((part) => part.trim())
}

/**
 * Translates all utterances in a single Gemini request so the model sees the whole script.
 */
export class GeminiTranslator implements Translator {
  constructor(private readonly client: GeminiClient) {}

  async translate(params: {
    utterances: readonly TranscribedUtterance[]
    sourceLanguage: string
    targetLanguage: string
    advertiserName?: string
    instructions?: string
    systemInstruction: string
  }): Promise<string[]> {
    if (params.utterances.length === 0) return []
    const prompt = buildTranslationPrompt({
      script: generateScript(params.utterances),
      targetLanguage: params.targetLanguage,
      advertiserName: params.advertiserName,
      instructions: params.instructions,
    })
    const translated = await this.client.generateContent({
      systemInstruction: params.systemInstruction,
      contents: [{ role: 'user', parts: [{ text: prompt }] }],
    })
    return splitTranslatedScript(translated)
  }
}
