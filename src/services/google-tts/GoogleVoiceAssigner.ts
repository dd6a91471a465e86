import { ConfigurationError } from '../../core/dubbing-engine/errors'
import type { VoiceAssigner } from '../../core/dubbing-engine/types'
import type { GoogleTtsClient, TtsVoice } from './GoogleTtsClient'

function matchesGender(voice: TtsVoice, gender: string): boolean {
  return voice.ssmlGender.toLowerCase() === gender.trim().toLowerCase()
}

function familyRank(voice: TtsVoice, preferredVoices: readonly string[]): number {
  const index = preferredVoices.findIndex((family) => voice.name.toLowerCase().includes(family.toLowerCase()))
  return index === -1 ? preferredVoices.length : index
}

/**
 * Pick one voice per speaker.
 *
 * Candidates are voices of the speaker's gender (all voices when none match), ordered by
 * the position of their family in `preferredVoices` and then by name. Each speaker takes
 * the first candidate no earlier speaker took; when every candidate is taken the first
 * one is reused.
 */
export function pickVoices(params: {
  speakers: ReadonlyArray<{ speakerId: string; gender: string }>
  voices: readonly TtsVoice[]
  preferredVoices?: readonly string[]
}): Record<string, string> {
  const preferred = params.preferredVoices ?? []
  const used = new Set<string>()
  const assigned: Record<string, string> = {}
  for (const speaker of params.speakers) {
    const byGender = params.voices.filter((voice) => matchesGender(voice, speaker.gender))
    const candidates = (byGender.length > 0 ? byGender : [...params.voices]).sort(
      (left, right) =>
        familyRank(left, preferred) - familyRank(right, preferred) || left.name.localeCompare(right.name),
    )
    const chosen = candidates.find((voice) => !used.has(voice.name)) ?? candidates[0]
    if (!chosen) {
      throw new ConfigurationError(`No voice available for speaker ${speaker.speakerId}`)
    }
    used.add(chosen.name)
    assigned[speaker.speakerId] = chosen.name
  }
  return assigned
}

export class GoogleVoiceAssigner implements VoiceAssigner {
  constructor(private readonly client: GoogleTtsClient) {}

  async assignVoices(params: {
    speakers: ReadonlyArray<{ speakerId: string; gender: string }>
    targetLanguage: string
    preferredVoices?: readonly string[]
  }): Promise<Record<string, string>> {
    if (params.speakers.length === 0) return {}
    const voices = await this.client.listVoices(params.targetLanguage)
    if (voices.length === 0) {
      throw new ConfigurationError(`No Text-to-Speech voices found for ${params.targetLanguage}`)
    }
    return pickVoices({ speakers: params.speakers, voices, preferredVoices: params.preferredVoices })
  }
}
