import type { DiarizationModel, RemoteAssetHandle } from '../types'
import type { SpeakerAttribution, TranscribedUtterance } from '../utterances'
import { waitUntilActive } from './assetPoller'
import { parseSpeakerDiarizationResponse } from './responseParser'

export function buildDiarizationPrompt(params: {
  utterances: readonly TranscribedUtterance[]
  numberOfSpeakers: number
  instructions?: string
}): string {
  const transcript = params.utterances.map((utterance) => ({
    start: utterance.start,
    end: utterance.end,
    text: utterance.text,
  }))
  return [
    `You got the video attached. The transcript is: ${JSON.stringify(transcript)}.`,
    `The number of speakers in the video is: ${params.numberOfSpeakers}.`,
    `You must provide only ${params.utterances.length} annotations, one for each sentence in the transcript.`,
    'Each annotation is a single line of the form (speaker_id, gender), in transcript order.',
    params.instructions?.trim() ? `Additional instructions: ${params.instructions.trim()}` : '',
  ]
    .filter(Boolean)
    .join('\n')
}

/**
 * Ask the generative model which speaker says each utterance.
 *
 * The media file is uploaded, awaited until the remote service marks it active, then
 * a chat session seeded with it receives the prompt. The exchange is rewound afterwards
 * so the session history stays clean, also when the reply cannot be parsed.
 */
export async function diarizeSpeakers(params: {
  model: DiarizationModel
  mediaFile: string
  utterances: readonly TranscribedUtterance[]
  numberOfSpeakers: number
  instructions?: string
  systemInstruction: string
  poll: { maxWaitMs: number; pollIntervalMs: number }
  onAssetPoll?: (handle: RemoteAssetHandle, attempt: number) => void
}): Promise<SpeakerAttribution[]> {
  const uploaded = await params.model.uploadAsset(params.mediaFile)
  const { handle } = await waitUntilActive(uploaded, (asset) => params.model.queryStatus(asset), {
    ...params.poll,
    onPoll: params.onAssetPoll,
  })

  const session = await params.model.startSession({
    asset: handle,
    systemInstruction: params.systemInstruction,
  })
  const response = await session.send(
    buildDiarizationPrompt({
      utterances: params.utterances,
      numberOfSpeakers: params.numberOfSpeakers,
      instructions: params.instructions,
    }),
  )
  try {
    return parseSpeakerDiarizationResponse(response)
  } finally {
    session.rewind()
  }
}
