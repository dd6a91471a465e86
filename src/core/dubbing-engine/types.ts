import type { StageName, StepName } from '../db/types'
import type {
  DubbedUtterance,
  SegmentedUtterance,
  SpeakerAttribution,
  TimeSpan,
  TranscribedUtterance,
  TranslatedUtterance,
} from './utterances'

/**
 * DubbingEngine event definitions.
 */
export interface DubbingEngineEvents {
  log: {
    runId: string
    stage: StepName | 'engine'
    level: 'info' | 'warn' | 'error'
    text: string
    timestamp: string
  }
  progress: {
    runId: string
    stage: StepName
    completedSteps: number
    totalSteps: number
    message: string
  }
  warning: {
    runId: string
    stage: StepName
    errorCode: string
    errorMessage: string
  }
  failed: {
    runId: string
    stage: StepName
    errorCode: string
    errorMessage: string
  }
  completed: {
    runId: string
    outputFile: string
    metadataFile: string | null
    durationMs: number
  }
}

export type EventName = keyof DubbingEngineEvents

export type Listener<T extends EventName> = (payload: DubbingEngineEvents[T]) => void

/** Receives one line of diagnostic output from a collaborator. */
export type LogSink = (level: 'info' | 'warn', text: string) => void

// ---------------------------------------------------------------------------
// Remote assets

export type RemoteAssetState = 'pending' | 'active' | 'failed'

export interface RemoteAssetHandle {
  name: string
  uri: string
  mimeType: string
  state: RemoteAssetState
}

export type RemoteStatusQuery = (handle: RemoteAssetHandle) => Promise<RemoteAssetState>

// ---------------------------------------------------------------------------
// Collaborators

export interface MediaProcessor {
  /** Split a video into a silent video track and an audio track. */
  splitAudioVideo(params: {
    videoFile: string
    outputDirectory: string
  }): Promise<{ videoFile: string; audioFile: string }>
  /** Separate vocals from the background track. */
  separateVocals(params: {
    audioFile: string
    outputDirectory: string
  }): Promise<{ vocalsFile: string; backgroundFile: string }>
  /** Cut one audio chunk per span; returns paths in span order. */
  cutUtterances(params: {
    audioFile: string
    spans: readonly TimeSpan[]
    outputDirectory: string
  }): Promise<string[]>
  /** Overlay dubbed utterances at their start offsets over the background track. */
  mixDubbedAudio(params: {
    utterances: readonly DubbedUtterance[]
    backgroundFile: string
    outputDirectory: string
    targetLanguage: string
  }): Promise<string>
  /** Replace the audio of a silent video with the dubbed track. */
  combineAudioVideo(params: {
    videoFile: string
    audioFile: string
    outputDirectory: string
    targetLanguage: string
  }): Promise<string>
}

export interface Segmenter {
  segment(params: { audioFile: string; numberOfSpeakers: number }): Promise<TimeSpan[]>
}

export interface Transcriber {
  transcribe(params: {
    audioFile: string
    languageHint: string
    advertiserName?: string
  }): Promise<string>
}

export interface ChatSession {
  send(prompt: string): Promise<string>
  /** Drop the most recent exchange from the session history. */
  rewind(): void
}

export interface DiarizationModel {
  uploadAsset(filePath: string): Promise<RemoteAssetHandle>
  queryStatus: RemoteStatusQuery
  startSession(params: { asset: RemoteAssetHandle; systemInstruction: string }): Promise<ChatSession>
}

export interface Translator {
  /** Return exactly one translation per utterance, in order. */
  translate(params: {
    utterances: readonly TranscribedUtterance[]
    sourceLanguage: string
    targetLanguage: string
    advertiserName?: string
    instructions?: string
    systemInstruction: string
  }): Promise<string[]>
}

export interface VoiceAssigner {
  /** Map each speaker id to a voice name of the target language. */
  assignVoices(params: {
    speakers: ReadonlyArray<{ speakerId: string; gender: string }>
    targetLanguage: string
    preferredVoices?: readonly string[]
  }): Promise<Record<string, string>>
}

export interface SpeechSynthesizer {
  synthesize(params: {
    text: string
    voice: string
    targetLanguage: string
    outputFile: string
  }): Promise<string>
}

export interface DubbingCollaborators {
  media: MediaProcessor
  segmenter: Segmenter
  transcriber: Transcriber
  diarization: DiarizationModel
  translator: Translator
  voiceAssigner: VoiceAssigner
  synthesizer: SpeechSynthesizer
}

// ---------------------------------------------------------------------------
// Stage outputs

/** Media paths threaded forward through every stage output. */
export interface MediaArtifacts {
  isVideo: boolean
  /** The run's input file, uploaded for diarization. */
  sourceFile: string
  /** Silent video track, present for video input only. */
  videoFile: string | null
  audioFile: string
  vocalsFile: string
  backgroundFile: string
}

export interface StageOutput<U> {
  media: MediaArtifacts
  utterances: readonly U[]
}

export interface StageOutputs {
  preprocessing: StageOutput<SegmentedUtterance>
  transcribing: StageOutput<TranscribedUtterance & { speakerId: string; gender: string }> & {
    speakerInfo: readonly SpeakerAttribution[]
  }
  translating: StageOutput<TranslatedUtterance>
  synthesizing: StageOutput<DubbedUtterance>
  saving_metadata: StageOutput<DubbedUtterance> & { metadataFile: string | null }
  postprocessing: { outputFile: string; metadataFile: string | null }
}

export type { StageName }
