import type { DatabaseContext } from './core/db'
import {
  DubbingEngine,
  resolveDubbingSettings,
  type DubbingCollaborators,
  type DubbingRunInput,
  type DubbingSettings,
  type LogSink,
} from './core/dubbing-engine'
import { GeminiClient } from './services/gemini/GeminiClient'
import { GeminiDiarizationModel } from './services/gemini/GeminiDiarizationModel'
import { GeminiTranslator } from './services/gemini/GeminiTranslator'
import { GoogleSpeechSynthesizer } from './services/google-tts/GoogleSpeechSynthesizer'
import { GoogleTtsClient } from './services/google-tts/GoogleTtsClient'
import { GoogleVoiceAssigner } from './services/google-tts/GoogleVoiceAssigner'
import { FfmpegMediaProcessor } from './services/media/FfmpegMediaProcessor'
import { SilenceSegmenter } from './services/media/SilenceSegmenter'
import { WhisperCliTranscriber } from './services/media/WhisperCliTranscriber'

export interface CreateDubbingRunOptions {
  /** Replace any of the default ffmpeg, whisper, Gemini and Google TTS collaborators. */
  collaborators?: Partial<DubbingCollaborators>
  /** Record the run in this ledger (see `openDatabase`). */
  ledger?: Pick<DatabaseContext, 'runDao' | 'runStepDao'>
  runId?: string
}

/** Build the collaborators backed by local command line tools and Google REST APIs. */
export function createDefaultCollaborators(settings: DubbingSettings, onLog?: LogSink): DubbingCollaborators {
  const gemini = new GeminiClient({ settings: settings.gemini })
  const tts = new GoogleTtsClient({
    apiBaseUrl: settings.googleTts.apiBaseUrl,
    apiKey: settings.googleTts.apiKey,
  })
  return {
    media: new FfmpegMediaProcessor({ onLog }),
    segmenter: new SilenceSegmenter(),
    transcriber: new WhisperCliTranscriber({ onLog }),
    diarization: new GeminiDiarizationModel(gemini),
    translator: new GeminiTranslator(gemini),
    voiceAssigner: new GoogleVoiceAssigner(tts),
    synthesizer: new GoogleSpeechSynthesizer(tts),
  }
}

/**
 * Resolve settings and create an engine for one dubbing run. Nothing runs until
 * `run()` or `getStageOutput()` is called on the returned engine.
 */
export function createDubbingRun(input: DubbingRunInput, options: CreateDubbingRunOptions = {}): DubbingEngine {
  const settings = resolveDubbingSettings(input)
  let engine: DubbingEngine | null = null
  const onLog: LogSink = (level, text) => engine?.report(level, text)
  engine = new DubbingEngine({
    settings,
    collaborators: { ...createDefaultCollaborators(settings, onLog), ...options.collaborators },
    ledger: options.ledger,
    runId: options.runId,
  })
  return engine
}

export { closeDatabase, openDatabase, type DatabaseContext } from './core/db'
export type { RunRecord, RunStepRecord, RunStatus, StepName, StepStatus } from './core/db'
export * from './core/dubbing-engine'
export { CommandError } from './services/media/command'
