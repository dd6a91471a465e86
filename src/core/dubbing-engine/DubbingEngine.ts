import { EventEmitter } from 'node:events'
import fs from 'node:fs/promises'
import path from 'node:path'
import { randomUUID } from 'node:crypto'
import type { RunDao, RunStepDao } from '../db/dao'
import type { StageName, StepName } from '../db/types'
import { cleanDirectory, type RemoveEntry } from './cleanup'
import {
  GEMINI_TOKEN_ENV,
  GOOGLE_TTS_API_KEY_ENV,
  PROGRESS_STAGES,
  STAGES,
  UTTERANCE_METADATA_FILE_NAME,
} from './constants'
import { diarizeSpeakers } from './diarization'
import {
  CleanupError,
  ConfigurationError,
  DubbingError,
  PersistenceWarning,
  TranslationMismatchError,
  describeError,
  errorCodeOf,
} from './errors'
import {
  normalizeEndpointForLog,
  resolveApiKeyState,
  type DubbingSettings,
} from './settings-resolvers'
import type {
  DubbingCollaborators,
  DubbingEngineEvents,
  EventName,
  Listener,
  MediaArtifacts,
  StageOutputs,
} from './types'
import {
  addSpeakerInfo,
  addTranslations,
  createUtterances,
  extendUtterance,
  listSpeakers,
  mergeUtterances,
  type DubbedUtterance,
  type TranscribedUtterance,
} from './utterances'
import { isVideoFile, nowIso, readSystemInstructions } from './utils'

const STEP_LOG_EXCERPT_LINES = 20

type StageRunners = { [S in StageName]: () => Promise<StageOutputs[S]> }
type StageCache<K extends StageName = StageName> = { [S in K]?: Promise<StageOutputs[S]> }

export interface DubbingEngineDeps {
  settings: DubbingSettings
  collaborators: DubbingCollaborators
  runId?: string
  /** Optional run ledger; stage caching never depends on it. */
  ledger?: { runDao: RunDao; runStepDao: RunStepDao }
  /** Overrides how cleanup removes a directory entry. */
  removeEntry?: RemoveEntry
}

/**
 * Drives one dubbing run through its fixed chain of stages.
 *
 * Every stage is computed at most once per engine: the first `getStageOutput()` call
 * starts it (after all of its predecessors), later calls share the same promise. A new
 * run needs a new engine.
 */
export class DubbingEngine {
  readonly runId: string
  readonly isVideo: boolean
  private readonly emitter = new EventEmitter()
  private readonly cache: StageCache = {}
  private readonly runners: StageRunners
  private readonly instructionCache = new Map<'diarization' | 'translation', Promise<string>>()
  private readonly totalSteps: number
  private completedSteps = 0
  private currentStep: StepName | null = null
  private stepLogLines: string[] = []
  private cleanupFailures: CleanupError[] = []
  private runPromise: Promise<string> | null = null

  constructor(private readonly deps: DubbingEngineDeps) {
    this.isVideo = isVideoFile(deps.settings.inputFile)
    this.runId = deps.runId ?? randomUUID()
    this.totalSteps = PROGRESS_STAGES.length + (deps.settings.cleanUp ? 1 : 0)
    this.runners = {
      preprocessing: () => this.runPreprocessing(),
      transcribing: () => this.runTranscribing(),
      translating: () => this.runTranslating(),
      synthesizing: () => this.runSynthesizing(),
      saving_metadata: () => this.runSavingMetadata(),
      postprocessing: () => this.runPostprocessing(),
    }
  }

  /** Register a typed event listener and return an unsubscribe callback. */
  on<T extends EventName>(event: T, listener: Listener<T>): () => void {
    this.emitter.on(event, listener)
    return () => {
      this.emitter.off(event, listener)
    }
  }

  getProgress(): { completedSteps: number; totalSteps: number } {
    return { completedSteps: this.completedSteps, totalSteps: this.totalSteps }
  }

  getCleanupFailures(): readonly CleanupError[] {
    return this.cleanupFailures
  }

  /** Forward a collaborator's diagnostic line, attributed to the running stage. */
  report(level: 'info' | 'warn', text: string): void {
    this.log(this.currentStep ?? 'engine', level, text)
  }

  /**
   * Return a stage's output, computing it and every unrealized predecessor first.
   */
  getStageOutput<S extends StageName>(stage: S): Promise<StageOutputs[S]> {
    const cache: StageCache<S> = this.cache
    const cached = cache[stage]
    if (cached) return cached
    const pending = this.computeStage(stage)
    cache[stage] = pending
    return pending
  }

  /**
   * Run all stages (and cleanup when enabled); resolve with the final artifact path.
   * Repeated calls share the first run.
   */
  run(): Promise<string> {
    if (!this.runPromise) {
      this.runPromise = this.executeRun()
    }
    return this.runPromise
  }

  private async executeRun(): Promise<string> {
    const startedAt = Date.now()
    const { settings } = this.deps
    this.log('engine', 'info', 'Dubbing process starting...')
    this.log(
      'engine',
      'info',
      `Gemini: model=${settings.gemini.modelName}, endpoint=${normalizeEndpointForLog(
        settings.gemini.apiBaseUrl,
      )}, token=${resolveApiKeyState(GEMINI_TOKEN_ENV, settings.gemini.token)}`,
    )
    this.log(
      'engine',
      'info',
      `Text-to-Speech: endpoint=${normalizeEndpointForLog(
        settings.googleTts.apiBaseUrl,
      )}, apiKey=${resolveApiKeyState(GOOGLE_TTS_API_KEY_ENV, settings.googleTts.apiKey)}`,
    )
    this.ensureRunRecorded()
    this.deps.ledger?.runDao.updateRunStatus(this.runId, 'running')

    try {
      const { outputFile, metadataFile: savedMetadataFile } = await this.getStageOutput('postprocessing')
      let metadataFile = savedMetadataFile
      if (settings.cleanUp) {
        const removed = await this.runCleanup(outputFile)
        if (metadataFile && removed.has(path.resolve(metadataFile))) {
          metadataFile = null
        }
      }

      const durationMs = Date.now() - startedAt
      this.deps.ledger?.runDao.updateRunStatus(this.runId, 'completed', {
        outputFile,
        completedAt: nowIso(),
        errorCode: null,
        errorMessage: null,
      })
      this.log('engine', 'info', 'Dubbing process finished.')
      this.log('engine', 'info', `Total execution time: ${(durationMs / 1000).toFixed(2)} seconds.`)
      this.log('engine', 'info', `Output file saved under: ${outputFile}.`)
      this.emit('completed', { runId: this.runId, outputFile, metadataFile, durationMs })
      return outputFile
    } catch (error) {
      this.deps.ledger?.runDao.updateRunStatus(this.runId, 'failed', {
        errorCode: errorCodeOf(error, 'E_RUN_FAILED'),
        errorMessage: describeError(error),
        completedAt: nowIso(),
      })
      this.log('engine', 'error', describeError(error))
      throw error
    }
  }

  private async computeStage<S extends StageName>(stage: S): Promise<StageOutputs[S]> {
    const index = STAGES.indexOf(stage)
    if (index > 0) {
      await this.getStageOutput(STAGES[index - 1])
    }
    return await this.trackStep(stage, this.runners[stage])
  }

  /** Run one step with ledger bookkeeping, logging and progress accounting. */
  private async trackStep<T>(step: StepName, execute: () => Promise<T>): Promise<T> {
    this.ensureRunRecorded()
    const stepId = this.deps.ledger?.runStepDao.startStep(this.runId, step)
    this.deps.ledger?.runDao.updateRunStatus(this.runId, step)
    this.currentStep = step
    this.stepLogLines = []
    this.log(step, 'info', `Starting ${step}`)

    let result: T
    try {
      result = await execute()
    } catch (error) {
      const errorCode = errorCodeOf(error, `E_${step.toUpperCase()}_FAILED`)
      const errorMessage = describeError(error)
      if (stepId !== undefined) {
        this.deps.ledger?.runStepDao.failStep(stepId, errorCode, errorMessage)
      }
      this.emit('failed', { runId: this.runId, stage: step, errorCode, errorMessage })
      this.log(step, 'error', `Stage failed: ${step}: ${errorMessage}`)
      throw error
    } finally {
      this.currentStep = null
    }

    if (stepId !== undefined) {
      this.deps.ledger?.runStepDao.finishStep(stepId, this.stepLogLines.slice(-STEP_LOG_EXCERPT_LINES).join('\n'))
    }
    if (step === 'cleanup' || PROGRESS_STAGES.some((stage) => stage === step)) {
      this.completedSteps += 1
      this.emit('progress', {
        runId: this.runId,
        stage: step,
        completedSteps: this.completedSteps,
        totalSteps: this.totalSteps,
        message: `${step} done`,
      })
    }
    this.log(step, 'info', `Stage completed: ${step}`)
    return result
  }

  /** Split audio/video, separate vocals, and cut the audio into utterances. */
  private async runPreprocessing(): Promise<StageOutputs['preprocessing']> {
    const { settings, collaborators } = this.deps
    await fs.mkdir(settings.outputDirectory, { recursive: true })

    let videoFile: string | null = null
    let audioFile = settings.inputFile
    if (this.isVideo) {
      const split = await collaborators.media.splitAudioVideo({
        videoFile: settings.inputFile,
        outputDirectory: settings.outputDirectory,
      })
      videoFile = split.videoFile
      audioFile = split.audioFile
    }

    const { vocalsFile, backgroundFile } = await collaborators.media.separateVocals({
      audioFile,
      outputDirectory: settings.outputDirectory,
    })
    const spans = await collaborators.segmenter.segment({
      audioFile,
      numberOfSpeakers: settings.numberOfSpeakers,
    })
    this.log('preprocessing', 'info', `Detected ${spans.length} utterances`)
    const chunkPaths = await collaborators.media.cutUtterances({
      audioFile,
      spans,
      outputDirectory: settings.outputDirectory,
    })

    const media: MediaArtifacts = {
      isVideo: this.isVideo,
      sourceFile: settings.inputFile,
      videoFile,
      audioFile,
      vocalsFile,
      backgroundFile,
    }
    return { media, utterances: createUtterances(spans, chunkPaths) }
  }

  /** Transcribe every chunk, then attribute speakers with the generative model. */
  private async runTranscribing(): Promise<StageOutputs['transcribing']> {
    const { settings, collaborators } = this.deps
    const { media, utterances } = await this.getStageOutput('preprocessing')

    const transcribed: TranscribedUtterance[] = []
    for (const utterance of utterances) {
      const text = await collaborators.transcriber.transcribe({
        audioFile: utterance.audioPath,
        languageHint: settings.sourceLanguage,
        advertiserName: settings.advertiserName,
      })
      transcribed.push(extendUtterance(utterance, { text: text.trim() }))
    }

    const speakerInfo = await diarizeSpeakers({
      model: collaborators.diarization,
      mediaFile: media.sourceFile,
      utterances: transcribed,
      numberOfSpeakers: settings.numberOfSpeakers,
      instructions: settings.diarizationInstructions,
      systemInstruction: await this.loadInstructions('diarization'),
      poll: { maxWaitMs: settings.assetMaxWaitMs, pollIntervalMs: settings.assetPollIntervalMs },
      onAssetPoll: (handle, attempt) => {
        this.log('transcribing', 'info', `Remote asset ${handle.name} is ${handle.state} (check ${attempt})`)
      },
    })

    return { media, utterances: addSpeakerInfo(transcribed, speakerInfo), speakerInfo }
  }

  /** Translate every utterance and optionally merge close neighbours of one speaker. */
  private async runTranslating(): Promise<StageOutputs['translating']> {
    const { settings, collaborators } = this.deps
    const { media, utterances } = await this.getStageOutput('transcribing')

    const translations = await collaborators.translator.translate({
      utterances,
      sourceLanguage: settings.sourceLanguage,
      targetLanguage: settings.targetLanguage,
      advertiserName: settings.advertiserName,
      instructions: settings.translationInstructions,
      systemInstruction: await this.loadInstructions('translation'),
    })
    if (translations.length !== utterances.length) {
      throw new TranslationMismatchError(utterances.length, translations.length)
    }

    const translated = addTranslations(utterances, translations)
    if (!settings.mergeUtterances) {
      return { media, utterances: translated }
    }
    const merged = mergeUtterances(translated, settings.minimumMergeThreshold)
    if (merged.length !== translated.length) {
      this.log('translating', 'info', `Merged ${translated.length} utterances into ${merged.length}`)
    }
    return { media, utterances: merged }
  }

  /** Assign one voice per speaker and synthesize every utterance. */
  private async runSynthesizing(): Promise<StageOutputs['synthesizing']> {
    const { settings, collaborators } = this.deps
    const { media, utterances } = await this.getStageOutput('translating')

    const voices = await collaborators.voiceAssigner.assignVoices({
      speakers: listSpeakers(utterances),
      targetLanguage: settings.targetLanguage,
      preferredVoices: settings.preferredVoices,
    })

    const dubbed: DubbedUtterance[] = []
    for (const [index, utterance] of utterances.entries()) {
      const voice = voices[utterance.speakerId]
      if (!voice) {
        throw new ConfigurationError(`No voice assigned for speaker '${utterance.speakerId}'`)
      }
      const withVoice = extendUtterance(utterance, { assignedVoice: voice })
      const dubbedAudioPath = await collaborators.synthesizer.synthesize({
        text: withVoice.translatedText,
        voice,
        targetLanguage: settings.targetLanguage,
        outputFile: path.join(
          settings.outputDirectory,
          `dubbed_utterance_${String(index).padStart(3, '0')}.mp3`,
        ),
      })
      dubbed.push(extendUtterance(withVoice, { dubbedAudioPath }))
    }
    return { media, utterances: dubbed }
  }

  /** Snapshot the utterance metadata. Failure here is reported, never thrown. */
  private async runSavingMetadata(): Promise<StageOutputs['saving_metadata']> {
    const output = await this.getStageOutput('synthesizing')
    const metadataFile = path.join(this.deps.settings.outputDirectory, UTTERANCE_METADATA_FILE_NAME)
    try {
      await fs.writeFile(metadataFile, `${JSON.stringify(output.utterances, null, 2)}\n`, 'utf-8')
      this.log('saving_metadata', 'info', `Utterance metadata saved successfully to '${metadataFile}'`)
      return { ...output, metadataFile }
    } catch (error) {
      const warning = new PersistenceWarning(metadataFile, error)
      this.emit('warning', {
        runId: this.runId,
        stage: 'saving_metadata',
        errorCode: warning.code,
        errorMessage: warning.message,
      })
      this.log('saving_metadata', 'warn', warning.message)
      return { ...output, metadataFile: null }
    }
  }

  /** Lay the dubbed vocals over the background and, for video, remux. */
  private async runPostprocessing(): Promise<StageOutputs['postprocessing']> {
    const { settings, collaborators } = this.deps
    const { media, utterances, metadataFile } = await this.getStageOutput('saving_metadata')

    const dubbedAudioFile = await collaborators.media.mixDubbedAudio({
      utterances,
      backgroundFile: media.backgroundFile,
      outputDirectory: settings.outputDirectory,
      targetLanguage: settings.targetLanguage,
    })
    if (!media.isVideo) {
      return { outputFile: dubbedAudioFile, metadataFile }
    }
    if (!media.videoFile) {
      throw new DubbingError('E_MISSING_VIDEO', 'A video track is required when the input file is a video')
    }
    const outputFile = await collaborators.media.combineAudioVideo({
      videoFile: media.videoFile,
      audioFile: dubbedAudioFile,
      outputDirectory: settings.outputDirectory,
      targetLanguage: settings.targetLanguage,
    })
    return { outputFile, metadataFile }
  }

  /**
   * Remove every artifact of the run except the final output and the input file.
   * Resolves with the resolved paths that were removed.
   */
  private async runCleanup(outputFile: string): Promise<Set<string>> {
    return await this.trackStep('cleanup', async () => {
      const removed = new Set<string>()
      let failures: CleanupError[]
      try {
        const result = await cleanDirectory({
          directory: this.deps.settings.outputDirectory,
          keepFiles: [outputFile, this.deps.settings.inputFile],
          remove: this.deps.removeEntry,
        })
        result.removed.forEach((entryPath) => removed.add(path.resolve(entryPath)))
        failures = result.failures
        this.log('cleanup', 'info', `Removed ${result.removed.length} temporary artifacts`)
      } catch (error) {
        failures = [new CleanupError(this.deps.settings.outputDirectory, error)]
      }

      for (const failure of failures) {
        this.emit('warning', {
          runId: this.runId,
          stage: 'cleanup',
          errorCode: failure.code,
          errorMessage: failure.message,
        })
        this.log('cleanup', 'warn', failure.message)
      }
      this.cleanupFailures = failures
      return removed
    })
  }

  private loadInstructions(kind: 'diarization' | 'translation'): Promise<string> {
    const cached = this.instructionCache.get(kind)
    if (cached) return cached
    const source =
      kind === 'diarization'
        ? this.deps.settings.diarizationSystemInstructions
        : this.deps.settings.translationSystemInstructions
    const pending = readSystemInstructions(source)
    this.instructionCache.set(kind, pending)
    return pending
  }

  private ensureRunRecorded(): void {
    const ledger = this.deps.ledger
    if (!ledger || ledger.runDao.findRunById(this.runId)) return
    const { settings } = this.deps
    ledger.runDao.createRun({
      id: this.runId,
      inputFile: settings.inputFile,
      outputDirectory: settings.outputDirectory,
      sourceLanguage: settings.sourceLanguage,
      targetLanguage: settings.targetLanguage,
    })
  }

  private log(stage: StepName | 'engine', level: 'info' | 'warn' | 'error', text: string): void {
    if (stage === this.currentStep) {
      this.stepLogLines.push(text)
    }
    this.emit('log', { runId: this.runId, stage, level, text, timestamp: nowIso() })
  }

  /** Emit typed engine events through the internal event emitter. */
  private emit<T extends EventName>(event: T, payload: DubbingEngineEvents[T]): void {
    this.emitter.emit(event, payload)
  }
}
