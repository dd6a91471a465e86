import {
  DEFAULT_ASSET_MAX_WAIT_MS,
  DEFAULT_ASSET_POLL_INTERVAL_MS,
  DEFAULT_DIARIZATION_SYSTEM_INSTRUCTIONS,
  DEFAULT_GEMINI_API_BASE_URL,
  DEFAULT_GEMINI_MAX_OUTPUT_TOKENS,
  DEFAULT_GEMINI_MODEL,
  DEFAULT_GEMINI_RESPONSE_MIME_TYPE,
  DEFAULT_GEMINI_TEMPERATURE,
  DEFAULT_GEMINI_TOP_K,
  DEFAULT_GEMINI_TOP_P,
  DEFAULT_GOOGLE_TTS_API_BASE_URL,
  DEFAULT_MINIMUM_MERGE_THRESHOLD_SEC,
  DEFAULT_NUMBER_OF_SPEAKERS,
  DEFAULT_TRANSLATION_SYSTEM_INSTRUCTIONS,
} from './constants'
import { ConfigurationError } from './errors'

export interface GeminiSettings {
  apiBaseUrl: string
  token?: string
  modelName: string
  temperature: number
  topP: number
  topK: number
  maxOutputTokens: number
  responseMimeType: string
}

/**
 * Caller-facing run options. Everything except the file paths and languages is optional.
 */
export interface DubbingRunInput {
  inputFile: string
  outputDirectory: string
  /** Used as context for transcription and translation prompts. */
  advertiserName?: string
  /** ISO 639-1 language code of the source audio, e.g. `en`. */
  sourceLanguage: string
  /** BCP-47 language code to dub into, e.g. `pl-PL`. */
  targetLanguage: string
  numberOfSpeakers?: number
  diarizationInstructions?: string
  translationInstructions?: string
  mergeUtterances?: boolean
  minimumMergeThreshold?: number
  /** High-level voice families such as `Wavenet` or `Standard`. */
  preferredVoices?: string[]
  cleanUp?: boolean
  /** Inline text or a path to a `.txt` file. */
  diarizationSystemInstructions?: string
  translationSystemInstructions?: string
  assetPollIntervalMs?: number
  assetMaxWaitMs?: number
  gemini?: Partial<GeminiSettings>
  googleTts?: { apiBaseUrl?: string; apiKey?: string }
}

export interface DubbingSettings {
  inputFile: string
  outputDirectory: string
  advertiserName?: string
  sourceLanguage: string
  targetLanguage: string
  numberOfSpeakers: number
  diarizationInstructions?: string
  translationInstructions?: string
  mergeUtterances: boolean
  minimumMergeThreshold: number
  preferredVoices?: string[]
  cleanUp: boolean
  diarizationSystemInstructions: string
  translationSystemInstructions: string
  assetPollIntervalMs: number
  assetMaxWaitMs: number
  gemini: GeminiSettings
  googleTts: { apiBaseUrl: string; apiKey?: string }
}

function positiveOr(value: number | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback
}

/**
 * Fill run options with defaults and validate the values that have a fixed range.
 */
export function resolveDubbingSettings(input: DubbingRunInput): DubbingSettings {
  if (!input.inputFile.trim()) {
    throw new ConfigurationError('inputFile is required')
  }
  if (!input.outputDirectory.trim()) {
    throw new ConfigurationError('outputDirectory is required')
  }
  if (!input.sourceLanguage.trim() || !input.targetLanguage.trim()) {
    throw new ConfigurationError('sourceLanguage and targetLanguage are required')
  }

  const numberOfSpeakers = input.numberOfSpeakers ?? DEFAULT_NUMBER_OF_SPEAKERS
  if (!Number.isInteger(numberOfSpeakers) || numberOfSpeakers < 1) {
    throw new ConfigurationError(`numberOfSpeakers must be a positive integer, got ${numberOfSpeakers}`)
  }
  const minimumMergeThreshold = input.minimumMergeThreshold ?? DEFAULT_MINIMUM_MERGE_THRESHOLD_SEC
  if (!Number.isFinite(minimumMergeThreshold) || minimumMergeThreshold < 0) {
    throw new ConfigurationError(`minimumMergeThreshold must be >= 0, got ${minimumMergeThreshold}`)
  }

  const gemini = input.gemini ?? {}
  return {
    inputFile: input.inputFile,
    outputDirectory: input.outputDirectory,
    advertiserName: input.advertiserName,
    sourceLanguage: input.sourceLanguage,
    targetLanguage: input.targetLanguage,
    numberOfSpeakers,
    diarizationInstructions: input.diarizationInstructions,
    translationInstructions: input.translationInstructions,
    mergeUtterances: input.mergeUtterances ?? true,
    minimumMergeThreshold,
    preferredVoices: input.preferredVoices,
    cleanUp: input.cleanUp ?? true,
    diarizationSystemInstructions:
      input.diarizationSystemInstructions ?? DEFAULT_DIARIZATION_SYSTEM_INSTRUCTIONS,
    translationSystemInstructions:
      input.translationSystemInstructions ?? DEFAULT_TRANSLATION_SYSTEM_INSTRUCTIONS,
    assetPollIntervalMs: positiveOr(input.assetPollIntervalMs, DEFAULT_ASSET_POLL_INTERVAL_MS),
    assetMaxWaitMs: positiveOr(input.assetMaxWaitMs, DEFAULT_ASSET_MAX_WAIT_MS),
    gemini: {
      apiBaseUrl: gemini.apiBaseUrl ?? DEFAULT_GEMINI_API_BASE_URL,
      token: gemini.token,
      modelName: gemini.modelName ?? DEFAULT_GEMINI_MODEL,
      temperature: gemini.temperature ?? DEFAULT_GEMINI_TEMPERATURE,
      topP: gemini.topP ?? DEFAULT_GEMINI_TOP_P,
      topK: gemini.topK ?? DEFAULT_GEMINI_TOP_K,
      maxOutputTokens: gemini.maxOutputTokens ?? DEFAULT_GEMINI_MAX_OUTPUT_TOKENS,
      responseMimeType: gemini.responseMimeType ?? DEFAULT_GEMINI_RESPONSE_MIME_TYPE,
    },
    googleTts: {
      apiBaseUrl: input.googleTts?.apiBaseUrl ?? DEFAULT_GOOGLE_TTS_API_BASE_URL,
      apiKey: input.googleTts?.apiKey,
    },
  }
}

/**
 * Resolve a credential, preferring the explicit value over the environment variable.
 */
export function resolveApiToken(
  envVariable: string,
  providedToken?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const token = providedToken?.trim() || env[envVariable]?.trim()
  if (!token) {
    throw new ConfigurationError(
      `You must either provide the token argument or set the '${envVariable}' environment variable`,
    )
  }
  return token
}

export function resolveApiKeyState(
  envVariable: string,
  providedToken?: string,
  env: NodeJS.ProcessEnv = process.env,
): 'set' | 'missing' {
  return providedToken?.trim() || env[envVariable]?.trim() ? 'set' : 'missing'
}

/**
 * Normalize endpoint URL for logging (drop query string and credentials).
 */
export function normalizeEndpointForLog(rawUrl: string): string {
  const trimmed = rawUrl.trim()
  if (!trimmed) return '(empty)'
  try {
    const parsed = new URL(trimmed)
    return `${parsed.origin}${parsed.pathname}`.replace(/\/+$/, '')
  } catch {
    return trimmed
  }
}
