import path from 'node:path'
import { fileURLToPath } from 'node:url'
import type { StageName } from '../db/types'

/**
 * Pipeline stages in execution order.
 */
export const STAGES: readonly StageName[] = [
  'preprocessing',
  'transcribing',
  'translating',
  'synthesizing',
  'saving_metadata',
  'postprocessing',
]

/**
 * Stages that advance the progress counter. Cleanup adds one more unit when enabled.
 */
export const PROGRESS_STAGES: readonly StageName[] = [
  'preprocessing',
  'transcribing',
  'translating',
  'synthesizing',
  'postprocessing',
]

export const ACCEPTED_VIDEO_FORMATS = ['.mp4'] as const
export const ACCEPTED_AUDIO_FORMATS = ['.wav', '.mp3', '.flac'] as const

export const UTTERANCE_METADATA_FILE_NAME = 'utterance_metadata.json'

export const GEMINI_TOKEN_ENV = 'GEMINI_TOKEN'
export const GOOGLE_TTS_API_KEY_ENV = 'GOOGLE_TTS_API_KEY'

// Remote asset polling defaults
export const DEFAULT_ASSET_POLL_INTERVAL_MS = 10 * 1000
export const DEFAULT_ASSET_MAX_WAIT_MS = 5 * 60 * 1000

// Utterance defaults
export const DEFAULT_NUMBER_OF_SPEAKERS = 1
export const DEFAULT_MINIMUM_MERGE_THRESHOLD_SEC = 0.001

// Gemini defaults
export const DEFAULT_GEMINI_API_BASE_URL = 'https://generativelanguage.googleapis.com'
export const DEFAULT_GEMINI_MODEL = 'gemini-1.5-flash'
export const DEFAULT_GEMINI_TEMPERATURE = 1.0
export const DEFAULT_GEMINI_TOP_P = 0.95
export const DEFAULT_GEMINI_TOP_K = 64
export const DEFAULT_GEMINI_MAX_OUTPUT_TOKENS = 8192
export const DEFAULT_GEMINI_RESPONSE_MIME_TYPE = 'text/plain'
export const DEFAULT_GEMINI_REQUEST_TIMEOUT_MS = 120 * 1000

export const GEMINI_HARM_CATEGORIES = [
  'HARM_CATEGORY_HATE_SPEECH',
  'HARM_CATEGORY_HARASSMENT',
  'HARM_CATEGORY_SEXUALLY_EXPLICIT',
  'HARM_CATEGORY_DANGEROUS_CONTENT',
] as const

export const DEFAULT_GEMINI_SAFETY_THRESHOLD = 'BLOCK_LOW_AND_ABOVE'

// Google Text-to-Speech defaults
export const DEFAULT_GOOGLE_TTS_API_BASE_URL = 'https://texttospeech.googleapis.com'

const moduleDir = path.dirname(fileURLToPath(import.meta.url))
const assetsDir = path.resolve(moduleDir, '..', '..', '..', 'assets')

export const DEFAULT_DIARIZATION_SYSTEM_INSTRUCTIONS = path.join(
  assetsDir,
  'system_settings_diarization.txt',
)
export const DEFAULT_TRANSLATION_SYSTEM_INSTRUCTIONS = path.join(
  assetsDir,
  'system_settings_translation.txt',
)
