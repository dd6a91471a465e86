import { GOOGLE_TTS_API_KEY_ENV } from '../../core/dubbing-engine/constants'
import { resolveApiToken } from '../../core/dubbing-engine/settings-resolvers'
import {
  arrayField,
  fetchWithTimeout,
  isRecord,
  normalizeBaseUrl,
  readJsonResponse,
  stringField,
} from '../http'

export interface TtsVoice {
  name: string
  languageCodes: string[]
  /** `MALE`, `FEMALE` or `NEUTRAL`. */
  ssmlGender: string
}

export interface GoogleTtsClientOptions {
  apiBaseUrl: string
  apiKey?: string
  timeoutMs?: number
  env?: NodeJS.ProcessEnv
}

function parseVoice(value: unknown): TtsVoice | null {
  if (!isRecord(value)) return null
  const name = stringField(value, 'name')
  if (!name) return null
  return {
    name,
    languageCodes: arrayField(value, 'languageCodes').filter((code): code is string => typeof code === 'string'),
    ssmlGender: stringField(value, 'ssmlGender') ?? 'SSML_VOICE_GENDER_UNSPECIFIED',
  }
}

/**
 * REST client for Google Cloud Text-to-Speech.
 */
export class GoogleTtsClient {
  private readonly baseUrl: string

  constructor(private readonly options: GoogleTtsClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.apiBaseUrl)
  }

  private headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'x-goog-api-key': resolveApiToken(GOOGLE_TTS_API_KEY_ENV, this.options.apiKey, this.options.env),
    }
  }

  async listVoices(languageCode: string): Promise<TtsVoice[]> {
    const url = new URL(`${this.baseUrl}/v1/voices`)
    url.searchParams.set('languageCode', languageCode)
    const response = await fetchWithTimeout(
      url,
      { method: 'GET', headers: this.headers() },
      this.options.timeoutMs,
      'Google TTS voices',
    )
    const data = await readJsonResponse(response, 'Google TTS voices')
    if (!isRecord(data)) return []
    return arrayField(data, 'voices')
      .map(parseVoice)
      .filter((voice): voice is TtsVoice => voice !== null)
  }

  /** Returns the MP3 bytes of the spoken text. */
  async synthesize(params: { text: string; voiceName: string; languageCode: string }): Promise<Buffer> {
    const response = await fetchWithTimeout(
      `${this.baseUrl}/v1/text:synthesize`,
      {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({
          input: { text: params.text },
          voice: { languageCode: params.languageCode, name: params.voiceName },
          audioConfig: { audioEncoding: 'MP3' },
        }),
      },
      this.options.timeoutMs,
      'Google TTS synthesize',
    )
    const data = await readJsonResponse(response, 'Google TTS synthesize')
    const audioContent = isRecord(data) ? stringField(data, 'audioContent') : undefined
    if (!audioContent) {
      throw new Error('Google TTS synthesize response missing audioContent')
    }
    return Buffer.from(audioContent, 'base64')
  }
}
