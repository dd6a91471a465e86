import fs from 'node:fs/promises'
import path from 'node:path'
import {
  DEFAULT_GEMINI_REQUEST_TIMEOUT_MS,
  DEFAULT_GEMINI_SAFETY_THRESHOLD,
  GEMINI_HARM_CATEGORIES,
  GEMINI_TOKEN_ENV,
} from '../../core/dubbing-engine/constants'
import type { GeminiSettings } from '../../core/dubbing-engine/settings-resolvers'
import { resolveApiToken } from '../../core/dubbing-engine/settings-resolvers'
import {
  arrayField,
  fetchWithTimeout,
  isRecord,
  normalizeBaseUrl,
  readJsonResponse,
  recordField,
  stringField,
  type JsonRecord,
} from '../http'

const MIME_TYPES: Record<string, string> = {
  '.mp4': 'video/mp4',
  '.wav': 'audio/wav',
  '.mp3': 'audio/mpeg',
  '.flac': 'audio/flac',
}

export type GeminiPart = { text: string } | { fileData: { mimeType: string; fileUri: string } }

export interface GeminiContent {
  role: 'user' | 'model'
  parts: GeminiPart[]
}

export interface GeminiFile {
  /** Resource name, e.g. `files/abc123`. */
  name: string
  uri: string
  mimeType: string
  /** `PROCESSING`, `ACTIVE` or `FAILED`. */
  state: string
}

export function mimeTypeOf(filePath: string): string {
  return MIME_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream'
}

function parseGeminiFile(value: unknown): GeminiFile {
  const data: JsonRecord = isRecord(value) ? value : {}
  const nested = data.file
  const record = isRecord(nested) ? nested : data
  const name = stringField(record, 'name')
  const uri = stringField(record, 'uri')
  if (!name || !uri) {
    throw new Error('Gemini file response missing name or uri')
  }
  return {
    name,
    uri,
    mimeType: stringField(record, 'mimeType') ?? 'application/octet-stream',
    state: stringField(record, 'state') ?? 'STATE_UNSPECIFIED',
  }
}

/** Concatenate the text parts of the first candidate. */
export function extractCandidateText(response: unknown): string {
  const data: JsonRecord = isRecord(response) ? response : {}
  const candidate = arrayField(data, 'candidates')[0]
  if (!isRecord(candidate)) {
    const blockReason = stringField(recordField(data, 'promptFeedback'), 'blockReason')
    throw new Error(`Gemini response has no candidates${blockReason ? ` (blocked: ${blockReason})` : ''}`)
  }
  const text = arrayField(recordField(candidate, 'content'), 'parts')
    .map((part) => (isRecord(part) ? stringField(part, 'text') ?? '' : ''))
    .join('')
  if (!text.trim()) {
    throw new Error(`Gemini response missing text (${stringField(candidate, 'finishReason') ?? 'unknown'})`)
  }
  return text
}

/**
 * A multi-turn conversation. The seeded history is never rewound.
 */
export class GeminiChatSession {
  private readonly history: GeminiContent[]
  private readonly seededLength: number

  constructor(
    private readonly client: GeminiClient,
    private readonly systemInstruction: string,
    history: GeminiContent[] = [],
  ) {
    this.history = [...history]
    this.seededLength = this.history.length
  }

  getHistory(): readonly GeminiContent[] {
    return this.history
  }

  async send(prompt: string): Promise<string> {
    const userTurn: GeminiContent = { role: 'user', parts: [{ text: prompt }] }
    const text = await this.client.generateContent({
      systemInstruction: this.systemInstruction,
      contents: [...this.history, userTurn],
    })
    this.history.push(userTurn, { role: 'model', parts: [{ text }] })
    return text
  }

  /** Drop the latest prompt and reply. */
  rewind(): void {
    if (this.history.length - this.seededLength >= 2) {
      this.history.splice(-2, 2)
    }
  }
}

export interface GeminiClientOptions {
  settings: GeminiSettings
  timeoutMs?: number
  env?: NodeJS.ProcessEnv
}

/**
 * REST client for the Gemini API: file upload, file status and content generation.
 */
export class GeminiClient {
  private readonly baseUrl: string

  constructor(private readonly options: GeminiClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.settings.apiBaseUrl)
  }

  private get timeoutMs(): number {
    return this.options.timeoutMs ?? DEFAULT_GEMINI_REQUEST_TIMEOUT_MS
  }

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    return {
      'x-goog-api-key': resolveApiToken(GEMINI_TOKEN_ENV, this.options.settings.token, this.options.env),
      ...extra,
    }
  }

  async uploadFile(filePath: string): Promise<GeminiFile> {
    const bytes = await fs.readFile(filePath)
    const mimeType = mimeTypeOf(filePath)
    const startResponse = await fetchWithTimeout(
      `${this.baseUrl}/upload/v1beta/files`,
      {
        method: 'POST',
        headers: this.headers({
          'Content-Type': 'application/json',
          'X-Goog-Upload-Protocol': 'resumable',
          'X-Goog-Upload-Command': 'start',
          'X-Goog-Upload-Header-Content-Length': String(bytes.byteLength),
          'X-Goog-Upload-Header-Content-Type': mimeType,
        }),
        body: JSON.stringify({ file: { display_name: path.basename(filePath) } }),
      },
      this.timeoutMs,
      'Gemini upload start',
    )
    if (!startResponse.ok) {
      throw new Error(`Gemini upload start failed: HTTP ${startResponse.status}`)
    }
    const uploadUrl = startResponse.headers.get('x-goog-upload-url')
    if (!uploadUrl) {
      throw new Error('Gemini upload start response missing x-goog-upload-url')
    }

    const uploadResponse = await fetchWithTimeout(
      uploadUrl,
      {
        method: 'POST',
        headers: this.headers({
          'Content-Length': String(bytes.byteLength),
          'X-Goog-Upload-Offset': '0',
          'X-Goog-Upload-Command': 'upload, finalize',
        }),
        body: bytes,
      },
      this.timeoutMs,
      'Gemini upload',
    )
    return parseGeminiFile(await readJsonResponse(uploadResponse, 'Gemini upload'))
  }

  async getFile(name: string): Promise<GeminiFile> {
    const response = await fetchWithTimeout(
      `${this.baseUrl}/v1beta/${name}`,
      { method: 'GET', headers: this.headers() },
      this.timeoutMs,
      'Gemini file query',
    )
    return parseGeminiFile(await readJsonResponse(response, 'Gemini file query'))
  }

  async generateContent(params: { systemInstruction: string; contents: GeminiContent[] }): Promise<string> {
    const settings = this.options.settings
    const response = await fetchWithTimeout(
      `${this.baseUrl}/v1beta/models/${settings.modelName}:generateContent`,
      {
        method: 'POST',
        headers: this.headers({ 'Content-Type': 'application/json' }),
        body: JSON.stringify({
          systemInstruction: { parts: [{ text: params.systemInstruction }] },
          contents: params.contents,
          generationConfig: {
            temperature: settings.temperature,
            topP: settings.topP,
            topK: settings.topK,
            maxOutputTokens: settings.maxOutputTokens,
            responseMimeType: settings.responseMimeType,
          },
          safetySettings: GEMINI_HARM_CATEGORIES.map((category) => ({
            category,
            threshold: DEFAULT_GEMINI_SAFETY_THRESHOLD,
          })),
        }),
      },
      this.timeoutMs,
      'Gemini generateContent',
    )
    return extractCandidateText(await readJsonResponse(response, 'Gemini generateContent'))
  }

  startChat(params: { systemInstruction: string; history?: GeminiContent[] }): GeminiChatSession {
    return new GeminiChatSession(this, params.systemInstruction, params.history)
  }
}
