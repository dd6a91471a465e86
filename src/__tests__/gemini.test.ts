import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ConfigurationError } from '../core/dubbing-engine/errors'
import type { GeminiSettings } from '../core/dubbing-engine/settings-resolvers'
import { GeminiClient, extractCandidateText, mimeTypeOf } from '../services/gemini/GeminiClient'
import { GeminiDiarizationModel, toRemoteAssetState } from '../services/gemini/GeminiDiarizationModel'
import { GeminiTranslator, splitTranslatedScript } from '../services/gemini/GeminiTranslator'

const settings: GeminiSettings = {
  apiBaseUrl: 'https://gemini.test/',
  token: 'test-secret',
  modelName: 'gemini-test',
  temperature: 1,
  topP: 0.95,
  topK: 64,
  maxOutputTokens: 8192,
  responseMimeType: 'text/plain',
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

function candidate(text: string): unknown {
  return { candidates: [{ content: { role: 'model', parts: [{ text }] }, finishReason: 'STOP' }] }
}

function requestBody(init: RequestInit | undefined): unknown {
  return JSON.parse(typeof init?.body === 'string' ? init.body : '{}')
}

describe('Gemini services', () => {
  const fetchMock = vi.fn(async (_input: string | URL, _init?: RequestInit) => jsonResponse(candidate('ok')))

  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('maps file extensions and remote states', () => {
    expect(mimeTypeOf('/in/AD.MP4')).toBe('video/mp4')
    expect(mimeTypeOf('/in/ad.mp3')).toBe('audio/mpeg')
    expect(mimeTypeOf('/in/ad.bin')).toBe('application/octet-stream')
    expect(toRemoteAssetState('ACTIVE')).toBe('active')
    expect(toRemoteAssetState('FAILED')).toBe('failed')
    expect(toRemoteAssetState('PROCESSING')).toBe('pending')
  })

  it('sends generation settings and safety thresholds with every request', async () => {
    fetchMock.mockImplementation(async () => jsonResponse(candidate('Hola')))
    const client = new GeminiClient({ settings })

    const text = await client.generateContent({
      systemInstruction: 'Be brief.',
      contents: [{ role: 'user', parts: [{ text: 'Hi' }] }],
    })

    expect(text).toBe('Hola')
    const [url, init] = fetchMock.mock.calls[0] ?? []
    expect(String(url)).toBe('https://gemini.test/v1beta/models/gemini-test:generateContent')
    expect(init?.method).toBe('POST')
    expect(init?.headers).toMatchObject({ 'x-goog-api-key': 'test-secret' })
    expect(requestBody(init)).toEqual({
      systemInstruction: { parts: [{ text: 'Be brief.' }] },
      contents: [{ role: 'user', parts: [{ text: 'Hi' }] }],
      generationConfig: {
        temperature: 1,
        topP: 0.95,
        topK: 64,
        maxOutputTokens: 8192,
        responseMimeType: 'text/plain',
      },
      safetySettings: [
        { category: 'HARM_CATEGORY_HATE_SPEECH', threshold: 'BLOCK_LOW_AND_ABOVE' },
        { category: 'HARM_CATEGORY_HARASSMENT', threshold: 'BLOCK_LOW_AND_ABOVE' },
        { category: 'HARM_CATEGORY_SEXUALLY_EXPLICIT', threshold: 'BLOCK_LOW_AND_ABOVE' },
        { category: 'HARM_CATEGORY_DANGEROUS_CONTENT', threshold: 'BLOCK_LOW_AND_ABOVE' },
      ],
    })
  })

  it('fails at first use when no token is configured', async () => {
    const client = new GeminiClient({ settings: { ...settings, token: undefined }, env: {} })
    await expect(
      client.generateContent({ systemInstruction: 'x', contents: [{ role: 'user', parts: [{ text: 'Hi' }] }] }),
    ).rejects.toBeInstanceOf(ConfigurationError)
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('reports HTTP errors with the start of the body', async () => {
    fetchMock.mockImplementation(async () => new Response('quota exceeded', { status: 429 }))
    const client = new GeminiClient({ settings })
    await expect(
      client.generateContent({ systemInstruction: 'x', contents: [{ role: 'user', parts: [{ text: 'Hi' }] }] }),
    ).rejects.toThrow('Gemini generateContent failed: HTTP 429 quota exceeded')
  })

  it('explains a blocked prompt', () => {
    expect(() => extractCandidateText({ promptFeedback: { blockReason: 'SAFETY' } })).toThrow(
      'Gemini response has no candidates (blocked: SAFETY)',
    )
    expect(extractCandidateText(candidate('joined'))).toBe('joined')
  })

  describe('diarization model', () => {
    let tempDir = ''

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dubflow-gemini-'))
    })

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true })
    })

    it('uploads the media with a resumable upload', async () => {
      const mediaFile = path.join(tempDir, 'ad.mp4')
      await fs.writeFile(mediaFile, 'video-bytes')
      fetchMock
        .mockImplementationOnce(
          async () => new Response(null, { status: 200, headers: { 'x-goog-upload-url': 'https://upload.test/session-1' } }),
        )
        .mockImplementationOnce(async () =>
          jsonResponse({
            file: { name: 'files/abc', uri: 'https://gemini.test/v1beta/files/abc', mimeType: 'video/mp4', state: 'PROCESSING' },
          }),
        )
      const model = new GeminiDiarizationModel(new GeminiClient({ settings }))

      const handle = await model.uploadAsset(mediaFile)

      expect(handle).toEqual({
        name: 'files/abc',
        uri: 'https://gemini.test/v1beta/files/abc',
        mimeType: 'video/mp4',
        state: 'pending',
      })
      const [startUrl, startInit] = fetchMock.mock.calls[0] ?? []
      expect(String(startUrl)).toBe('https://gemini.test/upload/v1beta/files')
      expect(startInit?.headers).toMatchObject({
        'X-Goog-Upload-Protocol': 'resumable',
        'X-Goog-Upload-Command': 'start',
        'X-Goog-Upload-Header-Content-Length': '11',
        'X-Goog-Upload-Header-Content-Type': 'video/mp4',
      })
      const [uploadUrl, uploadInit] = fetchMock.mock.calls[1] ?? []
      expect(String(uploadUrl)).toBe('https://upload.test/session-1')
      expect(uploadInit?.headers).toMatchObject({ 'X-Goog-Upload-Command': 'upload, finalize' })
    })

    it('queries the file state by resource name', async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({ name: 'files/abc', uri: 'https://gemini.test/v1beta/files/abc', state: 'ACTIVE' }),
      )
      const model = new GeminiDiarizationModel(new GeminiClient({ settings }))

      const state = await model.queryStatus({
        name: 'files/abc',
        uri: 'https://gemini.test/v1beta/files/abc',
        mimeType: 'video/mp4',
        state: 'pending',
      })

      expect(state).toBe('active')
      expect(String(fetchMock.mock.calls[0]?.[0])).toBe('https://gemini.test/v1beta/files/abc')
    })

    it('seeds the chat with the file and rewinds only the latest exchange', async () => {
      fetchMock.mockImplementation(async () => jsonResponse(candidate('(speaker_1, Male)')))
      const client = new GeminiClient({ settings })
      const model = new GeminiDiarizationModel(client)

      const session = await model.startSession({
        asset: { name: 'files/abc', uri: 'https://gemini.test/v1beta/files/abc', mimeType: 'video/mp4', state: 'active' },
        systemInstruction: 'Annotate speakers.',
      })
      const reply = await session.send('Who speaks?')

      expect(reply).toBe('(speaker_1, Male)')
      expect(requestBody(fetchMock.mock.calls[0]?.[1])).toMatchObject({
        systemInstruction: { parts: [{ text: 'Annotate speakers.' }] },
        contents: [
          {
            role: 'user',
            parts: [{ fileData: { mimeType: 'video/mp4', fileUri: 'https://gemini.test/v1beta/files/abc' } }],
          },
          { role: 'user', parts: [{ text: 'Who speaks?' }] },
        ],
      })

      const chat = client.startChat({
        systemInstruction: 'Annotate speakers.',
        history: [{ role: 'user', parts: [{ text: 'seed' }] }],
      })
      await chat.send('first')
      expect(chat.getHistory()).toHaveLength(3)
      chat.rewind()
      expect(chat.getHistory()).toEqual([{ role: 'user', parts: [{ text: 'seed' }] }])
      chat.rewind()
      expect(chat.getHistory()).toHaveLength(1)
    })
  })

  describe('translator', () => {
    it('translates the whole script in one request and splits on break markers', async () => {
      fetchMock.mockImplementation(async () => jsonResponse(candidate('Hola amigo <BREAK> Adiós\n')))
      const translator = new GeminiTranslator(new GeminiClient({ settings }))

      const translations = await translator.translate({
        utterances: [
          { audioPath: 'a.wav', start: 0, end: 1, text: 'Hello friend ' },
          { audioPath: 'b.wav', start: 2, end: 3, text: 'Bye' },
        ],
        sourceLanguage: 'en',
        targetLanguage: 'es-ES',
        advertiserName: 'Acme',
        systemInstruction: 'Translate ads.',
      })

      expect(translations).toEqual(['Hola amigo', 'Adiós'])
      expect(fetchMock).toHaveBeenCalledTimes(1)
      const body = requestBody(fetchMock.mock.calls[0]?.[1])
      expect(body).toMatchObject({ systemInstruction: { parts: [{ text: 'Translate ads.' }] } })
      expect(JSON.stringify(body)).toContain('Script: Hello friend<BREAK>Bye')
      expect(JSON.stringify(body)).toContain('The advertiser is Acme.')
    })

    it('skips the request when there is nothing to translate', async () => {
      const translator = new GeminiTranslator(new GeminiClient({ settings }))
      await expect(
        translator.translate({ utterances: [], sourceLanguage: 'en', targetLanguage: 'es-ES', systemInstruction: 'x' }),
      ).resolves.toEqual([])
      expect(fetchMock).not.toHaveBeenCalled()
    })

    it('keeps empty segments so counts stay aligned', () => {
      expect(splitTranslatedScript('Uno<BREAK><BREAK>Tres')).toEqual(['Uno', '', 'Tres'])
    })
  })
})
