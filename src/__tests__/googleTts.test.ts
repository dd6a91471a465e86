import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ConfigurationError } from '../core/dubbing-engine/errors'
import { GoogleSpeechSynthesizer } from '../services/google-tts/GoogleSpeechSynthesizer'
import { GoogleTtsClient, type TtsVoice } from '../services/google-tts/GoogleTtsClient'
import { GoogleVoiceAssigner, pickVoices } from '../services/google-tts/GoogleVoiceAssigner'

const voices: TtsVoice[] = [
  { name: 'pl-PL-Standard-A', languageCodes: ['pl-PL'], ssmlGender: 'FEMALE' },
  { name: 'pl-PL-Wavenet-A', languageCodes: ['pl-PL'], ssmlGender: 'FEMALE' },
  { name: 'pl-PL-Wavenet-B', languageCodes: ['pl-PL'], ssmlGender: 'MALE' },
  { name: 'pl-PL-Standard-B', languageCodes: ['pl-PL'], ssmlGender: 'MALE' },
  { name: 'pl-PL-Wavenet-C', languageCodes: ['pl-PL'], ssmlGender: 'FEMALE' },
]

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } })
}

describe('pickVoices', () => {
  it('matches gender, prefers the requested families and avoids reuse', () => {
    expect(
      pickVoices({
        speakers: [
          { speakerId: 'speaker_1', gender: 'Male' },
          { speakerId: 'speaker_2', gender: 'Female' },
          { speakerId: 'speaker_3', gender: 'female' },
        ],
        voices,
        preferredVoices: ['Wavenet'],
      }),
    ).toEqual({
      speaker_1: 'pl-PL-Wavenet-B',
      speaker_2: 'pl-PL-Wavenet-A',
      speaker_3: 'pl-PL-Wavenet-C',
    })
  })

  it('orders by name without a preference', () => {
    expect(pickVoices({ speakers: [{ speakerId: 'speaker_1', gender: 'Female' }], voices })).toEqual({
      speaker_1: 'pl-PL-Standard-A',
    })
  })

  it('reuses a voice once every candidate is taken', () => {
    const maleOnly = voices.filter((voice) => voice.name === 'pl-PL-Wavenet-B')
    expect(
      pickVoices({
        speakers: [
          { speakerId: 'speaker_1', gender: 'Male' },
          { speakerId: 'speaker_2', gender: 'Male' },
        ],
        voices: maleOnly,
      }),
    ).toEqual({ speaker_1: 'pl-PL-Wavenet-B', speaker_2: 'pl-PL-Wavenet-B' })
  })

  it('falls back to any voice for an unknown gender', () => {
    expect(pickVoices({ speakers: [{ speakerId: 'speaker_1', gender: 'Unknown' }], voices })).toEqual({
      speaker_1: 'pl-PL-Standard-A',
    })
  })

  it('fails when no voice exists', () => {
    expect(() => pickVoices({ speakers: [{ speakerId: 'speaker_1', gender: 'Male' }], voices: [] })).toThrow(
      'No voice available for speaker speaker_1',
    )
  })
})

describe('Google Text-to-Speech services', () => {
  const fetchMock = vi.fn(async (_input: string | URL, _init?: RequestInit) => jsonResponse({}))
  let tempDir = ''

  beforeEach(async () => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dubflow-tts-'))
  })

  afterEach(async () => {
    vi.unstubAllGlobals()
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  function client(): GoogleTtsClient {
    return new GoogleTtsClient({ apiBaseUrl: 'https://tts.test', apiKey: 'test-secret', env: {} })
  }

  it('lists voices for a language and skips malformed entries', async () => {
    fetchMock.mockImplementation(async () =>
      jsonResponse({
        voices: [
          { name: 'pl-PL-Wavenet-B', languageCodes: ['pl-PL'], ssmlGender: 'MALE', naturalSampleRateHertz: 24000 },
          { languageCodes: ['pl-PL'] },
        ],
      }),
    )

    const listed = await client().listVoices('pl-PL')

    expect(listed).toEqual([{ name: 'pl-PL-Wavenet-B', languageCodes: ['pl-PL'], ssmlGender: 'MALE' }])
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe('https://tts.test/v1/voices?languageCode=pl-PL')
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({ 'x-goog-api-key': 'test-secret' })
  })

  it('assigns voices from the listed ones', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ voices }))
    const assigner = new GoogleVoiceAssigner(client())

    await expect(
      assigner.assignVoices({
        speakers: [{ speakerId: 'speaker_1', gender: 'Male' }],
        targetLanguage: 'pl-PL',
        preferredVoices: ['Standard'],
      }),
    ).resolves.toEqual({ speaker_1: 'pl-PL-Standard-B' })
  })

  it('fails when the language has no voices', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ voices: [] }))
    const assigner = new GoogleVoiceAssigner(client())

    await expect(
      assigner.assignVoices({ speakers: [{ speakerId: 'speaker_1', gender: 'Male' }], targetLanguage: 'xx-XX' }),
    ).rejects.toThrow('No Text-to-Speech voices found for xx-XX')
  })

  it('writes the synthesized audio to the output file', async () => {
    fetchMock.mockImplementation(async () =>
      jsonResponse({ audioContent: Buffer.from('mp3-bytes').toString('base64') }),
    )
    const synthesizer = new GoogleSpeechSynthesizer(client())
    const outputFile = path.join(tempDir, 'nested', 'dubbed_utterance_000.mp3')

    const written = await synthesizer.synthesize({
      text: 'Dzień dobry',
      voice: 'pl-PL-Wavenet-B',
      targetLanguage: 'pl-PL',
      outputFile,
    })

    expect(written).toBe(outputFile)
    expect(await fs.readFile(outputFile, 'utf-8')).toBe('mp3-bytes')
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body))
    expect(body).toEqual({
      input: { text: 'Dzień dobry' },
      voice: { languageCode: 'pl-PL', name: 'pl-PL-Wavenet-B' },
      audioConfig: { audioEncoding: 'MP3' },
    })
  })

  it('requires an API key', async () => {
    const withoutKey = new GoogleTtsClient({ apiBaseUrl: 'https://tts.test', env: {} })
    await expect(withoutKey.listVoices('pl-PL')).rejects.toBeInstanceOf(ConfigurationError)
    expect(fetchMock).not.toHaveBeenCalled()
  })
})
