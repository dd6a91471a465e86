import { AttributionMismatchError, InvalidUtteranceError } from './errors'

/**
 * One detected speech segment. Fields past `end` are filled in by later stages and
 * are append-only: once set, a later stage may read them but never replace them.
 */
export interface UtteranceRecord {
  readonly audioPath: string
  readonly start: number
  readonly end: number
  readonly text?: string
  readonly speakerId?: string
  readonly gender?: string
  readonly translatedText?: string
  readonly assignedVoice?: string
  readonly dubbedAudioPath?: string
}

export type SegmentedUtterance = Pick<UtteranceRecord, 'audioPath' | 'start' | 'end'>
export type TranscribedUtterance = SegmentedUtterance & { readonly text: string }
export type AttributedUtterance = TranscribedUtterance & {
  readonly speakerId: string
  readonly gender: string
}
export type TranslatedUtterance = AttributedUtterance & { readonly translatedText: string }
export type DubbedUtterance = TranslatedUtterance & {
  readonly assignedVoice: string
  readonly dubbedAudioPath: string
}

/** `(speakerId, gender)` as declared by the diarization model. */
export type SpeakerAttribution = readonly [speakerId: string, gender: string]

export interface TimeSpan {
  start: number
  end: number
}

const LATE_BOUND_FIELDS = [
  'text',
  'speakerId',
  'gender',
  'translatedText',
  'assignedVoice',
  'dubbedAudioPath',
] as const

type LateBoundField = (typeof LATE_BOUND_FIELDS)[number]

export function assertValidSpan(span: TimeSpan, index?: number): void {
  const { start, end } = span
  if (!Number.isFinite(start) || !Number.isFinite(end) || start < 0 || start >= end) {
    const where = typeof index === 'number' ? ` at index ${index}` : ''
    throw new InvalidUtteranceError(`Invalid utterance span${where}: start=${start}, end=${end}`)
  }
}

/** Build the chronologically ordered store from segmentation spans and chunk paths. */
export function createUtterances(
  spans: readonly TimeSpan[],
  audioPaths: readonly string[],
): SegmentedUtterance[] {
  if (spans.length !== audioPaths.length) {
    throw new InvalidUtteranceError(
      `Expected ${spans.length} audio chunks, received ${audioPaths.length}`,
    )
  }
  const utterances = spans.map((span, index) => {
    assertValidSpan(span, index)
    return { audioPath: audioPaths[index], start: span.start, end: span.end }
  })
  for (let index = 1; index < utterances.length; index += 1) {
    if (utterances[index].start < utterances[index - 1].start) {
      throw new InvalidUtteranceError(`Utterances are not in chronological order at index ${index}`)
    }
  }
  return utterances
}

/**
 * Return a copy of `record` with `fields` attached. Setting a field that already holds a
 * different value is rejected.
 */
export function extendUtterance<
  T extends SegmentedUtterance,
  F extends Partial<Pick<UtteranceRecord, LateBoundField>>,
>(
  record: T,
  fields: F,
): T & F {
  const current: Partial<UtteranceRecord> = record
  for (const key of LATE_BOUND_FIELDS) {
    const existing = current[key]
    const next = fields[key]
    if (next !== undefined && existing !== undefined && existing !== next) {
      throw new InvalidUtteranceError(
        `Field '${key}' is already set on utterance at ${record.start}s and cannot be replaced`,
      )
    }
  }
  return { ...record, ...fields }
}

/**
 * Attach speaker attribution positionally: tuple `i` belongs to utterance `i`.
 * The diarization prompt asks for exactly one tuple per utterance in chronological order.
 */
export function addSpeakerInfo<T extends TranscribedUtterance>(
  utterances: readonly T[],
  speakerInfo: readonly SpeakerAttribution[],
): Array<T & { speakerId: string; gender: string }> {
  if (utterances.length !== speakerInfo.length) {
    throw new AttributionMismatchError(utterances.length, speakerInfo.length)
  }
  return utterances.map((utterance, index) => {
    const [speakerId, gender] = speakerInfo[index]
    return extendUtterance(utterance, { speakerId, gender })
  })
}

export function addTranslations<T extends AttributedUtterance>(
  utterances: readonly T[],
  translations: readonly string[],
): Array<T & { translatedText: string }> {
  return utterances.map((utterance, index) =>
    extendUtterance(utterance, { translatedText: translations[index] }),
  )
}

function joinText(left: string, right: string): string {
  const a = left.trim()
  const b = right.trim()
  if (!a) return b
  if (!b) return a
  return `${a} ${b}`
}

/**
 * Merge neighbouring utterances of the same speaker whose gap is at most
 * `minimumMergeThreshold` seconds. The merged record keeps the first chunk's audio path.
 */
export function mergeUtterances(
  utterances: readonly TranslatedUtterance[],
  minimumMergeThreshold: number,
): TranslatedUtterance[] {
  const merged: TranslatedUtterance[] = []
  for (const utterance of utterances) {
    const previous = merged[merged.length - 1]
    if (
      previous &&
      previous.speakerId === utterance.speakerId &&
      utterance.start - previous.end <= minimumMergeThreshold
    ) {
      merged[merged.length - 1] = {
        ...previous,
        end: Math.max(previous.end, utterance.end),
        text: joinText(previous.text, utterance.text),
        translatedText: joinText(previous.translatedText, utterance.translatedText),
      }
      continue
    }
    merged.push(utterance)
  }
  return merged
}

/** Distinct speakers in order of first appearance. */
export function listSpeakers(
  utterances: readonly AttributedUtterance[],
): Array<{ speakerId: string; gender: string }> {
  const seen = new Map<string, string>()
  for (const utterance of utterances) {
    if (!seen.has(utterance.speakerId)) {
      seen.set(utterance.speakerId, utterance.gender)
    }
  }
  return Array.from(seen, ([speakerId, gender]) => ({ speakerId, gender }))
}
