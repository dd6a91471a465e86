import { ParseError } from '../errors'
import type { SpeakerAttribution } from '../utterances'

const GROUP_PATTERN = /\(([^()]*)\)/g
const SEPARATOR_ONLY = /^[\s,;]*$/

function stripQuotes(token: string): string {
  const trimmed = token.trim()
  const match = trimmed.match(/^(['"`])(.*)\1$/)
  return match ? match[2].trim() : trimmed
}

function parseLine(line: string, lineNumber: number): SpeakerAttribution[] {
  const groups = Array.from(line.matchAll(GROUP_PATTERN))
  if (groups.length === 0) {
    throw new ParseError(line, lineNumber, 'missing parentheses')
  }

  const leftover = line.replace(GROUP_PATTERN, '')
  if (!SEPARATOR_ONLY.test(leftover)) {
    throw new ParseError(line, lineNumber, `unexpected text ${JSON.stringify(leftover.trim())}`)
  }

  return groups.map((group) => {
    const tokens = group[1].split(',').map(stripQuotes)
    if (tokens.length !== 2) {
      throw new ParseError(line, lineNumber, `expected 2 tokens, got ${tokens.length}`)
    }
    const [speakerId, gender] = tokens
    if (!speakerId || !gender) {
      throw new ParseError(line, lineNumber, 'empty token')
    }
    return [speakerId, gender] as const
  })
}

/**
 * Parse the diarization model's reply into `(speakerId, gender)` tuples.
 *
 * The reply holds one `(speaker_label, gender_label)` group per line; several groups on
 * one line separated by commas are accepted too. Order and duplicates are preserved.
 * Any line that does not fit throws a {@link ParseError}; nothing is returned partially.
 */
export function parseSpeakerDiarizationResponse(response: string): SpeakerAttribution[] {
  const result: SpeakerAttribution[] = []
  const lines = response.split(/\r?\n/)
  lines.forEach((rawLine, index) => {
    const line = rawLine.trim()
    if (!line) return
    result.push(...parseLine(line, index + 1))
  })
  return result
}
