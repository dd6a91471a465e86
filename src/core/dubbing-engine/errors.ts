/**
 * Base class for every error raised by the dubbing pipeline.
 * `code` is stable and is what gets written to the run ledger.
 */
export class DubbingError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

export class UnsupportedFormatError extends DubbingError {
  constructor(readonly extension: string) {
    super('E_UNSUPPORTED_FORMAT', `Unsupported file format: ${extension || '(none)'}`)
  }
}

export class ConfigurationError extends DubbingError {
  constructor(message: string) {
    super('E_CONFIGURATION', message)
  }
}

export class RemoteAssetTimeoutError extends DubbingError {
  constructor(
    readonly assetName: string,
    readonly waitedMs: number,
  ) {
    super('E_REMOTE_ASSET_TIMEOUT', `Remote asset '${assetName}' was not active after ${waitedMs}ms`)
  }
}

export class RemoteAssetFailedError extends DubbingError {
  constructor(readonly assetName: string) {
    super('E_REMOTE_ASSET_FAILED', `Remote asset '${assetName}' failed to process`)
  }
}

export class ParseError extends DubbingError {
  constructor(
    readonly line: string,
    readonly lineNumber: number,
    reason: string,
  ) {
    super('E_PARSE', `Malformed diarization line ${lineNumber} (${reason}): ${JSON.stringify(line)}`)
  }
}

export class AttributionMismatchError extends DubbingError {
  constructor(
    readonly utteranceCount: number,
    readonly speakerInfoCount: number,
  ) {
    super(
      'E_ATTRIBUTION_MISMATCH',
      `The length of utterances (${utteranceCount}) and speaker info (${speakerInfoCount}) must be the same`,
    )
  }
}

export class TranslationMismatchError extends DubbingError {
  constructor(
    readonly utteranceCount: number,
    readonly translationCount: number,
  ) {
    super(
      'E_TRANSLATION_MISMATCH',
      `Expected ${utteranceCount} translated lines, received ${translationCount}`,
    )
  }
}

export class InvalidUtteranceError extends DubbingError {
  constructor(message: string) {
    super('E_INVALID_UTTERANCE', message)
  }
}

/** Recoverable: the metadata snapshot could not be written. */
export class PersistenceWarning extends DubbingError {
  constructor(
    readonly filePath: string,
    cause: unknown,
  ) {
    super('E_PERSISTENCE', `Error saving utterance metadata to '${filePath}': ${describeError(cause)}`, {
      cause,
    })
  }
}

/** Recoverable: one entry of the working directory could not be removed. */
export class CleanupError extends DubbingError {
  constructor(
    readonly filePath: string,
    cause: unknown,
  ) {
    super('E_CLEANUP', `Failed to remove '${filePath}': ${describeError(cause)}`, { cause })
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return typeof error === 'string' ? error : 'Unknown error'
}

export function errorCodeOf(error: unknown, fallback: string): string {
  return error instanceof DubbingError ? error.code : fallback
}
