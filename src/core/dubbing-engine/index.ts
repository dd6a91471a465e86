export { DubbingEngine, type DubbingEngineDeps } from './DubbingEngine'
export { cleanDirectory, type RemoveEntry } from './cleanup'
export * from './constants'
export * from './diarization'
export * from './errors'
export {
  resolveDubbingSettings,
  resolveApiToken,
  type DubbingRunInput,
  type DubbingSettings,
  type GeminiSettings,
} from './settings-resolvers'
export type * from './types'
export * from './utterances'
export { isVideoFile, readSystemInstructions } from './utils'
