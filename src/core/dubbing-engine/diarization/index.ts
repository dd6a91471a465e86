export { waitUntilActive, type WaitUntilActiveOptions, type WaitUntilActiveResult } from './assetPoller'
export { buildDiarizationPrompt, diarizeSpeakers } from './diarizeSpeakers'
export { parseSpeakerDiarizationResponse } from './responseParser'
