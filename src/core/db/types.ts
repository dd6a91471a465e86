export type StageName =
  | 'preprocessing'
  | 'transcribing'
  | 'translating'
  | 'synthesizing'
  | 'saving_metadata'
  | 'postprocessing'

export type StepName = StageName | 'cleanup'

export type StepStatus = 'running' | 'success' | 'failed'

export type RunStatus = 'created' | 'running' | StageName | 'cleanup' | 'completed' | 'failed'

export interface CreateRunInput {
  id: string
  inputFile: string
  outputDirectory: string
  sourceLanguage: string
  targetLanguage: string
}

export interface RunRecord {
  id: string
  inputFile: string
  outputDirectory: string
  sourceLanguage: string
  targetLanguage: string
  status: RunStatus
  outputFile: string | null
  errorCode: string | null
  errorMessage: string | null
  createdAt: string
  updatedAt: string
  completedAt: string | null
}

export interface RunStepRecord {
  id: number
  runId: string
  stepName: StepName
  status: StepStatus
  startedAt: string | null
  endedAt: string | null
  durationMs: number | null
  errorCode: string | null
  errorMessage: string | null
  logExcerpt: string | null
}
