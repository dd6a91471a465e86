import type Database from 'better-sqlite3'
import type { RunStepRecord, StepName, StepStatus } from '../types'

interface RunStepRow {
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

const SELECT_COLUMNS = `
  id,
  run_id AS runId,
  step_name AS stepName,
  status,
  started_at AS startedAt,
  ended_at AS endedAt,
  duration_ms AS durationMs,
  error_code AS errorCode,
  error_message AS errorMessage,
  log_excerpt AS logExcerpt
`

function mapRunStep(row: RunStepRow): RunStepRecord {
  return {
    id: row.id,
    runId: row.runId,
    stepName: row.stepName,
    status: row.status,
    startedAt: row.startedAt,
    endedAt: row.endedAt,
    durationMs: row.durationMs,
    errorCode: row.errorCode,
    errorMessage: row.errorMessage,
    logExcerpt: row.logExcerpt,
  }
}

function calculateDurationMs(startedAt: string | null, endedAt: string): number | null {
  if (!startedAt) return null
  const startMs = Date.parse(startedAt)
  const endMs = Date.parse(endedAt)
  if (Number.isNaN(startMs) || Number.isNaN(endMs)) return null
  return Math.max(0, endMs - startMs)
}

export class RunStepDao {
  constructor(private readonly db: Database.Database) {}

  startStep(runId: string, stepName: StepName): number {
    const now = new Date().toISOString()
    const info = this.db
      .prepare(
        `
        INSERT INTO run_steps(
          run_id, step_name, status, started_at, ended_at, duration_ms,
          error_code, error_message, log_excerpt
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
      )
      .run(runId, stepName, 'running', now, null, null, null, null, null)

    return Number(info.lastInsertRowid)
  }

  finishStep(stepId: number, logExcerpt?: string | null): RunStepRecord {
    const current = this.getStep(stepId)
    const endedAt = new Date().toISOString()

    this.db
      .prepare(
        `
        UPDATE run_steps
        SET status = ?, ended_at = ?, duration_ms = ?, log_excerpt = COALESCE(?, log_excerpt)
        WHERE id = ?
      `,
      )
      .run('success', endedAt, calculateDurationMs(current.startedAt, endedAt), logExcerpt ?? null, stepId)

    return this.getStep(stepId)
  }

  failStep(stepId: number, errorCode: string, errorMessage: string): RunStepRecord {
    const current = this.getStep(stepId)
    const endedAt = new Date().toISOString()

    this.db
      .prepare(
        `
        UPDATE run_steps
        SET status = ?, ended_at = ?, duration_ms = ?, error_code = ?, error_message = ?
        WHERE id = ?
      `,
      )
      .run('failed', endedAt, calculateDurationMs(current.startedAt, endedAt), errorCode, errorMessage, stepId)

    return this.getStep(stepId)
  }

  listSteps(runId: string): RunStepRecord[] {
    const rows = this.db
      .prepare(`SELECT ${SELECT_COLUMNS} FROM run_steps WHERE run_id = ? ORDER BY id ASC`)
      .all(runId) as RunStepRow[]

    return rows.map(mapRunStep)
  }

  getStep(stepId: number): RunStepRecord {
    const row = this.db
      .prepare(`SELECT ${SELECT_COLUMNS} FROM run_steps WHERE id = ?`)
      .get(stepId) as RunStepRow | undefined

    if (!row) {
      throw new Error(`Run step not found: ${stepId}`)
    }

    return mapRunStep(row)
  }
}
