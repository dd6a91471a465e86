import type Database from 'better-sqlite3'
import type { CreateRunInput, RunRecord, RunStatus } from '../types'

interface RunRow {
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

const SELECT_COLUMNS = `
  id,
  input_file AS inputFile,
  output_directory AS outputDirectory,
  source_language AS sourceLanguage,
  target_language AS targetLanguage,
  status,
  output_file AS outputFile,
  error_code AS errorCode,
  error_message AS errorMessage,
  created_at AS createdAt,
  updated_at AS updatedAt,
  completed_at AS completedAt
`

function mapRun(row: RunRow): RunRecord {
  return { ...row }
}

export class RunDao {
  constructor(private readonly db: Database.Database) {}

  createRun(input: CreateRunInput): RunRecord {
    const now = new Date().toISOString()
    this.db
      .prepare(
        `
        INSERT INTO runs(
          id, input_file, output_directory, source_language, target_language, status,
          output_file, error_code, error_message, created_at, updated_at, completed_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
      )
      .run(
        input.id,
        input.inputFile,
        input.outputDirectory,
        input.sourceLanguage,
        input.targetLanguage,
        'created',
        null,
        null,
        null,
        now,
        now,
        null,
      )

    return this.getRunById(input.id)
  }

  updateRunStatus(
    id: string,
    status: RunStatus,
    patch: {
      outputFile?: string | null
      errorCode?: string | null
      errorMessage?: string | null
      completedAt?: string | null
    } = {},
  ): RunRecord {
    const current = this.getRunById(id)
    const now = new Date().toISOString()

    this.db
      .prepare(
        `
        UPDATE runs
        SET status = ?, output_file = ?, error_code = ?, error_message = ?, updated_at = ?, completed_at = ?
        WHERE id = ?
      `,
      )
      .run(
        status,
        patch.outputFile === undefined ? current.outputFile : patch.outputFile,
        patch.errorCode === undefined ? current.errorCode : patch.errorCode,
        patch.errorMessage === undefined ? current.errorMessage : patch.errorMessage,
        now,
        patch.completedAt === undefined ? current.completedAt : patch.completedAt,
        id,
      )

    return this.getRunById(id)
  }

  findRunById(id: string): RunRecord | null {
    const row = this.db.prepare(`SELECT ${SELECT_COLUMNS} FROM runs WHERE id = ?`).get(id) as
      | RunRow
      | undefined
    return row ? mapRun(row) : null
  }

  getRunById(id: string): RunRecord {
    const run = this.findRunById(id)
    if (!run) {
      throw new Error(`Run not found: ${id}`)
    }
    return run
  }

  listRuns(limit = 50): RunRecord[] {
    const rows = this.db
      .prepare(`SELECT ${SELECT_COLUMNS} FROM runs ORDER BY created_at DESC LIMIT ?`)
      .all(limit) as RunRow[]
    return rows.map(mapRun)
  }
}
