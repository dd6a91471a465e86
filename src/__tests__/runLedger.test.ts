import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { closeDatabase, openDatabase, type DatabaseContext } from '../core/db'
import { getSchemaVersion, runMigrations } from '../core/db/migrate'

const runInput = {
  inputFile: '/in/ad.mp4',
  outputDirectory: '/out',
  sourceLanguage: 'en',
  targetLanguage: 'pl-PL',
}

describe('run ledger', () => {
  let database: DatabaseContext

  beforeEach(() => {
    database = openDatabase({ dbPath: ':memory:' })
  })

  afterEach(() => {
    closeDatabase(database)
  })

  it('applies the schema once', () => {
    expect(getSchemaVersion(database.db)).toBe(1)
    runMigrations(database.db)
    expect(getSchemaVersion(database.db)).toBe(1)
    expect(database.db.prepare('SELECT version, description FROM schema_migrations').all()).toEqual([
      { version: 1, description: 'runs and run steps' },
    ])
  })

  it('creates runs in the created state and finds them by id', () => {
    const run = database.runDao.createRun({ id: 'run-a', ...runInput })
    expect(run.status).toBe('created')
    expect(run.outputFile).toBeNull()
    expect(database.runDao.findRunById('run-a')?.inputFile).toBe('/in/ad.mp4')
    expect(database.runDao.findRunById('missing')).toBeNull()
    expect(() => database.runDao.getRunById('missing')).toThrow('Run not found: missing')
  })

  it('keeps fields the status patch leaves out', () => {
    database.runDao.createRun({ id: 'run-a', ...runInput })
    database.runDao.updateRunStatus('run-a', 'completed', { outputFile: '/out/dubbed.mp4' })
    const updated = database.runDao.updateRunStatus('run-a', 'completed', { errorCode: null })
    expect(updated.outputFile).toBe('/out/dubbed.mp4')
    expect(updated.status).toBe('completed')
  })

  it('lists runs', () => {
    database.runDao.createRun({ id: 'run-a', ...runInput })
    database.runDao.createRun({ id: 'run-b', ...runInput })
    expect(
      database.runDao
        .listRuns()
        .map((run) => run.id)
        .sort(),
    ).toEqual(['run-a', 'run-b'])
    expect(database.runDao.listRuns(1)).toHaveLength(1)
  })

  it('records step outcomes', () => {
    database.runDao.createRun({ id: 'run-a', ...runInput })
    const first = database.runStepDao.startStep('run-a', 'preprocessing')
    const second = database.runStepDao.startStep('run-a', 'transcribing')
    const finished = database.runStepDao.finishStep(first, 'Detected 3 utterances')
    const failed = database.runStepDao.failStep(second, 'E_PARSE', 'Malformed diarization line 1')

    expect(finished.status).toBe('success')
    expect(finished.logExcerpt).toBe('Detected 3 utterances')
    expect(finished.durationMs).toBeGreaterThanOrEqual(0)
    expect(failed.status).toBe('failed')
    expect(failed.errorCode).toBe('E_PARSE')
    expect(database.runStepDao.listSteps('run-a').map((step) => step.stepName)).toEqual([
      'preprocessing',
      'transcribing',
    ])
  })

  it('rejects steps for unknown runs', () => {
    expect(() => database.runStepDao.startStep('missing', 'preprocessing')).toThrow()
  })
})
