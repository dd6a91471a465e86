import { spawn } from 'node:child_process'
import { DubbingError } from '../../core/dubbing-engine/errors'

export interface RunCommandOptions {
  command: string
  args: string[]
  cwd?: string
  env?: NodeJS.ProcessEnv
  timeoutMs?: number
  onStdoutLine?: (line: string) => void
  onStderrLine?: (line: string) => void
}

const OUTPUT_TAIL_LINES = 40

/** A child process exited non-zero or ran past its timeout. */
export class CommandError extends DubbingError {
  constructor(
    readonly commandLine: string,
    readonly exitCode: number | null,
    readonly stderrTail: readonly string[],
    readonly stdoutTail: readonly string[],
    readonly timedOutAfterMs?: number,
  ) {
    super(
      timedOutAfterMs === undefined ? 'E_COMMAND_FAILED' : 'E_COMMAND_TIMEOUT',
      formatCommandFailure({ commandLine, exitCode, stderrTail, stdoutTail, timedOutAfterMs }),
    )
  }
}

export function formatCommandFailure(failure: {
  commandLine: string
  exitCode: number | null
  stderrTail: readonly string[]
  stdoutTail: readonly string[]
  timedOutAfterMs?: number
}): string {
  const headline =
    failure.timedOutAfterMs === undefined
      ? `Command failed with code ${failure.exitCode ?? 'null'}: ${failure.commandLine}`
      : `Command timeout after ${failure.timedOutAfterMs}ms: ${failure.commandLine}`
  const details = [
    failure.stderrTail.length > 0 ? `stderr: ${failure.stderrTail.join(' | ')}` : '',
    failure.stdoutTail.length > 0 ? `stdout: ${failure.stdoutTail.join(' | ')}` : '',
  ].filter(Boolean)
  return [headline, ...details].join('\n')
}

/** Split a byte stream into trimmed, non-empty lines. */
export function createLineBuffer(onLine: (line: string) => void): {
  push: (chunk: string) => void
  flush: () => void
} {
  let buffer = ''
  const emit = (line: string): void => {
    const trimmed = line.trim()
    if (trimmed) onLine(trimmed)
  }
  return {
    push: (chunk: string) => {
      buffer += chunk
      const parts = buffer.split(/\r?\n|\r/)
      buffer = parts.pop() ?? ''
      parts.forEach(emit)
    },
    flush: () => {
      emit(buffer)
      buffer = ''
    },
  }
}

function createTail(limit: number): { add: (line: string) => void; lines: string[] } {
  const lines: string[] = []
  return {
    lines,
    add: (line) => {
      lines.push(line)
      if (lines.length > limit) lines.shift()
    },
  }
}

/** Spawn a command and resolve once it exits with code 0; otherwise reject with a {@link CommandError}. */
export async function runCommand(options: RunCommandOptions): Promise<void> {
  const commandLine = [options.command, ...options.args].join(' ')
  const stdoutTail = createTail(OUTPUT_TAIL_LINES)
  const stderrTail = createTail(OUTPUT_TAIL_LINES)
  const stdout = createLineBuffer((line) => {
    stdoutTail.add(line)
    options.onStdoutLine?.(line)
  })
  const stderr = createLineBuffer((line) => {
    stderrTail.add(line)
    options.onStderrLine?.(line)
  })

  const child = spawn(options.command, options.args, {
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    stdio: 'pipe',
  })
  child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk.toString()))
  child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk.toString()))

  await new Promise<void>((resolve, reject) => {
    const timeoutMs = options.timeoutMs
    let timedOut = false
    const timer =
      timeoutMs !== undefined && Number.isFinite(timeoutMs) && timeoutMs > 0
        ? setTimeout(() => {
          timedOut = true
          child.kill('SIGTERM')
        }, timeoutMs)
        : null

    child.on('error', (error) => {
      if (timer) clearTimeout(timer)
      reject(error)
    })

    child.on('close', (code) => {
      stdout.flush()
      stderr.flush()
      if (timer) clearTimeout(timer)
      if (timedOut || code !== 0) {
        reject(new CommandError(commandLine, code, stderrTail.lines, stdoutTail.lines, timedOut ? timeoutMs : undefined))
        return
      }
      resolve()
    })
  })
}
