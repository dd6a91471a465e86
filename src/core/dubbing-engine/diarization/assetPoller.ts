import { RemoteAssetFailedError, RemoteAssetTimeoutError } from '../errors'
import type { RemoteAssetHandle, RemoteStatusQuery } from '../types'
import { sleep } from '../utils'

export interface WaitUntilActiveOptions {
  maxWaitMs: number
  pollIntervalMs: number
  /** Called after every re-query with the observed handle. */
  onPoll?: (handle: RemoteAssetHandle, attempt: number) => void
}

export interface WaitUntilActiveResult {
  handle: RemoteAssetHandle
  queries: number
}

/**
 * Block until an uploaded asset becomes `active`.
 *
 * The handle's own state is inspected first; while it is `pending` the status is
 * re-queried at a fixed interval. `failed` ends the wait at once, and staying `pending`
 * past `maxWaitMs` raises a timeout. No backoff, no cancellation.
 */
export async function waitUntilActive(
  handle: RemoteAssetHandle,
  queryStatus: RemoteStatusQuery,
  options: WaitUntilActiveOptions,
): Promise<WaitUntilActiveResult> {
  const { maxWaitMs, pollIntervalMs } = options
  const startedAt = Date.now()
  let current = handle
  let queries = 0

  while (current.state !== 'active') {
    if (current.state === 'failed') {
      throw new RemoteAssetFailedError(current.name)
    }

    const elapsed = Date.now() - startedAt
    if (elapsed >= maxWaitMs) {
      throw new RemoteAssetTimeoutError(current.name, elapsed)
    }

    await sleep(Math.min(pollIntervalMs, maxWaitMs - elapsed))
    const state = await queryStatus(current)
    queries += 1
    current = { ...current, state }
    options.onPoll?.(current, queries)
  }

  return { handle: current, queries }
}
