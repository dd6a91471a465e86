import { describe, expect, it, vi } from 'vitest'
import { waitUntilActive } from '../core/dubbing-engine/diarization'
import { RemoteAssetFailedError, RemoteAssetTimeoutError } from '../core/dubbing-engine/errors'
import type { RemoteAssetHandle, RemoteAssetState } from '../core/dubbing-engine/types'

function handle(state: RemoteAssetState): RemoteAssetHandle {
  return { name: 'files/test-asset', uri: 'https://example.test/files/test-asset', mimeType: 'video/mp4', state }
}

describe('waitUntilActive', () => {
  it('returns an active handle without querying', async () => {
    const query = vi.fn(async (): Promise<RemoteAssetState> => 'active')
    const result = await waitUntilActive(handle('active'), query, { maxWaitMs: 1000, pollIntervalMs: 5 })
    expect(result.queries).toBe(0)
    expect(result.handle.state).toBe('active')
    expect(query).not.toHaveBeenCalled()
  })

  it('re-queries a pending asset until it becomes active', async () => {
    const states: RemoteAssetState[] = ['pending', 'pending', 'active']
    const query = vi.fn(async (): Promise<RemoteAssetState> => states.shift() ?? 'active')
    const onPoll = vi.fn()
    const result = await waitUntilActive(handle('pending'), query, {
      maxWaitMs: 1000,
      pollIntervalMs: 5,
      onPoll,
    })
    expect(result.queries).toBe(3)
    expect(result.handle).toEqual(handle('active'))
    expect(onPoll).toHaveBeenCalledTimes(3)
    expect(onPoll).toHaveBeenLastCalledWith(handle('active'), 3)
  })

  it('becomes active after a single query', async () => {
    const query = vi.fn(async (): Promise<RemoteAssetState> => 'active')
    const result = await waitUntilActive(handle('pending'), query, { maxWaitMs: 1000, pollIntervalMs: 5 })
    expect(result.queries).toBe(1)
    expect(query).toHaveBeenCalledWith(handle('pending'))
  })

  it('fails at once when the initial state is failed', async () => {
    const query = vi.fn(async (): Promise<RemoteAssetState> => 'active')
    await expect(
      waitUntilActive(handle('failed'), query, { maxWaitMs: 1000, pollIntervalMs: 5 }),
    ).rejects.toBeInstanceOf(RemoteAssetFailedError)
    expect(query).not.toHaveBeenCalled()
  })

  it('fails when a query reports a failed asset', async () => {
    const query = vi.fn(async (): Promise<RemoteAssetState> => 'failed')
    await expect(
      waitUntilActive(handle('pending'), query, { maxWaitMs: 1000, pollIntervalMs: 5 }),
    ).rejects.toThrow("Remote asset 'files/test-asset' failed to process")
    expect(query).toHaveBeenCalledTimes(1)
  })

  it('times out while the asset stays pending', async () => {
    const query = vi.fn(async (): Promise<RemoteAssetState> => 'pending')
    const startedAt = Date.now()
    await expect(
      waitUntilActive(handle('pending'), query, { maxWaitMs: 60, pollIntervalMs: 20 }),
    ).rejects.toBeInstanceOf(RemoteAssetTimeoutError)
    expect(Date.now() - startedAt).toBeLessThan(1000)
    expect(query.mock.calls.length).toBeGreaterThanOrEqual(1)
  })

  it('times out immediately with a zero wait budget', async () => {
    const query = vi.fn(async (): Promise<RemoteAssetState> => 'active')
    await expect(
      waitUntilActive(handle('pending'), query, { maxWaitMs: 0, pollIntervalMs: 5 }),
    ).rejects.toBeInstanceOf(RemoteAssetTimeoutError)
    expect(query).not.toHaveBeenCalled()
  })
})
