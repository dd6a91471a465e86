import fs from 'node:fs/promises'
import path from 'node:path'
import { CleanupError } from './errors'

export type RemoveEntry = (entryPath: string) => Promise<void>

const removeRecursively: RemoveEntry = (entryPath) => fs.rm(entryPath, { recursive: true, force: true })

/**
 * Remove every entry of `directory` except the paths in `keepFiles`.
 * A failing entry does not stop the others; failures are returned, not thrown.
 */
export async function cleanDirectory(params: {
  directory: string
  keepFiles: readonly string[]
  remove?: RemoveEntry
}): Promise<{ removed: string[]; failures: CleanupError[] }> {
  const remove = params.remove ?? removeRecursively
  const keep = new Set(params.keepFiles.map((file) => path.resolve(file)))
  const entries = await fs.readdir(params.directory)

  const removed: string[] = []
  const failures: CleanupError[] = []
  for (const entry of entries.sort()) {
    const entryPath = path.join(params.directory, entry)
    if (keep.has(path.resolve(entryPath))) continue
    try {
      await remove(entryPath)
      removed.push(entryPath)
    } catch (error) {
      failures.push(new CleanupError(entryPath, error))
    }
  }
  return { removed, failures }
}
