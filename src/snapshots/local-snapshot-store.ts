import { mkdir, readdir, readFile, rename, writeFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { SnapshotNotFoundError, SnapshotStoreError, errorMessage } from '../shared/errors.js'
import { parseSnapshotDate } from './snapshot-codec.js'
import type { SnapshotRef, SnapshotStore } from './snapshot-store.js'

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error

/**
 * Snapshot store backed by a local directory (`output/` by default).
 * A missing directory simply has no snapshots.
 */
export const createLocalSnapshotStore = (directory: string): SnapshotStore => {
  const root = resolve(directory)

  const listSnapshots = async (): Promise<SnapshotRef[]> => {
    let names: string[]
    try {
      names = await readdir(root)
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return []
      throw new SnapshotStoreError(`Cannot list ${root}: ${errorMessage(error)}`, { cause: error })
    }

    return names.flatMap((name) => {
      const date = parseSnapshotDate(name)
      return date ? [{ id: join(root, name), name, date }] : []
    })
  }

  const read = async (ref: SnapshotRef): Promise<string> => {
    try {
      return await readFile(ref.id, 'utf-8')
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') throw new SnapshotNotFoundError(ref.name)
      throw new SnapshotStoreError(`Cannot read ${ref.id}: ${errorMessage(error)}`, { cause: error })
    }
  }

  const write = async (name: string, content: string): Promise<SnapshotRef> => {
    const path = join(root, name)
    // Readers only ever see the previous file or the complete new one
    const tempPath = `${path}.${process.pid}.tmp`
    try {
      await mkdir(root, { recursive: true })
      await writeFile(tempPath, content, 'utf-8')
      await rename(tempPath, path)
    } catch (error) {
      throw new SnapshotStoreError(`Cannot write ${path}: ${errorMessage(error)}`, { cause: error })
    }
    return { id: path, name, date: parseSnapshotDate(name) ?? '' }
  }

  return { label: `local directory ${root}`, listSnapshots, read, write }
}
