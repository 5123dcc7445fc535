/**
 * Brain file store: loads and saves snapshots on disk.
 *
 * Saves write a temporary sibling first and rename it over the target, so
 * an interrupted save leaves the previous snapshot intact. Saves through
 * one store are serialized.
 */

import { readFile, writeFile, rename, mkdir } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import type { Logger } from 'pino'
import { Brain, type BrainOptions } from '../extension/brain/Brain.js'
import { encodeBrain, decodeBrain } from '../extension/brain/snapshot.js'

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/** Read a snapshot. Throws ENOENT if missing, BrainFileError if malformed. */
export async function loadBrainFile(path: string, options: BrainOptions = {}): Promise<Brain> {
  const bytes = await readFile(path)
  return decodeBrain(bytes, options)
}

export async function saveBrainFile(brain: Brain, path: string): Promise<void> {
  // Encoding is synchronous, so the snapshot is a single consistent
  // point in time even if learning resumes while the file is written.
  const bytes = encodeBrain(brain)
  const dir = dirname(path)
  const temp = join(dir, `.${basename(path)}.new`)
  await mkdir(dir, { recursive: true })
  await writeFile(temp, bytes)
  await rename(temp, path)
}

export class BrainStore {
  private saveLock = Promise.resolve()

  constructor(
    readonly path: string,
    private options: BrainOptions = {},
    private logger?: Logger,
  ) {}

  /** Load the snapshot, or start an empty brain if there is none yet. */
  async open(): Promise<Brain> {
    try {
      const brain = await loadBrainFile(this.path, this.options)
      this.logger?.info({ path: this.path, ...brain.stats() }, 'brain loaded')
      return brain
    } catch (err) {
      if (!isNotFound(err)) throw err
      this.logger?.info({ path: this.path }, 'no brain file, starting with an empty brain')
      return new Brain(this.options)
    }
  }

  async save(brain: Brain): Promise<void> {
    await this.withLock(() => saveBrainFile(brain, this.path))
    this.logger?.info({ path: this.path, ...brain.stats() }, 'brain saved')
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.saveLock
    let resolve!: () => void
    this.saveLock = new Promise<void>((r) => { resolve = r })
    await prev
    try {
      return await fn()
    } finally {
      resolve()
    }
  }
}
