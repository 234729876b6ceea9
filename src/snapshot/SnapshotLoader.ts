import { v4 as uuidv4 } from 'uuid'
import { Snapshot } from './types'
import { matchesGlob } from './globPattern'
import { Storage, StoredFile } from '../storage/Storage'
import { SourceEncoding } from '../contracts'
import { debugLog, errorMessage } from '../logging/debugLog'

export class SourceFileError extends Error {
  constructor(
    readonly filePath: string,
    cause: unknown
  ) {
    super(`Cannot read ${filePath}: ${errorMessage(cause)}`)
    this.name = 'SourceFileError'
  }
}

/**
 * Split file content into a set of stripped lines.
 * `\r`, `\n` and `\r\n` all end a line. Blank lines are kept as '';
 * a trailing line terminator does not add one.
 */
export function parseLines(content: string): Set<string> {
  if (content === '') {
    return new Set()
  }

  const rawLines = content.split(/\r\n|\r|\n/)
  if (/[\r\n]$/.test(content)) {
    rawLines.pop()
  }

  return new Set(rawLines.map(line => line.trim()))
}

export class SnapshotLoader {
  constructor(
    private storage: Storage,
    private encoding: SourceEncoding = 'utf8'
  ) {}

  /**
   * Most recently modified file in `directory` whose name matches `pattern`
   */
  async findLatest(directory: string, pattern: string): Promise<StoredFile | null> {
    const candidates = (await this.storage.list(directory))
      .filter(file => matchesGlob(file.name, pattern))

    let latest: StoredFile | null = null
    for (const file of candidates) {
      if (
        !latest ||
        file.modifiedAt > latest.modifiedAt ||
        (file.modifiedAt === latest.modifiedAt && file.name > latest.name)
      ) {
        latest = file
      }
    }

    debugLog({
      event: 'find_latest',
      directory,
      pattern,
      candidates: candidates.length,
      latest: latest?.path ?? null,
    })

    return latest
  }

  /**
   * Read a file into a line set. Errors are reported and yield an empty set.
   */
  async readLines(filePath: string): Promise<Set<string>> {
    try {
      return await this.readRequiredLines(filePath)
    } catch (error) {
      console.error(`Error reading file ${filePath}: ${errorMessage(error)}`)
      debugLog({
        event: 'read_error',
        file: filePath,
        error: errorMessage(error),
      })
      return new Set()
    }
  }

  async readRequiredLines(filePath: string): Promise<Set<string>> {
    let content: string
    try {
      content = await this.storage.read(filePath, this.encoding)
    } catch (error) {
      throw new SourceFileError(filePath, error)
    }
    return parseLines(content)
  }

  async load(filePath: string): Promise<Snapshot> {
    const lines = await this.readRequiredLines(filePath)
    return this.toSnapshot(filePath, lines, new Date().toISOString())
  }

  /**
   * Load the newest matching snapshot, or null when there is none.
   * An unreadable snapshot loads as empty.
   */
  async loadLatest(directory: string, pattern: string): Promise<Snapshot | null> {
    const latest = await this.findLatest(directory, pattern)
    if (!latest) {
      return null
    }

    const lines = await this.readLines(latest.path)
    return this.toSnapshot(latest.path, lines, new Date(latest.modifiedAt).toISOString())
  }

  private toSnapshot(filePath: string, lines: Set<string>, timestamp: string): Snapshot {
    const snapshot: Snapshot = {
      id: uuidv4(),
      path: filePath,
      timestamp,
      lines,
    }

    debugLog({
      event: 'snapshot_loaded',
      snapshotId: snapshot.id,
      file: filePath,
      lineCount: lines.size,
      timestamp,
    })

    return snapshot
  }
}
