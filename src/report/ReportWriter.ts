import path from 'path'
import { Storage } from '../storage/Storage'
import { formatTimestamp } from './timestamp'
import { sortedLines } from './ReportFormatter'
import { debugLog } from '../logging/debugLog'

export interface OutputLayout {
  dumpDir: string
  logDir: string
  dumpPrefix: string
  logPrefix: string
}

export interface WrittenFiles {
  logPath: string
  dumpPath: string
  timestamp: string
}

export const OUTPUT_EXTENSION = '.txt'

export class ReportWriter {
  constructor(
    private storage: Storage,
    private layout: OutputLayout
  ) {}

  /** Glob that matches every dump this writer produces */
  get dumpPattern(): string {
    return `${this.layout.dumpPrefix}*${OUTPUT_EXTENSION}`
  }

  /**
   * Write the log and the snapshot copy under one timestamp.
   * Existing files are never overwritten; any failure rejects.
   */
  async write(logLines: string[], snapshotLines: ReadonlySet<string>, now: Date = new Date()): Promise<WrittenFiles> {
    const timestamp = formatTimestamp(now)
    const logPath = path.join(this.layout.logDir, `${this.layout.logPrefix}${timestamp}${OUTPUT_EXTENSION}`)
    const dumpPath = path.join(this.layout.dumpDir, `${this.layout.dumpPrefix}${timestamp}${OUTPUT_EXTENSION}`)

    await Promise.all([
      this.storage.ensureDir(this.layout.logDir),
      this.storage.ensureDir(this.layout.dumpDir),
    ])

    await Promise.all([
      this.storage.create(logPath, toFileContent(logLines)),
      this.storage.create(dumpPath, toFileContent(sortedLines(snapshotLines))),
    ])

    debugLog({
      event: 'outputs_written',
      logPath,
      dumpPath,
      logLineCount: logLines.length,
      snapshotLineCount: snapshotLines.size,
    })

    return { logPath, dumpPath, timestamp }
  }
}

const toFileContent = (lines: string[]): string =>
  lines.map(line => `${line}\n`).join('')
