export interface Snapshot {
  id: string
  path: string
  /** ISO time: file mtime when loaded, wall-clock time when written */
  timestamp: string
  lines: Set<string>
}
