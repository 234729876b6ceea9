import path from 'path'
import { Storage, StoredFile } from './Storage'

interface MemoryFile {
  content: string
  modifiedAt: number
}

export class MemoryStorage implements Storage {
  private files: Map<string, MemoryFile> = new Map()
  private directories: Set<string> = new Set()
  private clock = 0

  async list(directory: string): Promise<StoredFile[]> {
    const dir = path.normalize(directory)
    const listed: StoredFile[] = []
    for (const [filePath, file] of this.files) {
      if (path.dirname(filePath) === dir) {
        listed.push({
          path: filePath,
          name: path.basename(filePath),
          modifiedAt: file.modifiedAt,
        })
      }
    }
    return listed
  }

  async read(filePath: string): Promise<string> {
    const file = this.files.get(path.normalize(filePath))
    if (!file) {
      throw new Error(`ENOENT: no such file, open '${filePath}'`)
    }
    return file.content
  }

  async create(filePath: string, content: string): Promise<void> {
    const key = path.normalize(filePath)
    if (this.files.has(key)) {
      throw new Error(`EEXIST: file already exists, open '${filePath}'`)
    }
    if (!this.directories.has(path.dirname(key))) {
      throw new Error(`ENOENT: no such directory, open '${filePath}'`)
    }
    this.files.set(key, { content, modifiedAt: this.tick() })
  }

  async ensureDir(directory: string): Promise<void> {
    this.directories.add(path.normalize(directory))
  }

  /**
   * Place a file directly, bypassing the exclusive-create check.
   * Without an explicit mtime each call is newer than the last.
   */
  seed(filePath: string, content: string, modifiedAt?: number): void {
    const key = path.normalize(filePath)
    this.directories.add(path.dirname(key))
    this.files.set(key, { content, modifiedAt: modifiedAt ?? this.tick() })
  }

  has(filePath: string): boolean {
    return this.files.has(path.normalize(filePath))
  }

  paths(): string[] {
    return Array.from(this.files.keys()).sort()
  }

  private tick(): number {
    this.clock += 1
    return this.clock
  }
}
