import { promises as fs, Dirent } from 'fs'
import path from 'path'
import { Storage, StoredFile } from './Storage'
import { SourceEncoding } from '../contracts'
import { debugLog, errorMessage } from '../logging/debugLog'

export class FileStorage implements Storage {
  async list(directory: string): Promise<StoredFile[]> {
    let entries: Dirent[]
    try {
      entries = await fs.readdir(directory, { withFileTypes: true })
    } catch (error) {
      debugLog({
        event: 'storage_error',
        method: 'list',
        directory,
        error: errorMessage(error),
      })
      return []
    }

    const files: StoredFile[] = []
    for (const entry of entries) {
      if (!entry.isFile()) {
        continue
      }
      const filePath = path.join(directory, entry.name)
      let modifiedAt: number
      try {
        modifiedAt = (await fs.stat(filePath)).mtimeMs
      } catch (error) {
        // Removed between readdir and stat
        debugLog({
          event: 'storage_error',
          method: 'list',
          file: filePath,
          error: errorMessage(error),
        })
        continue
      }
      files.push({
        path: filePath,
        name: entry.name,
        modifiedAt,
      })
    }

    return files
  }

  async read(filePath: string, encoding: SourceEncoding): Promise<string> {
    return fs.readFile(filePath, { encoding })
  }

  async create(filePath: string, content: string): Promise<void> {
    await fs.writeFile(filePath, content, { encoding: 'utf8', flag: 'wx' })
  }

  async ensureDir(directory: string): Promise<void> {
    await fs.mkdir(directory, { recursive: true })
  }
}
