import { SourceEncoding } from '../contracts'

export interface StoredFile {
  /** Full path: directory joined with the file name */
  path: string
  name: string
  /** Modification time in milliseconds */
  modifiedAt: number
}

export interface Storage {
  // Directory listing (non-recursive, regular files only). Missing directory lists as empty.
  list(directory: string): Promise<StoredFile[]>

  // Reading rejects when the file is missing or unreadable
  read(filePath: string, encoding: SourceEncoding): Promise<string>

  // Creates a new file; rejects if one already exists at that path
  create(filePath: string, content: string): Promise<void>

  ensureDir(directory: string): Promise<void>
}
