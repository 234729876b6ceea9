import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { FileStorage } from './FileStorage'
import fs from 'fs'
import path from 'path'
import os from 'os'

describe('FileStorage', () => {
  let tempDir: string
  let storage: FileStorage

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'langdiff-storage-'))
    storage = new FileStorage()
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it('should list regular files with modification times', async () => {
    fs.writeFileSync(path.join(tempDir, 'ru_lang_1.txt'), 'a.1=x\n')
    fs.mkdirSync(path.join(tempDir, 'nested'))
    const mtime = new Date('2024-02-03T04:05:06.000Z')
    fs.utimesSync(path.join(tempDir, 'ru_lang_1.txt'), mtime, mtime)

    const files = await storage.list(tempDir)

    expect(files).toEqual([
      {
        path: path.join(tempDir, 'ru_lang_1.txt'),
        name: 'ru_lang_1.txt',
        modifiedAt: mtime.getTime(),
      },
    ])
  })

  it('should list a missing directory as empty', async () => {
    expect(await storage.list(path.join(tempDir, 'missing'))).toEqual([])
  })

  it('should skip files that vanish before they can be stat-ed', async () => {
    fs.writeFileSync(path.join(tempDir, 'ru_lang_1.txt'), 'a.1=x\n')
    fs.writeFileSync(path.join(tempDir, 'ru_lang_2.txt'), 'a.1=x\n')
    const statSpy = vi.spyOn(fs.promises, 'stat')
      .mockRejectedValueOnce(new Error('ENOENT: no such file or directory'))

    const files = await storage.list(tempDir)

    expect(statSpy).toHaveBeenCalledTimes(2)
    expect(files).toHaveLength(1)
  })

  it('should read with the requested encoding', async () => {
    const filePath = path.join(tempDir, 'latin.lang')
    fs.writeFileSync(filePath, Buffer.from([0x63, 0x61, 0x66, 0xe9]))

    expect(await storage.read(filePath, 'latin1')).toBe('café')
  })

  it('should reject reading a missing file', async () => {
    await expect(storage.read(path.join(tempDir, 'missing.lang'), 'utf8')).rejects.toThrow(/ENOENT/)
  })

  it('should create new files and refuse to overwrite', async () => {
    const dir = path.join(tempDir, 'logs', 'deep')
    const filePath = path.join(dir, 'log_1.txt')

    await storage.ensureDir(dir)
    await storage.create(filePath, 'first\n')

    await expect(storage.create(filePath, 'second\n')).rejects.toThrow(/EEXIST/)
    expect(fs.readFileSync(filePath, 'utf8')).toBe('first\n')
  })
})
