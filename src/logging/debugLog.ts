import { appendFileSync, mkdirSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'

// Debug logging - only enabled when LANGDIFF_DEBUG environment variable is set
export const isDebugEnabled = (): boolean =>
  process.env.LANGDIFF_DEBUG === 'true' || process.env.LANGDIFF_DEBUG === '1'

export const debugLogPath = (): string => join(homedir(), '.langdiff', 'debug.log')

export const debugLog = (message: Record<string, unknown>): void => {
  if (!isDebugEnabled()) return

  const logPath = debugLogPath()

  // Ensure directory exists
  mkdirSync(join(homedir(), '.langdiff'), { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
