import { z } from 'zod'
import { EncodingSchema, LangDiffConfigSchema } from './schemas'

export type SourceEncoding = z.infer<typeof EncodingSchema>

export type LangDiffConfig = z.infer<typeof LangDiffConfigSchema>

export interface AnalysisResult {
  /** Prefix counts, highest first; equal counts in ascending prefix order */
  prefixCounts: Array<[string, number]>
  emptyValueCount: number
  totalLength: number
  uniquePrefixes: number
  itemValues: string[]
  maxPrefixLength: number
  newLinesCount: number
}

export interface AnalysisOutcome {
  result: AnalysisResult
  newLines: Set<string>
  sourcePath: string
  previousPath: string | null
  logPath: string
  dumpPath: string
}
