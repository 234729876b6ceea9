import { Storage } from '../storage/Storage'
import { AnalysisOutcome, LangDiffConfig } from '../contracts'
import { SnapshotLoader } from '../snapshot/SnapshotLoader'
import { diffLines } from '../analysis/diffLines'
import { PrefixAnalyzer } from '../analysis/PrefixAnalyzer'
import { ReportFormatter } from '../report/ReportFormatter'
import { ReportWriter } from '../report/ReportWriter'
import { debugLog } from '../logging/debugLog'

export class LangAnalyzer {
  private loader: SnapshotLoader
  private prefixAnalyzer: PrefixAnalyzer
  private formatter = new ReportFormatter()
  private writer: ReportWriter

  constructor(
    storage: Storage,
    private config: LangDiffConfig,
    private clock: () => Date = () => new Date()
  ) {
    this.loader = new SnapshotLoader(storage, config.source.encoding)
    this.prefixAnalyzer = new PrefixAnalyzer(config.analysis.itemPrefix)
    this.writer = new ReportWriter(storage, config.output)
  }

  /**
   * Diff `sourcePath` against the latest dump, then write the log and a new dump.
   * Rejects with SourceFileError before writing anything if the source is unreadable.
   */
  async analyzeFile(sourcePath: string): Promise<AnalysisOutcome> {
    const [previous, current] = await Promise.all([
      this.loader.loadLatest(this.config.output.dumpDir, this.writer.dumpPattern),
      this.loader.load(sourcePath),
    ])

    const newLines = diffLines(current.lines, previous?.lines ?? new Set<string>())
    const result = this.prefixAnalyzer.analyze(newLines)

    debugLog({
      event: 'analysis_complete',
      currentSnapshotId: current.id,
      previousSnapshotId: previous?.id ?? null,
      currentLineCount: current.lines.size,
      previousLineCount: previous?.lines.size ?? 0,
      newLinesCount: result.newLinesCount,
      uniquePrefixes: result.uniquePrefixes,
    })

    const analyzedAt = this.clock()
    const previousPath = previous?.path ?? null
    const logLines = this.formatter.format(result, newLines, {
      analyzedAt,
      sourcePath,
      previousPath,
    })
    const written = await this.writer.write(logLines, current.lines, analyzedAt)

    return {
      result,
      newLines,
      sourcePath,
      previousPath,
      logPath: written.logPath,
      dumpPath: written.dumpPath,
    }
  }

  summarize(outcome: AnalysisOutcome): string {
    return this.formatter.summary(outcome)
  }
}
