import { AnalysisOutcome, AnalysisResult } from '../contracts'
import { charLength } from '../analysis/PrefixAnalyzer'
import { formatLocalIso } from './timestamp'

export interface ReportContext {
  analyzedAt: Date
  sourcePath: string
  previousPath: string | null
}

export const NOT_FOUND = 'Not found'

export class ReportFormatter {
  /**
   * Log file body, one entry per line
   */
  format(result: AnalysisResult, newLines: ReadonlySet<string>, context: ReportContext): string[] {
    const lines = [
      `Analysis time: ${formatLocalIso(context.analyzedAt)}`,
      `New file: ${context.sourcePath}`,
      `Comparison file: ${context.previousPath ?? NOT_FOUND}`,
      ...this.statistics(result),
      '',
      'Prefix statistics:',
      ...result.prefixCounts.map(
        ([prefix, count]) => `${padPrefix(prefix, result.maxPrefixLength)}: ${count}`
      ),
      '',
      'New lines:',
      '',
      ...sortedLines(newLines),
    ]

    return lines
  }

  summary(outcome: AnalysisOutcome): string {
    const { result } = outcome
    let message = 'Analysis complete\n\n'

    message += `   New file: ${outcome.sourcePath}\n`
    message += `   Comparison file: ${outcome.previousPath ?? NOT_FOUND}\n`
    for (const line of this.statistics(result)) {
      message += `   ${line}\n`
    }
    message += `   Item values: ${result.itemValues.length}\n`

    if (result.prefixCounts.length > 0) {
      const top = result.prefixCounts
        .slice(0, 5)
        .map(([prefix, count]) => `${prefix} (${count})`)
        .join(', ')
      message += `   Top prefixes: ${top}\n`
    }

    message += '\n'
    message += `Log written to: ${outcome.logPath}\n`
    message += `Dump file created: ${outcome.dumpPath}`

    return message
  }

  private statistics(result: AnalysisResult): string[] {
    return [
      `Total number of new lines: ${result.newLinesCount}`,
      `Number of lines with empty values: ${result.emptyValueCount}`,
      `Total length of new lines: ${result.totalLength}`,
      `Number of unique prefixes: ${result.uniquePrefixes}`,
    ]
  }
}

const padPrefix = (prefix: string, width: number): string =>
  prefix + ' '.repeat(Math.max(0, width - charLength(prefix)))

export function sortedLines(lines: ReadonlySet<string>): string[] {
  return Array.from(lines).sort()
}
