import { AnalysisResult } from '../contracts'

/** Length in code points, so astral characters count once */
export const charLength = (text: string): number => [...text].length

export class PrefixAnalyzer {
  private static readonly DEFAULT_ITEM_PREFIX = 'item'

  constructor(private itemPrefix: string = PrefixAnalyzer.DEFAULT_ITEM_PREFIX) {}

  analyze(lines: ReadonlySet<string>): AnalysisResult {
    const counts = new Map<string, number>()
    const itemValues: string[] = []
    let emptyValueCount = 0
    let totalLength = 0

    for (const line of lines) {
      totalLength += charLength(line)

      const dot = line.indexOf('.')
      if (dot === -1) {
        continue
      }

      const prefix = line.slice(0, dot)
      const rest = line.slice(dot + 1)
      counts.set(prefix, (counts.get(prefix) ?? 0) + 1)

      const eq = rest.indexOf('=')
      if (eq === -1) {
        continue
      }

      const value = rest.slice(eq + 1).trim()
      if (value === '') {
        emptyValueCount++
      }
      if (prefix === this.itemPrefix) {
        itemValues.push(value)
      }
    }

    const prefixCounts = Array.from(counts.entries()).sort(
      ([a, countA], [b, countB]) => countB - countA || (a < b ? -1 : a > b ? 1 : 0)
    )
    const maxPrefixLength = prefixCounts.reduce(
      (max, [prefix]) => Math.max(max, charLength(prefix)),
      0
    )

    return {
      prefixCounts,
      emptyValueCount,
      totalLength,
      uniquePrefixes: counts.size,
      itemValues,
      maxPrefixLength,
      newLinesCount: lines.size,
    }
  }
}
