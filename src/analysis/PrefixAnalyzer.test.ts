import { describe, it, expect } from 'vitest'
import { PrefixAnalyzer } from './PrefixAnalyzer'

describe('PrefixAnalyzer', () => {
  const analyzer = new PrefixAnalyzer()

  it('should count prefixes, empty values and item values', () => {
    const result = analyzer.analyze(new Set(['item.1=Sword', 'item.2=', 'ui.title=Menu']))

    expect(result.prefixCounts).toEqual([['item', 2], ['ui', 1]])
    expect(result.emptyValueCount).toBe(1)
    expect(result.uniquePrefixes).toBe(2)
    expect(result.itemValues).toEqual(['Sword', ''])
    expect(result.totalLength).toBe(32)
    expect(result.maxPrefixLength).toBe(4)
    expect(result.newLinesCount).toBe(3)
  })

  it('should return empty statistics for no lines', () => {
    const result = analyzer.analyze(new Set())

    expect(result).toEqual({
      prefixCounts: [],
      emptyValueCount: 0,
      totalLength: 0,
      uniquePrefixes: 0,
      itemValues: [],
      maxPrefixLength: 0,
      newLinesCount: 0,
    })
  })

  it('should break count ties by prefix name', () => {
    const result = analyzer.analyze(new Set(['c.z=', 'b.x=1', 'a.y=2', 'b.w=3']))

    expect(result.prefixCounts).toEqual([['b', 2], ['a', 1], ['c', 1]])
  })

  it('should skip lines without a dot for prefix statistics', () => {
    const result = analyzer.analyze(new Set(['plain=value', '', 'ui.ok=Yes']))

    expect(result.prefixCounts).toEqual([['ui', 1]])
    expect(result.newLinesCount).toBe(3)
    expect(result.totalLength).toBe(11 + 0 + 9)
  })

  it('should not count a missing value separator as an empty value', () => {
    const result = analyzer.analyze(new Set(['ui.header', 'item.noequals', 'ui.blank=   ']))

    expect(result.prefixCounts).toEqual([['ui', 2], ['item', 1]])
    expect(result.emptyValueCount).toBe(1)
    expect(result.itemValues).toEqual([])
  })

  it('should split only on the first dot and first equals sign', () => {
    const result = analyzer.analyze(new Set(['item.a.b=x=y', 'k=v.w']))

    expect(result.prefixCounts).toEqual([['item', 1], ['k=v', 1]])
    expect(result.itemValues).toEqual(['x=y'])
  })

  it('should collect values for a configured item prefix', () => {
    const weapons = new PrefixAnalyzer('weapon')
    const result = weapons.analyze(new Set(['weapon.ak=AK-74', 'item.1=Sword', 'weapons.x=No']))

    expect(result.itemValues).toEqual(['AK-74'])
  })

  it('should count astral characters once', () => {
    const result = analyzer.analyze(new Set(['ui.e=😀', '😀.a=1']))

    expect(result.totalLength).toBe(6 + 5)
    expect(result.maxPrefixLength).toBe(2)
  })

  it('should sum prefix counts to the number of lines containing a dot', () => {
    const lines = new Set(['a.1=x', 'a.2=y', 'b.1=', 'nodot', 'c.d.e', ''])
    const result = analyzer.analyze(lines)

    const total = result.prefixCounts.reduce((sum, [, count]) => sum + count, 0)
    expect(total).toBe(4)
    expect(total).toBeLessThanOrEqual(result.newLinesCount)
  })
})
