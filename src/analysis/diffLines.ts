/**
 * Lines present in `current` but not in `previous`
 */
export function diffLines(current: ReadonlySet<string>, previous: ReadonlySet<string>): Set<string> {
  const added = new Set<string>()
  for (const line of current) {
    if (!previous.has(line)) {
      added.add(line)
    }
  }
  return added
}
