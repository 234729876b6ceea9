/**
 * Convert a file-name glob into an anchored regular expression.
 * `*` matches any run of characters except `/`, `?` matches one character.
 */
export function globToRegExp(pattern: string): RegExp {
  const regexPattern = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&') // Escape regex special chars except * and ?
    .replace(/\*/g, '[^/]*')
    .replace(/\?/g, '.')

  return new RegExp(`^${regexPattern}$`)
}

export function matchesGlob(name: string, pattern: string): boolean {
  return globToRegExp(pattern).test(name)
}
