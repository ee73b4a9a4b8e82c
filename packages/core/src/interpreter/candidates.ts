/** Levenshtein edit distance between two strings */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0
  if (a.length === 0) return b.length
  if (b.length === 0) return a.length

  let prev = Array.from({ length: b.length + 1 }, (_, j) => j)
  for (let i = 1; i <= a.length; i++) {
    const curr = [i]
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1
      curr.push(Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost))
    }
    prev = curr
  }
  return prev[b.length]
}

/**
 * Up to `limit` names closest to `target` by case-insensitive edit distance.
 * Ties keep the order of `names`.
 */
export function nearestNames(target: string, names: readonly string[], limit = 3): string[] {
  const wanted = target.trim().toLowerCase()
  return names
    .map((name, index) => ({ name, index, distance: editDistance(wanted, name.trim().toLowerCase()) }))
    .sort((a, b) => a.distance - b.distance || a.index - b.index)
    .slice(0, limit)
    .map((c) => c.name)
}
