/**
 * Keeps the keys starting with `prefix`, with the prefix stripped. Without a
 * prefix every key is kept.
 */
export function filterPrefix<V>(
  values: Record<string, V>,
  prefix: string | undefined,
): Record<string, V> {
  if (!prefix) return { ...values }

  const filtered: Record<string, V> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix)) {
      filtered[key.slice(prefix.length)] = value
    }
  }

  return filtered
}
