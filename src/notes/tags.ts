/**
 * Cleans user-supplied tags: trims, drops a leading `@` or `#`, turns inner
 * whitespace into `-`, removes empties and duplicates (first one wins).
 */
export function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim().replace(/^[@#]+/, '').replace(/\s+/g, '-');
    if (!tag || seen.has(tag)) continue;
    seen.add(tag);
    result.push(tag);
  }
  return result;
}

export function parseTagList(value: string): string[] {
  return normalizeTags(value.split(','));
}
