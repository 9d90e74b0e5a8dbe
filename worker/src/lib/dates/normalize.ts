const monthPatterns = new WeakMap<Record<string, string>, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function getMonthPattern(months: Record<string, string>): RegExp {
  let pattern = monthPatterns.get(months);
  if (!pattern) {
    // Longest names first so "juni" wins over "jun"
    const names = Object.keys(months)
      .map(name => name.toLowerCase())
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp);
    pattern = new RegExp(`(?<![\\p{L}\\p{N}_])(${names.join('|')})(?![\\p{L}\\p{N}_])`, 'gu');
    monthPatterns.set(months, pattern);
  }
  return pattern;
}

/**
 * Lowercase the text and replace Indonesian month names and abbreviations by
 * their English names, whole words only.
 */
export function normalizeDateText(text: string, months: Record<string, string>): string {
  const lower = text.toLowerCase();
  if (Object.keys(months).length === 0) {
    return lower;
  }

  const lookup = new Map(Object.entries(months).map(([name, english]) => [name.toLowerCase(), english]));
  return lower.replace(getMonthPattern(months), name => lookup.get(name) ?? name);
}

export function isNoDateSentinel(text: string): boolean {
  return text.trim() === '-';
}
