import type { CategoryKeywordTable, TaxonomyEntry } from '../types.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Word boundaries that understand non-ASCII letters and keywords such as "ui/ux"
function wholeWordPattern(keyword: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(keyword.trim())}(?![\\p{L}\\p{N}_])`, 'iu');
}

export type CategoryClassifier = (
  title: string | null | undefined,
  description: string | null | undefined,
  taxonomy: readonly TaxonomyEntry[],
) => string[];

/**
 * Compile the keyword patterns of one table once and return a classifier
 * that maps text to the ids of matching taxonomy entries, in taxonomy order.
 */
export function createCategoryClassifier(keywords: CategoryKeywordTable): CategoryClassifier {
  const patterns = new Map<string, RegExp[]>();
  for (const [slug, list] of Object.entries(keywords)) {
    patterns.set(
      slug,
      list.filter(keyword => keyword.trim().length > 0).map(wholeWordPattern),
    );
  }

  return (title, description, taxonomy) => {
    const text = `${title ?? ''} ${description ?? ''}`.toLowerCase();
    if (!text.trim()) return [];

    const ids: string[] = [];
    for (const entry of taxonomy) {
      const slugPatterns = patterns.get(entry.slug);
      if (!slugPatterns || ids.includes(entry.id)) continue;
      if (slugPatterns.some(pattern => pattern.test(text))) {
        ids.push(entry.id);
      }
    }
    return ids;
  };
}

const classifierCache = new WeakMap<CategoryKeywordTable, CategoryClassifier>();

/**
 * Associate taxonomy ids with an event by whole-word keyword matches over
 * its title and description. No match yields an empty list.
 */
export function classifyEvent(
  title: string | null | undefined,
  description: string | null | undefined,
  taxonomy: readonly TaxonomyEntry[],
  keywords: CategoryKeywordTable,
): string[] {
  let classifier = classifierCache.get(keywords);
  if (!classifier) {
    classifier = createCategoryClassifier(keywords);
    classifierCache.set(keywords, classifier);
  }
  return classifier(title, description, taxonomy);
}
