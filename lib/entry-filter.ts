import type { ClassifiedEntry, Entry, FilterState } from './types';

export interface NewspaperHeuristic {
  tags: readonly string[];
  titlePattern: RegExp;
}

/**
 * Tags decide when the entry carries any (category metadata);
 * otherwise the title pattern does.
 */
export function isNewspaper(entry: Entry, heuristic: NewspaperHeuristic): boolean {
  if (entry.tags.length > 0) {
    const newspaperTags = new Set(heuristic.tags.map((tag) => tag.toLowerCase()));
    return entry.tags.some((tag) => newspaperTags.has(tag.trim().toLowerCase()));
  }
  return heuristic.titlePattern.test(entry.title);
}

export function matchesQuery(entry: Entry, query: string): boolean {
  const needle = query.trim().toLowerCase();
  if (!needle) return true;
  if (entry.title.toLowerCase().includes(needle)) return true;
  return entry.authors.some((author) => author.toLowerCase().includes(needle));
}

/**
 * Returns the visible rows, keeping their relative order.
 * Never mutates its input.
 */
export function filterEntries(
  rows: readonly ClassifiedEntry[],
  filter: FilterState,
  heuristic: NewspaperHeuristic
): ClassifiedEntry[] {
  return rows.filter((row) => {
    if (filter.hideAlreadyInLibrary && row.inLibrary) return false;
    if (filter.hideNewspapers && isNewspaper(row.entry, heuristic)) return false;
    return matchesQuery(row.entry, filter.query);
  });
}
