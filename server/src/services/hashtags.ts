const HASHTAG_PATTERN = /#([A-Za-z0-9_]+)/g;

/**
 * Extract hashtags from a description.
 *
 * A tag is `#` followed by letters, digits or underscores; any other character
 * ends it, so `#not-a-tag` yields `not`. Names are lowercased and returned once
 * each, in order of first occurrence.
 */
export function extractTags(description: string): string[] {
  const names = new Set<string>();
  for (const match of description.matchAll(HASHTAG_PATTERN)) {
    names.add(match[1].toLowerCase());
  }
  return [...names];
}
