/**
 * Normalize an action item title for de-duplication:
 * lowercase, punctuation stripped, whitespace collapsed, leading "please" dropped.
 */
export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^please\s+/, '');
}
