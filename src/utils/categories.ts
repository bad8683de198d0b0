/**
 * Category suggestions.
 *
 * Categories are free text; these are offered to clients as a starting
 * set and are not enforced.
 */

export const DEFAULT_CATEGORIES = [
  'Food',
  'Transport',
  'Rent',
  'Utilities',
  'Shopping',
  'Other',
] as const;

/**
 * Check whether a category is one of the defaults (case-insensitive).
 */
export function isDefaultCategory(category: string): boolean {
  const lower = category.trim().toLowerCase();
  return DEFAULT_CATEGORIES.some((name) => name.toLowerCase() === lower);
}
