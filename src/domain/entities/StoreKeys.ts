/**
 * Lookup key for words and usernames. Every store adapter folds with this one
 * rule, so "Ärger" and "ärger" name the same entry everywhere.
 */
export function storeKey(value: string): string {
  return value.toLowerCase();
}
