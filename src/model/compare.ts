/**
 * Case-insensitive comparison and hashing helpers
 */

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * Compares two strings ignoring case
 */
export function equalsIgnoreCase(a: string, b: string): boolean {
  return a === b || a.toLowerCase() === b.toLowerCase();
}

/**
 * Compares two optional strings ignoring case; null only equals null
 */
export function optionalEqualsIgnoreCase(a: string | null, b: string | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return equalsIgnoreCase(a, b);
}

/**
 * 32-bit FNV-1a hash of the lower-cased string
 */
export function hashIgnoreCase(value: string): number {
  const folded = value.toLowerCase();
  let hash = FNV_OFFSET;
  for (let i = 0; i < folded.length; i++) {
    hash ^= folded.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash | 0;
}
