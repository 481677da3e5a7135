/**
 * General-purpose utility functions used across every module.
 * All functions are pure (no side effects, no I/O) unless noted.
 */

// ---------------------------------------------------------------------------
// String utilities
// ---------------------------------------------------------------------------

/**
 * Truncates text to `maxLen` characters, appending an ellipsis if shortened.
 * The result never exceeds `maxLen`.
 */
export function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) {
    return text;
  }
  return text.slice(0, maxLen - 1) + '…'; // unicode ellipsis
}

/** Collapses runs of whitespace (including newlines) into single spaces. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Turns a URL path segment into a readable title.
 * Example: "ai-summit_2025.html" -> "Ai Summit 2025"
 */
export function humanizeSlug(segment: string): string {
  return segment
    .replace(/\.[a-z0-9]{2,5}$/i, '')
    .replace(/[-_+]+/g, ' ')
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/** Case-insensitive "does `text` contain any of `terms`". */
export function containsAny(text: string, terms: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return terms.some((term) => lower.includes(term.toLowerCase()));
}

// ---------------------------------------------------------------------------
// Numeric utilities
// ---------------------------------------------------------------------------

export function clamp(value: number, min = 0, max = 1): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.max(min, Math.min(max, value));
}

// ---------------------------------------------------------------------------
// URL utilities
// ---------------------------------------------------------------------------

/**
 * Identity key for candidate deduplication: the URL lower-cased with
 * trailing slashes stripped. Matches how records are keyed downstream.
 */
export function dedupKey(url: string): string {
  return url.trim().toLowerCase().replace(/\/+$/, '');
}

/**
 * Extracts the bare domain from a URL. Example: "https://www.example.com/path" -> "example.com"
 */
export function extractDomain(url: string): string {
  try {
    const hostname = new URL(url).hostname.toLowerCase();
    return hostname.replace(/^www\./, '');
  } catch {
    return url;
  }
}

/** True when `domain` equals `suffix` or is a subdomain of it. */
export function domainMatches(domain: string, suffix: string): boolean {
  return domain === suffix || domain.endsWith(`.${suffix}`);
}

export function isHttpUrl(url: string): boolean {
  return url.startsWith('http://') || url.startsWith('https://');
}

// ---------------------------------------------------------------------------
// Array utilities
// ---------------------------------------------------------------------------

/**
 * Returns a random element from the array.
 * Throws if the array is empty.
 */
export function pickRandom<T>(arr: readonly T[]): T {
  const item = arr[Math.floor(Math.random() * arr.length)];
  if (item === undefined) {
    throw new Error('Cannot pick from an empty array');
  }
  return item;
}

/**
 * Splits an array into chunks of the given size.
 * The last chunk may be smaller if the array length is not evenly divisible.
 */
export function chunkArray<T>(arr: readonly T[], size: number): T[][] {
  if (size <= 0) {
    throw new Error('Chunk size must be a positive integer');
  }
  const chunks: T[][] = [];
  for (let i = 0; i < arr.length; i += size) {
    chunks.push(arr.slice(i, i + size));
  }
  return chunks;
}
