/**
 * Shared slugification utilities.
 * Uses @sindresorhus/slugify for proper Unicode transliteration.
 */
import slugifyLib from "@sindresorhus/slugify";

/**
 * Creates a filesystem-safe slug from a string.
 * Handles Unicode characters, special symbols, and edge cases.
 */
export function slugify(name: string): string {
  return slugifyLib(name, {
    lowercase: true,
    separator: "-",
  }).substring(0, 100);
}

/**
 * Zero-pads a 1-based ordinal to at least two digits, or to `width` when
 * the list is longer.
 * Example: padOrdinal(3) → "03", padOrdinal(7, 3) → "007"
 */
export function padOrdinal(ordinal: number, width = 2): string {
  return String(ordinal).padStart(Math.max(2, width), "0");
}
