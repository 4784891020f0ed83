/**
 * Literal-separator string splitting.
 */

/** Split at the first occurrence of `separator`, or null if absent. */
export function splitOnce(text: string, separator: string): [string, string] | null {
  const index = text.indexOf(separator);
  if (index === -1) return null;
  return [text.substring(0, index), text.substring(index + separator.length)];
}

/**
 * Split into three parts at the first two occurrences of `separator`.
 * The last part keeps any further separators: "a b c d" → ["a", "b", "c d"].
 */
export function splitThree(text: string, separator: string): [string, string, string] | null {
  const first = splitOnce(text, separator);
  if (!first) return null;
  const second = splitOnce(first[1], separator);
  if (!second) return null;
  return [first[0], second[0], second[1]];
}
