/**
 * Returns the text before the first newline of a message.
 *
 * @param message - The message to read
 * @returns The first line, or the whole message when it has no newline
 *
 * @example
 * // Returns "feat: add login"
 * getFirstLine("feat: add login\n\nAdds the login form.")
 */
export function getFirstLine(message: string): string {
  const newlineIndex = message.indexOf('\n');
  return newlineIndex === -1 ? message : message.slice(0, newlineIndex);
}

/**
 * Counts the Unicode code points of a string. Unlike `String.prototype.length` this counts an emoji
 * or any other astral character once.
 *
 * @example
 * // Returns 6
 * countCharacters("feat 🚀")
 */
export function countCharacters(input: string): number {
  return [...input].length;
}

/**
 * Tests whether a pattern matches at the very start of the input. The match does not have to cover
 * the whole input, and a match found later in the input does not count.
 *
 * The pattern's own flags are kept, except `g` which is dropped; matching runs in sticky mode from
 * offset 0 on a copy, so the caller's `lastIndex` is never touched.
 *
 * @param pattern - The pattern to test
 * @param input - The text to match
 * @returns `true` when the pattern matches at offset 0
 *
 * @example
 * // Returns true
 * matchesAtStart(/feat: \w+/, "feat: login\n\nbody")
 *
 * @example
 * // Returns false
 * matchesAtStart(/feat/, "not a feat")
 */
export function matchesAtStart(pattern: RegExp, input: string): boolean {
  const flags = pattern.flags.replace(/[gy]/g, '');
  return new RegExp(pattern.source, `${flags}y`).test(input);
}
