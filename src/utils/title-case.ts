/**
 * Title Case Utilities
 * Derives display titles from file and directory names
 */

// Minor words kept lower case unless first or last
const SMALL_WORDS = new Set([
  "a",
  "an",
  "and",
  "as",
  "at",
  "but",
  "by",
  "en",
  "for",
  "if",
  "in",
  "of",
  "on",
  "or",
  "the",
  "to",
  "v",
  "v.",
  "via",
  "vs",
  "vs.",
]);

function capitalize(word: string): string {
  return word.replace(/\p{L}/u, (letter) => letter.toUpperCase());
}

/**
 * Capitalize each word, leaving minor words and mixed-case words alone
 *
 * @example
 * capitalizeWords("first part of part 2") // "First Part of Part 2"
 * capitalizeWords("WritingIsGood") // "WritingIsGood"
 */
export function capitalizeWords(text: string): string {
  const words = text.split(/(\s+)/);
  const wordIndexes = words
    .map((word, i) => (/\S/.test(word) ? i : -1))
    .filter((i) => i >= 0);
  const first = wordIndexes[0];
  const last = wordIndexes[wordIndexes.length - 1];

  return words
    .map((word, i) => {
      if (!/\S/.test(word)) return word;
      if (/\p{Lu}/u.test(word.slice(1))) return word;

      const lower = word.toLowerCase();
      if (i !== first && i !== last && SMALL_WORDS.has(lower)) {
        return lower;
      }
      return capitalize(word);
    })
    .join("");
}

/**
 * Convert a file or directory name to a readable title
 * Drops the leading ordering prefix and treats underscores as spaces
 *
 * @example
 * titleCase("1-chapter_1") // "Chapter 1"
 * titleCase("chapter_23") // "Chapter 23"
 * titleCase("03_getting_started") // "Getting Started"
 */
export function titleCase(name: string): string {
  return capitalizeWords(name.replace(/^\P{L}+/u, "").replaceAll("_", " "));
}
