/**
 * Shell-style word splitting for command arguments
 *
 * - whitespace separates words
 * - '...' is taken literally
 * - "..." allows backslash escapes
 * - outside quotes a backslash escapes the next character
 * - adjacent pieces join into one word: a'b c'd → "ab cd"
 */

export class MismatchedQuotesError extends Error {
  constructor(readonly position: number) {
    super(`mismatched quotes at position ${position}`);
    this.name = "MismatchedQuotesError";
  }
}

const WHITESPACE = /\s/;

export function splitWords(input: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let i = 0;

  while (i < input.length) {
    const ch = input.charAt(i);

    if (WHITESPACE.test(ch)) {
      if (inWord) {
        words.push(current);
        current = "";
        inWord = false;
      }
      i++;
      continue;
    }

    inWord = true;

    if (ch === "'") {
      const end = input.indexOf("'", i + 1);
      if (end === -1) throw new MismatchedQuotesError(i);
      current += input.slice(i + 1, end);
      i = end + 1;
      continue;
    }

    if (ch === '"') {
      const start = i;
      let closed = false;
      i++;
      while (i < input.length) {
        const c = input.charAt(i);
        if (c === "\\" && i + 1 < input.length) {
          current += input.charAt(i + 1);
          i += 2;
          continue;
        }
        i++;
        if (c === '"') {
          closed = true;
          break;
        }
        current += c;
      }
      if (!closed) throw new MismatchedQuotesError(start);
      continue;
    }

    if (ch === "\\") {
      // A trailing backslash escapes nothing
      current += input.charAt(i + 1);
      i += 2;
      continue;
    }

    current += ch;
    i++;
  }

  if (inWord) words.push(current);
  return words;
}
