/**
 * Option String Parsing
 */

/**
 * Split a free-form option string into an argument list.
 *
 * Whitespace separates arguments; a run of words opened and closed by double
 * quotes becomes one argument without its quotes. A newline always ends the
 * current argument, even inside an unterminated quote (which is dropped).
 */
export function parseOptionString(input: string): string[] {
  const result: string[] = [];

  for (const line of input.split(/\r?\n/)) {
    let quoted: string[] | null = null;

    for (const word of line.split(/\s+/).filter(Boolean)) {
      if (quoted === null && word.startsWith('"')) {
        quoted = [];
      }

      if (quoted === null) {
        result.push(word);
        continue;
      }

      quoted.push(word);
      const joined = quoted.join(' ');
      if (joined.length > 1 && word.endsWith('"')) {
        result.push(joined.slice(1, -1));
        quoted = null;
      }
    }
  }

  return result;
}
