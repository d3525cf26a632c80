const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;
const WHITESPACE = /\s/;

export function quoteArgument(value: string): string {
  if (value.length === 0) {
    return "''";
  }
  if (SAFE_WORD.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

export function joinCommand(words: readonly string[]): string {
  return words.map(quoteArgument).join(' ');
}

/**
 * Splits a command line into words with POSIX shell quoting: single quotes are
 * literal, double quotes only honour `\"` and `\\`, and a backslash outside
 * quotes escapes the next character. No expansion of any kind is performed.
 */
export function splitCommandLine(line: string): string[] {
  const words: string[] = [];
  let word = '';
  let inWord = false;
  let i = 0;

  while (i < line.length) {
    const char = line[i];

    if (WHITESPACE.test(char)) {
      if (inWord) {
        words.push(word);
        word = '';
        inWord = false;
      }
      i += 1;
      continue;
    }

    inWord = true;

    if (char === "'") {
      const end = line.indexOf("'", i + 1);
      if (end === -1) {
        throw new Error(`no closing quotation in: ${line}`);
      }
      word += line.slice(i + 1, end);
      i = end + 1;
      continue;
    }

    if (char === '"') {
      i += 1;
      let closed = false;
      while (i < line.length) {
        const inner = line[i];
        if (inner === '"') {
          closed = true;
          i += 1;
          break;
        }
        const next = line[i + 1];
        if (inner === '\\' && (next === '"' || next === '\\')) {
          word += next;
          i += 2;
          continue;
        }
        word += inner;
        i += 1;
      }
      if (!closed) {
        throw new Error(`no closing quotation in: ${line}`);
      }
      continue;
    }

    if (char === '\\') {
      if (i + 1 >= line.length) {
        throw new Error(`no escaped character in: ${line}`);
      }
      word += line[i + 1];
      i += 2;
      continue;
    }

    word += char;
    i += 1;
  }

  if (inWord) {
    words.push(word);
  }
  return words;
}
