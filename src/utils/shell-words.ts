import { ValidationError } from "../errors.js";

/**
 * Split a command template into words the way a POSIX shell would, without
 * any expansion: single quotes are literal, double quotes honour `\"`, `\\`,
 * `\$` and `` \` ``, and a bare backslash escapes the next character.
 */
export function splitShellWords(input: string): string[] {
  const words: string[] = [];
  let word = "";
  let inWord = false;
  let i = 0;

  while (i < input.length) {
    const ch = input[i];

    if (ch === " " || ch === "\t" || ch === "\n") {
      if (inWord) {
        words.push(word);
        word = "";
        inWord = false;
      }
      i++;
      continue;
    }

    inWord = true;

    if (ch === "'") {
      const end = input.indexOf("'", i + 1);
      if (end === -1) throw new ValidationError("VALIDATION_FAILED", `Unterminated single quote in: ${input}`);
      word += input.slice(i + 1, end);
      i = end + 1;
    } else if (ch === '"') {
      i++;
      while (i < input.length && input[i] !== '"') {
        if (input[i] === "\\" && i + 1 < input.length && '"\\$`'.includes(input[i + 1])) {
          i++;
        }
        word += input[i];
        i++;
      }
      if (i >= input.length) throw new ValidationError("VALIDATION_FAILED", `Unterminated double quote in: ${input}`);
      i++;
    } else if (ch === "\\") {
      if (i + 1 >= input.length) throw new ValidationError("VALIDATION_FAILED", `Trailing backslash in: ${input}`);
      word += input[i + 1];
      i += 2;
    } else {
      word += ch;
      i++;
    }
  }

  if (inWord) words.push(word);
  return words;
}
