type TokenizeState = {
  tokens: string[];
  /** True when the input ends in unquoted whitespace. */
  trailingSpace: boolean;
};

function scan(line: string): TokenizeState {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < line.length; i += 1) {
    const char = line.charAt(i);
    if (quote) {
      if (char === "\\" && i + 1 < line.length) {
        i += 1;
        current += line.charAt(i);
      } else if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
      inToken = true;
      continue;
    }
    if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = "";
        inToken = false;
      }
      continue;
    }
    current += char;
    inToken = true;
  }

  if (inToken) {
    tokens.push(current);
  }
  return { tokens, trailingSpace: !inToken && quote === null && /\s$/.test(line) };
}

/**
 * Splits a command line on whitespace. Single and double quotes group words;
 * inside quotes a backslash escapes the next character. An unterminated quote
 * runs to the end of the line.
 */
export function tokenize(line: string): string[] {
  return scan(line).tokens;
}

/** Like {@link tokenize}, but a trailing space starts a new, empty token. */
export function tokenizeForCompletion(line: string): string[] {
  const { tokens, trailingSpace } = scan(line);
  if (trailingSpace || tokens.length === 0) {
    tokens.push("");
  }
  return tokens;
}
