
const separators = new Set([' ', '\n', '\t', '\r', '　']);

/**
 * Splits source text into raw tokens. A brace-delimited block or a quoted
 * string is always a single token, however much whitespace it holds.
 * A block or quote still open at end of input is dropped.
 */
export function tokenize(src: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let depth = 0;
  let quoted = false;

  const emit = () => {
    tokens.push(current);
    current = '';
  };

  for (const c of src) {
    if (c === '{' && !quoted) {
      depth++;
      current += c;
    } else if (c === '}' && !quoted) {
      // a stray closing brace at the top level is ignored
      if (depth > 0) {
        current += c;
        depth--;

        if (depth === 0) {
          emit();
        }
      }
    } else if (c === '"') {
      current += c;

      // quotes only delimit strings outside of blocks
      if (depth === 0) {
        if (quoted) {
          quoted = false;
          emit();
        } else {
          quoted = true;
        }
      }
    } else if (separators.has(c)) {
      if (depth > 0 || quoted) {
        current += c;
      } else if (current.length > 0) {
        emit();
      }
    } else {
      current += c;
    }
  }

  if (depth === 0 && !quoted && current.length > 0) {
    tokens.push(current);
  }

  return tokens;
}
