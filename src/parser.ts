import { block, instruction, isInstruction, num, type Program, str, type Value, variable } from "./ast";
import { tokenize } from "./lexer";
import { parseNumber } from "./util";

class Parser {

  index = 0;

  constructor(private src: readonly string[]) {
  }

  parseAll(): Value[] {
    const body: Value[] = [];

    while (this.index < this.src.length) {
      const next = this.parseToken(trim(this.next()));

      // anything that is not a literal or a keyword just disappears
      if (next != null) {
        body.push(next);
      }
    }

    return body;
  }

  parseToken(token: string): Value | null {
    const number = parseNumber(token);

    if (number != null) {
      return num(number);
    } else if (isDelimited(token, '"', '"')) {
      return str(token.slice(1, -1));
    } else if (isDelimited(token, '{', '}')) {
      return block(parse(token.slice(1, -1)));
    } else if (token.startsWith('$')) {
      return variable(token.slice(1));
    } else if (isInstruction(token)) {
      return instruction(token);
    } else {
      return null;
    }
  }

  next(): string {
    return this.src[this.index++];
  }
}

// Unicode White_Space exactly: keeps U+FEFF, strips U+0085.
function trim(token: string): string {
  return token.replace(/^\p{White_Space}+|\p{White_Space}+$/gu, '');
}

function isDelimited(token: string, open: string, close: string): boolean {
  return token.length >= 2 && token.startsWith(open) && token.endsWith(close);
}

export function parse(src: string | readonly string[]): Program {
  const tokens = typeof src === 'string' ? tokenize(src) : src;
  const parser = new Parser(tokens);
  return parser.parseAll();
}
