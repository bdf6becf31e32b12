
const numberLiteral = /^[+-]?(?:inf|infinity|nan|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)$/i;

export function parseNumber(token: string): number | null {
  if (!numberLiteral.test(token)) {
    return null;
  }

  const negative = token.startsWith('-');
  const word = token.replace(/^[+-]/, '').toLowerCase();

  if (word === 'nan') {
    return NaN;
  } else if (word === 'inf' || word === 'infinity') {
    return negative ? -Infinity : Infinity;
  } else {
    return Number(token);
  }
}

// Plain decimal text, never exponent notation: 1e21 is written out in full.
export function formatNumber(n: number): string {
  if (Number.isNaN(n)) {
    return 'NaN';
  } else if (n === Infinity) {
    return 'inf';
  } else if (n === -Infinity) {
    return '-inf';
  } else if (Object.is(n, -0)) {
    return '-0';
  }

  const text = String(n);
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);

  if (match == null) {
    return text;
  }

  const [, sign, lead, fraction = '', rawExponent] = match;
  const digits = lead + fraction;
  const exponent = Number(rawExponent);

  if (exponent >= 0) {
    return sign + digits + '0'.repeat(exponent + 1 - digits.length);
  } else {
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
  }
}
