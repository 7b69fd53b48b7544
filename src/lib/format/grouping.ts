/**
 * Digit grouping
 */

const GROUP_SIZE = 3;

const isDigit = (c: string | undefined) => c !== undefined && c >= '0' && c <= '9';

// Separate runs of digits in groups of three, counting from the end of the run
function groupRight(text: string, sep: string): string {
  if (!sep) return text;
  let out = '';
  let run = 0;
  for (let i = text.length - 1; i >= 0; i--) {
    const c = text[i];
    out = c + out;
    if (!isDigit(c)) {
      run = 0;
      continue;
    }
    run++;
    if (run % GROUP_SIZE === 0 && isDigit(text[i - 1])) out = sep + out;
  }
  return out;
}

// Same, counting from the start of each run
function groupLeft(text: string, sep: string): string {
  if (!sep) return text;
  let out = '';
  let run = 0;
  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    out += c;
    if (!isDigit(c)) {
      run = 0;
      continue;
    }
    run++;
    if (run % GROUP_SIZE === 0 && isDigit(text[i + 1])) out += sep;
  }
  return out;
}

/**
 * Insert group separators into a rendered mantissa and swap the decimal
 * point for `decimal`. Separators only ever go between two digits.
 *
 * @example addSeparators('123456.654321', ',', '.', ' ') // '123,456.654 321'
 */
export function addSeparators(text: string, upper: string, decimal: string, lower: string): string {
  const point = text.indexOf('.');
  if (point === -1) return groupRight(text, upper);
  const whole = groupRight(text.slice(0, point), upper);
  const frac = groupLeft(text.slice(point + 1), lower);
  return `${whole}${decimal}${frac}`;
}
