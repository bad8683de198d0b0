/**
 * Exact decimal arithmetic for amounts.
 *
 * Amounts travel through the system as decimal strings ("-12.50", "40.00").
 * Arithmetic happens on scaled bigints so sums never drift the way binary
 * floating point does.
 */

/**
 * Canonical amount text: optional minus sign, digits, optional fraction.
 */
export const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

interface ScaledDecimal {
  units: bigint;
  scale: number;
}

/**
 * Check whether a string is a canonical decimal amount.
 */
export function isDecimal(value: string): boolean {
  return DECIMAL_PATTERN.test(value);
}

/**
 * Normalize user-supplied amount text.
 *
 * Trims whitespace and drops a leading "+". Returns undefined when the
 * remaining text is not a decimal number; nothing is ever coerced to zero.
 *
 * @example
 * normalizeDecimal(' +40.00 ') // "40.00"
 * normalizeDecimal('12,50')    // undefined
 */
export function normalizeDecimal(raw: string): string | undefined {
  let text = raw.trim();
  if (text.startsWith('+')) {
    text = text.slice(1);
  }
  return isDecimal(text) ? text : undefined;
}

function parseDecimal(value: string): ScaledDecimal {
  if (!isDecimal(value)) {
    throw new Error(`Not a decimal amount: ${value}`);
  }
  const negative = value.startsWith('-');
  const unsigned = negative ? value.slice(1) : value;
  const [whole, fraction = ''] = unsigned.split('.');
  const units = BigInt(whole + fraction);
  return { units: negative ? -units : units, scale: fraction.length };
}

function rescale(value: ScaledDecimal, scale: number): bigint {
  return value.units * 10n ** BigInt(scale - value.scale);
}

function formatDecimal({ units, scale }: ScaledDecimal): string {
  const negative = units < 0n;
  const digits = (negative ? -units : units).toString().padStart(scale + 1, '0');
  const whole = digits.slice(0, digits.length - scale);
  const text = scale > 0 ? `${whole}.${digits.slice(digits.length - scale)}` : whole;
  return negative ? `-${text}` : text;
}

/**
 * Add two decimal amounts exactly. The result keeps the larger scale.
 *
 * @example
 * addDecimals('-12.50', '40.00') // "27.50"
 * addDecimals('1.5', '2.25')     // "3.75"
 */
export function addDecimals(a: string, b: string): string {
  const left = parseDecimal(a);
  const right = parseDecimal(b);
  const scale = Math.max(left.scale, right.scale);
  return formatDecimal({ units: rescale(left, scale) + rescale(right, scale), scale });
}

/**
 * Sum a sequence of decimal amounts. An empty sequence sums to "0".
 */
export function sumDecimals(values: Iterable<string>): string {
  let total = '0';
  for (const value of values) {
    total = addDecimals(total, value);
  }
  return total;
}

/**
 * Compare two decimal amounts by value.
 *
 * @returns Negative if a < b, zero if equal ("1.0" equals "1"), positive if a > b
 */
export function compareDecimals(a: string, b: string): number {
  const left = parseDecimal(a);
  const right = parseDecimal(b);
  const scale = Math.max(left.scale, right.scale);
  const diff = rescale(left, scale) - rescale(right, scale);
  return diff < 0n ? -1 : diff > 0n ? 1 : 0;
}
