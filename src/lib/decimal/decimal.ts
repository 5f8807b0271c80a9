/**
 * Exact decimal arithmetic for prices, quantities and balances.
 *
 * A value is `coefficient / 10^scale`. The scale is kept as parsed, so "1.50"
 * formats back to "1.50" and "0.00000001" to "0.00000001". Binary floating
 * point never touches these values.
 */

import * as v from "valibot";

export interface Decimal {
  readonly coefficient: bigint;
  readonly scale: number;
}

export class DecimalFormatError extends Error {
  public override readonly name = "DecimalFormatError";

  constructor(public readonly input: unknown) {
    super(`Invalid decimal value: ${String(input)}`);
  }
}

export const ZERO: Decimal = { coefficient: 0n, scale: 0 };

const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/** Largest exponent magnitude accepted in exponent notation */
export const MAX_DECIMAL_EXPONENT = 1000;

const numberToText = (input: number): string => {
  if (!Number.isFinite(input)) {
    throw new DecimalFormatError(input);
  }
  // String() yields the shortest text that round-trips the double
  return String(input);
};

/**
 * Parses a decimal string (or a finite number) into an exact decimal.
 *
 * Exponent notation is accepted: `"1e-8"` parses to coefficient 1, scale 8.
 * Exponents beyond {@link MAX_DECIMAL_EXPONENT} in either direction are rejected.
 */
export const parseDecimal = (input: string | number): Decimal => {
  const text = typeof input === "number" ? numberToText(input) : input.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new DecimalFormatError(input);
  }

  const [, sign = "", whole = "", fraction = "", exponent] = match;
  if (whole === "" && fraction === "") {
    throw new DecimalFormatError(input);
  }

  const shift = exponent === undefined ? 0 : Number.parseInt(exponent, 10);
  if (Math.abs(shift) > MAX_DECIMAL_EXPONENT) {
    throw new DecimalFormatError(input);
  }

  let coefficient = BigInt(`${whole}${fraction}`);
  let scale = fraction.length - shift;

  if (scale < 0) {
    coefficient *= 10n ** BigInt(-scale);
    scale = 0;
  }

  return { coefficient: sign === "-" ? -coefficient : coefficient, scale };
};

export const tryParseDecimal = (input: string | number): Decimal | null => {
  try {
    return parseDecimal(input);
  } catch {
    return null;
  }
};

/**
 * Formats a decimal in plain notation, keeping every digit of its scale.
 */
export const formatDecimal = (value: Decimal): string => {
  const negative = value.coefficient < 0n;
  const digits = (negative ? -value.coefficient : value.coefficient).toString();
  const sign = negative ? "-" : "";

  if (value.scale === 0) {
    return `${sign}${digits}`;
  }

  const padded = digits.padStart(value.scale + 1, "0");
  const split = padded.length - value.scale;
  return `${sign}${padded.slice(0, split)}.${padded.slice(split)}`;
};

const rescaleUp = (value: Decimal, scale: number): bigint =>
  value.coefficient * 10n ** BigInt(scale - value.scale);

const align = (a: Decimal, b: Decimal): [bigint, bigint, number] => {
  const scale = Math.max(a.scale, b.scale);
  return [rescaleUp(a, scale), rescaleUp(b, scale), scale];
};

export const compareDecimal = (a: Decimal, b: Decimal): -1 | 0 | 1 => {
  const [left, right] = align(a, b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
};

export const decimalEquals = (a: Decimal, b: Decimal): boolean => compareDecimal(a, b) === 0;

export const addDecimal = (a: Decimal, b: Decimal): Decimal => {
  const [left, right, scale] = align(a, b);
  return { coefficient: left + right, scale };
};

export const subtractDecimal = (a: Decimal, b: Decimal): Decimal => {
  const [left, right, scale] = align(a, b);
  return { coefficient: left - right, scale };
};

export const multiplyDecimal = (a: Decimal, b: Decimal): Decimal => ({
  coefficient: a.coefficient * b.coefficient,
  scale: a.scale + b.scale,
});

/**
 * Divides to `scale` fractional digits, truncating toward zero. The result
 * is normalized.
 */
export const divideDecimal = (a: Decimal, b: Decimal, scale: number): Decimal => {
  if (b.coefficient === 0n) {
    throw new RangeError("Division by zero");
  }
  const numerator = a.coefficient * 10n ** BigInt(b.scale + scale);
  const denominator = b.coefficient * 10n ** BigInt(a.scale);
  return normalizeDecimal({ coefficient: numerator / denominator, scale });
};

export const minDecimal = (a: Decimal, b: Decimal): Decimal =>
  compareDecimal(a, b) <= 0 ? a : b;

export const isZeroDecimal = (value: Decimal): boolean => value.coefficient === 0n;

export const isNegativeDecimal = (value: Decimal): boolean => value.coefficient < 0n;

/**
 * Drops trailing fractional zeros: `1.500` becomes `1.5`, `2.000` becomes `2`.
 */
export const normalizeDecimal = (value: Decimal): Decimal => {
  let { coefficient, scale } = value;
  while (scale > 0 && coefficient % 10n === 0n) {
    coefficient /= 10n;
    scale--;
  }
  return { coefficient, scale };
};

/** Number of significant fractional digits (`"0.00100"` → 3). */
export const decimalScale = (value: Decimal): number => normalizeDecimal(value).scale;

/** True when `value` is an exact multiple of `step`. A zero step accepts anything. */
export const isMultipleOf = (value: Decimal, step: Decimal): boolean => {
  const [left, right] = align(value, step);
  if (right === 0n) return true;
  return left % right === 0n;
};

export const isDecimal = (value: unknown): value is Decimal =>
  value !== null &&
  typeof value === "object" &&
  "coefficient" in value &&
  typeof value.coefficient === "bigint" &&
  "scale" in value &&
  typeof value.scale === "number" &&
  Number.isInteger(value.scale) &&
  value.scale >= 0;

/** Validates an already-parsed Decimal value. */
export const decimalValueSchema = v.custom<Decimal>(isDecimal, "Expected Decimal");

/**
 * Decodes a decimal from wire text (or a safe number) into a Decimal.
 */
export const decimalSchema = v.pipe(
  v.union([v.string(), v.number()]),
  v.check((input) => tryParseDecimal(input) !== null, "Expected a decimal value"),
  v.transform((input) => parseDecimal(input)),
);
