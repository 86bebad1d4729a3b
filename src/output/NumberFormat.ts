/**
 * NumberFormat - fixed-point rendering of output fields
 *
 * Rendering matches C stream output in fixed mode: digits come from the exact
 * binary value, exact ties round to even, a negative zero keeps its minus
 * sign and, with showPos, non-negative values get a leading "+".
 */

export interface FormatOptions {
  /** Digits after the decimal point */
  readonly precision: number;
  /** Always print the sign */
  readonly showPos?: boolean;
}

/** A numeric field of an output line */
export type LineField =
  | { readonly kind: "real"; readonly value: number }
  | { readonly kind: "integer"; readonly value: number };

/** Destination default, used by the run header */
export const HEADER_FORMAT: FormatOptions = { precision: 4 };

/** Shower ("S", "C") lines */
export const RECORD_FORMAT: FormatOptions = { precision: 7 };

/** Photon ("P") lines */
export const PHOTON_FORMAT: FormatOptions = { precision: 7, showPos: true };

function signOf(value: number, showPos: boolean): string {
  if (value < 0 || Object.is(value, -0)) return "-";
  return showPos ? "+" : "";
}

/**
 * Exact decimal digits of a finite non-negative double scaled by 10^precision,
 * rounded half to even
 */
function scaledDigits(magnitude: number, precision: number): bigint {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, magnitude);
  const bits = view.getBigUint64(0);
  const exponentBits = (bits >> 52n) & 0x7ffn;
  const fraction = bits & ((1n << 52n) - 1n);
  // magnitude === mantissa * 2^exponent
  const mantissa = exponentBits === 0n ? fraction : fraction | (1n << 52n);
  const exponent = exponentBits === 0n ? -1074n : exponentBits - 1075n;

  const scaled = mantissa * 10n ** BigInt(precision);
  if (exponent >= 0n) return scaled << exponent;

  const denominator = 1n << -exponent;
  const quotient = scaled / denominator;
  const twiceRemainder = (scaled % denominator) * 2n;
  if (twiceRemainder > denominator) return quotient + 1n;
  if (twiceRemainder === denominator && quotient % 2n === 1n) return quotient + 1n;
  return quotient;
}

function fixedDigits(magnitude: number, precision: number): string {
  const digits = scaledDigits(magnitude, precision).toString().padStart(precision + 1, "0");
  if (precision === 0) return digits;
  const point = digits.length - precision;
  return `${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Render a real number in fixed-point notation
 */
export function formatFixed(value: number, options: FormatOptions): string {
  const showPos = options.showPos ?? false;
  if (Number.isNaN(value)) return showPos ? "+nan" : "nan";
  if (!Number.isFinite(value)) return `${signOf(value, showPos)}inf`;
  return signOf(value, showPos) + fixedDigits(Math.abs(value), options.precision);
}

/**
 * Render an integer, truncating toward zero
 */
export function formatInteger(value: number, options?: Pick<FormatOptions, "showPos">): string {
  const truncated = Math.trunc(value);
  // Integer output has no negative zero
  const sign = truncated < 0 ? "-" : options?.showPos ? "+" : "";
  return sign + BigInt(Math.abs(truncated)).toString();
}

export function real(value: number): LineField {
  return { kind: "real", value };
}

export function integer(value: number): LineField {
  return { kind: "integer", value };
}

/**
 * Render one record line: the tag followed by space-separated fields
 */
export function formatLine(
  tag: string,
  fields: readonly LineField[],
  options: FormatOptions
): string {
  const rendered = fields.map((field) =>
    field.kind === "real" ? formatFixed(field.value, options) : formatInteger(field.value, options)
  );
  return [tag, ...rendered].join(" ");
}
