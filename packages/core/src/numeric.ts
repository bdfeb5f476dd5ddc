/**
 * Numeric literal model. Values are kept as exact text (or bigint) so that
 * nothing is lost between the surface syntax and the markup.
 */
import { NumericFormatError, UnsupportedConstructError } from "./errors.js";

export interface IntegerLiteral {
  type: "integer";
  value: bigint;
}

export interface DecimalLiteral {
  type: "decimal";
  value: string;
}

export interface RationalLiteral {
  type: "rational";
  numerator: string;
  denominator: string;
}

export interface ComplexLiteral {
  type: "complex";
  real: string;
  imaginary: string;
}

export interface ENotationLiteral {
  type: "e-notation";
  mantissa: string;
  exponent: string;
}

export interface BoolLiteral {
  type: "bool";
  value: boolean;
}

export type NumericLiteral =
  | IntegerLiteral
  | DecimalLiteral
  | RationalLiteral
  | ComplexLiteral
  | ENotationLiteral
  | BoolLiteral;

export type BinaryNumericLiteral = RationalLiteral | ComplexLiteral | ENotationLiteral;

/** The `cn` type attribute values this model reads and writes. */
export type NumericMarkupType = Exclude<NumericLiteral["type"], "bool">;

const DECIMAL_PATTERN = /^-?\d+(?:\.\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const ZERO_PATTERN = /^-?0+(?:\.0+)?$/;

/**
 * Normalize a decimal part: drop a leading `+`, write `.5` as `0.5`.
 * Throws when the result is not a plain decimal literal.
 */
export function decimalPart(text: string): string {
  let out = text.trim();
  if (out.startsWith("+")) out = out.slice(1);
  if (out.startsWith(".")) out = `0${out}`;
  else if (out.startsWith("-.")) out = `-0${out.slice(1)}`;
  if (!DECIMAL_PATTERN.test(out)) {
    throw new NumericFormatError(`'${text}' is not a decimal literal.`);
  }
  return out;
}

export function integer(value: bigint | number | string): IntegerLiteral {
  if (typeof value === "bigint") return { type: "integer", value };
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new NumericFormatError(`${value} is not a safe integer.`);
    }
    return { type: "integer", value: BigInt(value) };
  }
  const text = value.trim();
  if (!INTEGER_PATTERN.test(text)) {
    throw new NumericFormatError(`'${value}' is not an integer literal.`);
  }
  return { type: "integer", value: BigInt(text) };
}

export function decimal(value: string): DecimalLiteral {
  return { type: "decimal", value: decimalPart(value) };
}

export function rational(numerator: string, denominator: string): RationalLiteral {
  return { type: "rational", numerator: decimalPart(numerator), denominator: decimalPart(denominator) };
}

export function complex(real: string, imaginary: string): ComplexLiteral {
  return { type: "complex", real: decimalPart(real), imaginary: decimalPart(imaginary) };
}

export function eNotation(mantissa: string, exponent: string): ENotationLiteral {
  return { type: "e-notation", mantissa: decimalPart(mantissa), exponent: decimalPart(exponent) };
}

export function bool(value: boolean): BoolLiteral {
  return { type: "bool", value };
}

export function isBinaryLiteral(lit: NumericLiteral): lit is BinaryNumericLiteral {
  return lit.type === "rational" || lit.type === "complex" || lit.type === "e-notation";
}

export function isNegative(lit: NumericLiteral): boolean {
  switch (lit.type) {
    case "integer":
      return lit.value < 0n;
    case "decimal":
      return lit.value.startsWith("-");
    case "rational":
      return lit.numerator.startsWith("-");
    case "complex":
      return isImaginary(lit) ? lit.imaginary.startsWith("-") : lit.real.startsWith("-");
    case "e-notation":
      return lit.mantissa.startsWith("-");
    case "bool":
      return false;
  }
}

function isZero(part: string): boolean {
  return ZERO_PATTERN.test(part);
}

/** A complex literal without real part, written `3i`. */
export function isImaginary(lit: ComplexLiteral): boolean {
  return isZero(lit.real);
}

/** Surface text of a literal, as the infix parser reads it back. */
export function numericText(lit: NumericLiteral): string {
  switch (lit.type) {
    case "integer":
      return lit.value.toString();
    case "decimal":
      return lit.value;
    case "rational":
      return `${lit.numerator}/${lit.denominator}r`;
    case "complex": {
      if (isImaginary(lit)) return `${lit.imaginary}i`;
      const sign = lit.imaginary.startsWith("-") ? "" : "+";
      return `${lit.real}${sign}${lit.imaginary}i`;
    }
    case "e-notation":
      return `${lit.mantissa}e${lit.exponent}`;
    case "bool":
      return lit.value ? "true" : "false";
  }
}

/** Text parts of a `cn` body; two-part literals are separated by `<sep/>`. */
export function numericParts(lit: Exclude<NumericLiteral, BoolLiteral>): [string] | [string, string] {
  switch (lit.type) {
    case "integer":
      return [lit.value.toString()];
    case "decimal":
      return [lit.value];
    case "rational":
      return [lit.numerator, lit.denominator];
    case "complex":
      return [lit.real, lit.imaginary];
    case "e-notation":
      return [lit.mantissa, lit.exponent];
  }
}

// MathML 2 names accepted on input next to our own vocabulary
const TYPE_ALIASES = new Map<string, NumericMarkupType>([
  ["integer", "integer"],
  ["decimal", "decimal"],
  ["real", "decimal"],
  ["rational", "rational"],
  ["complex", "complex"],
  ["complex-cartesian", "complex"],
  ["e-notation", "e-notation"],
]);

/**
 * Build a literal from a `cn` element's type attribute and text parts.
 * A missing type means integer when the text is one, decimal otherwise.
 */
export function fromMarkup(type: string | undefined, parts: string[]): Exclude<NumericLiteral, BoolLiteral> {
  const resolved = type === undefined
    ? (parts.length === 1 && INTEGER_PATTERN.test(parts[0].trim()) ? "integer" : "decimal")
    : TYPE_ALIASES.get(type);
  if (resolved === undefined) {
    throw new UnsupportedConstructError(`cn elements of type '${type}' are not supported`);
  }

  const expected = resolved === "integer" || resolved === "decimal" ? 1 : 2;
  if (parts.length !== expected) {
    throw new UnsupportedConstructError(
      `cn element of type '${resolved}' has ${parts.length} part(s), ${expected} required`
    );
  }

  switch (resolved) {
    case "integer":
      return integer(parts[0]);
    case "decimal":
      return decimal(parts[0]);
    case "rational":
      return rational(parts[0], parts[1]);
    case "complex":
      return complex(parts[0], parts[1]);
    case "e-notation":
      return eNotation(parts[0], parts[1]);
  }
}
