// src/core/elaborate/numeral.ts
// Numeral literals. A trailing ".0" is dropped before reading, so "2.0"
// and "2" elaborate to the same literal.

import { DEFAULT_ELABORATION_CONFIG } from "../config/config";

export type NumeralOptions = {
  /** Read other decimals as exact rationals instead of rejecting them; on unless set to false */
  fractionalNumerals?: boolean;
};

export function looksNumeric(text: string): boolean {
  const c = text[0];
  return c === "." || (c !== undefined && c >= "0" && c <= "9");
}

export function stripZeroFraction(text: string): string {
  let t = text;
  while (t.length >= 3 && t.endsWith(".0")) t = t.slice(0, -2);
  return t;
}

function gcd(a: bigint, b: bigint): bigint {
  while (b !== 0n) [a, b] = [b, a % b];
  return a;
}

/**
 * Canonical text of a numeral: a decimal integer, or "n/d" in lowest terms.
 * Returns undefined when the text is not a numeral this reader accepts.
 */
export function parseNumeral(text: string, options: NumeralOptions = {}): string | undefined {
  const t = stripZeroFraction(text);
  if (/^\d+$/.test(t)) return BigInt(t).toString();

  if (!(options.fractionalNumerals ?? DEFAULT_ELABORATION_CONFIG.fractionalNumerals)) return undefined;

  const m = /^(\d*)\.(\d*)$/.exec(t);
  if (!m || (m[1] === "" && m[2] === "")) return undefined;
  const whole = m[1] ?? "";
  const frac = m[2] ?? "";

  const num = BigInt(whole + frac || "0");
  const den = 10n ** BigInt(frac.length);
  const g = gcd(num, den);
  const n = num / g;
  const d = den / g;
  return d === 1n ? n.toString() : `${n}/${d}`;
}
