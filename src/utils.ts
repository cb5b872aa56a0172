// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import type { Parameter } from "./circuit.js";
import { defaultPrecision, minLabelWidth } from "./constants.js";

/**
 * Centers `text` in a field of `width` characters. When the padding cannot be
 * split evenly, the extra character goes to the right unless both the padding
 * and the width are odd, in which case it goes to the left.
 *
 * @param text The text to center.
 * @param width Width of the field. Text that is already as wide is returned as is.
 * @param fill Padding character.
 *
 * @returns The padded text.
 */
const center = (text: string, width: number, fill = " "): string => {
  const margin = width - text.length;
  if (margin <= 0) return text;
  const left = Math.floor(margin / 2) + (margin & width & 1);
  return fill.repeat(left) + text + fill.repeat(margin - left);
};

/**
 * Pads `text` on the right up to `width` characters.
 */
const ljust = (text: string, width: number, fill = " "): string =>
  text.length >= width ? text : text + fill.repeat(width - text.length);

/**
 * Pads `text` on the left up to `width` characters.
 */
const rjust = (text: string, width: number, fill = " "): string =>
  text.length >= width ? text : fill.repeat(width - text.length) + text;

/**
 * Upper-cases the first character and lower-cases the rest,
 * e.g. "rz" -> "Rz", "U3" -> "U3", "cX" -> "Cx".
 */
const capitalize = (text: string): string =>
  text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();

/**
 * Formats a number the way `%.<precision>g` does: fixed notation for
 * moderate exponents, scientific notation (`1e-07`) otherwise, and no
 * trailing zeros in either case.
 *
 * @param value Number to format.
 * @param precision Number of significant digits.
 *
 * @returns The formatted number.
 */
const formatNumber = (value: number, precision = defaultPrecision): string => {
  if (!Number.isFinite(value)) return String(value);
  if (value === 0) return "0";

  // Let the rounding decide the exponent, 99999.7 becomes 1e+05.
  const [mantissa, exponentText] = value
    .toExponential(precision - 1)
    .split("e");
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= precision) {
    const sign = exponent < 0 ? "-" : "+";
    const digits = String(Math.abs(exponent)).padStart(2, "0");
    return `${_trimZeros(mantissa)}e${sign}${digits}`;
  }
  return _trimZeros(value.toFixed(precision - 1 - exponent));
};

const _trimZeros = (text: string): string =>
  text.includes(".") ? text.replace(/\.?0+$/, "") : text;

/**
 * Formats gate arguments for display.
 *
 * Example: [Math.PI / 2, "theta", Math.PI] -> "1.5708,theta,3.1416"
 *
 * @param args Gate arguments.
 * @param precision Significant digits for numeric arguments.
 *
 * @returns Comma-separated arguments, or an empty string if there are none.
 */
const formatArgs = (
  args: Parameter[] | undefined,
  precision = defaultPrecision,
): string =>
  (args ?? [])
    .map((arg) =>
      typeof arg === "number" ? formatNumber(arg, precision) : arg,
    )
    .join(",");

/**
 * Clips `label` so that it is at most `maxWidth` characters wide, marking
 * the cut with `..` when there is room for it.
 */
const clipLabel = (label: string, maxWidth: number): string => {
  const width = Math.max(minLabelWidth, maxWidth);
  if (label.length <= width) return label;
  if (width <= 3) return label.slice(0, width);
  return `${label.slice(0, width - 2)}..`;
};

export {
  center,
  ljust,
  rjust,
  capitalize,
  formatNumber,
  formatArgs,
  clipLabel,
};
