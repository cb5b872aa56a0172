// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { defaultDrawOptions } from "./constants.js";
import { InvalidOptionsError } from "./errors.js";

/** Where operations go when they could share a column with others. */
export type Justify = "left" | "right" | "none";

/** How aggressively the blank lines between wires are merged. */
export type VerticalCompression = "high" | "medium" | "low";

export interface DrawOptions {
  /** Draw the last bit of each kind at the top. */
  reverseBits?: boolean;
  justify?: Justify;
  verticalCompression?: VerticalCompression;
  /** Draw barriers. Hidden barriers still keep operations apart. */
  plotBarriers?: boolean;
  /** Treat every barrier as spanning all qubits. */
  fullWidthBarriers?: boolean;
  /**
   * Maximum width of an output line. `undefined`, `-1` and `Infinity`
   * disable pagination.
   */
  lineLength?: number;
  /** Show `|0>` and `0` after the wire names. */
  initialState?: boolean;
  /** Keep wires no operation acts on. */
  idleWires?: boolean;
  /** Significant digits of numeric gate arguments. */
  precision?: number;
}

export type ResolvedDrawOptions = Required<Omit<DrawOptions, "lineLength">> & {
  /** Infinity when output is not paginated. */
  lineLength: number;
};

const justifyValues: readonly Justify[] = ["left", "right", "none"];
const compressionValues: readonly VerticalCompression[] = [
  "high",
  "medium",
  "low",
];

const _checkBoolean = (option: string, value: unknown): void => {
  if (typeof value !== "boolean") {
    throw new InvalidOptionsError(option, value, "a boolean");
  }
};

const _checkOneOf = (
  option: string,
  value: unknown,
  allowed: readonly string[],
): void => {
  if (typeof value !== "string" || !allowed.includes(value)) {
    throw new InvalidOptionsError(
      option,
      value,
      `one of ${allowed.map((v) => `"${v}"`).join(", ")}`,
    );
  }
};

/**
 * Fills in the defaults and checks every option.
 *
 * @param options Options given by the caller.
 *
 * @returns The complete set of options.
 * @throws {InvalidOptionsError} When an option holds a value outside its allowed set.
 */
const resolveOptions = (options: DrawOptions = {}): ResolvedDrawOptions => {
  const resolved = {
    reverseBits: options.reverseBits ?? defaultDrawOptions.reverseBits,
    justify: options.justify ?? defaultDrawOptions.justify,
    verticalCompression:
      options.verticalCompression ?? defaultDrawOptions.verticalCompression,
    plotBarriers: options.plotBarriers ?? defaultDrawOptions.plotBarriers,
    fullWidthBarriers:
      options.fullWidthBarriers ?? defaultDrawOptions.fullWidthBarriers,
    initialState: options.initialState ?? defaultDrawOptions.initialState,
    idleWires: options.idleWires ?? defaultDrawOptions.idleWires,
    precision: options.precision ?? defaultDrawOptions.precision,
  };
  _checkBoolean("reverseBits", resolved.reverseBits);
  _checkBoolean("plotBarriers", resolved.plotBarriers);
  _checkBoolean("fullWidthBarriers", resolved.fullWidthBarriers);
  _checkBoolean("initialState", resolved.initialState);
  _checkBoolean("idleWires", resolved.idleWires);
  _checkOneOf("justify", resolved.justify, justifyValues);
  _checkOneOf(
    "verticalCompression",
    resolved.verticalCompression,
    compressionValues,
  );

  const { precision } = resolved;
  if (!Number.isInteger(precision) || precision < 1 || precision > 21) {
    throw new InvalidOptionsError(
      "precision",
      precision,
      "an integer from 1 to 21",
    );
  }

  const lineLength = options.lineLength;
  let pageWidth = Infinity;
  if (lineLength != null && lineLength !== -1 && lineLength !== Infinity) {
    if (!Number.isInteger(lineLength) || lineLength < 1) {
      throw new InvalidOptionsError(
        "lineLength",
        lineLength,
        "a positive integer, -1 or Infinity",
      );
    }
    pageWidth = lineLength;
  }

  return { ...resolved, lineLength: pageWidth };
};

export { resolveOptions };
