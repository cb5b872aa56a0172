// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { describe, expect, it } from "vitest";
import { defaultDrawOptions } from "../src/constants.js";
import { InvalidOptionsError } from "../src/errors.js";
import type { DrawOptions } from "../src/options.js";
import { resolveOptions } from "../src/options.js";

describe("resolveOptions", () => {
  it("fills in every default", () => {
    expect(resolveOptions()).toEqual({
      ...defaultDrawOptions,
      lineLength: Infinity,
    });
  });

  it("keeps the values given", () => {
    const resolved = resolveOptions({
      reverseBits: true,
      justify: "none",
      verticalCompression: "low",
      lineLength: 80,
      precision: 3,
    });
    expect(resolved.reverseBits).toBe(true);
    expect(resolved.justify).toBe("none");
    expect(resolved.verticalCompression).toBe("low");
    expect(resolved.lineLength).toBe(80);
    expect(resolved.precision).toBe(3);
  });

  it("treats undefined as missing", () => {
    expect(resolveOptions({ justify: undefined }).justify).toBe("left");
  });

  it("turns pagination off for -1 and Infinity", () => {
    expect(resolveOptions({ lineLength: -1 }).lineLength).toBe(Infinity);
    expect(resolveOptions({ lineLength: Infinity }).lineLength).toBe(Infinity);
  });

  it("rejects line lengths that are not positive integers", () => {
    expect(() => resolveOptions({ lineLength: 0 })).toThrow(
      'Invalid value 0 for option "lineLength", expected a positive integer, -1 or Infinity.',
    );
    expect(() => resolveOptions({ lineLength: -2 })).toThrow(
      InvalidOptionsError,
    );
  });

  it("rejects values outside the allowed set", () => {
    const compression: DrawOptions = JSON.parse(
      '{"verticalCompression":"maximum"}',
    );
    expect(() => resolveOptions(compression)).toThrow(
      'Invalid value "maximum" for option "verticalCompression", expected one of "high", "medium", "low".',
    );
    const flag: DrawOptions = JSON.parse('{"idleWires":"yes"}');
    expect(() => resolveOptions(flag)).toThrow(
      'Invalid value "yes" for option "idleWires", expected a boolean.',
    );
  });

  it("rejects precisions out of range", () => {
    expect(() => resolveOptions({ precision: 0 })).toThrow(
      'Invalid value 0 for option "precision", expected an integer from 1 to 21.',
    );
    expect(() => resolveOptions({ precision: 2.5 })).toThrow(
      InvalidOptionsError,
    );
  });

  it("names the option on the error", () => {
    try {
      resolveOptions({ precision: 22 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidOptionsError);
      if (error instanceof InvalidOptionsError) {
        expect(error.option).toBe("precision");
        expect(error.name).toBe("InvalidOptionsError");
      }
    }
  });
});
