// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { describe, expect, it } from "vitest";
import {
  capitalize,
  center,
  clipLabel,
  formatArgs,
  formatNumber,
  ljust,
  rjust,
} from "../src/utils.js";

describe("center", () => {
  it("puts the extra character on the right for even widths", () => {
    expect(center("abc", 6)).toBe(" abc  ");
  });

  it("puts the extra character on the left when padding and width are odd", () => {
    expect(center("ab", 5)).toBe("  ab ");
  });

  it("uses the fill character", () => {
    expect(center("┴", 3, "─")).toBe("─┴─");
  });

  it("leaves text that is already wide enough", () => {
    expect(center("abcd", 2)).toBe("abcd");
  });
});

describe("justification", () => {
  it("pads on the right", () => {
    expect(ljust("ab", 4, "─")).toBe("ab──");
  });

  it("pads on the left", () => {
    expect(rjust("c_0: 0 ", 8)).toBe(" c_0: 0 ");
  });
});

describe("capitalize", () => {
  it("upper-cases only the first letter", () => {
    expect(capitalize("rz")).toBe("Rz");
    expect(capitalize("U3")).toBe("U3");
    expect(capitalize("cX")).toBe("Cx");
  });
});

describe("formatNumber", () => {
  it("rounds to five significant digits", () => {
    expect(formatNumber(Math.PI / 2)).toBe("1.5708");
    expect(formatNumber(Math.PI)).toBe("3.1416");
  });

  it("drops trailing zeros", () => {
    expect(formatNumber(0.5)).toBe("0.5");
    expect(formatNumber(2)).toBe("2");
    expect(formatNumber(0)).toBe("0");
  });

  it("keeps integers up to the precision", () => {
    expect(formatNumber(11111)).toBe("11111");
  });

  it("switches to scientific notation for small and large values", () => {
    expect(formatNumber(1e-7)).toBe("1e-07");
    expect(formatNumber(123456)).toBe("1.2346e+05");
  });

  it("takes the number of significant digits", () => {
    expect(formatNumber(Math.PI, 3)).toBe("3.14");
  });
});

describe("formatArgs", () => {
  it("joins numbers and symbols with commas", () => {
    expect(formatArgs([Math.PI / 2, "theta", Math.PI])).toBe(
      "1.5708,theta,3.1416",
    );
  });

  it("returns an empty string without arguments", () => {
    expect(formatArgs(undefined)).toBe("");
    expect(formatArgs([])).toBe("");
  });
});

describe("clipLabel", () => {
  it("marks the cut with dots", () => {
    expect(clipLabel("abcdefgh", 5)).toBe("abc..");
  });

  it("truncates labels clipped to three characters or less", () => {
    expect(clipLabel("abcdef", 3)).toBe("abc");
  });

  it("keeps at least one character", () => {
    expect(clipLabel("abc", 0)).toBe("a");
  });

  it("keeps labels that fit", () => {
    expect(clipLabel("abc", 3)).toBe("abc");
  });
});
