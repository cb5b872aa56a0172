// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import type { DrawOptions } from "./options.js";

// Wire glyphs
/** Quantum wire. */
export const quWire = "─";
/** Classical wire. */
export const clWire = "═";
/** Vertical line joining the wires of a multi-qubit operation. */
export const connectorLine = "│";
/** Control dot. */
export const controlDot = "■";
/** Swap target. */
export const swapCross = "X";
/** Reset marker. */
export const resetLabel = "|0>";
/** Barrier. */
export const barrierShade = "░";
/** Marker at the right edge of every page but the last. */
export const pageBreakRight = "»";
/** Marker at the left edge of every page but the first. */
export const pageBreakLeft = "«";

// Wire labels
/** Initial state shown after a qubit label. */
export const qubitInitialState = "|0>";
/** Initial value shown after a classical bit label. */
export const clbitInitialState = "0 ";

// Parameters
/** Default number of significant digits for numeric gate arguments. */
export const defaultPrecision = 5;
/** Gate names drawn as two control dots with an inline angle label. */
export const phaseGates = ["u1", "p", "phase", "cu1", "cp"];
/** Two-qubit interaction drawn as two dots with an inline `zz(...)` label. */
export const zzGate = "rzz";

// Layout
/** Smallest box label kept when a label has to be clipped to fit a page. */
export const minLabelWidth = 1;
/** Columns taken by a box frame around its label (`┤ ` and ` ├`). */
export const boxFrameWidth = 4;

// HTML
/** Style of the `<pre>` element wrapping the HTML form of a drawing. */
export const htmlPreStyle =
  "word-wrap: normal;white-space: pre;line-height: 15px;";

// Options
/** Values used for the drawing options the caller leaves out. */
export const defaultDrawOptions: Required<Omit<DrawOptions, "lineLength">> = {
  reverseBits: false,
  justify: "left",
  verticalCompression: "high",
  plotBarriers: true,
  fullWidthBarriers: false,
  initialState: true,
  idleWires: true,
  precision: defaultPrecision,
};
