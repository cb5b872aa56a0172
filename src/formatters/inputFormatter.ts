// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import type { DrawElement } from "../drawElement.js";
import { breakWire, inputWire } from "../elements.js";

/**
 * Creates the column holding the wire labels.
 *
 * @param labels One label per row, already justified.
 *
 * @returns One element per row.
 */
const formatInputs = (labels: string[]): DrawElement[] =>
  labels.map((label) => inputWire(label));

/**
 * Creates a page continuation column, `»` or `«` on every row.
 */
const formatBreak = (rowCount: number, glyph: string): DrawElement[] =>
  Array.from({ length: rowCount }, () => breakWire(glyph));

export { formatInputs, formatBreak };
