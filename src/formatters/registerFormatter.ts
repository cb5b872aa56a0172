// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { clbitInitialState, qubitInitialState } from "../constants.js";
import type { DrawElement } from "../drawElement.js";
import { clWireElement, quWireElement } from "../elements.js";
import { RegisterType, type WireRow } from "../register.js";
import { rjust } from "../utils.js";

/**
 * Generates the label of every wire, right-justified to a common width.
 *
 * Example: `q_0: |0>` for a qubit, ` c_0: 0 ` for a classical bit.
 *
 * @param rows Display rows.
 * @param withInitialState Append the initial value of each wire.
 *
 * @returns One label per row.
 */
const formatWireLabels = (
  rows: WireRow[],
  withInitialState: boolean,
): string[] => {
  const labels = rows.map(({ type, bit }) => {
    const name = `${bit.register}_${bit.index}: `;
    if (!withInitialState) return name;
    return (
      name +
      (type === RegisterType.Qubit ? qubitInitialState : clbitInitialState)
    );
  });
  const width = Math.max(0, ...labels.map((label) => label.length));
  return labels.map((label) => rjust(label, width));
};

/**
 * Bare wire for a row that has nothing drawn on it in a layer.
 */
const formatEmptyWire = (type: RegisterType): DrawElement =>
  type === RegisterType.Qubit ? quWireElement() : clWireElement();

export { formatWireLabels, formatEmptyWire };
