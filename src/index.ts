// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

export { TextDrawing, drawText, drawHtml } from "./textDrawing.js";
export { defaultDrawOptions } from "./constants.js";
export {
  CircuitDrawError,
  UnsupportedOperationError,
  InconsistentWireReferenceError,
  InvalidOptionsError,
} from "./errors.js";
export type {
  Parameter,
  Bit,
  Qubit,
  Clbit,
  Condition,
  Unitary,
  Measurement,
  Reset,
  Barrier,
  Swap,
  Operation,
  OperationKind,
  Circuit,
} from "./circuit.js";
export type {
  DrawOptions,
  Justify,
  VerticalCompression,
} from "./options.js";
