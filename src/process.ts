// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import type { Circuit, Operation } from "./circuit.js";
import {
  InconsistentWireReferenceError,
  UnsupportedOperationError,
} from "./errors.js";
import { log } from "./log.js";
import type { Justify } from "./options.js";
import { registerRows, type WireMap } from "./register.js";

/**
 * Operation together with the rows it is drawn on.
 */
export interface PlacedOperation {
  /** Position of the operation in `Circuit.operations`. */
  index: number;
  operation: Operation;
  /** Rows the operation draws on, top to bottom. */
  rows: number[];
  /** Rows no other operation may use in the same column. */
  occupied: number[];
}

export interface LayerOptions {
  justify: Justify;
  plotBarriers: boolean;
  fullWidthBarriers: boolean;
}

const _kindOf = (op: unknown): string =>
  typeof op === "object" && op !== null && "kind" in op
    ? String(op.kind)
    : "unknown";

/**
 * Checks that every bit an operation refers to exists and appears only once.
 *
 * @throws {InconsistentWireReferenceError} On a missing or repeated bit.
 */
const _checkBits = (
  index: number,
  bits: number[],
  count: number,
  kind: "qubit" | "clbit",
): void => {
  const invalid = bits.filter(
    (bit) => !Number.isInteger(bit) || bit < 0 || bit >= count,
  );
  if (invalid.length > 0) {
    throw new InconsistentWireReferenceError(
      index,
      invalid.map((bit) => `${kind} ${bit}`),
      `the circuit has ${count} ${kind}(s)`,
    );
  }
  const repeated = bits.filter((bit, i) => bits.indexOf(bit) !== i);
  if (repeated.length > 0) {
    throw new InconsistentWireReferenceError(
      index,
      [...new Set(repeated)].map((bit) => `${kind} ${bit}`),
      "the same bit is used more than once",
    );
  }
};

/**
 * Qubits an operation acts on, in argument order (targets, then controls).
 */
const operationQubits = (op: Operation): number[] => {
  switch (op.kind) {
    case "unitary":
    case "swap":
      return [...op.targets, ...(op.controls ?? [])];
    case "measurement":
    case "reset":
      return [op.qubit];
    case "barrier":
      return op.qubits;
  }
};

/**
 * Names of qubits for error messages, e.g. `qubit 2`.
 */
const qubitNames = (qubits: number[]): string[] =>
  qubits.map((qubit) => `qubit ${qubit}`);

/**
 * Checks one operation against the bits of the circuit.
 *
 * @throws {UnsupportedOperationError} When the operation cannot be drawn.
 * @throws {InconsistentWireReferenceError} When it refers to bits the circuit lacks.
 */
const _validate = (circuit: Circuit, op: Operation, index: number): void => {
  const qubitCount = circuit.qubits.length;
  switch (op.kind) {
    case "unitary":
      if (op.targets.length === 0)
        throw new UnsupportedOperationError(
          index,
          op.kind,
          qubitNames(op.controls ?? []),
          "no target qubit",
        );
      break;
    case "swap":
      if (op.targets.length !== 2)
        throw new UnsupportedOperationError(
          index,
          op.kind,
          qubitNames(operationQubits(op)),
          `expected 2 target qubits, got ${op.targets.length}`,
        );
      break;
    case "barrier":
      if (op.qubits.length === 0)
        throw new UnsupportedOperationError(index, op.kind, [], "no qubit");
      break;
    case "measurement":
      _checkBits(index, [op.result], circuit.clbits.length, "clbit");
      break;
    case "reset":
      break;
    default:
      throw new UnsupportedOperationError(
        index,
        _kindOf(op),
        [],
        "unknown operation kind",
      );
  }
  _checkBits(index, operationQubits(op), qubitCount, "qubit");

  if (op.kind === "barrier" || op.condition == null) return;
  const { register } = op.condition;
  if (!circuit.clbits.some((bit) => bit.register === register)) {
    throw new InconsistentWireReferenceError(
      index,
      [register],
      "a condition needs a classical register with at least one bit",
    );
  }
  // The condition box covers every bit of its register.
  if (
    op.kind === "measurement" &&
    circuit.clbits[op.result].register === register
  ) {
    throw new UnsupportedOperationError(
      index,
      op.kind,
      [`qubit ${op.qubit}`, `clbit ${op.result}`],
      "the result bit belongs to the condition register",
    );
  }
};

const _range = (from: number, to: number): number[] =>
  Array.from({ length: to - from + 1 }, (_, i) => from + i);

/**
 * Finds the rows an operation is drawn on and the rows it keeps to itself.
 */
const _locate = (
  circuit: Circuit,
  wires: WireMap,
  op: Operation,
  index: number,
  fullWidthBarriers: boolean,
): PlacedOperation => {
  if (op.kind === "barrier") {
    const rows = fullWidthBarriers
      ? [...wires.qubitRows.values()]
      : op.qubits.flatMap((q) => wires.qubitRows.get(q) ?? []);
    rows.sort((a, b) => a - b);
    const occupied = fullWidthBarriers ? _range(0, wires.rows.length - 1) : rows;
    return { index, operation: op, rows, occupied };
  }

  const rows = operationQubits(op).flatMap(
    (q) => wires.qubitRows.get(q) ?? [],
  );
  if (op.kind === "measurement") {
    const resultRow = wires.clbitRows.get(op.result);
    if (resultRow != null) rows.push(resultRow);
  }
  if (op.condition != null) {
    rows.push(...registerRows(circuit, wires, op.condition.register));
  }
  rows.sort((a, b) => a - b);
  const occupied =
    rows.length > 0 ? _range(rows[0], rows[rows.length - 1]) : [];
  return { index, operation: op, rows, occupied };
};

/**
 * Assigns every operation the first column after the last one used on any
 * of its occupied rows.
 *
 * @returns Column of each operation, in input order.
 */
const _assignColumns = (
  ops: PlacedOperation[],
  rowCount: number,
): number[] => {
  const lastColumn: number[] = new Array(rowCount).fill(-1);
  return ops.map(({ occupied }) => {
    const column =
      1 + Math.max(-1, ...occupied.map((row) => lastColumn[row]));
    occupied.forEach((row) => (lastColumn[row] = column));
    return column;
  });
};

const _columnsFor = (
  ops: PlacedOperation[],
  rowCount: number,
  justify: Justify,
): number[] => {
  switch (justify) {
    case "left":
      return _assignColumns(ops, rowCount);
    case "right": {
      const fromEnd = _assignColumns([...ops].reverse(), rowCount).reverse();
      const maxColumn = Math.max(0, ...fromEnd);
      return fromEnd.map((column) => maxColumn - column);
    }
    case "none":
      return ops.map((_, i) => i);
  }
};

/**
 * Groups the operations of a circuit into layers, the columns of the diagram.
 * Two operations share a layer only when their occupied rows are disjoint;
 * on every row the order of the operations is kept.
 *
 * @param circuit Circuit being drawn.
 * @param wires Display rows of the circuit.
 * @param options Justification and barrier handling.
 *
 * @returns Layers from left to right, each sorted by operation index.
 * @throws {UnsupportedOperationError} When an operation cannot be drawn.
 * @throws {InconsistentWireReferenceError} When an operation refers to bits the circuit lacks.
 */
const layerOperations = (
  circuit: Circuit,
  wires: WireMap,
  options: LayerOptions,
): PlacedOperation[][] => {
  circuit.operations.forEach((op, i) => _validate(circuit, op, i));

  const placed = circuit.operations
    .map((op, i) =>
      _locate(circuit, wires, op, i, options.fullWidthBarriers),
    )
    .filter(({ occupied }) => occupied.length > 0);

  const columns = _columnsFor(placed, wires.rows.length, options.justify);
  const layers: PlacedOperation[][] = [];
  placed.forEach((op, i) => {
    const column = columns[i];
    while (layers.length <= column) layers.push([]);
    layers[column].push(op);
  });

  const drawn = layers
    .map((layer) =>
      layer
        .filter(
          ({ operation }) =>
            options.plotBarriers || operation.kind !== "barrier",
        )
        .sort((a, b) => a.index - b.index),
    )
    .filter((layer) => layer.length > 0);

  log.debug(
    `Placed ${placed.length} operation(s) in ${drawn.length} layer(s), justify=${options.justify}`,
  );
  return drawn;
};

export { layerOperations, operationQubits, qubitNames };
