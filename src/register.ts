// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import type { Bit, Circuit } from "./circuit.js";

/**
 * Kind of a wire.
 */
export enum RegisterType {
  Qubit,
  Classical,
}

/**
 * One display row of the diagram.
 */
export interface WireRow {
  type: RegisterType;
  bit: Bit;
  /** Index of the bit in `Circuit.qubits` or `Circuit.clbits`. */
  index: number;
}

/**
 * Display rows of a circuit and the lookup from bits to rows.
 */
export interface WireMap {
  rows: WireRow[];
  /** Row of each displayed qubit, by index in `Circuit.qubits`. */
  qubitRows: Map<number, number>;
  /** Row of each displayed classical bit, by index in `Circuit.clbits`. */
  clbitRows: Map<number, number>;
}

/**
 * Collects the bits operations act on. Barriers do not count; a condition
 * counts every bit of its register.
 */
const _activeBits = (
  circuit: Circuit,
): { qubits: Set<number>; clbits: Set<number> } => {
  const qubits = new Set<number>();
  const clbits = new Set<number>();
  for (const op of circuit.operations) {
    if (op.kind === "barrier") continue;
    switch (op.kind) {
      case "unitary":
      case "swap":
        op.targets.forEach((q) => qubits.add(q));
        (op.controls ?? []).forEach((q) => qubits.add(q));
        break;
      case "measurement":
        qubits.add(op.qubit);
        clbits.add(op.result);
        break;
      case "reset":
        qubits.add(op.qubit);
        break;
    }
    if (op.condition != null) {
      const register = op.condition.register;
      circuit.clbits.forEach((bit, i) => {
        if (bit.register === register) clbits.add(i);
      });
    }
  }
  return { qubits, clbits };
};

/**
 * Lays out the display rows: qubits first, then classical bits, each group
 * in declaration order or reversed.
 *
 * @param circuit Circuit being drawn.
 * @param reverseBits Reverse the order within each group.
 * @param idleWires Keep bits that no operation other than a barrier touches.
 *
 * @returns Rows and bit-to-row lookups.
 */
const buildWireMap = (
  circuit: Circuit,
  reverseBits: boolean,
  idleWires: boolean,
): WireMap => {
  const active = idleWires ? undefined : _activeBits(circuit);
  const group = (bits: Bit[], type: RegisterType, keep?: Set<number>) => {
    const rows = bits
      .map((bit, index): WireRow => ({ type, bit, index }))
      .filter((row) => keep == null || keep.has(row.index));
    return reverseBits ? rows.reverse() : rows;
  };

  const rows = [
    ...group(circuit.qubits, RegisterType.Qubit, active?.qubits),
    ...group(circuit.clbits, RegisterType.Classical, active?.clbits),
  ];

  const qubitRows = new Map<number, number>();
  const clbitRows = new Map<number, number>();
  rows.forEach((row, i) => {
    const rowsOfType =
      row.type === RegisterType.Qubit ? qubitRows : clbitRows;
    rowsOfType.set(row.index, i);
  });

  return { rows, qubitRows, clbitRows };
};

/**
 * Display rows of the bits of a classical register, top to bottom.
 */
const registerRows = (
  circuit: Circuit,
  wires: WireMap,
  register: string,
): number[] => {
  const rows: number[] = [];
  circuit.clbits.forEach((bit, i) => {
    const row = wires.clbitRows.get(i);
    if (bit.register === register && row != null) rows.push(row);
  });
  return rows.sort((a, b) => a - b);
};

export { buildWireMap, registerRows };
