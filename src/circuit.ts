// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

/**
 * Gate argument. Numbers are formatted to a fixed number of significant
 * digits; strings (symbolic parameters such as `theta` or `pi/2`) are drawn as given.
 */
export type Parameter = number | string;

/**
 * A single bit of a named register. Used for both qubits and classical bits.
 */
export interface Bit {
  /** Name of the register the bit belongs to. */
  register: string;
  /** Index of the bit within its register. */
  index: number;
}

export type Qubit = Bit;
export type Clbit = Bit;

/**
 * Classical condition: the operation is applied only when the value held
 * by `register` equals `value`.
 */
export interface Condition {
  register: string;
  value: number;
}

interface ConditionalOperation {
  condition?: Condition;
}

/**
 * Unitary gate on one or more target qubits, optionally controlled.
 * Qubits are referenced by their index in `Circuit.qubits`.
 */
export interface Unitary extends ConditionalOperation {
  kind: "unitary";
  /** Gate name, e.g. `h`, `rz` or `u3`. */
  gate: string;
  targets: number[];
  controls?: number[];
  args?: Parameter[];
  /** Display label used instead of the gate name. */
  label?: string;
}

/**
 * Measurement of `qubit` into the classical bit `result`
 * (index in `Circuit.clbits`).
 */
export interface Measurement extends ConditionalOperation {
  kind: "measurement";
  qubit: number;
  result: number;
}

export interface Reset extends ConditionalOperation {
  kind: "reset";
  qubit: number;
}

export interface Barrier {
  kind: "barrier";
  qubits: number[];
}

export interface Swap extends ConditionalOperation {
  kind: "swap";
  targets: [number, number];
  controls?: number[];
}

export type Operation = Unitary | Measurement | Reset | Barrier | Swap;

export type OperationKind = Operation["kind"];

/**
 * Circuit to be drawn: the declared bits and the already-ordered list of
 * operations acting on them.
 */
export interface Circuit {
  qubits: Qubit[];
  clbits: Clbit[];
  operations: Operation[];
}
