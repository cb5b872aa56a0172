// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import type {
  Circuit,
  Condition,
  Measurement,
  Swap,
  Unitary,
} from "../circuit.js";
import { connectorLine, phaseGates, zzGate } from "../constants.js";
import type { DrawElement } from "../drawElement.js";
import { ElementRole } from "../drawElement.js";
import {
  barrier,
  boxOnClWire,
  boxOnQuWire,
  bullet,
  ex,
  measureFrom,
  measureTo,
  multiBox,
  type MultiBoxRow,
  reset,
} from "../elements.js";
import { UnsupportedOperationError } from "../errors.js";
import type { Layer } from "../layer.js";
import { log } from "../log.js";
import { type PlacedOperation, qubitNames } from "../process.js";
import { registerRows, type WireMap } from "../register.js";
import { capitalize, clipLabel, formatArgs } from "../utils.js";

/**
 * What the formatters need to know beyond the operation itself.
 */
export interface FormatContext {
  circuit: Circuit;
  wires: WireMap;
  /** Significant digits of numeric gate arguments. */
  precision: number;
  /** Widest label a box may show; Infinity when output is not paginated. */
  maxLabelWidth: number;
}

const _qubitRow = (ctx: FormatContext, qubit: number): number => {
  const row = ctx.wires.qubitRows.get(qubit);
  if (row == null) throw new Error(`Failed to find row of qubit ${qubit}.`);
  return row;
};

const _clbitRow = (ctx: FormatContext, clbit: number): number => {
  const row = ctx.wires.clbitRows.get(clbit);
  if (row == null) throw new Error(`Failed to find row of clbit ${clbit}.`);
  return row;
};

const _range = (from: number, to: number): number[] =>
  Array.from({ length: to - from + 1 }, (_, i) => from + i);

/**
 * Clips a box label that cannot fit on a page.
 */
const _fit = (
  label: string,
  maxWidth: number,
  index: number,
): string => {
  if (label.length <= maxWidth) return label;
  const clipped = clipLabel(label, maxWidth);
  log.warn(
    `Label "${label}" of operation ${index} clipped to "${clipped}" to fit the line length.`,
  );
  return clipped;
};

/**
 * Text of a box: the label or the gate name, followed by the arguments.
 *
 * Example: `rz` with `[pi / 2]` -> `Rz(1.5708)`
 */
const _boxLabel = (
  op: Unitary,
  precision: number,
  capitalized: boolean,
): string => {
  const name = op.label ?? (capitalized ? capitalize(op.gate) : op.gate);
  const args = formatArgs(op.args, precision);
  return args ? `${name}(${args})` : name;
};

const _isPhaseGate = (gate: string): boolean =>
  phaseGates.includes(gate.toLowerCase());

/**
 * Draws the `╡ = value ╞` box on the rows of the condition register.
 */
const _formatCondition = (
  layer: Layer,
  condition: Condition,
  ctx: FormatContext,
): void => {
  const label = `= ${condition.value}`;
  const rows = registerRows(ctx.circuit, ctx.wires, condition.register);
  if (rows.length === 1) {
    layer.setElement(rows[0], boxOnClWire(label, "┴"));
    return;
  }
  const span = _range(rows[0], rows[rows.length - 1]);
  const boxRows: MultiBoxRow[] = span.map((row) => {
    const bit = rows.indexOf(row);
    return { wireLabel: "", targetIndex: bit >= 0 ? bit : undefined };
  });
  layer.setElements(
    span,
    multiBox(label, boxRows, { classical: true, topConnect: "┴" }),
  );
};

/**
 * Draws a box spanning every row from the first to the last target.
 *
 * @returns Rows of the top and bottom elements of the box.
 */
const _formatMultiTarget = (
  layer: Layer,
  op: Unitary,
  index: number,
  ctx: FormatContext,
  conditional: boolean,
): [number, number] => {
  const targetRows = op.targets.map((q) => _qubitRow(ctx, q));
  const top = Math.min(...targetRows);
  const bottom = Math.max(...targetRows);
  const span = _range(top, bottom);
  const wireLabelWidth = String(op.targets.length - 1).length;

  const label = _fit(
    _boxLabel(op, ctx.precision, false),
    ctx.maxLabelWidth - wireLabelWidth,
    index,
  );
  const boxRows: MultiBoxRow[] = span.map((row) => {
    const target = targetRows.indexOf(row);
    return target >= 0
      ? { wireLabel: String(target), targetIndex: target }
      : { wireLabel: "" };
  });
  layer.setElements(span, multiBox(label, boxRows, { conditional }));
  return [top, bottom];
};

const _formatUnitary = (
  layer: Layer,
  op: Unitary,
  index: number,
  ctx: FormatContext,
  conditional: boolean,
): void => {
  const controls = op.controls ?? [];
  const controlRows = controls.map((q) => _qubitRow(ctx, q));
  const targetRows = op.targets.map((q) => _qubitRow(ctx, q));

  const setBullets = (rows: number[], role = ElementRole.Control) =>
    rows.forEach((row) => layer.setElement(row, bullet(conditional, role)));

  if (controls.length === 0) {
    if (targetRows.length === 1) {
      const label = _fit(
        _boxLabel(op, ctx.precision, true),
        ctx.maxLabelWidth,
        index,
      );
      layer.setElement(targetRows[0], boxOnQuWire(label, conditional));
      return;
    }
    const gate = op.gate.toLowerCase();
    if (targetRows.length === 2 && (gate === zzGate || _isPhaseGate(gate))) {
      const args = formatArgs(op.args, ctx.precision);
      setBullets(targetRows, ElementRole.Target);
      layer.addConnection(targetRows, gate === zzGate ? `zz(${args})` : args);
      return;
    }
    _formatMultiTarget(layer, op, index, ctx, conditional);
    return;
  }

  setBullets(controlRows);

  if (targetRows.length === 1) {
    const gate = op.gate.toLowerCase();
    const rows = [...controlRows, ...targetRows];
    if (gate === "z") {
      setBullets(targetRows, ElementRole.Target);
      layer.addConnection(rows);
    } else if (_isPhaseGate(gate)) {
      setBullets(targetRows, ElementRole.Target);
      layer.addConnection(rows, formatArgs(op.args, ctx.precision));
    } else {
      const label = _fit(
        _boxLabel(op, ctx.precision, true),
        ctx.maxLabelWidth,
        index,
      );
      layer.setElement(targetRows[0], boxOnQuWire(label, conditional));
      layer.addConnection(rows);
    }
    return;
  }

  const top = Math.min(...targetRows);
  const bottom = Math.max(...targetRows);
  if (controlRows.some((row) => row > top && row < bottom)) {
    throw new UnsupportedOperationError(
      index,
      op.kind,
      qubitNames([...op.targets, ...controls]),
      "a control qubit lies inside the span of the target qubits",
    );
  }
  const edges = _formatMultiTarget(layer, op, index, ctx, conditional);
  layer.addConnection([...controlRows, ...edges]);
};

const _formatSwap = (
  layer: Layer,
  op: Swap,
  ctx: FormatContext,
  conditional: boolean,
): void => {
  const targetRows = op.targets.map((q) => _qubitRow(ctx, q));
  const controlRows = (op.controls ?? []).map((q) => _qubitRow(ctx, q));
  targetRows.forEach((row) => layer.setElement(row, ex(conditional)));
  controlRows.forEach((row) => layer.setElement(row, bullet(conditional)));
  layer.addConnection([...controlRows, ...targetRows]);
};

const _formatMeasurement = (
  layer: Layer,
  op: Measurement,
  ctx: FormatContext,
): void => {
  layer.setElement(_qubitRow(ctx, op.qubit), measureFrom());
  layer.setElement(_clbitRow(ctx, op.result), measureTo());
};

/**
 * Draws one operation into `layer`: its elements on every row it acts on,
 * its condition box, and the connections between them.
 *
 * @param layer Column the operation belongs to.
 * @param placed Operation and the rows it was placed on.
 * @param ctx Circuit, rows and formatting settings.
 *
 * @throws {UnsupportedOperationError} When the operation has no drawable form.
 */
const formatOperation = (
  layer: Layer,
  placed: PlacedOperation,
  ctx: FormatContext,
): void => {
  const { operation: op, index } = placed;

  if (op.kind === "barrier") {
    placed.rows.forEach((row) => layer.setElement(row, barrier()));
    return;
  }

  const conditional = op.condition != null;
  if (op.condition != null) _formatCondition(layer, op.condition, ctx);

  switch (op.kind) {
    case "unitary":
      _formatUnitary(layer, op, index, ctx, conditional);
      break;
    case "swap":
      _formatSwap(layer, op, ctx, conditional);
      break;
    case "measurement":
      _formatMeasurement(layer, op, ctx);
      break;
    case "reset":
      layer.setElement(_qubitRow(ctx, op.qubit), reset(conditional));
      break;
  }
};

/**
 * Draws every operation of a layer and joins the elements of each one.
 *
 * @returns Elements of every row of the column.
 */
const formatLayer = (
  layer: Layer,
  operations: PlacedOperation[],
  ctx: FormatContext,
): DrawElement[] => {
  operations.forEach((placed) => formatOperation(layer, placed, ctx));
  layer.connectWith(connectorLine);
  return layer.fullLayer();
};

export { formatLayer };
