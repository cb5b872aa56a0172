// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import {
  barrierShade,
  clWire,
  connectorLine,
  controlDot,
  quWire,
  resetLabel,
  swapCross,
} from "./constants.js";
import { DrawElement, ElementRole } from "./drawElement.js";

/** Junctions drawn where the connecting line meets a box edge. */
const boxTopConnector = { [connectorLine]: "┴" };
const boxBotConnector = { [connectorLine]: "┬" };
/** Glyphs drawn directly on the wire let the line run straight through. */
const directConnector = { [connectorLine]: connectorLine };

/**
 * Box around `label` on a quantum wire:
 *
 * ```
 * ┌───┐
 * ┤ H ├
 * └───┘
 * ```
 *
 * @param label Text inside the box.
 * @param conditional Whether a condition box hangs below the element.
 */
const boxOnQuWire = (label: string, conditional = false): DrawElement =>
  new DrawElement({
    role: ElementRole.Target,
    top: { prefix: "┌─", content: quWire, pad: quWire, suffix: "─┐" },
    mid: { prefix: "┤ ", content: label, suffix: " ├", background: quWire },
    bot: {
      prefix: "└─",
      content: conditional ? "┬" : quWire,
      pad: quWire,
      suffix: "─┘",
    },
    topConnector: boxTopConnector,
    botConnector: boxBotConnector,
  });

/**
 * Box around `label` on a classical wire, e.g. `╡ = 1 ╞`.
 *
 * @param label Text inside the box.
 * @param topConnect Glyph in the middle of the top edge.
 */
const boxOnClWire = (
  label: string,
  topConnect: string = quWire,
): DrawElement =>
  new DrawElement({
    role: ElementRole.Condition,
    top: { prefix: "┌─", content: topConnect, pad: quWire, suffix: "─┐" },
    mid: { prefix: "╡ ", content: label, suffix: " ╞", background: clWire },
    bot: { prefix: "└─", content: quWire, pad: quWire, suffix: "─┘" },
    topConnector: boxTopConnector,
    botConnector: boxBotConnector,
  });

/**
 * Glyph drawn straight on a quantum wire, e.g. `─■─`.
 */
const directOnQuWire = (
  label: string,
  role: ElementRole,
  ends: { top?: string; bot?: string; connectable?: boolean } = {},
): DrawElement => {
  const connectable = ends.connectable ?? true;
  return new DrawElement({
    role,
    top: { prefix: " ", content: ends.top ?? "", suffix: " " },
    mid: {
      prefix: quWire,
      content: label,
      pad: quWire,
      suffix: quWire,
      background: quWire,
    },
    bot: { prefix: " ", content: ends.bot ?? "", suffix: " " },
    topConnector: connectable ? directConnector : undefined,
    botConnector: connectable ? directConnector : undefined,
  });
};

const _conditionalEnd = (conditional: boolean): string =>
  conditional ? connectorLine : "";

/** Control dot, also used for both ends of a controlled phase. */
const bullet = (
  conditional = false,
  role = ElementRole.Control,
): DrawElement =>
  directOnQuWire(controlDot, role, { bot: _conditionalEnd(conditional) });

/** One end of a swap. */
const ex = (conditional = false): DrawElement =>
  directOnQuWire(swapCross, ElementRole.Target, {
    bot: _conditionalEnd(conditional),
  });

const reset = (conditional = false): DrawElement =>
  directOnQuWire(resetLabel, ElementRole.Target, {
    bot: _conditionalEnd(conditional),
  });

/** Barrier section; consecutive sections join into a single column. */
const barrier = (): DrawElement =>
  directOnQuWire(barrierShade, ElementRole.Barrier, {
    top: barrierShade,
    bot: barrierShade,
    connectable: false,
  });

/** Measurement box on the measured qubit. */
const measureFrom = (): DrawElement =>
  new DrawElement({
    role: ElementRole.Measure,
    top: { content: "┌─┐" },
    mid: { content: "┤M├", pad: quWire, background: quWire },
    bot: { content: "└╥┘" },
  });

/** End of the measurement line on the classical bit. */
const measureTo = (): DrawElement =>
  new DrawElement({
    role: ElementRole.MeasureResult,
    top: { content: " ║ " },
    mid: { content: "═╩═", background: clWire },
    bot: { content: "   " },
  });

const _emptyWire = (glyph: string): DrawElement =>
  new DrawElement({
    role: ElementRole.Wire,
    mid: { content: glyph, pad: glyph, background: glyph },
  });

/** Quantum wire with nothing on it. */
const quWireElement = (): DrawElement => _emptyWire(quWire);

/** Classical wire with nothing on it. */
const clWireElement = (): DrawElement => _emptyWire(clWire);

/** Label of a wire in the first column, e.g. `q_0: |0>`. */
const inputWire = (label: string): DrawElement =>
  new DrawElement({ role: ElementRole.Label, mid: { content: label } });

/** Page continuation marker, `»` or `«`. */
const breakWire = (glyph: string): DrawElement =>
  new DrawElement({
    role: ElementRole.Break,
    top: { content: glyph },
    mid: { content: glyph },
    bot: { content: glyph },
  });

export interface MultiBoxRow {
  /** Argument index shown at the left edge; empty for rows the box only spans. */
  wireLabel: string;
  /** Argument index of the row, if the operation acts on it. */
  targetIndex?: number;
}

export interface MultiBoxOptions {
  /** Box on classical wires (`╡ ╞`) rather than quantum ones (`┤ ├`). */
  classical?: boolean;
  /** Whether a condition box hangs below the lowest row. */
  conditional?: boolean;
  /** Glyph in the middle of the top edge. */
  topConnect?: string;
}

/**
 * One box spanning several consecutive rows. Every row gets its own element;
 * the label is written on the interior line at the vertical center of the box.
 *
 * Example for a gate `twoQ` on two rows:
 * ```
 * ┌───────┐
 * ┤0      ├
 * │  twoQ │
 * ┤1      ├
 * └───────┘
 * ```
 *
 * @param label Text centered in the box.
 * @param rows Rows from top to bottom, at least two.
 * @param options Box kind and connection glyphs.
 *
 * @returns One element per row, in the order of `rows`.
 */
const multiBox = (
  label: string,
  rows: MultiBoxRow[],
  options: MultiBoxOptions = {},
): DrawElement[] => {
  const classical = options.classical ?? false;
  const [left, right, background] = classical
    ? ["╡", "╞", clWire]
    : ["┤", "├", quWire];
  const labelWidth = classical
    ? 0
    : Math.max(0, ...rows.map((row) => row.wireLabel.length));
  const width = Math.max(label.length, 1);

  // The box has 2n-1 interior lines: the middle line of every row and the
  // line between each pair of rows, which belongs to the lower row's top.
  const labelLine = rows.length - 1;
  const labelRow = Math.ceil(labelLine / 2);
  const labelOnMid = labelLine % 2 === 0;

  // Edge junctions are centered on the whole box.
  const edgeWidth = labelWidth + width + 2;
  const inner = (content: string) => ({
    prefix: `│${" ".repeat(labelWidth)} `,
    content,
    suffix: " │",
  });

  const last = rows.length - 1;
  return rows.map((row, i) => {
    const labelHere = (onMid: boolean) =>
      i === labelRow && labelOnMid === onMid ? label : "";
    return new DrawElement({
      role:
        row.targetIndex != null
          ? classical
            ? ElementRole.Condition
            : ElementRole.Target
          : ElementRole.Span,
      targetIndex: row.targetIndex,
      width,
      top:
        i === 0
          ? {
              prefix: "┌",
              content: options.topConnect ?? quWire,
              pad: quWire,
              suffix: "┐",
              width: edgeWidth,
            }
          : inner(labelHere(false)),
      mid: {
        prefix: `${left}${row.wireLabel.padEnd(labelWidth)} `,
        content: labelHere(true),
        suffix: ` ${right}`,
        background,
      },
      bot:
        i === last
          ? {
              prefix: "└",
              content: options.conditional ? "┬" : quWire,
              pad: quWire,
              suffix: "┘",
              width: edgeWidth,
            }
          : inner(""),
      topConnector: i === 0 ? boxTopConnector : undefined,
      botConnector: i === last ? boxBotConnector : undefined,
    });
  });
};

export {
  boxOnQuWire,
  boxOnClWire,
  bullet,
  ex,
  reset,
  barrier,
  measureFrom,
  measureTo,
  quWireElement,
  clWireElement,
  inputWire,
  breakWire,
  multiBox,
};
