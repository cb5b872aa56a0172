// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import type { Circuit } from "./circuit.js";
import { drawWires, normalizeWidth } from "./compression.js";
import { boxFrameWidth, htmlPreStyle } from "./constants.js";
import type { DrawElement } from "./drawElement.js";
import {
  type FormatContext,
  formatLayer,
} from "./formatters/gateFormatter.js";
import { formatInputs } from "./formatters/inputFormatter.js";
import { formatWireLabels } from "./formatters/registerFormatter.js";
import { Layer } from "./layer.js";
import { log } from "./log.js";
import {
  type DrawOptions,
  type ResolvedDrawOptions,
  resolveOptions,
} from "./options.js";
import { paginate } from "./pager.js";
import { layerOperations } from "./process.js";
import { buildWireMap, type WireMap } from "./register.js";

/** Columns taken by the `«` and `»` markers of a page. */
const pageBreakWidth = 2;

/**
 * Text drawing of a circuit.
 *
 * The layout is computed when the drawing is created, so errors in the
 * circuit or the options are thrown from the constructor. Another page width
 * passed to `lines` gets its own layout, with labels clipped to that width.
 */
class TextDrawing {
  readonly options: ResolvedDrawOptions;
  private readonly wires: WireMap;
  /** Layers by page width; labels are clipped to fit the page. */
  private readonly layers = new Map<number, DrawElement[][]>();

  /**
   * @param circuit Circuit to draw.
   * @param options Drawing options; missing ones take their defaults.
   *
   * @throws {InvalidOptionsError} When an option is invalid.
   * @throws {UnsupportedOperationError} When an operation has no drawable form.
   * @throws {InconsistentWireReferenceError} When an operation refers to a missing bit.
   */
  constructor(
    private readonly circuit: Circuit,
    options?: DrawOptions,
  ) {
    this.options = resolveOptions(options);
    this.wires = buildWireMap(
      circuit,
      this.options.reverseBits,
      this.options.idleWires,
    );
    this.layersFor(this.options.lineLength);
  }

  /**
   * Labels of every wire, right-justified to a common width.
   *
   * @param withInitialState Append `|0>` or `0` to each label.
   */
  wireNames(withInitialState = this.options.initialState): string[] {
    return formatWireLabels(this.wires.rows, withInitialState);
  }

  /**
   * Text lines of the drawing, page after page.
   *
   * @param lineLength Page width overriding the one given in the options;
   *                   `-1` or `Infinity` for a single page.
   */
  lines(lineLength?: number): string[] {
    if (this.wires.rows.length === 0) return [];
    const pageWidth =
      lineLength == null
        ? this.options.lineLength
        : resolveOptions({ lineLength }).lineLength;

    const pages = paginate({
      labels: formatInputs(this.wireNames()),
      continuationLabels: () => formatInputs(this.wireNames(false)),
      layers: this.layersFor(pageWidth),
      lineLength: pageWidth,
    });
    if (pages.length > 1) log.debug(`Drawing split into ${pages.length} pages`);

    return pages.flatMap((page) => {
      const rows = this.wires.rows.map((_, row) =>
        page.map((column) => column[row]),
      );
      return drawWires(rows, this.options.verticalCompression);
    });
  }

  toString(): string {
    return this.lines().join("\n");
  }

  /**
   * Drawing wrapped in a `<pre>` element, for embedding in HTML.
   */
  toHtml(): string {
    const text = this.toString().replace(/&/g, "&amp;").replace(/</g, "&lt;");
    return `<pre style="${htmlPreStyle}">${text}</pre>`;
  }

  private layersFor(pageWidth: number): DrawElement[][] {
    const cached = this.layers.get(pageWidth);
    if (cached != null) return cached;

    const placed = layerOperations(this.circuit, this.wires, this.options);
    const ctx: FormatContext = {
      circuit: this.circuit,
      wires: this.wires,
      precision: this.options.precision,
      maxLabelWidth: this.maxLabelWidth(pageWidth),
    };
    const layers = placed.map((operations) => {
      const column = formatLayer(new Layer(this.wires.rows), operations, ctx);
      normalizeWidth(column);
      return column;
    });
    this.layers.set(pageWidth, layers);
    return layers;
  }

  /**
   * Widest box label that still fits on a continuation page.
   */
  private maxLabelWidth(pageWidth: number): number {
    if (!Number.isFinite(pageWidth)) return Infinity;
    const labelWidth = this.wireNames(false)[0]?.length ?? 0;
    return pageWidth - labelWidth - pageBreakWidth - boxFrameWidth;
  }
}

/**
 * Draws a circuit as text.
 *
 * @param circuit Circuit to draw.
 * @param options Drawing options.
 *
 * @returns The drawing, lines joined with `\n`; empty for a circuit without wires.
 */
const drawText = (circuit: Circuit, options?: DrawOptions): string =>
  new TextDrawing(circuit, options).toString();

/**
 * Draws a circuit as text wrapped in a `<pre>` element.
 */
const drawHtml = (circuit: Circuit, options?: DrawOptions): string =>
  new TextDrawing(circuit, options).toHtml();

export { TextDrawing, drawText, drawHtml };
