// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import type { DrawElement } from "./drawElement.js";
import { formatEmptyWire } from "./formatters/registerFormatter.js";
import type { WireRow } from "./register.js";

/**
 * Rows of one operation joined by a vertical line.
 */
interface Connection {
  rows: number[];
  /** Inline label written next to the line, above its lowest element. */
  label?: string;
}

/**
 * One column of the diagram under construction: at most one element per row
 * and the connections between the elements of each operation.
 */
class Layer {
  private readonly elements: (DrawElement | undefined)[];
  private readonly connections: Connection[] = [];

  constructor(private readonly rows: WireRow[]) {
    this.elements = rows.map(() => undefined);
  }

  /**
   * Places `element` on `row`.
   *
   * @throws {Error} When the row already holds an element.
   */
  setElement(row: number, element: DrawElement): void {
    if (this.elements[row] != null) {
      throw new Error(`Failed to place element: row ${row} is already used.`);
    }
    this.elements[row] = element;
  }

  /**
   * Places the elements of a box spanning `rows`, given top to bottom.
   */
  setElements(rows: number[], elements: DrawElement[]): void {
    rows.forEach((row, i) => this.setElement(row, elements[i]));
  }

  /**
   * Records that the elements on `rows` are joined by a vertical line.
   */
  addConnection(rows: number[], label?: string): void {
    this.connections.push({ rows: [...rows].sort((a, b) => a - b), label });
  }

  /**
   * Draws the junctions of every connection of two or more elements: the
   * first element connects downwards, the last upwards and the others both
   * ways. A connection label makes all its elements as wide as the label.
   *
   * @param wireChar Vertical line glyph.
   */
  connectWith(wireChar: string): void {
    for (const { rows, label } of this.connections) {
      const elements = rows.flatMap((row) => this.elements[row] ?? []);
      if (elements.length < 2) continue;

      const first = elements[0];
      const last = elements[elements.length - 1];
      first.connect(wireChar, ["bot"]);
      elements
        .slice(1, -1)
        .forEach((element) => element.connect(wireChar, ["top", "bot"]));
      last.connect(wireChar, ["top"], label);

      if (label) {
        for (const element of elements) {
          element.rightFill = label.length + element.midLine.length;
        }
      }
    }
  }

  /**
   * Elements of every row, with a bare wire on the rows nothing is drawn on.
   */
  fullLayer(): DrawElement[] {
    return this.elements.map(
      (element, row) => element ?? formatEmptyWire(this.rows[row].type),
    );
  }
}

export { Layer };
