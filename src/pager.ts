// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { pageBreakLeft, pageBreakRight } from "./constants.js";
import type { DrawElement } from "./drawElement.js";
import { formatBreak } from "./formatters/inputFormatter.js";
import { normalizeWidth } from "./compression.js";

/** Columns of one page, left to right; each column holds one element per row. */
export type Page = DrawElement[][];

export interface PageInput {
  /** Label column of the first page. */
  labels: DrawElement[];
  /** Creates the label column of every following page. */
  continuationLabels: () => DrawElement[];
  /** Layers, already normalized to their width. */
  layers: DrawElement[][];
  /** Maximum line width; Infinity for a single page. */
  lineLength: number;
}

const _width = (column: DrawElement[]): number => column[0]?.length ?? 0;

const _column = (elements: DrawElement[]): DrawElement[] => {
  normalizeWidth(elements);
  return elements;
};

/**
 * Splits the diagram into pages no wider than the line length, cutting
 * only between layers. Every page but the last ends with a `»` column and
 * every page but the first starts with a `«` column and the wire labels.
 *
 * @param input Label column, layers and line length.
 *
 * @returns The pages, left to right.
 */
const paginate = (input: PageInput): Page[] => {
  const labels = _column(input.labels);
  const rowCount = labels.length;
  if (!Number.isFinite(input.lineLength)) return [[labels, ...input.layers]];

  const pages: Page[] = [[]];
  let rest = input.lineLength;
  let current = pages[0];

  for (const column of [labels, ...input.layers]) {
    const width = _width(column);
    if (width < rest || current.length === 0) {
      current.push(column);
      rest -= width;
      continue;
    }
    current.push(_column(formatBreak(rowCount, pageBreakRight)));

    const start = _column(formatBreak(rowCount, pageBreakLeft));
    const pageLabels = _column(input.continuationLabels());
    current = [start, pageLabels, column];
    pages.push(current);
    rest = input.lineLength - _width(start) - _width(pageLabels) - width;
  }
  return pages;
};

export { paginate };
