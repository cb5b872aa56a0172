// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import type { DrawElement } from "./drawElement.js";
import type { VerticalCompression } from "./options.js";

/** Which of the two merged lines wins where they disagree. */
export type Precedence = "top" | "bot";

/**
 * Merges two characters drawn at the same position. Lines crossing each
 * other become junctions; otherwise the character named by `icod` wins.
 */
const _mergeChars = (top: string, bot: string, icod: Precedence): string => {
  if (top === bot) return top;
  if ("┼╪".includes(top) && bot === " ") return "│";
  if (top === " ") return bot;
  if ("┬╥".includes(top) && " ║│".includes(bot) && icod === "top") return top;
  if (top === "┬" && bot === " " && icod === "bot") return "│";
  if (top === "╥" && bot === " " && icod === "bot") return "║";
  if ("┬│".includes(top) && bot === "═") return "╪";
  if ("┬│".includes(top) && bot === "─") return "┼";
  if ("└┘║│░".includes(top) && bot === " " && icod === "top") return top;
  if ("─═".includes(top) && bot === " " && icod === "top") return top;
  if ("─═".includes(top) && bot === " " && icod === "bot") return bot;
  if ("║╥".includes(top) && bot === "═") return "╬";
  if ("║╥".includes(top) && bot === "─") return "╫";
  if ("║╫╬".includes(top) && bot === " ") return "║";
  if (top === "└" && bot === "┌") return "├";
  if (top === "┘" && bot === "┐") return "┤";
  if ("┐┌".includes(bot) && icod === "top") return "┬";
  if ("┘└".includes(top) && bot === "─" && icod === "top") return "┴";
  return bot;
};

/**
 * Merges two text lines of equal length character by character.
 *
 * @param top Line drawn above.
 * @param bot Line drawn below.
 * @param icod Line that wins where neither character is a junction.
 *
 * @returns The merged line.
 */
const mergeLines = (top: string, bot: string, icod: Precedence = "top"): string =>
  Array.from(top, (char, i) => _mergeChars(char, bot.charAt(i) || " ", icod)).join(
    "",
  );

const _isLabelOnly = (line: string): boolean => {
  const text = line.replace(/ /g, "");
  return text.length > 0 && /^[\p{L}\p{N}]+$/u.test(text);
};

/**
 * Decides whether the top line of a wire is drawn on the bottom line of the
 * wire above it.
 *
 * @param topLine Top line of the lower wire.
 * @param previousLine Bottom line of the upper wire.
 * @param compression Vertical compression policy.
 */
const shouldCompress = (
  topLine: string,
  previousLine: string,
  compression: VerticalCompression,
): boolean => {
  switch (compression) {
    case "high":
      return true;
    case "low":
      return false;
    case "medium":
      for (let i = 0; i < topLine.length; i++) {
        if ("┴╨".includes(topLine[i]) && "┬╥".includes(previousLine.charAt(i)))
          return false;
      }
      return !(_isLabelOnly(topLine) || _isLabelOnly(previousLine));
  }
};

/**
 * Draws the wires of one page as text lines.
 *
 * @param wires Elements of every row, left to right.
 * @param compression Vertical compression policy.
 *
 * @returns Lines from top to bottom.
 */
const drawWires = (
  wires: DrawElement[][],
  compression: VerticalCompression,
): string[] => {
  const lines: string[] = [];
  for (const wire of wires) {
    const topLine = wire.map((element) => element.topLine).join("");
    const previous = lines.pop();
    if (previous == null) {
      lines.push(topLine);
    } else if (shouldCompress(topLine, previous, compression)) {
      lines.push(mergeLines(previous, topLine, "top"));
    } else {
      lines.push(previous, mergeLines(previous, topLine, "bot"));
    }

    const midLine = wire.map((element) => element.midLine).join("");
    lines.push(mergeLines(lines[lines.length - 1], midLine, "bot"));

    const botLine = wire.map((element) => element.botLine).join("");
    lines.push(mergeLines(lines[lines.length - 1], botLine, "bot"));
  }
  return lines;
};

/**
 * Makes every element of a column as wide as the widest one.
 */
const normalizeWidth = (column: DrawElement[]): void => {
  const width = Math.max(0, ...column.map((element) => element.length));
  column.forEach((element) => (element.layerWidth = width));
};

export { mergeLines, shouldCompress, drawWires, normalizeWidth };
