// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { center, ljust } from "./utils.js";

/**
 * What an element stands for on its wire.
 */
export enum ElementRole {
  /** Bare wire, nothing drawn on it in this layer. */
  Wire,
  /** Wire label column. */
  Label,
  /** Page continuation marker. */
  Break,
  Control,
  Target,
  /** Section of a multi-wire box on a wire the operation does not act on. */
  Span,
  /** Box drawn on the classical register of a condition. */
  Condition,
  Measure,
  /** End of a measurement on its classical bit. */
  MeasureResult,
  Barrier,
}

/**
 * One of the three text lines of an element. The line is drawn as
 * `prefix + content + suffix`, with `content` centered in the element width.
 */
export interface Segment {
  prefix: string;
  content: string;
  /** Fills the element width around `content`, and the inline label fill. */
  pad: string;
  suffix: string;
  /** Fills the layer width around the whole segment. */
  background: string;
  /** Width `content` is centered in, when it differs from the element width. */
  width?: number;
}

export type ConnectionPoint = "top" | "bot";

export type ElementInit = {
  role: ElementRole;
  top?: Partial<Segment>;
  mid?: Partial<Segment>;
  bot?: Partial<Segment>;
  /** Width `content` is centered in. Defaults to the width of the middle content. */
  width?: number;
  /** Maps the connecting line to the glyph drawn where it meets the top edge. */
  topConnector?: Record<string, string>;
  botConnector?: Record<string, string>;
  /** Argument index of the wire within the operation, for targets. */
  targetIndex?: number;
};

const _segment = (init?: Partial<Segment>): Segment => ({
  prefix: "",
  content: "",
  pad: " ",
  suffix: "",
  background: " ",
  ...init,
});

/**
 * Rendered unit for one wire in one layer: three lines of text that are
 * all as wide as the layer once `layerWidth` has been set.
 */
export class DrawElement {
  readonly role: ElementRole;
  readonly targetIndex?: number;
  top: Segment;
  mid: Segment;
  bot: Segment;
  width: number;
  /** Width of the layer the element sits in; 0 until the layer is normalized. */
  layerWidth = 0;
  /** Minimum width of the element before centering, used by inline labels. */
  rightFill = 0;
  private readonly topConnector: Record<string, string>;
  private readonly botConnector: Record<string, string>;

  constructor(init: ElementInit) {
    this.role = init.role;
    this.targetIndex = init.targetIndex;
    this.top = _segment(init.top);
    this.mid = _segment(init.mid);
    this.bot = _segment(init.bot);
    this.width = init.width ?? this.mid.content.length;
    this.topConnector = init.topConnector ?? {};
    this.botConnector = init.botConnector ?? {};
  }

  get topLine(): string {
    return this.render(this.top);
  }

  get midLine(): string {
    return this.render(this.mid);
  }

  get botLine(): string {
    return this.render(this.bot);
  }

  /** Natural width of the element, before it is centered in its layer. */
  get length(): number {
    return Math.max(
      this.topLine.length,
      this.midLine.length,
      this.botLine.length,
    );
  }

  /**
   * Joins the element to a vertical line through the given edges, replacing
   * the edge content with the matching junction glyph. A label is written
   * right after the top junction.
   *
   * @param wireChar The connecting line, e.g. "│".
   * @param where Edges to connect.
   * @param label Inline label drawn next to the line above the element.
   */
  connect(wireChar: string, where: ConnectionPoint[], label?: string): void {
    const topGlyph = this.topConnector[wireChar];
    const botGlyph = this.botConnector[wireChar];
    if (where.includes("top") && topGlyph != null) this.top.content = topGlyph;
    if (where.includes("bot") && botGlyph != null) this.bot.content = botGlyph;
    if (label) this.top.suffix = this.top.suffix.slice(0, -1) + label;
  }

  private render(segment: Segment): string {
    let line =
      segment.prefix +
      center(segment.content, segment.width ?? this.width, segment.pad) +
      segment.suffix;
    if (this.rightFill) line = ljust(line, this.rightFill, segment.pad);
    return center(line, this.layerWidth, segment.background);
  }
}
