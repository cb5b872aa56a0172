// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { describe, expect, it } from "vitest";
import type { Circuit, Operation } from "../src/circuit.js";
import {
  CircuitDrawError,
  InconsistentWireReferenceError,
  UnsupportedOperationError,
} from "../src/errors.js";
import type { LayerOptions } from "../src/process.js";
import { layerOperations } from "../src/process.js";
import { buildWireMap } from "../src/register.js";
import {
  barrier,
  circuit,
  cx,
  gate,
  h,
  measure,
  register,
  x,
} from "./circuits.js";

const leftJustified: LayerOptions = {
  justify: "left",
  plotBarriers: true,
  fullWidthBarriers: false,
};

/** Operation indices of every layer. */
const layersOf = (
  c: Circuit,
  options: Partial<LayerOptions> = {},
  reverseBits = false,
): number[][] =>
  layerOperations(c, buildWireMap(c, reverseBits, true), {
    ...leftJustified,
    ...options,
  }).map((layer) => layer.map(({ index }) => index));

describe("layerOperations", () => {
  it("puts operations sharing a wire in different layers", () => {
    const c = circuit(register("q", 2), [], [cx(0, 1), cx(1, 0)]);
    expect(layersOf(c)).toEqual([[0], [1]]);
  });

  it("lets operations on disjoint wires share a layer", () => {
    const c = circuit(register("q", 3), [], [h(0), h(1), h(2)]);
    expect(layersOf(c)).toEqual([[0, 1, 2]]);
  });

  it("keeps wires inside a span occupied", () => {
    const c = circuit(register("q", 4), [], [cx(0, 3), cx(1, 2)]);
    expect(layersOf(c)).toEqual([[0], [1]]);
  });

  it("counts the rows between a measured qubit and its result", () => {
    const c = circuit(register("q", 2), register("c", 2), [
      measure(0, 0),
      x(1),
    ]);
    expect(layersOf(c)).toEqual([[0], [1]]);
  });

  it("places a measurement on its qubit and result rows", () => {
    const c = circuit(register("q", 2), register("c", 2), [measure(0, 1)]);
    const [[placed]] = layerOperations(
      c,
      buildWireMap(c, false, true),
      leftJustified,
    );
    expect(placed.rows).toEqual([0, 3]);
    expect(placed.occupied).toEqual([0, 1, 2, 3]);
  });

  it("counts the rows of a condition register", () => {
    const c = circuit(register("q", 1), [
      ...register("c0", 1),
      ...register("c1", 1),
    ], [x(0, { register: "c0", value: 1 }), x(0, { register: "c1", value: 1 })]);
    const placed = layerOperations(c, buildWireMap(c, false, true), leftJustified);
    expect(placed.map((layer) => layer.map(({ occupied }) => occupied))).toEqual(
      [[[0, 1]], [[0, 1, 2]]],
    );
  });

  describe("barriers", () => {
    it("only hold back operations on the wires they list", () => {
      const c = circuit(register("q", 4), [], [barrier(0, 1), h(2), h(0)]);
      expect(layersOf(c)).toEqual([[0, 1], [2]]);
    });

    it("span every wire when drawn full width", () => {
      const c = circuit(register("q", 3), [], [barrier(0), h(2)]);
      expect(layersOf(c, { fullWidthBarriers: true })).toEqual([[0], [1]]);
      const placed = layerOperations(c, buildWireMap(c, false, true), {
        ...leftJustified,
        fullWidthBarriers: true,
      });
      expect(placed[0][0].rows).toEqual([0, 1, 2]);
    });

    it("still separate operations when hidden", () => {
      const c = circuit(register("q", 2), [], [h(0), barrier(0, 1), h(1)]);
      expect(layersOf(c, { plotBarriers: false })).toEqual([[0], [2]]);
    });
  });

  describe("justification", () => {
    const c = circuit(register("q", 2), register("c", 2), [
      x(0),
      h(1),
      measure(1, 1),
    ]);

    it("packs operations to the left", () => {
      expect(layersOf(c, { justify: "left" })).toEqual([[0, 1], [2]]);
    });

    it("packs operations to the right", () => {
      expect(layersOf(c, { justify: "right" })).toEqual([[1], [0, 2]]);
    });

    it("gives every operation its own layer", () => {
      expect(layersOf(c, { justify: "none" })).toEqual([[0], [1], [2]]);
    });
  });

  it("keeps the order of operations on every wire", () => {
    const ops: Operation[] = [h(0), cx(0, 2), h(1), cx(1, 0), h(2)];
    const c = circuit(register("q", 3), [], ops);
    const layers = layersOf(c);
    const layerOf = (index: number) =>
      layers.findIndex((layer) => layer.includes(index));
    expect(layerOf(0)).toBeLessThan(layerOf(1));
    expect(layerOf(1)).toBeLessThan(layerOf(3));
    expect(layerOf(2)).toBeLessThan(layerOf(3));
    expect(layerOf(1)).toBeLessThan(layerOf(4));
  });

  it("works on display rows when bits are reversed", () => {
    const c = circuit(register("q", 3), [], [cx(0, 1), h(2)]);
    expect(layersOf(c, {}, true)).toEqual([[0, 1]]);
  });

  describe("errors", () => {
    it("rejects qubits the circuit does not have", () => {
      const c = circuit(register("q", 2), [], [h(0), cx(0, 5)]);
      expect(() => layersOf(c)).toThrow(
        new InconsistentWireReferenceError(
          1,
          ["qubit 5"],
          "the circuit has 2 qubit(s)",
        ),
      );
      expect(() => layersOf(c)).toThrow(
        "Operation 1 references invalid wire(s) qubit 5: the circuit has 2 qubit(s).",
      );
    });

    it("rejects a qubit used twice", () => {
      const c = circuit(register("q", 2), [], [cx(1, 1)]);
      expect(() => layersOf(c)).toThrow(InconsistentWireReferenceError);
    });

    it("rejects missing classical bits", () => {
      const c = circuit(register("q", 1), register("c", 1), [measure(0, 1)]);
      expect(() => layersOf(c)).toThrow(
        "Operation 0 references invalid wire(s) clbit 1: the circuit has 1 clbit(s).",
      );
    });

    it("rejects conditions on empty registers", () => {
      const c = circuit(register("q", 1), register("c", 1), [
        x(0, { register: "flags", value: 1 }),
      ]);
      expect(() => layersOf(c)).toThrow(
        "Operation 0 references invalid wire(s) flags: a condition needs a classical register with at least one bit.",
      );
    });

    it("rejects gates without targets", () => {
      const c = circuit(register("q", 1), [], [gate("h", [])]);
      expect(() => layersOf(c)).toThrow(UnsupportedOperationError);
      expect(() => layersOf(c)).toThrow(
        "Failed to draw operation 0 (unitary): no target qubit.",
      );
    });

    it("rejects empty barriers", () => {
      const c = circuit(register("q", 1), [], [barrier()]);
      expect(() => layersOf(c)).toThrow(
        "Failed to draw operation 0 (barrier): no qubit.",
      );
    });

    it("names the qubits of a malformed swap", () => {
      const malformed: Operation = JSON.parse(
        '{"kind":"swap","targets":[0,1,2]}',
      );
      const c = circuit(register("q", 3), [], [malformed]);
      expect(() => layersOf(c)).toThrow(
        "Failed to draw operation 0 (swap) on qubit 0, qubit 1, qubit 2: expected 2 target qubits, got 3.",
      );
    });

    it("rejects a measurement into its own condition register", () => {
      const op: Operation = {
        kind: "measurement",
        qubit: 0,
        result: 1,
        condition: { register: "c", value: 1 },
      };
      const c = circuit(register("q", 1), register("c", 2), [h(0), op]);
      expect(() => layersOf(c)).toThrow(CircuitDrawError);
      expect(() => layersOf(c)).toThrow(
        new UnsupportedOperationError(
          1,
          "measurement",
          ["qubit 0", "clbit 1"],
          "the result bit belongs to the condition register",
        ),
      );
      expect(() => layersOf(c)).toThrow(
        "Failed to draw operation 1 (measurement) on qubit 0, clbit 1: the result bit belongs to the condition register.",
      );
    });

    it("rejects unknown operation kinds", () => {
      const unknown: Operation = JSON.parse('{"kind":"teleport"}');
      const c = circuit(register("q", 1), [], [unknown]);
      expect(() => layersOf(c)).toThrow(
        "Failed to draw operation 0 (teleport): unknown operation kind.",
      );
    });
  });
});
