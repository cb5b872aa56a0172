// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

/**
 * Base class of every error raised while drawing a circuit.
 */
export class CircuitDrawError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * An operation has no drawable form, e.g. a gate acting on no qubits.
 */
export class UnsupportedOperationError extends CircuitDrawError {
  constructor(
    public readonly operationIndex: number,
    public readonly kind: string,
    public readonly wires: string[],
    reason: string,
  ) {
    const on = wires.length > 0 ? ` on ${wires.join(", ")}` : "";
    super(
      `Failed to draw operation ${operationIndex} (${kind})${on}: ${reason}.`,
    );
  }
}

/**
 * An operation refers to a bit or register the circuit does not declare,
 * or refers to the same bit twice.
 */
export class InconsistentWireReferenceError extends CircuitDrawError {
  constructor(
    public readonly operationIndex: number,
    public readonly wires: string[],
    reason: string,
  ) {
    super(
      `Operation ${operationIndex} references invalid wire(s) ${wires.join(", ")}: ${reason}.`,
    );
  }
}

/**
 * A drawing option holds a value outside its allowed set.
 */
export class InvalidOptionsError extends CircuitDrawError {
  constructor(
    public readonly option: string,
    value: unknown,
    expected: string,
  ) {
    super(
      `Invalid value ${JSON.stringify(value)} for option "${option}", expected ${expected}.`,
    );
  }
}
