import { GADGET_CATALOG, describeArity, type OperationKind } from "./catalog.js";
import { MalformedRecordError } from "./errors.js";
import { isIdentifier, isOperand, type Identifier, type Operand } from "./identifier.js";

export function expectOperands(kind: OperationKind, operands: readonly unknown[]): readonly Operand[] {
  if (!Array.isArray(operands)) {
    throw new MalformedRecordError(`${kind} operands must be an array`, { reason: "shape", kind });
  }
  const expected = GADGET_CATALOG[kind].roles.length;
  if (operands.length !== expected) {
    throw new MalformedRecordError(
      `${kind} expects ${describeArity(kind)}, got ${operands.length}`,
      { reason: "arity", kind, expected, actual: operands.length }
    );
  }
  return operands.map((value, position) => {
    if (!isOperand(value)) {
      const role = GADGET_CATALOG[kind].roles[position];
      throw new MalformedRecordError(
        `${kind} operand ${role} is not a valid identifier: ${JSON.stringify(value)}`,
        { reason: "identifier", kind }
      );
    }
    return value;
  });
}

export function expectOutput(kind: OperationKind, output: unknown): Identifier {
  if (!GADGET_CATALOG[kind].produces) {
    throw new MalformedRecordError(`${kind} does not produce an output`, { reason: "output", kind });
  }
  if (output === undefined) {
    throw new MalformedRecordError(`${kind} requires an output identifier`, { reason: "output", kind });
  }
  if (!isIdentifier(output)) {
    throw new MalformedRecordError(
      `${kind} output is not a valid identifier: ${JSON.stringify(output)}`,
      { reason: "identifier", kind }
    );
  }
  return output;
}

export function expectNoOutput(kind: OperationKind, output: unknown): void {
  if (output !== undefined) {
    throw new MalformedRecordError(
      `${kind} does not produce an output, got ${JSON.stringify(output)}`,
      { reason: "output", kind }
    );
  }
}
