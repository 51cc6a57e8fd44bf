import AjvModule from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";

import { GADGET_CATALOG, resolveKind, type OperationKind } from "./catalog.js";
import { MalformedRecordError } from "./errors.js";
import type { Identifier, Operand } from "./identifier.js";
import { quoteLabel } from "./label.js";
import {
  operationDocumentSchema,
  operationRecordSchema,
  type OperationDocument,
  type OperationRecordJson,
} from "./schemas.js";
import { expectNoOutput, expectOperands, expectOutput } from "./validate.js";

export interface OperationRecord {
  readonly label: string;
  readonly kind: OperationKind;
  readonly output?: Identifier;
  readonly operands: readonly Operand[];
}

export interface OperationRecordInput {
  readonly label: string;
  /** A kind or a legacy operation name. */
  readonly kind: string;
  readonly output?: string | null;
  readonly operands: readonly string[];
}

// ajv ships CommonJS; under NodeNext its constructor is the `default` member.
const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true, strict: true });

const validateRecordFn: ValidateFunction<OperationRecordJson> = ajv.compile(operationRecordSchema);
const validateDocumentFn: ValidateFunction<OperationDocument> = ajv.compile(operationDocumentSchema);

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return "unknown error";
  }
  return errors
    .map((error) => {
      const instance = error.instancePath || "/";
      const message = error.message ?? "validation error";
      return `${instance} ${message}`;
    })
    .join(", ");
}

export function createOperationRecord(input: OperationRecordInput): OperationRecord {
  const kind = resolveKind(input.kind);
  const operands = expectOperands(kind, input.operands);
  const rawOutput = input.output ?? undefined;
  quoteLabel(input.label, kind);
  if (!GADGET_CATALOG[kind].produces) {
    expectNoOutput(kind, rawOutput);
    return Object.freeze({ label: input.label, kind, operands: Object.freeze([...operands]) });
  }
  const output = expectOutput(kind, rawOutput);
  return Object.freeze({ label: input.label, kind, output, operands: Object.freeze([...operands]) });
}

/** Validates an untyped JSON value and builds the record it describes. */
export function parseOperationRecord(value: unknown): OperationRecord {
  if (!validateRecordFn(value)) {
    throw new MalformedRecordError(
      `operation record failed validation: ${formatSchemaErrors(validateRecordFn.errors)}`,
      { reason: "shape" }
    );
  }
  return createOperationRecord(value);
}

export class DocumentError extends Error {
  readonly code = "E_DOCUMENT_INVALID" as const;

  constructor(message: string) {
    super(message);
    this.name = "DocumentError";
  }
}

export function validateOperationDocument(value: unknown): OperationDocument {
  if (validateDocumentFn(value)) {
    return value;
  }
  throw new DocumentError(
    `operation document failed validation: ${formatSchemaErrors(validateDocumentFn.errors)}`
  );
}
