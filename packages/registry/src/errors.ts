import type { OperationKind } from "./catalog.js";

export type GadgetErrorCode = "E_UNRESOLVABLE_KIND" | "E_MALFORMED_RECORD";

export abstract class GadgetError extends Error {
  abstract readonly code: GadgetErrorCode;
}

export class UnresolvableKindError extends GadgetError {
  readonly code = "E_UNRESOLVABLE_KIND" as const;
  readonly requested: string;

  constructor(requested: string) {
    super(`unresolvable operation kind: ${JSON.stringify(requested)}`);
    this.name = "UnresolvableKindError";
    this.requested = requested;
  }
}

export type MalformedReason =
  | "arity"
  | "output"
  | "identifier"
  | "label"
  | "shape"
  | "unbound-operand";

export interface MalformedRecordDetails {
  readonly reason: MalformedReason;
  readonly kind?: OperationKind;
  readonly expected?: number;
  readonly actual?: number;
  /** Position of the record inside the sequence being rendered. */
  readonly index?: number;
}

export class MalformedRecordError extends GadgetError {
  readonly code = "E_MALFORMED_RECORD" as const;
  readonly reason: MalformedReason;
  readonly kind: OperationKind | undefined;
  readonly expected: number | undefined;
  readonly actual: number | undefined;
  readonly index: number | undefined;

  constructor(message: string, details: MalformedRecordDetails) {
    super(message);
    this.name = "MalformedRecordError";
    this.reason = details.reason;
    this.kind = details.kind;
    this.expected = details.expected;
    this.actual = details.actual;
    this.index = details.index;
  }

  get details(): MalformedRecordDetails {
    return {
      reason: this.reason,
      kind: this.kind,
      expected: this.expected,
      actual: this.actual,
      index: this.index,
    };
  }

  withIndex(index: number): MalformedRecordError {
    return new MalformedRecordError(this.message, { ...this.details, index });
  }
}
