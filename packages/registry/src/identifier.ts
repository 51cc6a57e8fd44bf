import { createRequire } from "node:module";

import { MalformedRecordError } from "./errors.js";

declare const operandBrand: unique symbol;
declare const identifierBrand: unique symbol;

/** A plain identifier or a `::` path naming a value in the generated source. */
export type Operand = string & { readonly [operandBrand]: true };

/** A plain identifier that can be bound with `let`. */
export type Identifier = Operand & { readonly [identifierBrand]: true };

const require = createRequire(import.meta.url);

function loadKeywords(): ReadonlySet<string> {
  const raw: unknown = require("../data/rust-keywords.json");
  if (!Array.isArray(raw)) {
    throw new Error("rust-keywords.json must contain an array");
  }
  return new Set(raw.filter((entry): entry is string => typeof entry === "string"));
}

const KEYWORDS = loadKeywords();
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const PATH_ROOTS = new Set(["crate", "self", "super", "Self"]);

export function isReservedWord(value: string): boolean {
  return KEYWORDS.has(value);
}

export function isIdentifier(value: unknown): value is Identifier {
  return (
    typeof value === "string" &&
    value !== "_" &&
    IDENTIFIER_PATTERN.test(value) &&
    !KEYWORDS.has(value)
  );
}

export function isOperand(value: unknown): value is Operand {
  if (typeof value !== "string") return false;
  const segments = value.split("::");
  if (segments.length === 1) return isIdentifier(value);
  return segments.every(
    (segment, index) => isIdentifier(segment) || (index === 0 && PATH_ROOTS.has(segment))
  );
}

export function identifier(value: string): Identifier {
  if (!isIdentifier(value)) {
    throw new MalformedRecordError(`invalid identifier: ${JSON.stringify(value)}`, {
      reason: "identifier",
    });
  }
  return value;
}

export function operand(value: string): Operand {
  if (!isOperand(value)) {
    throw new MalformedRecordError(`invalid operand: ${JSON.stringify(value)}`, {
      reason: "identifier",
    });
  }
  return value;
}
