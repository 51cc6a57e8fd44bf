import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import {
  GADGET_CATALOG,
  GadgetError,
  MalformedRecordError,
  OPERATION_KINDS,
  createOperationRecord,
  joinFragments,
  renderOperations,
  validateOperationDocument,
  type OperationDocument,
  type OperationRecord,
} from "@gadgetc/registry";

import { debug } from "./log.js";

export const HELP_TEXT = `gadgetc — render circuit gadget calls\n\n` +
  `Usage:\n` +
  `  gadgetc --help                        Show this message\n` +
  `  gadgetc render --input <path>         Render an operation document to stdout\n` +
  `         [--out <path>] [--strict] [--extern <name>]...\n` +
  `  gadgetc catalog                       Print the supported gadget kinds\n` +
  `\n` +
  `Environment:\n` +
  `  GADGETC_STRICT=1        check operand linkage by default\n` +
  `  GADGETC_EXTERNALS=a,b   extra external names for strict mode\n` +
  `  GADGETC_DEBUG=1         write debug events to stderr\n` +
  `\n` +
  `Exit codes:\n` +
  `  0 — rendered\n` +
  `  1 — invalid input (unknown kind, malformed record, bad document)\n` +
  `  2 — CLI misuse (missing flags, unknown command, unreadable file)`;

export interface RenderSuccess {
  status: "ok";
  text: string;
  fragments: number;
}

export interface RenderFailure {
  status: "error";
  error: {
    code: string;
    index: number;
    label: string;
    message: string;
  };
}

export type RenderResult = RenderSuccess | RenderFailure;

export interface RenderDocumentOptions {
  readonly strict?: boolean;
  readonly externals?: readonly string[];
}

function canonicalize(value: unknown): unknown {
  if (value === null) return null;
  if (Array.isArray(value)) {
    return value.map((item) => canonicalize(item));
  }
  if (typeof value === "object") {
    const entries = Object.entries(value)
      .map(([k, v]) => [k, canonicalize(v)] as const)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const result: Record<string, unknown> = {};
    for (const [k, v] of entries) {
      result[k] = v;
    }
    return result;
  }
  return value;
}

export function canonicalJson(value: unknown): string {
  return `${JSON.stringify(canonicalize(value), null, 2)}\n`;
}

export function catalogJson(): string {
  return canonicalJson({
    kinds: OPERATION_KINDS.map((kind) => GADGET_CATALOG[kind]),
  });
}

function failure(index: number, label: string, error: GadgetError): RenderFailure {
  return {
    status: "error",
    error: { code: error.code, index, label, message: error.message },
  };
}

export function formatFailure(result: RenderFailure): string {
  const { index, label, message } = result.error;
  return `operations[${index}] (${JSON.stringify(label)}): ${message}`;
}

export function renderDocument(
  doc: OperationDocument,
  options: RenderDocumentOptions = {}
): RenderResult {
  const records: OperationRecord[] = [];
  for (const [index, raw] of doc.operations.entries()) {
    try {
      records.push(createOperationRecord(raw));
    } catch (error) {
      if (error instanceof GadgetError) return failure(index, raw.label, error);
      throw error;
    }
  }
  const externals = [...(doc.externals ?? []), ...(options.externals ?? [])];
  try {
    const fragments = renderOperations(records, { strict: options.strict, externals });
    for (const fragment of fragments) {
      debug("render.fragment", { index: fragment.index, kind: fragment.kind, label: fragment.label });
    }
    return { status: "ok", text: joinFragments(fragments), fragments: fragments.length };
  } catch (error) {
    if (error instanceof MalformedRecordError && error.index !== undefined) {
      return failure(error.index, records[error.index].label, error);
    }
    throw error;
  }
}

export async function loadOperationDocument(filePath: string): Promise<OperationDocument> {
  const raw = await readFile(filePath, "utf-8");
  return validateOperationDocument(JSON.parse(raw));
}

export async function writeOutput(filePath: string, text: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, text, "utf-8");
}
