import { MalformedRecordError } from "./errors.js";
import type { OperationKind } from "./catalog.js";
import type { OperationRecord } from "./record.js";
import { renderRecord } from "./registry.js";

export interface RenderOptions {
  /** Require every operand to be an external or the output of an earlier record. */
  readonly strict?: boolean;
  readonly externals?: Iterable<string>;
}

export interface RenderedFragment {
  readonly index: number;
  readonly kind: OperationKind;
  readonly label: string;
  readonly text: string;
}

export class SymbolTable {
  private readonly bound = new Map<string, number | "external">();

  constructor(externals: Iterable<string> = []) {
    for (const name of externals) {
      this.bound.set(name, "external");
    }
  }

  has(name: string): boolean {
    return this.bound.has(name);
  }

  /** Index of the record that declared `name`, or "external". */
  origin(name: string): number | "external" | undefined {
    return this.bound.get(name);
  }

  declare(name: string, index: number): void {
    this.bound.set(name, index);
  }
}

function checkLinkage(symbols: SymbolTable, record: OperationRecord, index: number): void {
  for (const name of record.operands) {
    if (!symbols.has(name)) {
      throw new MalformedRecordError(
        `${record.kind} operand ${JSON.stringify(name)} is not bound by an earlier output or declared external`,
        { reason: "unbound-operand", kind: record.kind, index }
      );
    }
  }
}

export function renderOperations(
  records: readonly OperationRecord[],
  options: RenderOptions = {}
): RenderedFragment[] {
  const symbols = options.strict ? new SymbolTable(options.externals) : undefined;
  return records.map((record, index) => {
    if (symbols) {
      checkLinkage(symbols, record, index);
    }
    let text: string;
    try {
      text = renderRecord(record);
    } catch (error) {
      if (error instanceof MalformedRecordError && error.index === undefined) {
        throw error.withIndex(index);
      }
      throw error;
    }
    if (symbols && record.output !== undefined) {
      symbols.declare(record.output, index);
    }
    return { index, kind: record.kind, label: record.label, text };
  });
}

export function joinFragments(fragments: readonly RenderedFragment[]): string {
  if (fragments.length === 0) return "";
  return `${fragments.map((fragment) => fragment.text).join("\n")}\n`;
}
