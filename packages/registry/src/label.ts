import type { OperationKind } from "./catalog.js";
import { MalformedRecordError } from "./errors.js";

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  "\0": "\\0",
};

// rustc rejects literals holding embedding, override and isolate controls.
function isBidiControl(code: number): boolean {
  return (code >= 0x202a && code <= 0x202e) || (code >= 0x2066 && code <= 0x2069);
}

function escapeChar(ch: string): string {
  const simple = SIMPLE_ESCAPES[ch];
  if (simple !== undefined) return simple;
  const code = ch.codePointAt(0) ?? 0;
  if (code < 0x20 || code === 0x7f || isBidiControl(code)) {
    return `\\u{${code.toString(16)}}`;
  }
  return ch;
}

/**
 * Writes `label` as a Rust string literal. Labels are opaque data: quotes,
 * backslashes, control and text-direction characters are escaped, everything
 * else is kept.
 */
export function quoteLabel(label: unknown, kind?: OperationKind): string {
  if (typeof label !== "string") {
    throw new MalformedRecordError(`${kind ?? "record"} label must be a string`, {
      reason: "label",
      kind,
    });
  }
  if (LONE_SURROGATE.test(label)) {
    throw new MalformedRecordError(
      `${kind ?? "record"} label contains an unpaired surrogate and cannot be written as source text`,
      { reason: "label", kind }
    );
  }
  let literal = '"';
  for (const ch of label) {
    literal += escapeChar(ch);
  }
  return `${literal}"`;
}

export function namespace(label: unknown, kind?: OperationKind): string {
  return `cs.namespace(|| ${quoteLabel(label, kind)})`;
}
