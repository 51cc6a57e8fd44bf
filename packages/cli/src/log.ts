import { cliEnv } from "./config.js";

export type DebugFields = Readonly<Record<string, unknown>>;

/** Writes one JSON line to stderr when GADGETC_DEBUG is set. */
export function debug(event: string, fields: DebugFields = {}): void {
  if (!cliEnv().debug) return;
  process.stderr.write(`${JSON.stringify({ event, ...fields })}\n`);
}
