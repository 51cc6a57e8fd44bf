#!/usr/bin/env node
import { exit } from "node:process";

import { DocumentError } from "@gadgetc/registry";

import { cliEnv } from "./config.js";
import {
  HELP_TEXT,
  catalogJson,
  formatFailure,
  loadOperationDocument,
  renderDocument,
  writeOutput,
} from "./index.js";
import { debug } from "./log.js";

type ParsedFlags = {
  values: Partial<Record<string, string>>;
  lists: Partial<Record<string, string[]>>;
  toggles: Set<string>;
};

interface FlagSet {
  readonly values?: readonly string[];
  readonly lists?: readonly string[];
  readonly toggles?: readonly string[];
}

function parseFlagArgs(args: readonly string[], known: FlagSet): ParsedFlags {
  const valueSet = new Set(known.values ?? []);
  const listSet = new Set(known.lists ?? []);
  const toggleSet = new Set(known.toggles ?? []);
  const values: Partial<Record<string, string>> = {};
  const lists: Partial<Record<string, string[]>> = {};
  const toggles = new Set<string>();
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (!token.startsWith("-")) {
      throw new Error(`unknown flag: ${token}`);
    }
    if (toggleSet.has(token)) {
      toggles.add(token);
      index += 1;
      continue;
    }
    if (!token.startsWith("--")) {
      throw new Error(`unknown flag: ${token}`);
    }
    const eq = token.indexOf("=");
    const flag = eq < 0 ? token : token.slice(0, eq);
    const inline = eq < 0 ? undefined : token.slice(eq + 1);
    if (toggleSet.has(flag)) {
      if (inline !== undefined) {
        throw new Error(`flag ${flag} does not take a value`);
      }
      toggles.add(flag);
      index += 1;
      continue;
    }
    if (!valueSet.has(flag) && !listSet.has(flag)) {
      throw new Error(`unknown flag: ${flag}`);
    }
    let value: string;
    if (inline !== undefined) {
      value = inline;
      index += 1;
    } else {
      const next = args[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`missing value for ${flag}`);
      }
      value = next;
      index += 2;
    }
    if (listSet.has(flag)) {
      lists[flag] = [...(lists[flag] ?? []), value];
    } else {
      values[flag] = value;
    }
  }
  return { values, lists, toggles };
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isInvalidInput(error: unknown): boolean {
  return error instanceof DocumentError || error instanceof SyntaxError;
}

export async function runRender(args: string[]): Promise<number> {
  let parsed: ParsedFlags;
  try {
    parsed = parseFlagArgs(args, {
      values: ["--input", "--out"],
      lists: ["--extern"],
      toggles: ["--strict", "--help", "-h"],
    });
  } catch (error) {
    process.stderr.write(`${messageOf(error)}\n`);
    return 2;
  }
  if (parsed.toggles.has("--help") || parsed.toggles.has("-h")) {
    process.stdout.write(
      "Usage: gadgetc render --input <path> [--out <path>] [--strict] [--extern <name>]...\n"
    );
    return 0;
  }
  const input = parsed.values["--input"];
  if (!input) {
    process.stderr.write("--input <path> is required\n");
    return 2;
  }
  const env = cliEnv();
  const strict = parsed.toggles.has("--strict") || env.strict;
  const externals = [...env.externals, ...(parsed.lists["--extern"] ?? [])];
  try {
    const doc = await loadOperationDocument(input);
    debug("render.start", { input, operations: doc.operations.length, strict });
    const result = renderDocument(doc, { strict, externals });
    if (result.status === "error") {
      process.stderr.write(`${formatFailure(result)}\n`);
      return 1;
    }
    const out = parsed.values["--out"];
    if (out) {
      await writeOutput(out, result.text);
    } else {
      process.stdout.write(result.text);
    }
    debug("render.done", { fragments: result.fragments, out: out ?? "-" });
    return 0;
  } catch (error) {
    process.stderr.write(`${messageOf(error)}\n`);
    return isInvalidInput(error) ? 1 : 2;
  }
}

export async function runCatalog(args: string[]): Promise<number> {
  if (args.includes("--help") || args.includes("-h")) {
    process.stdout.write("Usage: gadgetc catalog\n");
    return 0;
  }
  if (args.length > 0) {
    process.stderr.write(`unknown argument: ${args[0]}\n`);
    return 2;
  }
  process.stdout.write(catalogJson());
  return 0;
}

function printHelp(): void {
  process.stdout.write(`${HELP_TEXT}\n`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    printHelp();
    exit(0);
  }
  const command = args[0];
  const rest = args.slice(1);
  switch (command) {
    case "render": {
      exit(await runRender(rest));
      return;
    }
    case "catalog": {
      exit(await runCatalog(rest));
      return;
    }
    default: {
      process.stderr.write(`unknown command: ${command}\n`);
      printHelp();
      exit(2);
    }
  }
}

if (!process.env.VITEST) {
  main().catch((error) => {
    process.stderr.write(`${messageOf(error)}\n`);
    exit(2);
  });
}

export { parseFlagArgs };
