import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { parseFlagArgs, runCatalog, runRender } from "../src/cli.js";
import { resetCliEnvForTest } from "../src/config.js";

const here = path.dirname(fileURLToPath(import.meta.url));
const fixture = path.join(here, "../fixtures/scenario.json");

const EXPECTED_SOURCE = [
  "let p = ecc::EdwardsPoint::witness(",
  '    cs.namespace(|| "load pk"),',
  "    maybe_pk.map(jubjub::ExtendedPoint::from))?;",
  'p.assert_not_small_order(cs.namespace(|| "pk order"))?;',
  "let r_bits = boolean::field_into_boolean_vec_le(",
  '    cs.namespace(|| "r bits"), r)?;',
  "let rg = ecc::fixed_base_multiplication(",
  '    cs.namespace(|| "r*G"),',
  "    &G,",
  "    &r_bits,",
  ")?;",
  'let s = p.add(cs.namespace(|| "sum"), &rg)?;',
  's.inputize(cs.namespace(|| "expose s"))?;',
  "",
].join("\n");

interface Captured {
  stdout: () => string;
  stderr: () => string;
}

function capture(): Captured {
  const out = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  const err = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  return {
    stdout: () => out.mock.calls.map(([chunk]) => String(chunk)).join(""),
    stderr: () => err.mock.calls.map(([chunk]) => String(chunk)).join(""),
  };
}

let workdir: string;

function writeDoc(name: string, doc: unknown): string {
  const file = path.join(workdir, name);
  writeFileSync(file, typeof doc === "string" ? doc : JSON.stringify(doc), "utf-8");
  return file;
}

beforeEach(() => {
  workdir = mkdtempSync(path.join(tmpdir(), "gadgetc-cli-"));
  resetCliEnvForTest();
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  resetCliEnvForTest();
  rmSync(workdir, { recursive: true, force: true });
});

describe("gadgetc render", () => {
  it("renders the fixture to stdout", async () => {
    const io = capture();
    const code = await runRender(["--input", fixture]);
    expect(code).toBe(0);
    expect(io.stdout()).toBe(EXPECTED_SOURCE);
    expect(io.stderr()).toBe("");
  });

  it("writes to --out and creates parent directories", async () => {
    const io = capture();
    const out = path.join(workdir, "nested/gadgets.rs");
    const code = await runRender([`--input=${fixture}`, "--out", out, "--strict"]);
    expect(code).toBe(0);
    expect(readFileSync(out, "utf-8")).toBe(EXPECTED_SOURCE);
    expect(io.stdout()).toBe("");
  });

  it("reports an unresolvable kind with its position", async () => {
    const input = writeDoc("bad-kind.json", {
      operations: [
        { label: "load pk", kind: "Witness", output: "p", operands: ["maybe_pk"] },
        { label: "pk order", kind: "AssertSmallOrder", operands: ["p"] },
      ],
    });
    const io = capture();
    const code = await runRender(["--input", input]);
    expect(code).toBe(1);
    expect(io.stderr()).toBe(
      'operations[1] ("pk order"): unresolvable operation kind: "AssertSmallOrder"\n'
    );
    expect(io.stdout()).toBe("");
  });

  it("reports an arity mismatch", async () => {
    const input = writeDoc("bad-arity.json", {
      operations: [{ label: "sum", kind: "PointAdd", output: "s", operands: ["p"] }],
    });
    const io = capture();
    expect(await runRender(["--input", input])).toBe(1);
    expect(io.stderr()).toBe(
      'operations[0] ("sum"): PointAdd expects 2 operands (a, b), got 1\n'
    );
  });

  it("checks linkage in strict mode", async () => {
    const input = writeDoc("unlinked.json", {
      operations: [{ label: "sum", kind: "PointAdd", output: "s", operands: ["p", "q"] }],
    });
    const io = capture();
    expect(await runRender(["--input", input, "--strict", "--extern", "p"])).toBe(1);
    expect(io.stderr()).toBe(
      'operations[0] ("sum"): PointAdd operand "q" is not bound by an earlier output or declared external\n'
    );
  });

  it("accepts repeated --extern flags in strict mode", async () => {
    const input = writeDoc("linked.json", {
      operations: [{ label: "sum", kind: "PointAdd", output: "s", operands: ["p", "q"] }],
    });
    const io = capture();
    const code = await runRender(["--input", input, "--strict", "--extern", "p", "--extern=q"]);
    expect(code).toBe(0);
    expect(io.stdout()).toBe('let s = p.add(cs.namespace(|| "sum"), &q)?;\n');
  });

  it("enables strict mode from the environment", async () => {
    vi.stubEnv("GADGETC_STRICT", "1");
    vi.stubEnv("GADGETC_EXTERNALS", "p");
    const input = writeDoc("env.json", {
      operations: [{ label: "sum", kind: "PointAdd", output: "s", operands: ["p", "q"] }],
    });
    const io = capture();
    expect(await runRender(["--input", input])).toBe(1);
    expect(io.stderr()).toContain('operand "q" is not bound');
  });

  it("writes debug events when enabled", async () => {
    vi.stubEnv("GADGETC_DEBUG", "1");
    const io = capture();
    expect(await runRender(["--input", fixture])).toBe(0);
    const events = io
      .stderr()
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line) as { event: string });
    expect(events.map((entry) => entry.event)).toEqual([
      "render.start",
      "render.fragment",
      "render.fragment",
      "render.fragment",
      "render.fragment",
      "render.fragment",
      "render.fragment",
      "render.done",
    ]);
    expect(events[0]).toEqual({ event: "render.start", input: fixture, operations: 6, strict: false });
  });

  it("rejects documents that fail the schema", async () => {
    const input = writeDoc("shape.json", { operations: [{ label: "x", kind: "Witness" }] });
    const io = capture();
    expect(await runRender(["--input", input])).toBe(1);
    expect(io.stderr()).toBe(
      "operation document failed validation: /operations/0 must have required property 'operands'\n"
    );
  });

  it("treats invalid JSON as invalid input", async () => {
    const input = writeDoc("broken.json", "{ not json");
    capture();
    expect(await runRender(["--input", input])).toBe(1);
  });

  it("treats a missing file as misuse", async () => {
    capture();
    expect(await runRender(["--input", path.join(workdir, "absent.json")])).toBe(2);
  });

  it("requires --input", async () => {
    const io = capture();
    expect(await runRender([])).toBe(2);
    expect(io.stderr()).toBe("--input <path> is required\n");
  });

  it("rejects unknown flags", async () => {
    const io = capture();
    expect(await runRender(["--input", fixture, "--verbose"])).toBe(2);
    expect(io.stderr()).toBe("unknown flag: --verbose\n");
  });
});

describe("gadgetc catalog", () => {
  it("prints the catalog as canonical json", async () => {
    const io = capture();
    expect(await runCatalog([])).toBe(0);
    const parsed = JSON.parse(io.stdout()) as { kinds: Array<Record<string, unknown>> };
    expect(parsed.kinds).toHaveLength(6);
    expect(Object.keys(parsed.kinds[0])).toEqual([
      "description",
      "kind",
      "legacyName",
      "produces",
      "roles",
    ]);
    expect(parsed.kinds[3]).toMatchObject({ kind: "FixedBaseScalarMul", roles: ["scalar", "base"] });
  });

  it("rejects extra arguments", async () => {
    const io = capture();
    expect(await runCatalog(["--json"])).toBe(2);
    expect(io.stderr()).toBe("unknown argument: --json\n");
  });
});

describe("parseFlagArgs", () => {
  it("collects list flags and toggles", () => {
    const parsed = parseFlagArgs(["--extern", "a", "--strict", "--extern=b", "--input", "x.json"], {
      values: ["--input"],
      lists: ["--extern"],
      toggles: ["--strict"],
    });
    expect(parsed.values).toEqual({ "--input": "x.json" });
    expect(parsed.lists).toEqual({ "--extern": ["a", "b"] });
    expect([...parsed.toggles]).toEqual(["--strict"]);
  });

  it("keeps everything after the first = in inline values", () => {
    const parsed = parseFlagArgs(["--out=build/a=b.rs", "--extern=x=y"], {
      values: ["--out"],
      lists: ["--extern"],
    });
    expect(parsed.values).toEqual({ "--out": "build/a=b.rs" });
    expect(parsed.lists).toEqual({ "--extern": ["x=y"] });
  });

  it("requires values", () => {
    expect(() => parseFlagArgs(["--input"], { values: ["--input"] })).toThrow(
      "missing value for --input"
    );
    expect(() => parseFlagArgs(["--strict=yes"], { toggles: ["--strict"] })).toThrow(
      "flag --strict does not take a value"
    );
  });
});
