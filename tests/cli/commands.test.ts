import { describe, it, expect, beforeAll, afterEach, vi } from "vitest";
import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  EXIT_DIAGNOSTICS,
  EXIT_INTERNAL,
  EXIT_OK,
  parseUnique,
  resolveDefaultFile,
  runKeywords,
  runTokens,
} from "../../src/commands.js";
import { Unique } from "../../src/lexer/unique.js";

describe("parseUnique", () => {
  it("accepts a non-negative integer", () => {
    expect(parseUnique("12").toNumber()).toBe(12);
    expect(parseUnique("0").toNumber()).toBe(0);
  });

  it("rejects anything else", () => {
    expect(() => parseUnique("-1")).toThrow(InvalidArgumentError);
    expect(() => parseUnique("1.5")).toThrow(InvalidArgumentError);
    expect(() => parseUnique("abc")).toThrow(InvalidArgumentError);
    expect(() => parseUnique("9007199254740993")).toThrow(InvalidArgumentError);
  });
});

describe("commands", () => {
  let dir: string | undefined;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  async function sourceFile(name: string, text: string): Promise<string> {
    const created = await mkdtemp(path.join(os.tmpdir(), "plclex-cli-"));
    dir = created;
    const file = path.join(created, name);
    await writeFile(file, text);
    return file;
  }

  function captureOutput() {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    return {
      out: () => log.mock.calls.map((c) => String(c[0])),
      err: () => err.mock.calls.map((c) => String(c[0])),
    };
  }

  it("exits with 1 and prints diagnostics when the source does not lex", async () => {
    const file = await sourceFile("bad.plc", "(lam x #)");
    const output = captureOutput();

    expect(await runTokens(file, {})).toBe(EXIT_DIAGNOSTICS);
    expect(output.out()).toEqual([]);
    expect(output.err()).toHaveLength(1);
    expect(output.err()[0].startsWith("error: Unexpected character: '#'\n")).toBe(true);
  });

  it("prints tokens as JSON from a given start handle", async () => {
    const file = await sourceFile("ok.plc", "x y x");
    const output = captureOutput();

    expect(await runTokens(file, { json: true, startUnique: Unique.of(5) })).toBe(EXIT_OK);
    const printed: { tokens: Array<{ kind: string; unique?: number }>; next: number } = JSON.parse(output.out()[0]);
    expect(printed.tokens.map((t) => t.unique)).toEqual([5, 6, 5, undefined]);
    expect(printed.next).toBe(7);
  });

  it("prints one line per token and the identifier table", async () => {
    const file = await sourceFile("ok.plc", "x y");
    const output = captureOutput();

    expect(await runTokens(file, { showIdentifiers: true })).toBe(EXIT_OK);
    expect(output.out()).toEqual([
      'Name\t"x"\t1:1',
      'Name\t"y"\t1:3',
      'EOF\t""\t1:4',
      "0\tx",
      "1\ty",
      "next\t2",
    ]);
  });

  it("exits with 2 when handles run out", async () => {
    const file = await sourceFile("ok.plc", "x");
    const output = captureOutput();

    expect(await runTokens(file, { startUnique: Unique.of(Number.MAX_SAFE_INTEGER) })).toBe(EXIT_INTERNAL);
    expect(output.err()).toEqual([
      "internal error: identifier handles exhausted: cannot allocate past 9007199254740991\n",
    ]);
  });

  it("exits with 1 when the file cannot be read", async () => {
    const created = await mkdtemp(path.join(os.tmpdir(), "plclex-cli-"));
    dir = created;
    const output = captureOutput();

    expect(await runTokens(path.join(created, "missing.plc"), {})).toBe(EXIT_DIAGNOSTICS);
    expect(output.err()[0].startsWith("Error: ")).toBe(true);
  });

  it("finds the only source file in a directory", async () => {
    const file = await sourceFile("main.uplc", "x");
    await writeFile(path.join(path.dirname(file), "notes.txt"), "");
    expect(await resolveDefaultFile(undefined, path.dirname(file))).toBe(file);
  });

  it("lists keywords in order", () => {
    const output = captureOutput();
    expect(runKeywords()).toBe(EXIT_OK);
    expect(output.out()).toHaveLength(14);
    expect(output.out()[0]).toBe("lam");
    expect(output.out()[13]).toBe("delay");
  });
});
