import { InvalidArgumentError } from "commander";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { count } from "../src/commands/count.js";
import { expand } from "../src/commands/expand.js";
import {
  parseNonNegativeInt,
  parsePositiveInt,
  resolveSource,
  resolveThreads,
} from "../src/commands/options.js";
import { CombinationSpaceTooLargeError, InvalidConfigurationError } from "../src/errors.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "textcombo-cli-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

describe("parsePositiveInt", () => {
  it("parses plain and underscored integers", () => {
    expect(parsePositiveInt("42")).toBe(42);
    expect(parsePositiveInt("10_000")).toBe(10000);
  });

  it.each(["0", "-1", "abc", "1.5", "", "1e3"])("rejects %j", (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
  });
});

describe("parseNonNegativeInt", () => {
  it("accepts zero and positive integers", () => {
    expect(parseNonNegativeInt("0")).toBe(0);
    expect(parseNonNegativeInt("3")).toBe(3);
  });

  it.each(["-1", "abc", ""])("rejects %j", (value) => {
    expect(() => parseNonNegativeInt(value)).toThrow(InvalidArgumentError);
  });
});

describe("resolveThreads", () => {
  it("uses one thread per batch in flight when the worker is built", () => {
    expect(resolveThreads(undefined, 4, true)).toBe(4);
  });

  it("renders on the main thread when running from source", () => {
    expect(resolveThreads(undefined, 4, false)).toBe(0);
    expect(resolveThreads(0, 4, false)).toBe(0);
  });

  it("keeps an explicit thread count", () => {
    expect(resolveThreads(2, 4, true)).toBe(2);
    expect(resolveThreads(0, 4, true)).toBe(0);
  });

  it("refuses threads without the compiled worker", () => {
    expect(() => resolveThreads(2, 4, false)).toThrow(InvalidConfigurationError);
  });
});

describe("resolveSource", () => {
  it("uses the positional template as inline text", () => {
    expect(resolveSource("[a|b]", {})).toEqual({ kind: "text", text: "[a|b]" });
  });

  it("reads files line by line unless --whole-file is set", () => {
    expect(resolveSource(undefined, { input: "in.txt" })).toEqual({
      kind: "file",
      path: "in.txt",
      perLine: true,
    });
    expect(resolveSource(undefined, { input: "in.txt", wholeFile: true })).toEqual({
      kind: "file",
      path: "in.txt",
      perLine: false,
    });
  });

  it("requires exactly one source", () => {
    expect(() => resolveSource(undefined, {})).toThrow(InvalidConfigurationError);
    expect(() => resolveSource("[a|b]", { input: "in.txt" })).toThrow(
      InvalidConfigurationError
    );
  });

  it("rejects --whole-file without --input", () => {
    expect(() => resolveSource("[a|b]", { wholeFile: true })).toThrow(
      "--whole-file only applies to --input"
    );
  });
});

describe("expand command", () => {
  it("writes the combinations and reports a summary", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const output = join(dir, "out.txt");

    await expand("[x|y]", { output, separator: "\\t" });

    expect(await readFile(output, "utf8")).toBe("x\ty");
    expect(log).toHaveBeenNthCalledWith(1, "✅ 2 combinations from 1 template(s) in 1 batch(es)");
    expect(log).toHaveBeenNthCalledWith(2, `   Wrote ${output}`);
  });

  it("appends with the separator boundary", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const output = join(dir, "out.txt");
    await writeFile(output, "PRE");

    await expand("[x|y]", { output, append: true, separator: "-", batchSize: 1 });

    expect(await readFile(output, "utf8")).toBe("PRE-x-y");
  });

  it("prints per-batch progress on stderr when verbose", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});

    await expand("[a|b|c]", { output: join(dir, "out.txt"), batchSize: 2, verbose: true });

    expect(errors.mock.calls).toEqual([
      ["📦 Template 1: batch 1/2 (2/3)"],
      ["📦 Template 1: batch 2/2 (3/3)"],
    ]);
  });

  it("refuses to append to stdout", async () => {
    await expect(expand("[a|b]", { output: "-", append: true })).rejects.toBeInstanceOf(
      InvalidConfigurationError
    );
  });
});

describe("count command", () => {
  it("prints the combinations of a template", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    await count("[a|b] [c|d|e]", {});

    expect(log.mock.calls).toEqual([["🎲 6  [a|b] [c|d|e]"]]);
  });

  it("prints a total for several templates", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const input = join(dir, "templates.txt");
    await writeFile(input, "[a|b]\n[c|d|e]\n");

    await count(undefined, { input });

    expect(log.mock.calls).toEqual([
      ["🎲 2  [a|b]"],
      ["🎲 3  [c|d|e]"],
      [],
      ["🧮 Total: 5 combinations across 2 templates"],
    ]);
  });

  it("fails above the maximum", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});

    await expect(count("[a|b][c|d]", { maxCombinations: 3 })).rejects.toBeInstanceOf(
      CombinationSpaceTooLargeError
    );
  });
});
