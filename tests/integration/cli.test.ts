import * as path from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { run, type CliIO } from "../../src/cli";
import { ConfigManager } from "../../src/config";
import { resetLogger } from "../../src/utils/logger";

const fixture = (name: string): string => path.join(__dirname, "..", "fixtures", name);
const SHIPPED = path.join(__dirname, "..", "..", "vectors", "canonical.json");

interface Captured {
  code: number;
  out: string[];
  err: string[];
}

async function cli(args: string[], stdin = ""): Promise<Captured> {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    out: (line) => out.push(line),
    err: (line) => err.push(line),
    readStdin: () => stdin,
  };
  const code = await run(["node", "canonical-digest", "--log-level", "error", ...args], io);
  return { code, out, err };
}

describe("canonical-digest CLI", () => {
  afterEach(() => {
    ConfigManager.reset();
    resetLogger();
  });

  it("should print the canonical form of a file", async () => {
    const result = await cli(["canonicalize", fixture("scenario.json")]);
    expect(result).toEqual({
      code: 0,
      out: [
        '{"confidence":0.95,"cost":100.5,"is_valid":false,"result":null,"timestamp":1678886400}',
      ],
      err: [],
    });
  });

  it("should hash stdin", async () => {
    const result = await cli(["hash", "-"], '{"b": 2, "a": 1}');
    expect(result.out).toEqual([
      "43258cff783fe7036d8a43033f830adfc60ec037382473548ac742b888292777",
    ]);
    expect(result.code).toBe(0);
  });

  it("should switch to BLAKE3 with --algo", async () => {
    const result = await cli(["--algo", "blake3", "hash", "-"], '{"a":1,"b":2}');
    expect(result.code).toBe(0);
    expect(result.out[0]).toMatch(/^[a-f0-9]{64}$/);
    expect(result.out[0]).not.toBe(
      "43258cff783fe7036d8a43033f830adfc60ec037382473548ac742b888292777"
    );
  });

  it("should exit 0 or 1 from verify", async () => {
    const digest = "f1cd85ab375b8acdc439801c3b866b1cc6444a992fd0b9e47b5493b1d8da10d1";
    expect(await cli(["verify", fixture("scenario.json"), digest])).toEqual({
      code: 0,
      out: ["ok"],
      err: [],
    });
    expect(await cli(["verify", fixture("scenario.json"), "0".repeat(64)])).toEqual({
      code: 1,
      out: ["mismatch"],
      err: [],
    });
  });

  it("should exit 2 on InvalidInput", async () => {
    const result = await cli(["--max-depth", "1", "canonicalize", "-"], "[[1]]");
    expect(result).toEqual({
      code: 2,
      out: [],
      err: ["InvalidInput: Nesting depth exceeds 1 at $[0]"],
    });
  });

  it("should exit 2 on text that is not JSON", async () => {
    const result = await cli(["canonicalize", "-"], "{");
    expect(result.code).toBe(2);
    expect(result.err[0]).toMatch(/^- is not valid JSON: /);
  });

  it("should exit 2 on a missing file", async () => {
    const result = await cli(["hash", fixture("absent.json")]);
    expect(result.code).toBe(2);
    expect(result.err[0]).toMatch(/^cannot read .*absent\.json: /);
  });

  it("should NFC-normalise with --nfc", async () => {
    const input = '{"name":"cafe\\u0301"}';
    expect((await cli(["canonicalize", "-"], input)).out).toEqual([
      '{"name":"cafe\\u0301"}',
    ]);
    expect((await cli(["--nfc", "canonicalize", "-"], input)).out).toEqual([
      '{"name":"caf\\u00e9"}',
    ]);
  });

  it("should keep an own __proto__ key with and without --nfc", async () => {
    const input = '{"__proto__":1,"a":2}';
    expect((await cli(["canonicalize", "-"], input)).out).toEqual(['{"__proto__":1,"a":2}']);
    expect((await cli(["--nfc", "canonicalize", "-"], input)).out).toEqual([
      '{"__proto__":1,"a":2}',
    ]);
  });

  it("should accept --max-depth 0 for scalar documents", async () => {
    expect((await cli(["--max-depth", "0", "canonicalize", "-"], '"x"')).out).toEqual(['"x"']);
    expect((await cli(["--max-depth", "0", "canonicalize", "-"], "[]")).code).toBe(2);
  });

  it("should run the shipped vectors", async () => {
    const result = await cli(["vectors", SHIPPED]);
    expect(result.code).toBe(0);
    expect(result.out).toHaveLength(36);
    expect(result.out[0]).toBe("✓ keys-sorted-arrays-kept");
    expect(result.out[35]).toBe("35/35 passed");
  });

  it("should report archive entries that do not reproduce", async () => {
    const result = await cli(["reproduce", fixture("entries.json")]);
    expect(result).toEqual({
      code: 1,
      out: ["✗ e2: Hash mismatch", "1/2 entries valid"],
      err: [],
    });
  });

  it("should require an array for reproduce", async () => {
    const result = await cli(["reproduce", "-"], "{}");
    expect(result).toEqual({
      code: 2,
      out: [],
      err: ["- must hold an array of entries"],
    });
  });

  it("should exit 2 on usage errors", async () => {
    const result = await cli(["frobnicate"]);
    expect(result.code).toBe(2);
    expect(result.err[0]).toMatch(/unknown command 'frobnicate'/);
    expect((await cli(["--max-depth", "zero", "hash", "-"], "1")).code).toBe(2);
    expect((await cli(["--max-depth", "-1", "hash", "-"], "1")).code).toBe(2);
  });
});
