import * as fs from "node:fs";
import { Command, CommanderError, InvalidArgumentError } from "commander";

import { canonicalize } from "./canonical";
import {
  ConfigManager,
  toCanonicalizeOptions,
  type CanonicalDigestConfig,
  type CanonicalDigestInit,
} from "./config";
import { hash, verify } from "./digest";
import { reproduceEntries } from "./entry";
import { errorMessage, isInvalidInput } from "./errors";
import { normalizeStrings } from "./normalize";
import { JSONValueSchema } from "./schema/json";
import { log, resetLogger, LOG_LEVELS, type LogLevel } from "./utils/logger";
import { runVectors } from "./vectors";

/** Exit codes: success, mismatch / failed check, unusable input */
export const EXIT_OK = 0;
export const EXIT_MISMATCH = 1;
export const EXIT_INVALID = 2;

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  readStdin(): string;
}

const processIO: CliIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
  readStdin: () => fs.readFileSync(0, "utf8"),
};

type GlobalFlags = {
  maxDepth?: number;
  lenient?: boolean;
  safeIntegers?: boolean;
  nfc?: boolean;
  algo?: "sha256" | "blake3";
  logLevel?: LogLevel;
};

function parseDepth(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("expected a non-negative integer");
  }
  return n;
}

function parseAlgo(value: string): "sha256" | "blake3" {
  if (value === "sha256" || value === "blake3") return value;
  throw new InvalidArgumentError("expected sha256 or blake3");
}

function parseLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value);
  if (!level) throw new InvalidArgumentError(`expected one of ${LOG_LEVELS.join(", ")}`);
  return level;
}

function flagsToInit(flags: GlobalFlags): CanonicalDigestInit {
  return {
    maxDepth: flags.maxDepth,
    mode: flags.lenient ? "lenient" : undefined,
    safeIntegers: flags.safeIntegers ? true : undefined,
    normalize: flags.nfc ? "NFC" : undefined,
    hashAlgo: flags.algo,
    logLevel: flags.logLevel,
  };
}

/** Raised for input the CLI cannot even hand to the canonicalizer */
class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

function readJson(file: string, io: CliIO): unknown {
  let text: string;
  try {
    text = file === "-" ? io.readStdin() : fs.readFileSync(file, "utf8");
  } catch (err) {
    throw new InputError(`cannot read ${file}: ${errorMessage(err)}`);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new InputError(`${file} is not valid JSON: ${errorMessage(err)}`);
  }
}

function prepare(raw: unknown, cfg: Readonly<CanonicalDigestConfig>): unknown {
  if (cfg.normalize === "none") return raw;
  // shape check only; zod's output would lose own "__proto__" keys
  if (!JSONValueSchema.safeParse(raw).success) {
    throw new InputError("input is not a JSON value");
  }
  return normalizeStrings(raw, cfg.normalize, cfg.maxDepth);
}

/**
 * Build the `canonical-digest` program. Each command records its exit code
 * through `setExit`; commander's own exits are thrown, not taken.
 */
export function buildProgram(
  io: CliIO = processIO,
  setExit: (code: number) => void = (code) => {
    process.exitCode = code;
  }
): Command {
  const program = new Command();
  program
    .name("canonical-digest")
    .description("Canonical JSON serialization and SHA-256 digests")
    .option("--max-depth <n>", "maximum nesting depth", parseDepth)
    .option("--lenient", "accept Date values and drop undefined members")
    .option("--safe-integers", "reject integers beyond 2^53-1")
    .option("--nfc", "NFC-normalise strings and keys before canonicalizing")
    .option("--algo <algo>", "digest algorithm for hash/verify (sha256|blake3)", parseAlgo)
    .option("--log-level <level>", "log level", parseLevel)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  program.hook("preAction", async () => {
    ConfigManager.reset();
    await ConfigManager.load(flagsToInit(program.opts<GlobalFlags>()));
    resetLogger();
  });

  const guard =
    (fn: (...args: string[]) => number) =>
    (...args: string[]): void => {
      try {
        setExit(fn(...args));
      } catch (err) {
        if (isInvalidInput(err)) {
          io.err(`InvalidInput: ${err.message}`);
          setExit(EXIT_INVALID);
          return;
        }
        io.err(errorMessage(err));
        log.debug(err instanceof Error && err.stack ? err.stack : errorMessage(err));
        setExit(EXIT_INVALID);
      }
    };

  program
    .command("canonicalize")
    .description("print the canonical form of a JSON file ('-' for stdin)")
    .argument("<file>")
    .action(
      guard((file) => {
        const cfg = ConfigManager.cfg;
        io.out(canonicalize(prepare(readJson(file, io), cfg), toCanonicalizeOptions(cfg)));
        return EXIT_OK;
      })
    );

  program
    .command("hash")
    .description("print the digest of a JSON file's canonical form")
    .argument("<file>")
    .action(
      guard((file) => {
        const cfg = ConfigManager.cfg;
        const value = prepare(readJson(file, io), cfg);
        io.out(hash(value, { ...toCanonicalizeOptions(cfg), algorithm: cfg.hashAlgo }));
        return EXIT_OK;
      })
    );

  program
    .command("verify")
    .description("check a JSON file against an expected digest")
    .argument("<file>")
    .argument("<digest>")
    .action(
      guard((file, expected) => {
        const cfg = ConfigManager.cfg;
        const value = prepare(readJson(file, io), cfg);
        const ok = verify(value, expected, {
          ...toCanonicalizeOptions(cfg),
          algorithm: cfg.hashAlgo,
        });
        io.out(ok ? "ok" : "mismatch");
        return ok ? EXIT_OK : EXIT_MISMATCH;
      })
    );

  program
    .command("vectors")
    .description("run a test-vector file")
    .argument("<file>")
    .action(
      guard((file) => {
        const results = runVectors(file, toCanonicalizeOptions(ConfigManager.cfg));
        for (const r of results) {
          io.out(`${r.ok ? "✓" : "✗"} ${r.name}`);
        }
        const failed = results.filter((r) => !r.ok).length;
        io.out(`${results.length - failed}/${results.length} passed`);
        return failed ? EXIT_MISMATCH : EXIT_OK;
      })
    );

  program
    .command("reproduce")
    .description("recompute the semantic hash of archive entries (JSON array)")
    .argument("<file>")
    .action(
      guard((file) => {
        const raw = readJson(file, io);
        if (!Array.isArray(raw)) throw new InputError(`${file} must hold an array of entries`);

        const { results, summary } = reproduceEntries(
          raw,
          toCanonicalizeOptions(ConfigManager.cfg)
        );
        for (const r of results) {
          if (!r.valid) io.out(`✗ ${r.entryId ?? "<unknown>"}: ${r.error ?? "invalid"}`);
        }
        io.out(`${summary.valid}/${summary.total} entries valid`);
        return summary.invalid ? EXIT_MISMATCH : EXIT_OK;
      })
    );

  return program;
}

/**
 * Parse `argv` (including the node and script entries) and resolve to the
 * exit code the commands recorded.
 */
export async function run(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  let code = EXIT_OK;
  const program = buildProgram(io, (c) => {
    code = c;
  });
  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    // commander's own exits (--help, usage errors) arrive here
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_OK : EXIT_INVALID;
    }
    throw err;
  }
  return code;
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  process.exitCode = await run(argv);
}
