import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "yaml";
import { z } from "zod";

import { DEFAULT_MAX_DEPTH } from "./canonical";
import { ConfigError } from "./errors";
import { zodIssues } from "./schema/issues";
import type { CanonicalizeOptions } from "./types";

const ConfigSchema = z.object({
  maxDepth: z.number().int().nonnegative(),
  mode: z.enum(["strict", "lenient"]),
  safeIntegers: z.boolean(),
  normalize: z.enum(["none", "NFC", "NFD", "NFKC", "NFKD"]),
  hashAlgo: z.enum(["sha256", "blake3"]),
  logLevel: z.enum(["error", "warn", "info", "verbose", "debug", "silly"]),
});

/** Fully resolved tooling configuration */
export type CanonicalDigestConfig = z.infer<typeof ConfigSchema>;

/** What callers, files and the environment may override */
export type CanonicalDigestInit = Partial<CanonicalDigestConfig>;

const PartialConfigSchema = ConfigSchema.partial().strict();

export const DEFAULT_CONFIG: Readonly<CanonicalDigestConfig> = {
  maxDepth: DEFAULT_MAX_DEPTH,
  mode: "strict",
  safeIntegers: false,
  normalize: "none",
  hashAlgo: "sha256",
  logLevel: "info",
};

function validatePartial(raw: unknown, source: string): CanonicalDigestInit {
  const parsed = PartialConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration in ${source}`, zodIssues(parsed.error));
  }
  return parsed.data;
}

async function readYaml(filePath: string): Promise<CanonicalDigestInit> {
  const abs = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(abs)) return {};

  const raw = await fs.promises.readFile(abs, "utf8");
  let doc: unknown;
  try {
    doc = yaml.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `Cannot parse ${abs}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return validatePartial(doc, abs);
}

function envBool(value: string): boolean | string {
  const v = value.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "no") return false;
  return value; // left for the schema to reject
}

const ENV_KEYS: ReadonlyArray<
  readonly [string, keyof CanonicalDigestConfig, (v: string) => unknown]
> = [
  ["CANONICAL_DIGEST_MAX_DEPTH", "maxDepth", Number],
  ["CANONICAL_DIGEST_MODE", "mode", String],
  ["CANONICAL_DIGEST_SAFE_INTEGERS", "safeIntegers", envBool],
  ["CANONICAL_DIGEST_NORMALIZE", "normalize", String],
  ["CANONICAL_DIGEST_HASH_ALGO", "hashAlgo", String],
  ["CANONICAL_DIGEST_LOG_LEVEL", "logLevel", String],
];

function readEnv(env: NodeJS.ProcessEnv): CanonicalDigestInit {
  const raw: Record<string, unknown> = {};
  for (const [name, key, convert] of ENV_KEYS) {
    const value = env[name];
    if (value) raw[key] = convert(value);
  }
  return validatePartial(raw, "environment");
}

/** Drop `undefined` members so they cannot shadow lower layers */
function definedOnly(cfg: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(cfg)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

class ConfigManagerClass {
  private _cfg?: Readonly<CanonicalDigestConfig>;
  private _loadPromise?: Promise<void>;

  /**
   * Merge defaults ← YAML file named by CANONICAL_DIGEST_RC ← environment
   * ← `userCfg`. Only the first call does any work.
   */
  async load(
    userCfg: CanonicalDigestInit = {},
    env: NodeJS.ProcessEnv = process.env
  ): Promise<void> {
    if (this._cfg) return;

    // Prevent multiple concurrent loads
    if (this._loadPromise) {
      await this._loadPromise;
      return;
    }

    this._loadPromise = this._doLoad(userCfg, env);
    try {
      await this._loadPromise;
    } finally {
      this._loadPromise = undefined;
    }
  }

  private async _doLoad(
    userCfg: CanonicalDigestInit,
    env: NodeJS.ProcessEnv
  ): Promise<void> {
    const rcPath = env["CANONICAL_DIGEST_RC"];
    const fileCfg = rcPath ? await readYaml(rcPath) : {};
    const envCfg = readEnv(env);
    const argCfg = validatePartial(definedOnly(userCfg), "options");

    const merged = ConfigSchema.safeParse({
      ...DEFAULT_CONFIG,
      ...fileCfg,
      ...envCfg,
      ...argCfg,
    });
    if (!merged.success) {
      throw new ConfigError("Invalid configuration", zodIssues(merged.error));
    }

    this._cfg = Object.freeze(merged.data);
  }

  get isLoaded(): boolean {
    return this._cfg !== undefined;
  }

  get cfg(): Readonly<CanonicalDigestConfig> {
    if (!this._cfg) {
      throw new ConfigError("ConfigManager.load() must be called first");
    }
    return this._cfg;
  }

  /** Forget the loaded configuration (tests, long-lived tools) */
  reset(): void {
    this._cfg = undefined;
    this._loadPromise = undefined;
  }
}

export const ConfigManager = new ConfigManagerClass();

export async function loadConfig(
  cfg?: CanonicalDigestInit
): Promise<Readonly<CanonicalDigestConfig>> {
  await ConfigManager.load(cfg);
  return ConfigManager.cfg;
}

export function toCanonicalizeOptions(
  cfg: Readonly<CanonicalDigestConfig>
): CanonicalizeOptions {
  return {
    maxDepth: cfg.maxDepth,
    mode: cfg.mode,
    safeIntegers: cfg.safeIntegers,
  };
}
