import path from "node:path";
import { z } from "zod";

import { ConfigError } from "./errors";
import { normalizePrefix } from "./remote-keys";

export const DEFAULT_MAX_WORKERS = 4;
export const MANIFEST_DIR = ".mirror-sync";

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((v) => v === "true" || v === "1" || v === "yes");

const envSchema = z.object({
  MIRROR_BUCKET: z.string().trim().min(1, "bucket name must not be empty"),
  MIRROR_PREFIX: z.string().default(""),
  MIRROR_ROOT: z.string().trim().min(1).default("database"),
  MIRROR_MANIFEST: z.string().trim().min(1).optional(),
  MIRROR_WORKERS: z.coerce.number().int().min(1).max(64).default(DEFAULT_MAX_WORKERS),
  MIRROR_INCREMENTAL: flag.default("true"),
  MIRROR_VERIFY_UPLOADS: flag.default("false"),
  MIRROR_VERBOSE: flag.default("true"),
  MIRROR_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30_000),
  MIRROR_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  AWS_REGION: z.string().trim().min(1).default("us-east-1"),
  // legacy .env names for static credentials
  ACCESSKEY_ID: z.string().optional(),
  SECRET_ACCESSKEY_ID: z.string().optional(),
});

export type StaticCredentials = {
  accessKeyId: string;
  secretAccessKey: string;
};

export type SyncConfig = {
  bucket: string;
  prefix: string;
  rootDir: string;
  manifestPath: string;
  maxWorkers: number;
  incrementalEnabled: boolean;
  verifyUploads: boolean;
  verbose: boolean;
  region: string;
  requestTimeoutMs: number;
  maxAttempts: number;
  /** Only set from the ACCESSKEY_ID aliases; otherwise the SDK's default chain applies. */
  credentials?: StaticCredentials;
};

type EnvLike = Record<string, string | undefined>;

export function loadSyncConfig(env: EnvLike, cwd: string = process.cwd()): SyncConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<env>"}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  const e = parsed.data;
  const rootDir = path.resolve(cwd, e.MIRROR_ROOT);
  const manifestPath = e.MIRROR_MANIFEST
    ? path.resolve(cwd, e.MIRROR_MANIFEST)
    : path.join(rootDir, MANIFEST_DIR, "manifest.json");

  const credentials =
    e.ACCESSKEY_ID && e.SECRET_ACCESSKEY_ID
      ? { accessKeyId: e.ACCESSKEY_ID, secretAccessKey: e.SECRET_ACCESSKEY_ID }
      : undefined;

  return {
    bucket: e.MIRROR_BUCKET,
    prefix: normalizePrefix(e.MIRROR_PREFIX),
    rootDir,
    manifestPath,
    maxWorkers: e.MIRROR_WORKERS,
    incrementalEnabled: e.MIRROR_INCREMENTAL,
    verifyUploads: e.MIRROR_VERIFY_UPLOADS,
    verbose: e.MIRROR_VERBOSE,
    region: e.AWS_REGION,
    requestTimeoutMs: e.MIRROR_TIMEOUT_MS,
    maxAttempts: e.MIRROR_MAX_ATTEMPTS,
    credentials,
  };
}

const VALUE_FLAGS = new Map<string, string>([
  ["--bucket", "MIRROR_BUCKET"],
  ["--prefix", "MIRROR_PREFIX"],
  ["--path", "MIRROR_ROOT"],
  ["--manifest", "MIRROR_MANIFEST"],
  ["--workers", "MIRROR_WORKERS"],
  ["--region", "AWS_REGION"],
]);

const SWITCH_FLAGS = new Map<string, [string, string]>([
  ["--full", ["MIRROR_INCREMENTAL", "false"]],
  ["--quiet", ["MIRROR_VERBOSE", "false"]],
  ["--verify", ["MIRROR_VERIFY_UPLOADS", "true"]],
]);

/**
 * Translates command-line flags into the environment variables understood by
 * `loadSyncConfig`, so flags and env share one validation path.
 * Accepts `--flag value` and `--flag=value`.
 */
export function cliArgsToEnv(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    const sw = SWITCH_FLAGS.get(name);
    if (sw) {
      out[sw[0]] = sw[1];
      continue;
    }

    const envName = VALUE_FLAGS.get(name);
    if (!envName) {
      throw new ConfigError(`Unknown option: ${name}`, [`${name}: unknown option`]);
    }

    const value = inline ?? argv[++i];
    if (value === undefined) {
      throw new ConfigError(`Missing value for ${name}`, [`${name}: missing value`]);
    }
    out[envName] = value;
  }

  return out;
}
