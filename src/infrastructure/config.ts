import fs from "fs";
import os from "os";
import path from "path";
import yaml from "js-yaml";
import { z } from "zod";
import { ValidationError, errorMessage } from "../domain/errors.js";
import { expectedErrorSchema, jsonValueSchema } from "./schemas.js";

const runnerConfigSchema = z.object({
  defaultAddress: z.string().min(1).default("localhost:4770"),
  pluginDir: z.string().min(1).optional(),
  concurrency: z.number().int().min(1).default(() => os.availableParallelism()),
  timeoutSeconds: z.number().positive().default(30),
  retry: z.object({
    // 0 and 1 both mean a single attempt
    maxAttempts: z.number().int().min(0).default(3),
    initialDelayMs: z.number().int().min(0).default(1000),
    backoffMultiplier: z.number().min(1).default(2),
    maxDelayMs: z.number().int().min(0).default(30_000),
    // overrides per-file `retries` as well
    disabled: z.boolean().default(false),
  }).strict().default({}),
  dryRun: z.object({
    enabled: z.boolean().default(false),
    response: jsonValueSchema.optional(),
    // `true` simulates a generic failure
    expectError: z.union([z.literal(true), expectedErrorSchema]).optional(),
  }).strict().default({}),
  grpcurlBin: z.string().min(1).default("grpcurl"),
  jqBin: z.string().min(1).default("jq"),
  logLevel: z.enum(["info", "debug"]).default("info"),
  protoPreflight: z.boolean().default(true),
}).strict();

export type RunnerConfig = z.infer<typeof runnerConfigSchema>;
export type RunnerConfigInput = z.input<typeof runnerConfigSchema>;

export const DEFAULT_CONFIG_FILE = ".gctf.yaml";

type Env = Record<string, string | undefined>;
type RawObject = Record<string, unknown>;

function isRawObject(x: unknown): x is RawObject {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function envBool(v: string | undefined): boolean | undefined {
  if (v === undefined || v === "") return undefined;
  const s = v.toLowerCase();
  return s === "true" || s === "1" || s === "yes";
}

function envNumber(v: string | undefined): number | undefined {
  if (v === undefined || v === "") return undefined;
  return Number(v);
}

function envJson(name: string, v: string | undefined): unknown {
  if (v === undefined || v === "") return undefined;
  try {
    return JSON.parse(v);
  } catch (e) {
    throw new ValidationError(`${name} is not valid JSON: ${errorMessage(e)}`);
  }
}

function envExpectError(v: string | undefined): unknown {
  if (v === undefined || v === "") return undefined;
  if (v.trim().startsWith("{")) return envJson("GCTF_DRY_RUN_EXPECT_ERROR", v);
  return envBool(v) ? true : undefined;
}

function dropUndefined(obj: RawObject): RawObject {
  const out: RawObject = {};
  for (const [k, v] of Object.entries(obj)) {
    if (v === undefined) continue;
    out[k] = isRawObject(v) ? dropUndefined(v) : v;
  }
  return out;
}

function merge(base: RawObject, over: RawObject): RawObject {
  const out: RawObject = { ...base };
  for (const [k, v] of Object.entries(over)) {
    const prev = out[k];
    out[k] = isRawObject(prev) && isRawObject(v) ? merge(prev, v) : v;
  }
  return out;
}

function readConfigFile(file: string): RawObject {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf8");
  } catch (e) {
    throw new ValidationError(`cannot read config file: ${errorMessage(e)}`, file, { cause: e });
  }
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (e) {
    throw new ValidationError(`invalid YAML: ${errorMessage(e)}`, file, { cause: e });
  }
  if (doc === undefined || doc === null) return {};
  if (!isRawObject(doc)) throw new ValidationError("config file must contain a mapping", file);
  return doc;
}

function fromEnv(env: Env): RawObject {
  return dropUndefined({
    defaultAddress: env.GCTF_ADDRESS || undefined,
    pluginDir: env.GCTF_PLUGIN_DIR || undefined,
    concurrency: envNumber(env.GCTF_PARALLEL),
    timeoutSeconds: envNumber(env.GCTF_TIMEOUT),
    retry: {
      maxAttempts: envNumber(env.GCTF_RETRIES),
      initialDelayMs: envNumber(env.GCTF_RETRY_DELAY_MS),
      disabled: envBool(env.GCTF_NO_RETRY),
    },
    dryRun: {
      enabled: envBool(env.GCTF_DRY_RUN),
      response: envJson("GCTF_DRY_RUN_RESPONSE", env.GCTF_DRY_RUN_RESPONSE),
      expectError: envExpectError(env.GCTF_DRY_RUN_EXPECT_ERROR),
    },
    grpcurlBin: env.GCTF_GRPCURL_BIN || undefined,
    jqBin: env.GCTF_JQ_BIN || undefined,
    logLevel: env.GCTF_LOG_LEVEL ? env.GCTF_LOG_LEVEL.toLowerCase() : undefined,
    protoPreflight: envBool(env.GCTF_PROTO_PREFLIGHT),
  });
}

export function parseRunnerConfig(input: unknown, source = "config"): RunnerConfig {
  const result = runnerConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ValidationError(`invalid ${source}: ${issues.join("; ")}`);
  }
  return result.data;
}

/**
 * Builds the runner configuration once: defaults, then the optional config
 * file (`GCTF_CONFIG`, or `.gctf.yaml` in `cwd` when present), then
 * environment variables.
 */
export function loadRunnerConfig(env: Env = process.env, cwd: string = process.cwd()): RunnerConfig {
  let fileLayer: RawObject = {};
  if (env.GCTF_CONFIG) {
    fileLayer = readConfigFile(path.resolve(cwd, env.GCTF_CONFIG));
  } else {
    const implicit = path.join(cwd, DEFAULT_CONFIG_FILE);
    if (fs.existsSync(implicit)) fileLayer = readConfigFile(implicit);
  }

  const config = parseRunnerConfig(merge(fileLayer, fromEnv(env)), "configuration");
  if (config.retry.disabled || config.retry.maxAttempts === 0) {
    config.retry = { ...config.retry, maxAttempts: 1, disabled: true };
  }
  return config;
}
