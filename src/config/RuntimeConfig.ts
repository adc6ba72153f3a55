import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import type { DebugOptions, LogLevel } from "../observability/Logger.js";
import { SchemaValidator } from "../core/SchemaValidator.js";
import { DEFAULT_JOB_TIMEOUT_SECONDS } from "../jobs/createJob.js";

/** Default config filename used when no path is given. */
export const DEFAULT_CONFIG_FILE = "job-runtime.yaml";

export interface BackendConfig {
  baseUrl: string;
  model: string;
  /** Resolved from the variable named by `apiKeyEnv` */
  apiKey?: string;
  requestTimeoutMs: number;
}

export interface RuntimeConfig {
  jobTimeoutSeconds: number;
  /** Advisory; the runtime does not cap concurrency itself */
  maxConcurrentJobs: number;
  backend?: BackendConfig;
  debug?: DebugOptions;
}

export interface RuntimeConfigLoadResult {
  configPath: string;
  rawConfig: unknown;
  config: RuntimeConfig;
}

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug", "trace"];

export const runtimeConfigSchema = {
  type: "object",
  properties: {
    runtime: {
      type: "object",
      properties: {
        jobTimeoutSeconds: {
          type: "number",
          exclusiveMinimum: 0,
          default: DEFAULT_JOB_TIMEOUT_SECONDS,
        },
        maxConcurrentJobs: { type: "integer", minimum: 1, default: 10 },
      },
      default: {},
    },
    backend: {
      type: "object",
      properties: {
        baseUrl: { type: "string", format: "uri" },
        model: { type: "string", minLength: 1 },
        apiKeyEnv: { type: "string", minLength: 1 },
        requestTimeoutMs: { type: "integer", minimum: 1, default: 60000 },
      },
      required: ["baseUrl", "model"],
    },
    debug: {
      type: "object",
      properties: {
        enabled: { type: "boolean" },
        level: { type: "string", enum: LOG_LEVELS },
        includeParameters: { type: "boolean" },
        includeOutputs: { type: "boolean" },
        logEvents: { type: "boolean" },
      },
    },
  },
} as const;

/**
 * Validate a parsed config document and map it to RuntimeConfig.
 * Throws SchemaValidationError when the document does not match.
 */
export function mapRuntimeConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
  validator: SchemaValidator = new SchemaValidator(),
): RuntimeConfig {
  const validated = validator.validateOrThrow(runtimeConfigSchema, raw ?? {}, "Invalid runtime config");
  const doc = asRecord(validated);
  const runtime = asRecord(doc.runtime);

  const config: RuntimeConfig = {
    jobTimeoutSeconds: numberOr(runtime.jobTimeoutSeconds, DEFAULT_JOB_TIMEOUT_SECONDS),
    maxConcurrentJobs: numberOr(runtime.maxConcurrentJobs, 10),
  };

  if (doc.backend !== undefined) {
    const backend = asRecord(doc.backend);
    const apiKeyEnv = typeof backend.apiKeyEnv === "string" ? backend.apiKeyEnv : undefined;
    config.backend = {
      baseUrl: String(backend.baseUrl),
      model: String(backend.model),
      apiKey: apiKeyEnv ? env[apiKeyEnv] : undefined,
      requestTimeoutMs: numberOr(backend.requestTimeoutMs, 60000),
    };
  }

  if (doc.debug !== undefined) {
    const debug = asRecord(doc.debug);
    config.debug = {
      enabled: booleanOrUndefined(debug.enabled),
      level: LOG_LEVELS.find((level) => level === debug.level),
      includeParameters: booleanOrUndefined(debug.includeParameters),
      includeOutputs: booleanOrUndefined(debug.includeOutputs),
      logEvents: booleanOrUndefined(debug.logEvents),
    };
  }

  return config;
}

export async function loadRuntimeConfig(
  configPath: string = DEFAULT_CONFIG_FILE,
  env: NodeJS.ProcessEnv = process.env,
): Promise<RuntimeConfigLoadResult> {
  const resolvedPath = path.resolve(process.cwd(), configPath);
  const rawConfigText = await fs.readFile(resolvedPath, "utf-8");
  const rawConfig = yaml.load(rawConfigText) ?? {};
  return {
    configPath: resolvedPath,
    rawConfig,
    config: mapRuntimeConfig(rawConfig, env),
  };
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === "number" ? value : fallback;
}

function booleanOrUndefined(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}
