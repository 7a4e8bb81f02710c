// apps/publisher/src/config.ts
//
// Publisher settings: defaults, then an optional JSON file, then CLI flags.

import path from "node:path";
import { readFile } from "node:fs/promises";
import Ajv from "ajv";
import type { PublisherConfig } from "shared-types";
import { errorMessage } from "./fsUtils";

export class ConfigError extends Error {
  public readonly exitCode = 2;
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DEFAULT_CONFIG: Omit<PublisherConfig, "scanBuildOutputFolder"> = {
  markBuildUnstableWhenThresholdIsExceeded: false,
  bugThreshold: 0,
};

const publisherConfigSchema = {
  type: "object",
  required: ["scanBuildOutputFolder", "markBuildUnstableWhenThresholdIsExceeded", "bugThreshold"],
  additionalProperties: false,
  properties: {
    scanBuildOutputFolder: { type: "string", minLength: 1 },
    markBuildUnstableWhenThresholdIsExceeded: { type: "boolean" },
    bugThreshold: { type: "integer", minimum: 0 },
  },
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validatePublisherConfig = ajv.compile<PublisherConfig>(publisherConfigSchema);

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** True when `relPath` normalizes to the root itself or to a path above it. */
function escapesRoot(relPath: string): boolean {
  const normalized = path.normalize(relPath);
  return normalized === ".." || normalized.startsWith(`..${path.sep}`) || normalized === ".";
}

/** Fills defaults into `raw` and validates the result. */
export function parsePublisherConfig(raw: unknown): PublisherConfig {
  if (!isRecord(raw)) throw new ConfigError("Publisher config must be a JSON object");
  const merged: unknown = { ...DEFAULT_CONFIG, ...raw };
  if (!validatePublisherConfig(merged)) {
    throw new ConfigError(`Invalid publisher config: ${ajv.errorsText(validatePublisherConfig.errors, { dataVar: "config" })}`);
  }
  if (path.isAbsolute(merged.scanBuildOutputFolder)) {
    throw new ConfigError(`scanBuildOutputFolder must be relative to the workspace: ${merged.scanBuildOutputFolder}`);
  }
  if (escapesRoot(merged.scanBuildOutputFolder)) {
    throw new ConfigError(`scanBuildOutputFolder must stay inside the workspace: ${merged.scanBuildOutputFolder}`);
  }
  return merged;
}

export async function readConfigFile(file: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(file, "utf-8");
  } catch (err) {
    throw new ConfigError(`Unable to read config file ${file}: ${errorMessage(err)}`);
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${file} is not valid JSON: ${errorMessage(err)}`);
  }
  if (!isRecord(value)) throw new ConfigError(`Config file ${file} must contain a JSON object`);
  return value;
}

/** Later sources win; undefined values never override. */
export function mergeConfigSources(...sources: Array<Record<string, unknown>>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const src of sources) {
    for (const [k, v] of Object.entries(src)) {
      if (v !== undefined) out[k] = v;
    }
  }
  return out;
}
