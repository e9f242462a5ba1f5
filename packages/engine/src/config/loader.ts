/**
 * Layered JSON config system for the ConfigTables.
 *
 * Supports named base documents + profile presets with overrides.
 * Base configs are full tables; profiles are partial overrides
 * that deep-merge on top of their base.
 */

import { readFileSync, readdirSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { ZodError } from "zod";

import { ConfigError } from "../errors.js";
import {
  profileConfigSchema,
  qualityConfigSchema,
  type ProfileConfig,
  type QualityConfig,
} from "./schema.js";

export interface ProfileInfo {
  name: string;
  description: string;
  extends: string;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Deep merge / freeze
// ---------------------------------------------------------------------------

/** Leaf-level deep merge: source values override target values. */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = target[key];
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

/** Freeze a value and everything reachable from it. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/quality/`.
 * Works from both source (packages/engine/src/) and compiled (dist/) paths.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "quality");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // __dirname is packages/engine/src/config or packages/engine/dist/config
  const repoRoot = resolve(__dirname, "..", "..", "..", "..");
  return join(repoRoot, "configs", "quality");
}

function readJson(filePath: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Config not found: ${filePath}`, { cause: err });
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config is not valid JSON: ${filePath}`, { cause: err });
  }
}

function describeIssues(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/** Validate a plain object as ConfigTables and freeze it. */
export function parseQualityConfig(data: unknown, source = "inline config"): QualityConfig {
  const result = qualityConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid config ${source}: ${describeIssues(result.error)}`);
  }
  return deepFreeze(result.data);
}

function readBase(name: string): PlainObject {
  const filePath = join(findConfigsRoot(), "base", `${name}.json`);
  const data = readJson(filePath);
  if (!isPlainObject(data)) {
    throw new ConfigError(`Config ${filePath} must be a JSON object`);
  }
  return data;
}

function readProfile(profileName: string): ProfileConfig {
  const filePath = join(findConfigsRoot(), "profiles", `${profileName}.json`);
  const result = profileConfigSchema.safeParse(readJson(filePath));
  if (!result.success) {
    throw new ConfigError(`Invalid profile ${filePath}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/** Load a base config document (default: "default"). */
export function loadBaseConfig(name = "default"): QualityConfig {
  return parseQualityConfig(readBase(name), `base/${name}.json`);
}

/** Load a profile config, merging its overrides on top of the base. */
export function loadProfileConfig(profileName: string): QualityConfig {
  const profile = readProfile(profileName);
  const merged = deepMerge(readBase(profile.extends), profile.overrides);
  return parseQualityConfig(merged, `profiles/${profileName}.json`);
}

/** Load a profile when one is named, the default base otherwise. */
export function loadConfig(profileName?: string): QualityConfig {
  return profileName ? loadProfileConfig(profileName) : loadBaseConfig();
}

/** List all available profiles from the profiles directory. */
export function listProfiles(): ProfileInfo[] {
  const profilesDir = join(findConfigsRoot(), "profiles");

  if (!existsSync(profilesDir)) return [];

  const files = readdirSync(profilesDir)
    .filter((f) => f.endsWith(".json"))
    .sort();
  const profiles: ProfileInfo[] = [];

  for (const file of files) {
    try {
      const parsed = readProfile(file.replace(/\.json$/, ""));
      profiles.push({
        name: parsed.name,
        description: parsed.description,
        extends: parsed.extends,
      });
    } catch (err) {
      console.warn(`[config] Skipping profile ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return profiles;
}
