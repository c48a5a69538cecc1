// provider/config.ts - Read ~/.gpuform/providers.toml provider configuration
//
// Credential resolution: explicit provider configuration, then environment
// variables, then the [lambda] section of providers.toml. The file is read
// fresh on every resolution.

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { homedir } from "os";
import { ConfigurationError, type ProviderConfigInput } from "@gpuform/contracts";
import { LAMBDA_API_BASE } from "./client";

// =============================================================================
// Provider Config Types
// =============================================================================

export interface ProviderConfig {
  lambda?: LambdaConfig;
}

export interface LambdaConfig {
  api_key?: string;
  api_base?: string;
}

/** What a controller needs; the key is captured once and never changes */
export interface ResolvedLambdaConfig {
  apiKey: string;
  apiBase: string;
}

// =============================================================================
// Config File Path
// =============================================================================

function getConfigPath(): string {
  return process.env.GPUFORM_PROVIDERS_CONFIG ?? join(homedir(), ".gpuform", "providers.toml");
}

// =============================================================================
// Simple TOML Parser (subset: sections + key=value pairs)
// =============================================================================

type TomlValue = string | number | boolean | TomlValue[];
type TomlDocument = Record<string, Record<string, TomlValue>>;

/**
 * Parse a minimal TOML-like config. Supports:
 * - [section] headers
 * - key = value (strings, numbers, booleans)
 * - key = "quoted string"
 * - key = [array, of, values]
 * - # comments
 */
export function parseSimpleToml(content: string): TomlDocument {
  let section: Record<string, TomlValue> = {};
  const result: TomlDocument = { __global__: section };

  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    const sectionMatch = line.match(/^\[([a-zA-Z0-9_.-]+)\]$/);
    if (sectionMatch) {
      const name = sectionMatch[1]!;
      section = result[name] ??= {};
      continue;
    }

    const eqIdx = line.indexOf("=");
    if (eqIdx === -1) continue;

    const key = line.slice(0, eqIdx).trim();
    section[key] = parseTomlValue(line.slice(eqIdx + 1));
  }

  return result;
}

/** Drop text after an unquoted `#` */
function stripInlineComment(value: string): string {
  let inQuote = false;
  for (let i = 0; i < value.length; i++) {
    if (value[i] === '"' && (i === 0 || value[i - 1] !== "\\")) inQuote = !inQuote;
    if (value[i] === "#" && !inQuote) return value.slice(0, i).trim();
  }
  return value.trim();
}

function parseTomlValue(raw: string): TomlValue {
  const value = stripInlineComment(raw);

  if ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }

  if (value.startsWith("[") && value.endsWith("]")) {
    const inner = value.slice(1, -1).trim();
    if (!inner) return [];
    return inner.split(",").map((item) => parseTomlValue(item));
  }

  if (value === "true") return true;
  if (value === "false") return false;

  const num = Number(value);
  if (!isNaN(num) && value !== "") return num;

  return value;
}

// =============================================================================
// Load Config
// =============================================================================

function stringField(section: Record<string, TomlValue>, key: string): string | undefined {
  const value = section[key];
  return typeof value === "string" ? value : undefined;
}

function mapToProviderConfig(raw: TomlDocument): ProviderConfig {
  const config: ProviderConfig = {};
  if (raw.lambda) {
    config.lambda = {
      api_key: stringField(raw.lambda, "api_key"),
      api_base: stringField(raw.lambda, "api_base"),
    };
  }
  return config;
}

/**
 * Load provider configuration from providers.toml.
 * Falls back to empty config if the file is missing or unreadable.
 */
export function loadProviderConfig(): ProviderConfig {
  const configPath = getConfigPath();
  if (!existsSync(configPath)) return {};

  try {
    return mapToProviderConfig(parseSimpleToml(readFileSync(configPath, "utf-8")));
  } catch (err) {
    console.warn(`[config] Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    return {};
  }
}

// =============================================================================
// Config Merge: explicit → env vars → providers.toml → defaults
// =============================================================================

function firstNonEmpty(...values: (string | undefined)[]): string | undefined {
  return values.find((v) => v !== undefined && v !== "");
}

export function resolveLambdaConfig(explicit: ProviderConfigInput = {}): ResolvedLambdaConfig {
  const file = loadProviderConfig().lambda ?? {};

  const apiKey = firstNonEmpty(explicit.api_key, process.env.LAMBDA_API_KEY, file.api_key);
  if (!apiKey) {
    throw new ConfigurationError(
      "While configuring the provider, the API key was not found in " +
        "the LAMBDA_API_KEY environment variable or provider " +
        "configuration block api_key attribute.",
      { code: "MISSING_API_KEY" },
    );
  }

  return {
    apiKey,
    apiBase:
      firstNonEmpty(explicit.api_base, process.env.LAMBDA_API_BASE, file.api_base) ??
      LAMBDA_API_BASE,
  };
}
