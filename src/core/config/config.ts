// src/core/config/config.ts
// Configuration for the narrative compiler: defaults, env, file and object sources

import * as fs from "fs";
import * as path from "path";
import { ConfigError } from "../errors";
import { isLogLevel, type LogLevel } from "../log";

// =========================================================================
// Configuration Types
// =========================================================================

export type LLMProvider = "openai" | "anthropic" | "groq";

export const LLM_PROVIDERS: readonly LLMProvider[] = ["openai", "anthropic", "groq"];

export type LLMConfig = {
  provider: LLMProvider;
  /** Model name (provider-specific) */
  model: string;
  /** API key (optional, can use env vars) */
  apiKey?: string;
  /** API base URL for proxies or compatible endpoints */
  baseUrl?: string;
  /** Per-call timeout in milliseconds */
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
  /** System prompt override */
  systemPrompt?: string;
};

export type CompilerConfig = {
  /** Generation attempts per token, first attempt included */
  maxAttempts: number;
  /** Tokens compiled at once */
  maxConcurrency: number;
  targetLanguage: string;
  targetFramework: string;
  /** LRU bound of the in-memory artifact cache */
  cacheMaxEntries: number;
  /** Whole-token retries after a generation failure */
  generationRetries: number;
  logLevel: LogLevel;
};

export type NarrativeConfig = {
  llm: LLMConfig;
  compiler: CompilerConfig;
};

export type PartialNarrativeConfig = {
  llm?: Partial<LLMConfig>;
  compiler?: Partial<CompilerConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-sonnet-latest",
  groq: "llama-3.3-70b-versatile",
};

export const DEFAULT_LLM_CONFIG: LLMConfig = {
  provider: "openai",
  model: DEFAULT_MODELS.openai,
  timeoutMs: 60_000,
  maxTokens: 4096,
  temperature: 0,
};

export const DEFAULT_COMPILER_CONFIG: CompilerConfig = {
  maxAttempts: 3,
  maxConcurrency: 4,
  targetLanguage: "typescript",
  targetFramework: "angular",
  cacheMaxEntries: 1000,
  generationRetries: 0,
  logLevel: "info",
};

export const DEFAULT_CONFIG: NarrativeConfig = {
  llm: DEFAULT_LLM_CONFIG,
  compiler: DEFAULT_COMPILER_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["narrc.config.json", "narrc.config.yaml", "narrc.config.yml"];

// =========================================================================
// Field readers
// =========================================================================

type Env = Record<string, string | undefined>;

export function isProvider(value: unknown): value is LLMProvider {
  return typeof value === "string" && (LLM_PROVIDERS as readonly string[]).includes(value);
}

function readProvider(value: unknown, where: string): LLMProvider | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  if (!isProvider(value)) {
    throw new ConfigError(`Unknown provider ${JSON.stringify(value)} in ${where}; expected one of ${LLM_PROVIDERS.join(", ")}`);
  }
  return value;
}

function readLogLevel(value: unknown, where: string): LogLevel | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  if (!isLogLevel(value)) {
    throw new ConfigError(`Unknown log level ${JSON.stringify(value)} in ${where}`);
  }
  return value;
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function readNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** First of the camelCase and snake_case spellings that is present */
function pick(data: Record<string, unknown>, camel: string, snake: string): unknown {
  return data[camel] ?? data[snake];
}

function assign<T, K extends keyof T>(target: Partial<T>, key: K, value: T[K] | undefined): void {
  if (value !== undefined) target[key] = value;
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Get API key for provider from environment variables.
 * Checks both generic and provider-specific env vars.
 */
export function getApiKeyFromEnv(provider: LLMProvider, env: Env = process.env, prefix = "NARRC"): string | undefined {
  const generic = env[`${prefix}_API_KEY`];
  if (generic) return generic;

  switch (provider) {
    case "openai":
      return env.OPENAI_API_KEY || undefined;
    case "anthropic":
      return env.ANTHROPIC_API_KEY || undefined;
    case "groq":
      return env.GROQ_API_KEY || undefined;
  }
}

/**
 * Only the settings the environment actually sets.
 */
export function partialConfigFromEnv(prefix = "NARRC", env: Env = process.env): PartialNarrativeConfig {
  const v = (name: string): string | undefined => env[`${prefix}_${name}`];
  const llm: Partial<LLMConfig> = {};
  const compiler: Partial<CompilerConfig> = {};

  assign(llm, "provider", readProvider(v("PROVIDER"), `${prefix}_PROVIDER`));
  assign(llm, "model", readString(v("MODEL")));
  assign(llm, "apiKey", readString(v("API_KEY")));
  assign(llm, "baseUrl", readString(v("BASE_URL")));
  assign(llm, "timeoutMs", readNumber(v("TIMEOUT_MS")));
  assign(llm, "maxTokens", readNumber(v("MAX_TOKENS")));
  assign(llm, "temperature", readNumber(v("TEMPERATURE")));
  assign(llm, "systemPrompt", readString(v("SYSTEM_PROMPT")));

  assign(compiler, "maxAttempts", readNumber(v("MAX_ATTEMPTS")));
  assign(compiler, "maxConcurrency", readNumber(v("MAX_CONCURRENCY")));
  assign(compiler, "targetLanguage", readString(v("TARGET_LANGUAGE")));
  assign(compiler, "targetFramework", readString(v("TARGET_FRAMEWORK")));
  assign(compiler, "cacheMaxEntries", readNumber(v("CACHE_MAX_ENTRIES")));
  assign(compiler, "generationRetries", readNumber(v("GENERATION_RETRIES")));
  assign(compiler, "logLevel", readLogLevel(v("LOG_LEVEL") ?? env.LOG_LEVEL?.toLowerCase(), `${prefix}_LOG_LEVEL`));

  return { llm, compiler };
}

/**
 * Load configuration from environment variables over the defaults.
 */
export function configFromEnv(prefix = "NARRC", env: Env = process.env): NarrativeConfig {
  return mergeConfigs(partialConfigFromEnv(prefix, env));
}

/**
 * Only the settings a plain object (e.g. parsed JSON/YAML) sets.
 * Keys may be camelCase or snake_case.
 */
export function partialConfigFromObject(data: Record<string, unknown>): PartialNarrativeConfig {
  const llmData = isRecord(data.llm) ? data.llm : {};
  const compilerData = isRecord(data.compiler) ? data.compiler : {};
  const llm: Partial<LLMConfig> = {};
  const compiler: Partial<CompilerConfig> = {};

  assign(llm, "provider", readProvider(llmData.provider, "llm.provider"));
  assign(llm, "model", readString(llmData.model));
  assign(llm, "apiKey", readString(pick(llmData, "apiKey", "api_key")));
  assign(llm, "baseUrl", readString(pick(llmData, "baseUrl", "base_url")));
  assign(llm, "timeoutMs", readNumber(pick(llmData, "timeoutMs", "timeout_ms")));
  assign(llm, "maxTokens", readNumber(pick(llmData, "maxTokens", "max_tokens")));
  assign(llm, "temperature", readNumber(llmData.temperature));
  assign(llm, "systemPrompt", readString(pick(llmData, "systemPrompt", "system_prompt")));

  assign(compiler, "maxAttempts", readNumber(pick(compilerData, "maxAttempts", "max_attempts")));
  assign(compiler, "maxConcurrency", readNumber(pick(compilerData, "maxConcurrency", "max_concurrency")));
  assign(compiler, "targetLanguage", readString(pick(compilerData, "targetLanguage", "target_language")));
  assign(compiler, "targetFramework", readString(pick(compilerData, "targetFramework", "target_framework")));
  assign(compiler, "cacheMaxEntries", readNumber(pick(compilerData, "cacheMaxEntries", "cache_max_entries")));
  assign(compiler, "generationRetries", readNumber(pick(compilerData, "generationRetries", "generation_retries")));
  assign(compiler, "logLevel", readLogLevel(pick(compilerData, "logLevel", "log_level"), "compiler.logLevel"));

  return { llm, compiler };
}

/**
 * Create configuration from a plain object over the defaults.
 */
export function configFromObject(data: Record<string, unknown>): NarrativeConfig {
  return mergeConfigs(partialConfigFromObject(data));
}

function readConfigFile(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;
  if (ext === ".json") {
    try {
      data = JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Invalid JSON in ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    }
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseSimpleYaml(content);
  } else {
    throw new ConfigError(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new ConfigError(`Config file ${filePath} must contain an object`);
  }
  return data;
}

/**
 * Load configuration from a JSON or YAML file over the defaults.
 */
export function configFromFile(filePath: string): NarrativeConfig {
  return configFromObject(readConfigFile(filePath));
}

function mergeLlm(base: LLMConfig, over: Partial<LLMConfig>): LLMConfig {
  const provider = over.provider ?? base.provider;
  // A provider switch without a model falls back to that provider's default
  const model = over.model ?? (provider !== base.provider ? DEFAULT_MODELS[provider] : base.model);
  return {
    provider,
    model,
    apiKey: over.apiKey ?? base.apiKey,
    baseUrl: over.baseUrl ?? base.baseUrl,
    timeoutMs: over.timeoutMs ?? base.timeoutMs,
    maxTokens: over.maxTokens ?? base.maxTokens,
    temperature: over.temperature ?? base.temperature,
    systemPrompt: over.systemPrompt ?? base.systemPrompt,
  };
}

function mergeCompiler(base: CompilerConfig, over: Partial<CompilerConfig>): CompilerConfig {
  return {
    maxAttempts: over.maxAttempts ?? base.maxAttempts,
    maxConcurrency: over.maxConcurrency ?? base.maxConcurrency,
    targetLanguage: over.targetLanguage ?? base.targetLanguage,
    targetFramework: over.targetFramework ?? base.targetFramework,
    cacheMaxEntries: over.cacheMaxEntries ?? base.cacheMaxEntries,
    generationRetries: over.generationRetries ?? base.generationRetries,
    logLevel: over.logLevel ?? base.logLevel,
  };
}

/**
 * Merge configs over the defaults, later ones overriding earlier ones.
 * Undefined fields never override.
 */
export function mergeConfigs(...configs: PartialNarrativeConfig[]): NarrativeConfig {
  let result: NarrativeConfig = { llm: { ...DEFAULT_LLM_CONFIG }, compiler: { ...DEFAULT_COMPILER_CONFIG } };

  for (const cfg of configs) {
    result = {
      llm: cfg.llm ? mergeLlm(result.llm, cfg.llm) : result.llm,
      compiler: cfg.compiler ? mergeCompiler(result.compiler, cfg.compiler) : result.compiler,
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  /** Directory searched for the default config files (default: cwd) */
  cwd?: string;
  env?: Env;
  overrides?: PartialNarrativeConfig;
}): NarrativeConfig {
  const env = options?.env ?? process.env;
  const layers: PartialNarrativeConfig[] = [partialConfigFromEnv("NARRC", env)];

  if (options?.configFile) {
    layers.push(partialConfigFromObject(readConfigFile(options.configFile)));
  } else {
    const dir = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(dir, name);
      if (fs.existsSync(p)) {
        layers.push(partialConfigFromObject(readConfigFile(p)));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  const config = mergeConfigs(...layers);

  // Resolve API key from environment if not set
  if (!config.llm.apiKey) {
    config.llm.apiKey = getApiKeyFromEnv(config.llm.provider, env);
  }

  return config;
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

/**
 * Nested `key: value` maps with scalars; no lists, anchors or multi-line strings.
 */
export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split(/\r?\n/)) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    // Pop stack to find parent at correct indent level
    let top = stack[stack.length - 1];
    while (stack.length > 1 && top.indent >= indent) {
      stack.pop();
      top = stack[stack.length - 1];
    }
    const parent = top.obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else {
      parent[key] = parseScalar(value);
    }
  }

  return result;
}

function parseScalar(value: string): string | number | boolean | null {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null" || value === "~") return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: NarrativeConfig, options: { requireApiKey?: boolean } = {}): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { llm, compiler } = config;

  if ((options.requireApiKey ?? true) && !llm.apiKey) {
    errors.push(`Missing API key for provider: ${llm.provider}. Set ${llm.provider.toUpperCase()}_API_KEY or NARRC_API_KEY`);
  }
  if (!(llm.timeoutMs > 0)) {
    errors.push("timeoutMs must be positive");
  }
  if (!(llm.maxTokens >= 1)) {
    errors.push("maxTokens must be at least 1");
  }
  if (!(llm.temperature >= 0 && llm.temperature <= 2)) {
    errors.push("temperature must be between 0 and 2");
  }

  if (!Number.isInteger(compiler.maxAttempts) || compiler.maxAttempts < 1) {
    errors.push("maxAttempts must be an integer of at least 1");
  }
  if (!Number.isInteger(compiler.maxConcurrency) || compiler.maxConcurrency < 1) {
    errors.push("maxConcurrency must be an integer of at least 1");
  }
  if (!Number.isInteger(compiler.cacheMaxEntries) || compiler.cacheMaxEntries < 1) {
    errors.push("cacheMaxEntries must be an integer of at least 1");
  }
  if (!Number.isInteger(compiler.generationRetries) || compiler.generationRetries < 0) {
    errors.push("generationRetries must be a non-negative integer");
  }

  if (compiler.maxAttempts > 10) {
    warnings.push("maxAttempts above 10 may spend many generation calls on one token");
  }
  if (llm.timeoutMs > 0 && llm.timeoutMs < 1000) {
    warnings.push("timeoutMs below one second will time out most generation calls");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * @throws ConfigError listing every validation error
 */
export function assertValidConfig(config: NarrativeConfig, options: { requireApiKey?: boolean } = {}): void {
  const result = validateConfig(config, options);
  if (!result.valid) {
    throw new ConfigError(`Invalid configuration: ${result.errors.join("; ")}`);
  }
}
