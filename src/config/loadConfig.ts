import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import { LogLevel } from "../observability/types";
import { AppConfig, ConfigOverrides, LedgerBackend, SameSitePolicy } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://www.hmmt.org/www/archive/problems",
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 10_000,
  downloadConcurrency: 10,
  crawlConcurrency: 2,
  maxPages: 200,
  maxDepth: 1,
  contentSelector: "#content",
  documentExtensions: [".pdf"],
  sameSitePolicy: "exact_host",
  validatePdfSignature: true,
  verifyDownloadedFilesOnStartup: true,
  retry: {
    maxAttempts: 5,
    baseDelayMs: 1_000,
    maxDelayMs: 10_000,
    jitterMs: 1_000,
  },
  outputDir: "downloaded_pdfs",
  ledgerBackend: "json",
  ledgerPath: "download_log.json",
  logLevel: "info",
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed as ConfigOverrides;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

function pickLedgerBackend(value: string | undefined, fallback: LedgerBackend): LedgerBackend {
  return value === "json" || value === "sqlite" ? value : fallback;
}

function pickSameSitePolicy(value: string | undefined, fallback: SameSitePolicy): SameSitePolicy {
  return value === "exact_host" || value === "include_subdomains" ? value : fallback;
}

function pickLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error" ? value : fallback;
}

export function validateConfig(config: AppConfig): AppConfig {
  let root: URL;
  try {
    root = new URL(config.baseUrl);
  } catch {
    throw new ConfigError(`baseUrl is not a valid URL: ${config.baseUrl}`);
  }
  if (root.protocol !== "http:" && root.protocol !== "https:") {
    throw new ConfigError(`baseUrl must use http or https: ${config.baseUrl}`);
  }

  const positive: Array<[string, number]> = [
    ["requestTimeoutMs", config.requestTimeoutMs],
    ["downloadConcurrency", config.downloadConcurrency],
    ["crawlConcurrency", config.crawlConcurrency],
    ["maxPages", config.maxPages],
    ["retry.maxAttempts", config.retry.maxAttempts],
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError(`${name} must be a positive integer, got ${value}`);
    }
  }

  const nonNegative: Array<[string, number]> = [
    ["maxDepth", config.maxDepth],
    ["retry.baseDelayMs", config.retry.baseDelayMs],
    ["retry.maxDelayMs", config.retry.maxDelayMs],
    ["retry.jitterMs", config.retry.jitterMs],
  ];
  for (const [name, value] of nonNegative) {
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigError(`${name} must be zero or greater, got ${value}`);
    }
  }

  if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
    throw new ConfigError("retry.maxDelayMs must not be smaller than retry.baseDelayMs");
  }
  if (config.documentExtensions.length === 0) {
    throw new ConfigError("documentExtensions must name at least one extension");
  }
  if (pickLedgerBackend(config.ledgerBackend, "json") !== config.ledgerBackend) {
    throw new ConfigError(`Unsupported ledger backend: ${config.ledgerBackend}`);
  }
  if (pickSameSitePolicy(config.sameSitePolicy, "exact_host") !== config.sameSitePolicy) {
    throw new ConfigError(`Unsupported same-site policy: ${config.sameSitePolicy}`);
  }

  return config;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    retry: {
      ...DEFAULT_CONFIG.retry,
      ...(fileConfig.retry ?? {}),
    },
  };

  return validateConfig({
    ...merged,
    baseUrl: env.BASE_URL ?? merged.baseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadConcurrency: toInt(env.DOWNLOAD_CONCURRENCY, merged.downloadConcurrency),
    crawlConcurrency: toInt(env.CRAWL_CONCURRENCY, merged.crawlConcurrency),
    maxPages: toInt(env.MAX_PAGES, merged.maxPages),
    maxDepth: toInt(env.MAX_DEPTH, merged.maxDepth),
    contentSelector: env.CONTENT_SELECTOR ?? merged.contentSelector,
    documentExtensions: toList(env.DOCUMENT_EXTENSIONS, merged.documentExtensions),
    sameSitePolicy: pickSameSitePolicy(env.SAME_SITE_POLICY, merged.sameSitePolicy),
    validatePdfSignature: toBool(env.VALIDATE_PDF_SIGNATURE, merged.validatePdfSignature),
    verifyDownloadedFilesOnStartup: toBool(
      env.VERIFY_DOWNLOADED_FILES_ON_STARTUP,
      merged.verifyDownloadedFilesOnStartup,
    ),
    retry: {
      maxAttempts: toInt(env.MAX_ATTEMPTS, merged.retry.maxAttempts),
      baseDelayMs: toInt(env.BACKOFF_BASE_MS, merged.retry.baseDelayMs),
      maxDelayMs: toInt(env.BACKOFF_MAX_MS, merged.retry.maxDelayMs),
      jitterMs: toInt(env.BACKOFF_JITTER_MS, merged.retry.jitterMs),
    },
    outputDir: env.OUTPUT_DIR ?? merged.outputDir,
    ledgerBackend: pickLedgerBackend(env.LEDGER_BACKEND, merged.ledgerBackend),
    ledgerPath: env.LEDGER_PATH ?? merged.ledgerPath,
    logLevel: pickLogLevel(env.LOG_LEVEL, merged.logLevel),
  });
}

export { DEFAULT_CONFIG };
