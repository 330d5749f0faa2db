import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs"
import { join } from "path"
import { z } from "zod"

import { ConfigError } from "@/errors"

/** Name of the per-project directory holding gitpulse settings. */
export const CONFIG_DIR = ".gitpulse"

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const

/** A winston level accepted in config. */
export type LogLevel = (typeof LOG_LEVELS)[number]

/** Keywords that mark a commit as a fix when they begin a word in its message. */
export const DEFAULT_FIX_KEYWORDS = [
  "fix",
  "bug",
  "error",
  "fail",
  "exception",
  "panic",
  "hotfix",
  "issue",
  "revert",
  "patch",
  "defect",
  "fatal",
  "crash",
  "broken",
  "regress",
]

/** Configuration for gitpulse stored in `.gitpulse/config.json`. */
export interface GitpulseConfig {
  /** Classifier vocabulary, lowercase and de-duplicated. */
  fixKeywords: string[]
  /** null (all history) or "YYYY-MM-DD" (only ingest commits on/after date). */
  indexStartDate: string | null
  /** Number of authors and files shown in rankings. */
  topN: number
  /** Default port for `gitpulse dashboard`. */
  dashboardPort: number
  /** Minimum level written by the diagnostic logger. */
  logLevel: LogLevel
}

/** Default configuration values. */
export const DEFAULTS: GitpulseConfig = {
  fixKeywords: DEFAULT_FIX_KEYWORDS,
  indexStartDate: null,
  topN: 10,
  dashboardPort: 8787,
  logLevel: "warn",
}

const RULES: Record<keyof GitpulseConfig, string> = {
  fixKeywords: "must be a non-empty array of non-empty strings",
  indexStartDate: 'must be null or a valid "YYYY-MM-DD" date string',
  topN: "must be an integer between 1 and 100",
  dashboardPort: "must be an integer between 0 and 65535",
  logLevel: `must be one of ${LOG_LEVELS.join(", ")}`,
}

const configSchema = z
  .object({
    fixKeywords: z
      .array(z.string().trim().min(1))
      .min(1)
      .transform(normalizeKeywords),
    indexStartDate: z.iso.date().nullable(),
    topN: z.number().int().min(1).max(100),
    dashboardPort: z.number().int().min(0).max(65535),
    logLevel: z.enum(LOG_LEVELS),
  })
  .partial()

/** Lowercases keywords and drops repeats, keeping first-seen order. */
export function normalizeKeywords(keywords: string[]): string[] {
  return [...new Set(keywords.map((k) => k.trim().toLowerCase()))]
}

function isConfigKey(key: PropertyKey | undefined): key is keyof GitpulseConfig {
  return typeof key === "string" && key in RULES
}

/** Validates a partial config object, throwing ConfigError on the first bad key. */
function validate(raw: unknown): Partial<GitpulseConfig> {
  const result = configSchema.safeParse(raw)
  if (result.success) return result.data

  const key = result.error.issues[0]?.path[0]
  if (isConfigKey(key)) {
    throw new ConfigError(`Invalid config: "${key}" ${RULES[key]}`)
  }
  throw new ConfigError("Invalid config: must be a JSON object")
}

/** Returns the path of the config file inside a `.gitpulse` directory. */
export function configPath(configDir: string): string {
  return join(configDir, "config.json")
}

/** Returns true when `.gitpulse/config.json` exists. */
export function configExists(configDir: string): boolean {
  return existsSync(configPath(configDir))
}

/**
 * Creates `.gitpulse/config.json` with defaults merged with optional overrides.
 * Throws if config already exists or if overrides contain invalid values.
 */
export function createConfig(
  configDir: string,
  overrides?: Partial<GitpulseConfig>,
): GitpulseConfig {
  if (configExists(configDir)) {
    throw new ConfigError(
      "Already initialized. Edit .gitpulse/config.json to change settings.",
    )
  }

  const config: GitpulseConfig = { ...DEFAULTS, ...validate(overrides ?? {}) }

  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true })
  }
  writeFileSync(configPath(configDir), JSON.stringify(config, null, 2) + "\n")

  return config
}

/**
 * Loads config from `.gitpulse/config.json`.
 * A missing file yields the defaults; missing keys are backfilled in memory.
 */
export function loadConfig(configDir: string): GitpulseConfig {
  const path = configPath(configDir)
  if (!existsSync(path)) return { ...DEFAULTS }

  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"))
  } catch {
    throw new ConfigError(`Invalid config: ${path} is not valid JSON`)
  }

  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`Invalid config: ${path} must be a JSON object`)
  }

  return { ...DEFAULTS, ...validate(raw) }
}
