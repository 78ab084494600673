import { resolve } from "node:path"
import { z } from "zod"
import type { ClassifyOptions } from "./types"

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent"

export interface AppConfig {
  listPath: string
  classify: ClassifyOptions
  logLevel: LogLevel
  logDir: string | null
}

export const bundledListPath = resolve(__dirname, "../data/public_suffix_list.dat")

export const defaultClassifyOptions: Readonly<ClassifyOptions> = Object.freeze({
  includePrivate: true,
  knownSuffixesOnly: false,
  sectionPrecedence: "private",
})

const EnvSchema = z.object({
  REGISTRABLE_LIST_PATH: z.string().optional(),
  REGISTRABLE_INCLUDE_PRIVATE: z.string().optional(),
  REGISTRABLE_KNOWN_ONLY: z.string().optional(),
  REGISTRABLE_SECTION_PRECEDENCE: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.enum(["private", "icann"]).default("private"),
  ),
  REGISTRABLE_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  REGISTRABLE_LOG_DIR: z.string().optional(),
})

function toBoolean(input: string | undefined, defaultValue: boolean): boolean {
  if (input === undefined) {
    return defaultValue
  }

  const normalized = input.trim().toLowerCase()
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false
  }

  return defaultValue
}

function toOptionalPath(input: string | undefined): string | null {
  const trimmed = input?.trim() ?? ""
  return trimmed.length > 0 ? resolve(trimmed) : null
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env)

  return {
    listPath: toOptionalPath(parsed.REGISTRABLE_LIST_PATH) ?? bundledListPath,
    classify: {
      includePrivate: toBoolean(parsed.REGISTRABLE_INCLUDE_PRIVATE, defaultClassifyOptions.includePrivate),
      knownSuffixesOnly: toBoolean(parsed.REGISTRABLE_KNOWN_ONLY, defaultClassifyOptions.knownSuffixesOnly),
      sectionPrecedence: parsed.REGISTRABLE_SECTION_PRECEDENCE,
    },
    logLevel: parsed.REGISTRABLE_LOG_LEVEL,
    logDir: toOptionalPath(parsed.REGISTRABLE_LOG_DIR),
  }
}
