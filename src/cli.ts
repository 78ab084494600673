import type { AppConfig } from "./config"
import { isDomainError } from "./errors"
import type { Logger } from "./logger"
import { DomainClassifier } from "./services/domain-classifier"
import { loadSuffixListFile } from "./services/list-loader"
import type { ClassifyOptions, SectionPrecedence } from "./types"

export interface CliOptions {
  listPath: string
  classify: ClassifyOptions
  domains: string[]
  help: boolean
}

export interface CliIo {
  out: (line: string) => void
  err: (line: string) => void
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "UsageError"
  }
}

export const usage = `Usage: registrable [options] <domain>...

Options:
  --list <path>             Public suffix list file (default: REGISTRABLE_LIST_PATH or bundled list)
  --no-private              Ignore rules from the PRIVATE section
  --known-only              Fail instead of guessing when no rule matches
  --prefer <icann|private>  Section that wins when both match at the same length
  --help                    Show this message
`

function parsePrecedence(value: string): SectionPrecedence {
  const normalized = value.trim().toLowerCase()
  if (normalized === "icann" || normalized === "private") {
    return normalized
  }
  throw new UsageError(`--prefer must be "icann" or "private", got ${value}`)
}

export function parseCliArgs(argv: string[], config: AppConfig): CliOptions {
  const options: CliOptions = {
    listPath: config.listPath,
    classify: { ...config.classify },
    domains: [],
    help: false,
  }

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index]
    if (arg === undefined) {
      continue
    }

    if (arg === "--help" || arg === "-h") {
      options.help = true
      continue
    }

    if (arg === "--no-private") {
      options.classify.includePrivate = false
      continue
    }

    if (arg === "--known-only") {
      options.classify.knownSuffixesOnly = true
      continue
    }

    if (arg === "--list" || arg === "--prefer") {
      const next = argv[index + 1]
      if (!next) {
        throw new UsageError(`${arg} requires a value`)
      }
      if (arg === "--list") {
        options.listPath = next
      } else {
        options.classify.sectionPrecedence = parsePrecedence(next)
      }
      index += 1
      continue
    }

    if (arg.startsWith("--")) {
      throw new UsageError(`Unknown option: ${arg}`)
    }

    options.domains.push(arg)
  }

  if (!options.help && options.domains.length === 0) {
    throw new UsageError("At least one domain is required")
  }

  return options
}

/** Classifies every domain and prints one JSON line each. Returns the exit code. */
export function classifyAll(classifier: DomainClassifier, options: CliOptions, io: CliIo): number {
  let failures = 0

  for (const domain of options.domains) {
    try {
      const result = classifier.classify(domain, options.classify)
      io.out(
        JSON.stringify({
          input: domain,
          name: result.name,
          suffix: result.suffix,
          root: result.root,
          subdomain: result.subdomain,
          knownSuffix: result.knownSuffix,
          section: result.section,
          rule: result.rule,
        }),
      )
    } catch (error) {
      if (!isDomainError(error)) {
        throw error
      }
      failures += 1
      io.out(JSON.stringify({ input: domain, error: { kind: error.kind, message: error.message } }))
    }
  }

  return failures > 0 ? 1 : 0
}

export async function runCli(argv: string[], config: AppConfig, logger: Logger, io: CliIo): Promise<number> {
  let options: CliOptions
  try {
    options = parseCliArgs(argv, config)
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(error.message)
      io.err(usage)
      return 2
    }
    throw error
  }

  if (options.help) {
    io.out(usage)
    return 0
  }

  const list = await loadSuffixListFile(options.listPath, logger)
  const classifier = new DomainClassifier(list, options.classify)
  const code = classifyAll(classifier, options, io)

  logger.debug({ domains: options.domains.length, exitCode: code }, "classification finished")
  return code
}
