#!/usr/bin/env node
import { runCli } from "./cli"
import { loadConfig } from "./config"
import { createLogger } from "./logger"

const config = loadConfig()
const logger = createLogger(config)

runCli(process.argv.slice(2), config, logger, {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
}).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    logger.fatal({ err: error }, "registrable failed")
    process.exitCode = 1
  },
)
