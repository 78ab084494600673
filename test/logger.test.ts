import { describe, expect, test } from "vitest"
import { createLogger } from "../src/logger"

describe("logger", () => {
  test("uses the configured level", () => {
    const logger = createLogger({ logDir: null, logLevel: "warn" })

    expect(logger.level).toBe("warn")
    expect(logger.isLevelEnabled("info")).toBe(false)
    expect(logger.isLevelEnabled("error")).toBe(true)
  })
})
