import pino from "pino"
import { describe, expect, test } from "vitest"
import { bundledListPath } from "../src/config"
import { MalformedListError } from "../src/errors"
import { DomainClassifier } from "../src/services/domain-classifier"
import { createSuffixListSource, loadSuffixListFile } from "../src/services/list-loader"
import { fixturePath } from "./helpers/lists"

function captureLogger() {
  const lines: Record<string, unknown>[] = []
  const logger = pino(
    { level: "info" },
    {
      write(message: string) {
        lines.push(JSON.parse(message))
      },
    },
  )
  return { logger, lines }
}

describe("list loader", () => {
  test("loads the bundled list", async () => {
    const list = await loadSuffixListFile(bundledListPath)

    expect(list.has("co.uk", "icann")).toBe(true)
    expect(list.has("!www.ck", "icann")).toBe(true)
    expect(list.has("github.io", "private")).toBe(true)
  })

  test("the bundled list knows second-level registries", async () => {
    const classifier = new DomainClassifier(await loadSuffixListFile(bundledListPath))

    const nz = classifier.classify("www.example.co.nz")
    expect(nz.root).toBe("example.co.nz")
    expect(nz.rule).toBe("co.nz")

    const au = classifier.classify("shop.example.com.au")
    expect(au.root).toBe("example.com.au")
    expect(au.knownSuffix).toBe(true)
  })

  test("logs rule counts per section", async () => {
    const { logger, lines } = captureLogger()

    await loadSuffixListFile(fixturePath("mini.dat"), logger)

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      msg: "suffix list loaded",
      rules: 13,
      icann: 10,
      private: 3,
    })
  })

  test("logs and rethrows parse failures", async () => {
    const { logger, lines } = captureLogger()

    await expect(loadSuffixListFile(fixturePath("orphan-rule.dat"), logger)).rejects.toBeInstanceOf(MalformedListError)
    expect(lines[0]).toMatchObject({
      msg: "failed to load suffix list",
      err: { type: "MalformedListError", message: "line 4: Rule outside of any section: net" },
    })
  })

  test("logs read failures with the error message", async () => {
    const { logger, lines } = captureLogger()

    await expect(loadSuffixListFile(fixturePath("missing.dat"), logger)).rejects.toThrow("ENOENT")
    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      msg: "failed to load suffix list",
      err: { message: expect.stringContaining("ENOENT") },
    })
  })

  test("a source loads once and keeps its failure", async () => {
    const source = createSuffixListSource(fixturePath("missing.dat"))
    const first = source.get()

    await expect(first).rejects.toThrow("ENOENT")
    expect(source.get()).toBe(first)
  })

  test("a source hands every caller the same list", async () => {
    const source = createSuffixListSource(fixturePath("mini.dat"))

    const [a, b] = await Promise.all([source.get(), source.get()])
    expect(a).toBe(b)
    expect(a.size).toBe(13)
  })
})
