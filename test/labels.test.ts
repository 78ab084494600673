import { describe, expect, test } from "vitest"
import { InvalidInputError } from "../src/errors"
import { splitLabels } from "../src/lib/labels"

describe("label splitter", () => {
  test("lower-cases labels and strips the root separator", () => {
    const split = splitLabels("Example.COM.")

    expect(split.fqdn).toBe(true)
    expect(split.labels.map((label) => label.value)).toEqual(["example", "com"])
    expect(split.labels.map((label) => label.ascii)).toEqual(["example", "com"])
  })

  test("encodes unicode labels while keeping the original form", () => {
    const split = splitLabels("食狮.中国")

    expect(split.labels).toEqual([
      { value: "食狮", ascii: "xn--85x722f" },
      { value: "中国", ascii: "xn--fiqs8s" },
    ])
  })

  test("folds case before encoding", () => {
    const split = splitLabels("BÜCHER.de")

    expect(split.labels[0]).toEqual({ value: "bücher", ascii: "xn--bcher-kva" })
  })

  test("maps fullwidth compatibility forms to their plain labels", () => {
    const split = splitLabels("ｅｘａｍｐｌｅ．ＣＯＭ")

    expect(split.labels).toEqual([
      { value: "example", ascii: "example" },
      { value: "com", ascii: "com" },
    ])
  })

  test("folds case with the IDNA mapping instead of context-sensitive lower-casing", () => {
    const upper = splitLabels("ΟΔΟΣ.gr").labels[0]
    const lower = splitLabels("οδοσ.gr").labels[0]

    expect(upper?.value).toBe("οδοσ")
    expect(upper?.ascii).toBe(lower?.ascii)
  })

  test("rejects labels that map to nothing", () => {
    expect(() => splitLabels("\u00AD.com")).toThrow(InvalidInputError)
  })

  test("treats ideographic full stops as separators", () => {
    const split = splitLabels("example。com")

    expect(split.labels.map((label) => label.value)).toEqual(["example", "com"])
    expect(split.fqdn).toBe(false)
  })

  test("rejects empty names and empty labels", () => {
    expect(() => splitLabels("")).toThrow(InvalidInputError)
    expect(() => splitLabels(".")).toThrow("Domain name has no labels")
    expect(() => splitLabels("a..b")).toThrow("Domain name contains an empty label")
    expect(() => splitLabels(".example.com")).toThrow("Domain name contains an empty label")
    expect(() => splitLabels("example.com..")).toThrow("Domain name contains an empty label")
  })

  test("enforces label and name length limits", () => {
    const label63 = "a".repeat(63)

    expect(splitLabels(`${label63}.com`).labels).toHaveLength(2)
    expect(() => splitLabels(`${"a".repeat(64)}.com`)).toThrow("Label exceeds 63 octets")

    const longest = [label63, label63, label63, label63].join(".")
    expect(splitLabels(longest).labels).toHaveLength(4)
    expect(() => splitLabels(`a.${longest}`)).toThrow("Domain name exceeds 255 octets")
  })

  test("reports the offending input on failure", () => {
    try {
      splitLabels("a..b")
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError)
      if (error instanceof InvalidInputError) {
        expect(error.kind).toBe("InvalidInput")
        expect(error.input).toBe("a..b")
      }
    }
  })
})
