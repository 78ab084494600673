import { describe, expect, test } from "vitest"
import { Once, once } from "../src/lib/once"

describe("publish-once gate", () => {
  test("builds the value once and shares it", () => {
    let calls = 0
    const gate = once(() => {
      calls += 1
      return { built: calls }
    })

    expect(gate.status).toBe("idle")
    const first = gate.get()
    expect(gate.get()).toBe(first)
    expect(calls).toBe(1)
    expect(gate.status).toBe("ready")
  })

  test("a failed build poisons the gate", () => {
    let calls = 0
    const failure = new Error("list unavailable")
    const gate = once((): number => {
      calls += 1
      throw failure
    })

    expect(() => gate.get()).toThrow(failure)
    expect(() => gate.get()).toThrow(failure)
    expect(calls).toBe(1)
    expect(gate.status).toBe("failed")
  })

  test("async rejections are observed by every caller", async () => {
    let calls = 0
    const gate = once(async (): Promise<string> => {
      calls += 1
      throw new Error("boom")
    })

    await expect(gate.get()).rejects.toThrow("boom")
    await expect(gate.get()).rejects.toThrow("boom")
    expect(calls).toBe(1)
  })

  test("rejects re-entry from its own factory", () => {
    const gate: Once<number> = once((): number => gate.get() + 1)

    expect(() => gate.get()).toThrow("Initializer re-entered while building")
    expect(gate.status).toBe("failed")
  })
})
