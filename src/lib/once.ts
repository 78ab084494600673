type GateState<T> =
  | { status: "idle" }
  | { status: "building" }
  | { status: "ready"; value: T }
  | { status: "failed"; error: unknown }

export type GateStatus = GateState<unknown>["status"]

/**
 * Runs a factory at most once and publishes its outcome to every caller.
 *
 * A thrown error is kept and rethrown on each later call. For an async
 * factory the promise itself is the published value, so a rejection is seen
 * by all callers awaiting it.
 */
export class Once<T> {
  private state: GateState<T> = { status: "idle" }

  constructor(private readonly factory: () => T) {}

  get status(): GateStatus {
    return this.state.status
  }

  get(): T {
    switch (this.state.status) {
      case "ready":
        return this.state.value
      case "failed":
        throw this.state.error
      case "building":
        throw new Error("Initializer re-entered while building")
      case "idle":
        break
    }

    this.state = { status: "building" }
    try {
      const value = this.factory()
      this.state = { status: "ready", value }
      return value
    } catch (error) {
      this.state = { status: "failed", error }
      throw error
    }
  }
}

export function once<T>(factory: () => T): Once<T> {
  return new Once(factory)
}
