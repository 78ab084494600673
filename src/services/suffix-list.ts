import { MalformedListError } from "../errors"
import type { Rule, RuleKind, Section } from "../types"

/**
 * Rules sharing one trailing (root) label.
 *
 * `rules` is keyed by the rule's concrete labels joined with `.`, so `co.uk`
 * and `*.co.uk` share the key `co.uk` and are told apart by kind.
 */
export interface RootBucket {
  maxLength: number
  rules: ReadonlyMap<string, readonly Rule[]>
}

export interface SuffixListStats {
  total: number
  icann: number
  private: number
  wildcard: number
  exception: number
}

/** Number of trailing labels a rule spans, counting the wildcard placeholder. */
export function ruleLength(rule: Rule): number {
  return rule.kind === "wildcard" ? rule.labels.length + 1 : rule.labels.length
}

export function formatRule(kind: RuleKind, labels: readonly string[]): string {
  const dotted = labels.join(".")
  if (kind === "wildcard") {
    return `*.${dotted}`
  }
  if (kind === "exception") {
    return `!${dotted}`
  }
  return dotted
}

/**
 * Immutable public suffix rule set indexed by trailing label.
 */
export class SuffixList {
  private readonly index: ReadonlyMap<string, RootBucket>
  readonly stats: SuffixListStats

  private constructor(index: Map<string, RootBucket>, stats: SuffixListStats) {
    this.index = index
    this.stats = Object.freeze(stats)
    Object.freeze(this)
  }

  static fromRules(rules: Iterable<Rule>): SuffixList {
    const buckets = new Map<string, { maxLength: number; rules: Map<string, Rule[]> }>()
    const stats: SuffixListStats = { total: 0, icann: 0, private: 0, wildcard: 0, exception: 0 }

    for (const rule of rules) {
      const root = rule.labels[rule.labels.length - 1]
      if (root === undefined) {
        throw new MalformedListError(`Rule ${rule.text} has no labels`, null)
      }

      let bucket = buckets.get(root)
      if (!bucket) {
        bucket = { maxLength: 0, rules: new Map() }
        buckets.set(root, bucket)
      }

      const key = rule.labels.join(".")
      const siblings = bucket.rules.get(key) ?? []

      if (siblings.some((other) => other.kind === rule.kind && other.section === rule.section)) {
        continue
      }

      const conflicting = siblings.find(
        (other) =>
          (other.kind === "plain" && rule.kind === "exception") ||
          (other.kind === "exception" && rule.kind === "plain"),
      )
      if (conflicting) {
        throw new MalformedListError(`Rule ${rule.text} conflicts with ${conflicting.text}`, null)
      }

      const frozen: Rule = Object.freeze({ ...rule, labels: Object.freeze([...rule.labels]) })
      siblings.push(frozen)
      bucket.rules.set(key, siblings)
      bucket.maxLength = Math.max(bucket.maxLength, ruleLength(frozen))

      stats.total += 1
      stats[frozen.section] += 1
      if (frozen.kind !== "plain") {
        stats[frozen.kind] += 1
      }
    }

    const index = new Map<string, RootBucket>()
    for (const [root, bucket] of buckets) {
      for (const siblings of bucket.rules.values()) {
        Object.freeze(siblings)
      }
      index.set(root, Object.freeze({ maxLength: bucket.maxLength, rules: bucket.rules }))
    }

    return new SuffixList(index, stats)
  }

  get size(): number {
    return this.stats.total
  }

  bucket(root: string): RootBucket | undefined {
    return this.index.get(root)
  }

  /** Rules with exactly these concrete labels, any kind, any section. */
  lookup(labels: readonly string[]): readonly Rule[] {
    const root = labels[labels.length - 1]
    if (root === undefined) {
      return []
    }
    return this.index.get(root)?.rules.get(labels.join(".")) ?? []
  }

  /** Whether a rule written as `text` (e.g. `*.ck`, `!www.ck`) is in the list. */
  has(text: string, section?: Section): boolean {
    const kind: RuleKind = text.startsWith("!") ? "exception" : text.startsWith("*.") ? "wildcard" : "plain"
    const dotted = kind === "exception" ? text.slice(1) : kind === "wildcard" ? text.slice(2) : text

    return this.lookup(dotted.split(".")).some(
      (rule) => rule.kind === kind && (section === undefined || rule.section === section),
    )
  }
}
