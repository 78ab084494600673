import { NoSuffixFoundError } from "../errors"
import type { ClassifyOptions, Label, Rule, RuleKind, SuffixMatch } from "../types"
import type { SuffixList } from "./suffix-list"

const KIND_RANK: Record<RuleKind, number> = {
  plain: 0,
  wildcard: 1,
  exception: 2,
}

interface Candidate {
  rule: Rule
  /** Trailing labels the rule covers, placeholder included. */
  span: number
}

function sectionRank(rule: Rule, options: ClassifyOptions): number {
  return rule.section === options.sectionPrecedence ? 1 : 0
}

/** Whether `a` should win over `b` when both cover the same number of labels. */
function outranks(a: Rule, b: Rule, options: ClassifyOptions): boolean {
  const byKind = KIND_RANK[a.kind] - KIND_RANK[b.kind]
  if (byKind !== 0) {
    return byKind > 0
  }
  return sectionRank(a, options) > sectionRank(b, options)
}

function pick(current: Candidate | null, next: Candidate, options: ClassifyOptions): Candidate {
  if (!current || next.span > current.span) {
    return next
  }
  if (next.span === current.span && outranks(next.rule, current.rule, options)) {
    return next
  }
  return current
}

/**
 * Finds the public suffix of `labels` (left to right) in `list`.
 *
 * Exception rules beat everything; otherwise the rule covering the most
 * trailing labels wins, with wildcard over plain and the preferred section
 * breaking ties at equal length. When nothing matches, the last label is the
 * suffix unless `knownSuffixesOnly` is set.
 */
export function matchSuffix(
  list: SuffixList,
  labels: readonly Label[],
  options: ClassifyOptions,
): SuffixMatch {
  const count = labels.length
  const root = labels[count - 1]
  const bucket = root ? list.bucket(root.ascii) : undefined

  let exception: Candidate | null = null
  let best: Candidate | null = null

  if (bucket) {
    const limit = Math.min(count, bucket.maxLength)
    const trailing: string[] = []

    for (let span = 1; span <= limit; span += 1) {
      const label = labels[count - span]
      if (!label) {
        break
      }
      trailing.unshift(label.ascii)

      // Rules whose concrete labels are exactly the trailing `span` labels.
      for (const rule of bucket.rules.get(trailing.join(".")) ?? []) {
        if (rule.section === "private" && !options.includePrivate) {
          continue
        }
        if (rule.kind === "exception") {
          exception = pick(exception, { rule, span }, options)
        } else if (rule.kind === "plain") {
          best = pick(best, { rule, span }, options)
        } else if (span < count) {
          // The wildcard placeholder takes the next label to the left.
          best = pick(best, { rule, span: span + 1 }, options)
        }
      }
    }
  }

  if (exception) {
    return { length: exception.span - 1, rule: exception.rule }
  }

  if (best) {
    return { length: best.span, rule: best.rule }
  }

  if (options.knownSuffixesOnly) {
    throw new NoSuffixFoundError(labels.map((label) => label.value).join("."))
  }

  return { length: Math.min(1, count), rule: null }
}
