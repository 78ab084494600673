import { defaultClassifyOptions } from "../config"
import { NoRootDomainError } from "../errors"
import { joinLabels, splitLabels } from "../lib/labels"
import type { ClassificationResult, ClassifyOptions, DomainParts, Label, RootDomain } from "../types"
import { matchSuffix } from "./rule-matcher"
import type { SuffixList } from "./suffix-list"

function composeParts(labels: readonly Label[], suffixLength: number, form: keyof Label): DomainParts {
  const count = labels.length
  const suffixStart = count - suffixLength
  const rootStart = suffixStart - 1

  return {
    name: joinLabels(labels, form),
    suffix: joinLabels(labels.slice(suffixStart), form),
    root: rootStart >= 0 ? joinLabels(labels.slice(rootStart), form) : null,
    subdomain: rootStart > 0 ? joinLabels(labels.slice(0, rootStart), form) : "",
  }
}

/**
 * Splits domain names into subdomain, registrable domain and public suffix
 * against one immutable {@link SuffixList}.
 */
export class DomainClassifier {
  private readonly defaults: ClassifyOptions

  constructor(
    private readonly list: SuffixList,
    defaults: Partial<ClassifyOptions> = {},
  ) {
    this.defaults = { ...defaultClassifyOptions, ...defaults }
  }

  get suffixList(): SuffixList {
    return this.list
  }

  classify(input: string, options: Partial<ClassifyOptions> = {}): ClassificationResult {
    const { labels, fqdn } = splitLabels(input)
    const match = matchSuffix(this.list, labels, { ...this.defaults, ...options })
    const parts = composeParts(labels, match.length, "value")

    return {
      ...parts,
      ascii: composeParts(labels, match.length, "ascii"),
      labels,
      suffixLength: match.length,
      knownSuffix: match.rule !== null,
      section: match.rule?.section ?? null,
      rule: match.rule?.text ?? null,
      fqdn,
    }
  }

  isSuffix(input: string, options: Partial<ClassifyOptions> = {}): boolean {
    const result = this.classify(input, options)
    return result.root === null
  }

  rootDomain(input: string, options: Partial<ClassifyOptions> = {}): RootDomain {
    const result = this.classify(input, options)
    if (result.root === null || result.ascii.root === null) {
      throw new NoRootDomainError(result.name)
    }

    return {
      root: result.root,
      ascii: result.ascii.root,
      suffix: result.suffix,
    }
  }

  suffix(input: string, options: Partial<ClassifyOptions> = {}): string {
    return this.classify(input, options).suffix
  }

  hasKnownSuffix(input: string, options: Partial<ClassifyOptions> = {}): boolean {
    return this.classify(input, { ...options, knownSuffixesOnly: false }).knownSuffix
  }
}
