export type Section = "icann" | "private"
export type RuleKind = "plain" | "wildcard" | "exception"
export type SectionPrecedence = Section

export interface Label {
  /** IDNA-mapped Unicode form; an A-label the caller wrote stays an A-label. */
  value: string
  /** A-label form used for matching. */
  ascii: string
}

export interface Rule {
  kind: RuleKind
  /** Concrete A-labels, left to right, without the `*.` or `!` marker. */
  labels: readonly string[]
  section: Section
  /** Rule as written in the list, in A-label form. */
  text: string
}

export interface ClassifyOptions {
  includePrivate: boolean
  knownSuffixesOnly: boolean
  sectionPrecedence: SectionPrecedence
}

export interface SuffixMatch {
  /** Number of trailing labels that make up the public suffix. */
  length: number
  rule: Rule | null
}

export interface DomainParts {
  name: string
  suffix: string
  root: string | null
  subdomain: string
}

export interface ClassificationResult extends DomainParts {
  ascii: DomainParts
  labels: readonly Label[]
  suffixLength: number
  knownSuffix: boolean
  section: Section | null
  rule: string | null
  fqdn: boolean
}

export interface RootDomain {
  root: string
  ascii: string
  suffix: string
}
