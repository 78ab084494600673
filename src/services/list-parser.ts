import { MalformedListError } from "../errors"
import { toAsciiLabel } from "../lib/labels"
import type { Rule, RuleKind, Section } from "../types"
import { SuffixList, formatRule } from "./suffix-list"

const SECTION_MARKER_RE = /^\/\/\s*===(BEGIN|END) (ICANN|PRIVATE) DOMAINS===\s*$/
const COMMENT_RE = /^\/\//
const RULE_TOKEN_RE = /^\S+/

export type SuffixListSource = string | Uint8Array

interface ParsedLine {
  kind: RuleKind
  labels: string[]
}

function decodeSource(source: SuffixListSource): string {
  if (typeof source === "string") {
    return source
  }

  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: false }).decode(source)
  } catch (error) {
    throw new MalformedListError("List is not valid UTF-8", null, { cause: error })
  }
}

function parseRule(token: string, lineNumber: number): ParsedLine {
  let kind: RuleKind = "plain"
  let body = token

  if (body.startsWith("!")) {
    kind = "exception"
    body = body.slice(1)
  } else if (body.startsWith("*.")) {
    kind = "wildcard"
    body = body.slice(2)
  }

  if (body.length === 0 || body === "*") {
    throw new MalformedListError(`Rule ${token} has no concrete labels`, lineNumber)
  }

  const labels = body.split(".").map((label) => {
    if (label.length === 0) {
      throw new MalformedListError(`Rule ${token} contains an empty label`, lineNumber)
    }
    if (label.includes("*") || label.includes("!")) {
      throw new MalformedListError(`Rule ${token} has a marker outside the leftmost label`, lineNumber)
    }

    try {
      return toAsciiLabel(label)
    } catch (error) {
      throw new MalformedListError(`Rule ${token} cannot be encoded`, lineNumber, { cause: error })
    }
  })

  if (kind === "exception" && labels.length < 2) {
    throw new MalformedListError(`Exception rule ${token} must have at least two labels`, lineNumber)
  }

  return { kind, labels }
}

/**
 * Parses the public suffix list text format into a {@link SuffixList}.
 *
 * Throws {@link MalformedListError} on the first structural problem; no
 * partially built list is ever returned.
 */
export function parseSuffixList(source: SuffixListSource): SuffixList {
  const text = decodeSource(source).replace(/^\uFEFF/, "")
  const lines = text.split(/\r?\n/)
  const rules: Rule[] = []
  const declared = new Map<string, { kind: RuleKind; line: number }[]>()

  let section: Section | null = null
  let sectionStartedAt = 0

  for (let index = 0; index < lines.length; index += 1) {
    const lineNumber = index + 1
    const line = (lines[index] ?? "").trim()

    const marker = SECTION_MARKER_RE.exec(line)
    if (marker) {
      const [, edge, name] = marker
      const markerSection: Section = name === "PRIVATE" ? "private" : "icann"

      if (edge === "BEGIN") {
        if (section !== null) {
          throw new MalformedListError(`${name} section begins inside the ${section} section`, lineNumber)
        }
        section = markerSection
        sectionStartedAt = lineNumber
      } else {
        if (section !== markerSection) {
          throw new MalformedListError(`${name} section ends without a matching BEGIN`, lineNumber)
        }
        section = null
      }
      continue
    }

    if (line.length === 0 || COMMENT_RE.test(line)) {
      continue
    }

    if (section === null) {
      throw new MalformedListError(`Rule outside of any section: ${line}`, lineNumber)
    }

    const token = RULE_TOKEN_RE.exec(line)?.[0] ?? line
    const { kind, labels } = parseRule(token, lineNumber)
    const key = labels.join(".")
    const seen = declared.get(key) ?? []

    const clash = seen.find(
      (other) => (other.kind === "plain" && kind === "exception") || (other.kind === "exception" && kind === "plain"),
    )
    if (clash) {
      throw new MalformedListError(
        `Rule ${token} conflicts with the ${clash.kind} rule on line ${clash.line}`,
        lineNumber,
      )
    }

    seen.push({ kind, line: lineNumber })
    declared.set(key, seen)
    rules.push({ kind, labels, section, text: formatRule(kind, labels) })
  }

  if (section !== null) {
    throw new MalformedListError(`${section.toUpperCase()} section opened on line ${sectionStartedAt} is never closed`, lines.length)
  }

  return SuffixList.fromRules(rules)
}
