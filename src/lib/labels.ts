import { toASCII, toUnicode } from "tr46"
import { InvalidInputError } from "../errors"
import type { Label } from "../types"

export const MAX_NAME_LENGTH = 255
export const MAX_LABEL_LENGTH = 63

// Raw names longer than this cannot fit in MAX_NAME_LENGTH octets once encoded.
const MAX_RAW_LENGTH = MAX_NAME_LENGTH * 4

const IDEOGRAPHIC_STOPS_RE = /[。．｡]/g
const NON_ASCII_RE = /[^\x00-\x7f]/

export interface SplitName {
  labels: Label[]
  /** The input ended with the root separator. */
  fqdn: boolean
}

// UTS #46 nontransitional mapping; host syntax is left to the caller.
const IDNA_OPTIONS = {
  checkBidi: false,
  checkHyphens: false,
  checkJoiners: false,
  useSTD3ASCIIRules: false,
}

const TO_ASCII_OPTIONS = {
  ...IDNA_OPTIONS,
  transitionalProcessing: false,
  verifyDNSLength: false,
}

/**
 * Maps one raw label to its Unicode and A-label forms.
 *
 * ASCII labels are only lower-cased; anything else goes through the IDNA
 * mapping table, which also folds case and compatibility forms.
 */
export function toLabel(raw: string): Label {
  if (!NON_ASCII_RE.test(raw)) {
    const value = raw.toLowerCase()
    return { value, ascii: value }
  }

  const ascii = toASCII(raw, TO_ASCII_OPTIONS)
  const unicode = toUnicode(raw, IDNA_OPTIONS)

  if (ascii === null || unicode.error) {
    throw new Error(`Label ${raw} is not a valid IDNA label`)
  }
  if (ascii.length === 0 || ascii.includes(".")) {
    throw new Error(`Label ${raw} does not map to exactly one label`)
  }

  return { value: unicode.domain, ascii }
}

export function toAsciiLabel(raw: string): string {
  return toLabel(raw).ascii
}

export function splitLabels(input: string): SplitName {
  if (input.length === 0) {
    throw new InvalidInputError("Domain name is empty", input)
  }

  if (input.length > MAX_RAW_LENGTH) {
    throw new InvalidInputError(`Domain name exceeds ${MAX_NAME_LENGTH} octets`, input)
  }

  let name = input.replace(IDEOGRAPHIC_STOPS_RE, ".")
  const fqdn = name.endsWith(".")
  if (fqdn) {
    name = name.slice(0, -1)
  }

  if (name.length === 0) {
    throw new InvalidInputError("Domain name has no labels", input)
  }

  const labels: Label[] = []
  let asciiLength = -1

  for (const raw of name.split(".")) {
    if (raw.length === 0) {
      throw new InvalidInputError("Domain name contains an empty label", input)
    }

    let label: Label
    try {
      label = toLabel(raw)
    } catch (error) {
      throw new InvalidInputError(`Label ${raw} cannot be encoded`, input, { cause: error })
    }

    if (label.ascii.length > MAX_LABEL_LENGTH) {
      throw new InvalidInputError(`Label exceeds ${MAX_LABEL_LENGTH} octets`, input)
    }

    asciiLength += label.ascii.length + 1
    labels.push(label)
  }

  if (asciiLength > MAX_NAME_LENGTH) {
    throw new InvalidInputError(`Domain name exceeds ${MAX_NAME_LENGTH} octets`, input)
  }

  return { labels, fqdn }
}

export function joinLabels(labels: readonly Label[], form: keyof Label = "value"): string {
  return labels.map((label) => label[form]).join(".")
}
