export type DomainErrorKind = "InvalidInput" | "MalformedList" | "NoSuffixFound" | "NoRootDomain"

export abstract class DomainError extends Error {
  abstract readonly kind: DomainErrorKind
}

export class InvalidInputError extends DomainError {
  readonly kind = "InvalidInput"

  constructor(
    message: string,
    readonly input: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = "InvalidInputError"
  }
}

export class MalformedListError extends DomainError {
  readonly kind = "MalformedList"

  constructor(
    message: string,
    readonly line: number | null,
    options?: ErrorOptions,
  ) {
    super(line === null ? message : `line ${line}: ${message}`, options)
    this.name = "MalformedListError"
  }
}

export class NoSuffixFoundError extends DomainError {
  readonly kind = "NoSuffixFound"

  constructor(readonly input: string) {
    super(`No known public suffix matches ${input}`)
    this.name = "NoSuffixFoundError"
  }
}

export class NoRootDomainError extends DomainError {
  readonly kind = "NoRootDomain"

  constructor(readonly input: string) {
    super(`${input} is a public suffix and has no registrable domain`)
    this.name = "NoRootDomainError"
  }
}

export function isDomainError(value: unknown): value is DomainError {
  return value instanceof DomainError
}
