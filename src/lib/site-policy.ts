import type { DomainClassifier } from "../services/domain-classifier"
import { joinLabels, splitLabels } from "./labels"

export type CookieDomainAction = "accept" | "reject"

export interface CookieDomainResult {
  domain: string
  action: CookieDomainAction
  reason?: string
}

function canonicalName(input: string): string {
  return joinLabels(splitLabels(input.replace(/^\.+/, "")).labels, "ascii")
}

export function domainMatches(host: string, domain: string): boolean {
  const normalizedHost = canonicalName(host)
  const normalizedDomain = canonicalName(domain)

  return normalizedHost === normalizedDomain || normalizedHost.endsWith(`.${normalizedDomain}`)
}

function siteOf(classifier: DomainClassifier, host: string): string {
  const result = classifier.classify(host, { knownSuffixesOnly: false })
  return result.ascii.root ?? result.ascii.name
}

export function isSameSite(classifier: DomainClassifier, a: string, b: string): boolean {
  return siteOf(classifier, a) === siteOf(classifier, b)
}

/**
 * Decides whether `host` may set a cookie scoped to `cookieDomain`, the way
 * user agents guard against supercookies on public suffixes.
 */
export function evaluateCookieDomain(
  classifier: DomainClassifier,
  host: string,
  cookieDomain: string,
): CookieDomainResult {
  const domain = canonicalName(cookieDomain)
  const normalizedHost = canonicalName(host)

  if (!domainMatches(normalizedHost, domain)) {
    return {
      domain,
      action: "reject",
      reason: `Host ${normalizedHost} does not domain-match ${domain}`,
    }
  }

  if (classifier.isSuffix(domain, { knownSuffixesOnly: false }) && domain !== normalizedHost) {
    return {
      domain,
      action: "reject",
      reason: `Cookie domain ${domain} is a public suffix`,
    }
  }

  return {
    domain,
    action: "accept",
  }
}
