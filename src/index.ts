import { DomainClassifier } from "./services/domain-classifier"
import { type SuffixListSource, parseSuffixList } from "./services/list-parser"
import type { ClassifyOptions } from "./types"

export { bundledListPath, defaultClassifyOptions, loadConfig } from "./config"
export type { AppConfig, LogLevel } from "./config"
export {
  DomainError,
  InvalidInputError,
  MalformedListError,
  NoRootDomainError,
  NoSuffixFoundError,
  isDomainError,
} from "./errors"
export type { DomainErrorKind } from "./errors"
export { createLogger } from "./logger"
export type { Logger } from "./logger"
export { MAX_LABEL_LENGTH, MAX_NAME_LENGTH, splitLabels } from "./lib/labels"
export type { SplitName } from "./lib/labels"
export { Once, once } from "./lib/once"
export { domainMatches, evaluateCookieDomain, isSameSite } from "./lib/site-policy"
export type { CookieDomainAction, CookieDomainResult } from "./lib/site-policy"
export { DomainClassifier } from "./services/domain-classifier"
export { createSuffixListSource, loadSuffixListFile } from "./services/list-loader"
export { parseSuffixList } from "./services/list-parser"
export type { SuffixListSource } from "./services/list-parser"
export { matchSuffix } from "./services/rule-matcher"
export { SuffixList } from "./services/suffix-list"
export type { RootBucket, SuffixListStats } from "./services/suffix-list"
export type * from "./types"

export function createClassifier(
  source: SuffixListSource,
  options: Partial<ClassifyOptions> = {},
): DomainClassifier {
  return new DomainClassifier(parseSuffixList(source), options)
}
