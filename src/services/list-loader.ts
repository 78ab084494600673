import { readFile } from "node:fs/promises"
import type { Logger } from "../logger"
import { Once, once } from "../lib/once"
import { parseSuffixList } from "./list-parser"
import type { SuffixList } from "./suffix-list"

export async function loadSuffixListFile(path: string, logger?: Logger): Promise<SuffixList> {
  const started = Date.now()

  try {
    const list = parseSuffixList(await readFile(path))
    logger?.info(
      {
        path,
        rules: list.stats.total,
        icann: list.stats.icann,
        private: list.stats.private,
        durationMs: Date.now() - started,
      },
      "suffix list loaded",
    )
    return list
  } catch (error) {
    logger?.error({ path, err: error }, "failed to load suffix list")
    throw error
  }
}

/** Loads the list from `path` on first use and hands every caller the same result. */
export function createSuffixListSource(path: string, logger?: Logger): Once<Promise<SuffixList>> {
  return once(() => loadSuffixListFile(path, logger))
}
