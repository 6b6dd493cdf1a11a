import { measureLength } from './catalog'
import { SymbolPair, comparePair, pairKey, wordKey } from './symbol'

/**
 * @description a whitespace-delimited word from the corpus,
 * e.g. symbols: ["l", "o", "w", "</w>"]
 */
export type Word = {
  symbols: string[]
  frequency: number
}

/**
 * @description wordKey(symbols) -> Word, e.g. "l o w </w>" -> { symbols, frequency: 5 }
 *
 * Replaced by a new table on each merge, never updated during a merge.
 */
export type WordFrequencyTable = Map<string, Word>

export type PairStat = {
  pair: SymbolPair
  /** @description sum of the frequencies of the words containing the pair */
  frequency: number
}

/** @description pairKey(a, b) -> PairStat */
export type PairStats = Map<string, PairStat>

export type MergeRule = {
  pair: SymbolPair
  /** @description earlier merges have higher priority */
  index: number
  /** @description pair frequency when the merge was selected */
  frequency: number
}

export type MergeOptions = {
  /** @default 1 */
  min_weight?: number
  /** @default unlimited, measured by measureLength() */
  max_length?: number
}

export type TrainResult = {
  merges: MergeRule[]
  table: WordFrequencyTable
}

export class MalformedPairError extends Error {
  constructor(public pair: unknown) {
    super(
      'malformed pair, expect exactly 2 symbols, got: ' + JSON.stringify(pair),
    )
    this.name = 'MalformedPairError'
  }
}

export function createWordFrequencyTable(): WordFrequencyTable {
  return new Map()
}

/**
 * @description add the word into the table,
 * the frequency is summed if the same symbol sequence already exists.
 *
 * The existing Word is replaced instead of updated,
 * since it may be shared with the table of the previous merge.
 */
export function insertWord(table: WordFrequencyTable, word: Word) {
  let key = wordKey(word.symbols)
  let existing = table.get(key)
  if (existing) {
    table.set(key, {
      symbols: existing.symbols,
      frequency: existing.frequency + word.frequency,
    })
  } else {
    table.set(key, word)
  }
}

/** @description total number of symbols, weighted by word frequency */
export function countSymbols(table: WordFrequencyTable): number {
  let count = 0
  for (let word of table.values()) {
    count += word.symbols.length * word.frequency
  }
  return count
}

export function computePairStats(table: WordFrequencyTable): PairStats {
  let stats: PairStats = new Map()
  for (let { symbols, frequency } of table.values()) {
    for (let i = 0; i + 1 < symbols.length; i++) {
      let a = symbols[i]
      let b = symbols[i + 1]
      let key = pairKey(a, b)
      let stat = stats.get(key)
      if (stat) {
        stat.frequency += frequency
      } else {
        stats.set(key, { pair: [a, b], frequency })
      }
    }
  }
  return stats
}

export function getPairFrequency(stats: PairStats, pair: SymbolPair): number {
  return stats.get(pairKey(pair[0], pair[1]))?.frequency || 0
}

function checkPair(pair: SymbolPair) {
  if (!Array.isArray(pair) || pair.length !== 2) {
    throw new MalformedPairError(pair)
  }
  for (let symbol of pair) {
    if (typeof symbol !== 'string' || !symbol || /\s/.test(symbol)) {
      throw new MalformedPairError(pair)
    }
  }
}

/**
 * @description fuse each whole, non-overlapping occurrence of a + b, scanning left to right.
 * Returns the input array if there is no occurrence.
 */
export function mergeSymbols(symbols: string[], pair: SymbolPair): string[] {
  let [a, b] = pair
  let merged: string[] = []
  let matched = false
  for (let i = 0; i < symbols.length; i++) {
    if (symbols[i] == a && i + 1 < symbols.length && symbols[i + 1] == b) {
      merged.push(a + b)
      matched = true
      i++
    } else {
      merged.push(symbols[i])
    }
  }
  return matched ? merged : symbols
}

/**
 * @description e.g. ["e", "l"] with "h e l l o </w>" -> "h el l o </w>"
 */
export function mergeVocabulary(
  pair: SymbolPair,
  table: WordFrequencyTable,
): WordFrequencyTable {
  checkPair(pair)
  let v_out = createWordFrequencyTable()
  for (let word of table.values()) {
    let symbols = mergeSymbols(word.symbols, pair)
    insertWord(
      v_out,
      symbols == word.symbols ? word : { symbols, frequency: word.frequency },
    )
  }
  return v_out
}

/**
 * @description pick the most frequent pair.
 * Ties are broken by comparePair(), so the result does not depend on the insertion order of the stats.
 */
export function selectBestPair(
  stats: PairStats,
  options?: MergeOptions,
): PairStat | null {
  let min_weight = options?.min_weight || 1
  let max_length = options?.max_length

  let best: PairStat | null = null
  for (let stat of stats.values()) {
    if (stat.frequency < min_weight) continue
    if (max_length && measureLength(stat.pair[0] + stat.pair[1]) > max_length)
      continue
    if (
      !best ||
      stat.frequency > best.frequency ||
      (stat.frequency == best.frequency &&
        comparePair(stat.pair, best.pair) < 0)
    ) {
      best = stat
    }
  }
  return best
}

/**
 * @description merge the most frequent pair for `num_merges` times.
 * Stops early when no candidate pair is left,
 * in which case fewer merges than requested are returned.
 */
export function train(
  table: WordFrequencyTable,
  num_merges: number,
  options?: MergeOptions,
): TrainResult {
  let merges: MergeRule[] = []
  for (let index = 0; index < num_merges; index++) {
    let stats = computePairStats(table)
    let best = selectBestPair(stats, options)
    if (!best) break
    table = mergeVocabulary(best.pair, table)
    merges.push({ pair: best.pair, index, frequency: best.frequency })
  }
  return { merges, table }
}

/**
 * @description re-derive the segmentation of a new word by replaying the merges in priority order
 */
export function applyMergeRules(
  symbols: string[],
  merges: readonly MergeRule[],
): string[] {
  for (let merge of merges) {
    symbols = mergeSymbols(symbols, merge.pair)
  }
  return symbols
}
