/** @description appended to every word, counted as one unit of length */
export let END_OF_WORD = '</w>'

/** @description emitted by the tokenizer for unmatchable residue */
export let UNKNOWN_MARKER = '</u>'

/**
 * @description a merge candidate or a learned merge, e.g. ["l", "o"] -> "lo"
 */
export type SymbolPair = readonly [a: string, b: string]

/** @description key of a word in WordFrequencyTable, e.g. "l o w </w>" */
export function wordKey(symbols: readonly string[]): string {
  return symbols.join(' ')
}

/** @description key of a pair in PairStats */
export function pairKey(a: string, b: string): string {
  return a + ' ' + b
}

/** @description code unit order, used to break ties between equal-frequency pairs */
export function comparePair(x: SymbolPair, y: SymbolPair): number {
  if (x[0] != y[0]) return x[0] < y[0] ? -1 : 1
  if (x[1] != y[1]) return x[1] < y[1] ? -1 : 1
  return 0
}

export function getOrZero<K>(map: ReadonlyMap<K, number>, key: K): number {
  return map.get(key) || 0
}

export function addOrInsert<K>(map: Map<K, number>, key: K, delta: number) {
  map.set(key, getOrZero(map, key) + delta)
}
