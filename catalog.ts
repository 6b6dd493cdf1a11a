import type { WordFrequencyTable } from './core'
import { END_OF_WORD, addOrInsert, getOrZero } from './symbol'

export type TokenCatalog = {
  /** @description symbol -> sum of the frequencies of the words containing it (once per occurrence) */
  token_frequencies: Map<string, number>
  /**
   * @description concatenated word (including "</w>") -> symbols, e.g. "lowest</w>" -> ["low", "est</w>"]
   *
   * When different symbol sequences concatenate into the same word,
   * the last one in the table wins.
   */
  word_to_symbols: Map<string, string[]>
}

export type TokenEntry = {
  token: string
  frequency: number
  /** @description measured by measureLength() */
  length: number
}

/**
 * @description length of a symbol in code points,
 * except each end-of-word marker is counted as 1
 */
export function measureLength(token: string): number {
  let length = 0
  let parts = token.split(END_OF_WORD)
  for (let part of parts) {
    length += Array.from(part).length
  }
  return length + parts.length - 1
}

export function deriveTokens(table: WordFrequencyTable): TokenCatalog {
  let token_frequencies = new Map<string, number>()
  let word_to_symbols = new Map<string, string[]>()
  for (let { symbols, frequency } of table.values()) {
    for (let symbol of symbols) {
      addOrInsert(token_frequencies, symbol, frequency)
    }
    word_to_symbols.set(symbols.join(''), symbols)
  }
  return { token_frequencies, word_to_symbols }
}

/**
 * @description sorted by length (desc), then frequency (desc), then token (asc).
 * Longer and more frequent tokens are tried first by the tokenizer.
 */
export function listTokenEntries(
  token_frequencies: ReadonlyMap<string, number>,
): TokenEntry[] {
  let entries: TokenEntry[] = []
  for (let token of token_frequencies.keys()) {
    entries.push({
      token,
      frequency: getOrZero(token_frequencies, token),
      length: measureLength(token),
    })
  }
  return entries.sort(
    (a, b) =>
      b.length - a.length ||
      b.frequency - a.frequency ||
      (a.token < b.token ? -1 : a.token > b.token ? 1 : 0),
  )
}

/** @description tokens in the priority order expected by tokenize() */
export function sortTokens(
  token_frequencies: ReadonlyMap<string, number>,
): string[] {
  return listTokenEntries(token_frequencies).map(entry => entry.token)
}
