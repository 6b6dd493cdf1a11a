import {
  MergeOptions,
  MergeRule,
  WordFrequencyTable,
  applyMergeRules,
  computePairStats,
  createWordFrequencyTable,
  insertWord,
  mergeVocabulary,
  selectBestPair,
} from './core'
import { TokenCatalog, deriveTokens, sortTokens } from './catalog'
import { addText, wordToSymbols } from './corpus'
import { tokenize } from './tokenizer'
import { END_OF_WORD, UNKNOWN_MARKER, wordKey } from './symbol'

/**
 * @description to be stored to file for restoring, e.g. ["lo", "w", 5]
 */
export type CompactMerge = [a: string, b: string, frequency: number]

/** @description for BPEModel.fromJSON() */
export type BPEModelJSON = {
  version: 1
  end_of_word: string
  /** @description current vocabulary, after all merges */
  words: [symbols: string, frequency: number][]
  /** @description in merge order */
  merges: CompactMerge[]
}

export function compactMerge(merge: MergeRule): CompactMerge {
  let [a, b] = merge.pair
  return [a, b, merge.frequency]
}

export function isCompactMerge(value: unknown): value is CompactMerge {
  return (
    Array.isArray(value) &&
    value.length == 3 &&
    typeof value[0] == 'string' &&
    typeof value[1] == 'string' &&
    typeof value[2] == 'number'
  )
}

export class BPEModel {
  /** @description replaced by a new table after each merge */
  table: WordFrequencyTable = createWordFrequencyTable()

  /** @description for export, merge.index is the position in this array */
  merges: MergeRule[] = []

  /** @description cache for getCachedSortedTokens() */
  protected sorted_tokens: string[] | null = null

  /**
   * @description add new content to corpus.
   * The words are segmented with the existing merges,
   * so content can be added after restoring merges.
   */
  addToCorpus(content: string) {
    let added = createWordFrequencyTable()
    addText(added, content)
    for (let word of added.values()) {
      let symbols = applyMergeRules(word.symbols, this.merges)
      insertWord(this.table, { symbols, frequency: word.frequency })
    }
    this.sorted_tokens = null
  }

  /**
   * @description called by `mergeUntil()`.
   * Can be used to implement custom iteration conditions.
   */
  findNextMerge(options?: MergeOptions): MergeRule | null {
    let stats = computePairStats(this.table)
    let best = selectBestPair(stats, options)
    if (!best) return null
    return {
      pair: best.pair,
      index: this.merges.length,
      frequency: best.frequency,
    }
  }

  /**
   * @description called by `mergeUntil()`.
   * Can be used to implement custom iteration conditions.
   */
  applyMerge(merge: MergeRule) {
    if (merge.index != this.merges.length) {
      throw new Error(
        `out of order merge, expect index ${this.merges.length}, got ${merge.index}`,
      )
    }
    this.table = mergeVocabulary(merge.pair, this.table)
    this.merges.push(merge)
    this.sorted_tokens = null
  }

  /**
   * @description call `findNextMerge()` and `applyMerge()` in loop
   * @returns number of merges applied, can be less than max_iterations
   */
  mergeUntil(
    options?: MergeOptions & {
      /** @default unlimited */
      max_iterations?: number
      /** @description called after each merge is applied */
      onMerge?: (merge: MergeRule) => void
    },
  ): number {
    let max_iterations = options?.max_iterations
    let count = 0
    for (
      let iteration = 1;
      max_iterations === undefined || iteration <= max_iterations;
      iteration++
    ) {
      let merge = this.findNextMerge(options)
      if (!merge) break
      this.applyMerge(merge)
      options?.onMerge?.(merge)
      count++
    }
    return count
  }

  /**
   * @description restore merge produced from `compactMerge(this.findNextMerge())`.
   * To be used after restart for continuous merging.
   */
  restoreMerge(compact: CompactMerge) {
    if (!isCompactMerge(compact)) {
      throw new Error('invalid merge: ' + JSON.stringify(compact))
    }
    let [a, b, frequency] = compact
    this.applyMerge({ pair: [a, b], index: this.merges.length, frequency })
  }

  getCatalog(): TokenCatalog {
    return deriveTokens(this.table)
  }

  /** @description tokens in the priority order of tokenize() */
  getSortedTokens(): string[] {
    return this.getCachedSortedTokens().slice()
  }

  protected getCachedSortedTokens(): readonly string[] {
    if (!this.sorted_tokens) {
      this.sorted_tokens = sortTokens(this.getCatalog().token_frequencies)
    }
    return this.sorted_tokens
  }

  /** @description segment a single word by replaying the merges */
  encodeWord(word: string): string[] {
    return applyMergeRules(wordToSymbols(word), this.merges)
  }

  /**
   * @description greedy tokenize each whitespace-delimited word (with "</w>" appended)
   * against the current vocabulary
   */
  tokenize(content: string, unknown_marker: string = UNKNOWN_MARKER): string[] {
    let sorted_tokens = this.getCachedSortedTokens()
    let tokens: string[] = []
    for (let word of content.trim().split(/\s+/)) {
      if (!word) continue
      tokens.push(
        ...tokenize(word + END_OF_WORD, sorted_tokens, unknown_marker),
      )
    }
    return tokens
  }

  /** @description end-of-word markers become spaces */
  decodeTokens(tokens: readonly string[]): string {
    return tokens.join('').replaceAll(END_OF_WORD, ' ').trimEnd()
  }

  /**
   * @description export vocabulary and merge list.
   * The json can be used to restore after restart, or to populate database with BPEModelDB.
   */
  toJSON(): BPEModelJSON {
    let words: BPEModelJSON['words'] = []
    for (let word of this.table.values()) {
      words.push([wordKey(word.symbols), word.frequency])
    }
    return {
      version: 1,
      end_of_word: END_OF_WORD,
      words,
      merges: this.merges.map(compactMerge),
    }
  }

  /** @description restore from json (after restart) */
  fromJSON(json: BPEModelJSON) {
    if (
      json.version !== 1 ||
      json.end_of_word !== END_OF_WORD ||
      !Array.isArray(json.words) ||
      !Array.isArray(json.merges) ||
      !json.merges.every(isCompactMerge)
    )
      throw new Error('invalid format')
    let table = createWordFrequencyTable()
    for (let entry of json.words) {
      if (
        !Array.isArray(entry) ||
        entry.length != 2 ||
        typeof entry[0] !== 'string' ||
        typeof entry[1] !== 'number' ||
        !(entry[1] > 0)
      ) {
        throw new Error('invalid format')
      }
      let [symbols, frequency] = entry
      insertWord(table, { symbols: symbols.split(' '), frequency })
    }
    this.table = table
    this.merges = json.merges.map(
      ([a, b, frequency], index): MergeRule => ({
        pair: [a, b],
        index,
        frequency,
      }),
    )
    this.sorted_tokens = null
  }
}
