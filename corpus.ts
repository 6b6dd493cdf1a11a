import { accessSync, constants, createReadStream, readFileSync } from 'fs'
import { stream_lines } from '@beenotung/tslib/file-stream'
import { END_OF_WORD } from './symbol'
import {
  WordFrequencyTable,
  createWordFrequencyTable,
  insertWord,
} from './core'

export class CorpusUnreadableError extends Error {
  constructor(
    public file: string,
    cause: unknown,
  ) {
    super(`failed to read corpus file: ${JSON.stringify(file)}`, { cause })
    this.name = 'CorpusUnreadableError'
  }
}

/** @description e.g. "low" -> ["l", "o", "w", "</w>"] */
export function wordToSymbols(word: string): string[] {
  if (!word || /\s/.test(word)) {
    throw new Error(
      'invalid word, expect non-empty text without whitespace, got: ' +
        JSON.stringify(word),
    )
  }
  let symbols: string[] = []
  for (let char of word) {
    symbols.push(char)
  }
  symbols.push(END_OF_WORD)
  return symbols
}

export function addWord(table: WordFrequencyTable, word: string, count = 1) {
  insertWord(table, { symbols: wordToSymbols(word), frequency: count })
}

/** @description split by whitespace, empty words are skipped */
export function addLine(table: WordFrequencyTable, line: string) {
  for (let word of line.trim().split(/\s+/)) {
    if (word) {
      addWord(table, word)
    }
  }
}

export function addText(table: WordFrequencyTable, text: string) {
  for (let line of text.split('\n')) {
    addLine(table, line)
  }
}

/**
 * @example "low low lower" -> { "l o w </w>": 2, "l o w e r </w>": 1 }
 */
export function textToWordFrequencyTable(text: string): WordFrequencyTable {
  let table = createWordFrequencyTable()
  addText(table, text)
  return table
}

/** @description read the whole file as utf-8 */
export function readCorpusFile(file: string): WordFrequencyTable {
  let text: string
  try {
    text = readFileSync(file, 'utf8')
  } catch (error) {
    throw new CorpusUnreadableError(file, error)
  }
  return textToWordFrequencyTable(text)
}

/** @description read the file line by line */
export async function streamCorpusFile(
  file: string,
): Promise<WordFrequencyTable> {
  let table = createWordFrequencyTable()
  try {
    accessSync(file, constants.R_OK)
    for await (let line of stream_lines(createReadStream(file))) {
      addLine(table, line)
    }
  } catch (error) {
    throw new CorpusUnreadableError(file, error)
  }
  return table
}
