import { expect } from 'chai'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { WordFrequencyTable, createWordFrequencyTable, train } from './core'
import {
  CorpusUnreadableError,
  addWord,
  readCorpusFile,
  streamCorpusFile,
  textToWordFrequencyTable,
  wordToSymbols,
} from './corpus'

function toRecord(table: WordFrequencyTable): Record<string, number> {
  let words: Record<string, number> = {}
  for (let [key, word] of table) {
    words[key] = word.frequency
  }
  return words
}

let corpus_text = 'lowest lowest\n  lower\tlowest \n\nlower\n'

let expected_words = {
  'l o w e s t </w>': 3,
  'l o w e r </w>': 2,
}

describe('wordToSymbols', () => {
  it('should split into characters with end-of-word marker', () => {
    expect(wordToSymbols('low')).to.deep.equal(['l', 'o', 'w', '</w>'])
  })

  it('should split by code points', () => {
    expect(wordToSymbols('a😀')).to.deep.equal(['a', '😀', '</w>'])
  })

  it('should reject empty word and word with whitespace', () => {
    expect(() => wordToSymbols('')).to.throw('invalid word')
    expect(() => wordToSymbols('a b')).to.throw('invalid word')
    expect(() => wordToSymbols('a\tb')).to.throw('invalid word')
  })
})

describe('addWord', () => {
  it('should sum counts of repeated word', () => {
    let table = createWordFrequencyTable()
    addWord(table, 'ab')
    addWord(table, 'ab', 2)
    expect(toRecord(table)).to.deep.equal({ 'a b </w>': 3 })
  })

  it('should not insert word with whitespace', () => {
    let table = createWordFrequencyTable()
    expect(() => addWord(table, 'a b')).to.throw('invalid word')
    expect(table.size).to.equal(0)
  })

  it('should train on text with words separated by whitespace', () => {
    let { merges } = train(textToWordFrequencyTable('a b'), 5)
    expect(merges.map(merge => merge.pair)).to.deep.equal([
      ['a', '</w>'],
      ['b', '</w>'],
    ])
  })
})

describe('textToWordFrequencyTable', () => {
  it('should count whitespace-delimited words', () => {
    let table = textToWordFrequencyTable(corpus_text)
    expect(toRecord(table)).to.deep.equal(expected_words)
  })

  it('should merge "l" and "o" first', () => {
    let { merges, table } = train(textToWordFrequencyTable(corpus_text), 1)
    expect(merges[0].pair).to.deep.equal(['l', 'o'])
    expect(merges[0].frequency).to.equal(5)
    expect(toRecord(table)).to.deep.equal({
      'lo w e s t </w>': 3,
      'lo w e r </w>': 2,
    })
  })
})

describe('corpus file', () => {
  let dir = mkdtempSync(join(tmpdir(), 'bpe-corpus-'))
  let file = join(dir, 'corpus.txt')
  let missing_file = join(dir, 'missing.txt')

  before(() => {
    writeFileSync(file, corpus_text)
  })

  after(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should read corpus file', () => {
    expect(toRecord(readCorpusFile(file))).to.deep.equal(expected_words)
  })

  it('should stream corpus file line by line', async () => {
    let table = await streamCorpusFile(file)
    expect(toRecord(table)).to.deep.equal(expected_words)
  })

  it('should throw CorpusUnreadableError for missing file', () => {
    expect(() => readCorpusFile(missing_file)).to.throw(CorpusUnreadableError)
  })

  it('should reject with CorpusUnreadableError for missing file when streaming', async () => {
    let error: unknown
    try {
      await streamCorpusFile(missing_file)
    } catch (e) {
      error = e
    }
    expect(error).to.be.instanceOf(CorpusUnreadableError)
    expect(error).to.have.property('file', missing_file)
  })
})
