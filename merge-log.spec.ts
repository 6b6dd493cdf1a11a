import { expect } from 'chai'
import { mkdtempSync, readFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { appendMergeLog, loadMergeLog, parseMergeLine } from './merge-log'

describe('merge log', () => {
  let dir = mkdtempSync(join(tmpdir(), 'bpe-merge-log-'))
  let file = join(dir, 'merge.log')

  after(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should load empty list before the log is created', async () => {
    expect(await loadMergeLog(file)).to.deep.equal([])
  })

  it('should append one line per merge', () => {
    appendMergeLog(file, { pair: ['l', 'o'], index: 0, frequency: 5 })
    appendMergeLog(file, { pair: ['lo', 'w'], index: 1, frequency: 5 })
    expect(readFileSync(file, 'utf8')).to.equal(
      '["l","o",5]\n' + '["lo","w",5]\n',
    )
  })

  it('should load merges in order', async () => {
    expect(await loadMergeLog(file)).to.deep.equal([
      ['l', 'o', 5],
      ['lo', 'w', 5],
    ])
  })
})

describe('parseMergeLine', () => {
  it('should parse compact merge', () => {
    expect(parseMergeLine('["t","</w>",3]')).to.deep.equal(['t', '</w>', 3])
  })

  it('should reject invalid line', () => {
    expect(() => parseMergeLine('["a"]')).to.throw('invalid merge log line')
    expect(() => parseMergeLine('["a","b","c"]')).to.throw(
      'invalid merge log line',
    )
  })
})
