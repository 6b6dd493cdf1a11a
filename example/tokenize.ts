import { readCorpusFile } from '../corpus'
import { loadMergeLog } from '../merge-log'
import { BPEModel } from '../model'

async function main() {
  let mergeFile = process.argv[2] || 'merge.log'
  let corpusFile = process.argv[3] || 'corpus.txt'
  let text = process.argv.slice(4).join(' ') || 'lowest newer wider'

  let model = new BPEModel()
  model.table = readCorpusFile(corpusFile)

  console.time('restore merges')
  for (let merge of await loadMergeLog(mergeFile)) {
    model.restoreMerge(merge)
  }
  console.timeEnd('restore merges')

  let tokens = model.tokenize(text)
  console.log({
    text,
    tokens,
    encoded: text
      .trim()
      .split(/\s+/)
      .filter(word => word)
      .map(word => model.encodeWord(word)),
  })
}
main().catch(e => console.error(e))
