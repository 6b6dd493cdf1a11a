import { startTimer } from '@beenotung/tslib/timer'
import { existsSync, unlinkSync } from 'fs'
import { streamCorpusFile } from '../corpus'
import { appendMergeLog } from '../merge-log'
import { BPEModel } from '../model'
import { parseCountArg } from './args'

async function main() {
  let corpusFile = process.argv[2] || 'corpus.txt'
  let numMerges = parseCountArg(process.argv[3], 1000)
  let mergeFile = process.argv[4] || 'merge.log'

  let model = new BPEModel()

  console.time('load corpus')
  model.table = await streamCorpusFile(corpusFile)
  console.timeEnd('load corpus')

  if (existsSync(mergeFile)) {
    unlinkSync(mergeFile)
  }

  let timer = startTimer('merge tokens')
  timer.setEstimateProgress(numMerges)
  let count = model.mergeUntil({
    max_iterations: numMerges,
    onMerge: merge => {
      appendMergeLog(mergeFile, merge)
      timer.tick()
    },
  })
  timer.end()

  let { token_frequencies } = model.getCatalog()
  console.log({
    words: model.table.size,
    merges: count,
    requested_merges: numMerges,
    vocabulary_size: token_frequencies.size,
  })
  if (count < numMerges) {
    console.log(`stopped after ${count} merges, no more pair to merge`)
  }
}
main().catch(e => console.error(e))
