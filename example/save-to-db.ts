import { readCorpusFile } from '../corpus'
import { BPEModelDB, connectDB } from '../db'
import { BPEModel } from '../model'
import { parseCountArg } from './args'

function main() {
  let corpusFile = process.argv[2] || 'corpus.txt'
  let numMerges = parseCountArg(process.argv[3], 1000)
  let dbFile = process.argv[4] || 'bpe-model.sqlite3'

  let model = new BPEModel()
  model.table = readCorpusFile(corpusFile)

  console.time('merge tokens')
  let count = model.mergeUntil({ max_iterations: numMerges })
  console.timeEnd('merge tokens')

  let db = connectDB(dbFile)
  let modelDB = new BPEModelDB({ db })

  console.time('save to db')
  modelDB.saveModel(model)
  console.timeEnd('save to db')

  console.log({ merges: count, saved_merges: modelDB.getMergeCount() })
  db.close()
}
main()
