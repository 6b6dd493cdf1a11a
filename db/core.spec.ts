import { expect } from 'chai'
import { BPEModel } from '../model'
import { BPEModelDB, connectDB, resetBPEModelDB } from './core'
import { unlinkSync } from 'fs'

let content = 'lowest lowest lowest lower lower'
let dbFile = 'bpe-model-test.sqlite3'

let db = connectDB(dbFile)

after(() => {
  db.close()
  unlinkSync(dbFile)
})

describe('BPEModelDB', () => {
  beforeEach(() => {
    resetBPEModelDB(db)
  })

  function trainModel(max_iterations: number) {
    let model = new BPEModel()
    model.addToCorpus(content)
    model.mergeUntil({ max_iterations })
    return model
  }

  it('should load empty model from empty database', () => {
    let modelDB = new BPEModelDB({ db })
    let model = modelDB.loadModel()
    expect(model.merges).to.deep.equal([])
    expect(model.table.size).to.equal(0)
    expect(modelDB.getMergeCount()).to.equal(0)
  })

  it('should save and load model', () => {
    let model = trainModel(3)

    let modelDB = new BPEModelDB({ db })
    modelDB.saveModel(model)

    expect(modelDB.getMergeCount()).to.equal(3)
    expect(modelDB.toJSON()).deep.equals(model.toJSON())
    expect(modelDB.loadModel().tokenize('lowest')).deep.equals(
      model.tokenize('lowest'),
    )
  })

  it('should replace previous model when saving', () => {
    let modelDB = new BPEModelDB({ db })
    modelDB.saveModel(trainModel(5))
    modelDB.saveModel(trainModel(2))

    expect(modelDB.getMergeCount()).to.equal(2)
    expect(modelDB.toJSON()).deep.equals(trainModel(2).toJSON())
  })

  it('should append merge log', () => {
    let modelDB = new BPEModelDB({ db })
    let model = new BPEModel()
    model.addToCorpus(content)
    model.mergeUntil({
      max_iterations: 2,
      onMerge: merge => modelDB.appendMerge(merge),
    })

    expect(modelDB.getMergeCount()).to.equal(2)
    expect(modelDB.toJSON().merges).deep.equals([
      ['l', 'o', 5],
      ['lo', 'w', 5],
    ])
  })
})
