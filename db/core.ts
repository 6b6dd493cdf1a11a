import DB, { BetterSqlite3Helper } from '@beenotung/better-sqlite3-helper'
import { DBProxy, createProxy } from './proxy'
import { migrationSQL } from './migration'
import type { MergeRule } from '../core'
import { BPEModel, BPEModelJSON, CompactMerge } from '../model'
import { END_OF_WORD, wordKey } from '../symbol'

export class BPEModelDB {
  db: BetterSqlite3Helper.DBInstance
  proxy: DBProxy

  /** @description used by loadModel() */
  protected select_word: {
    all(): { symbols: string; frequency: number }[]
  }

  /** @description used by loadModel() */
  protected select_merge: {
    all(): { a: string; b: string; frequency: number }[]
  }

  /** @description used by getMergeCount() */
  protected count_merge: { get(): number }

  constructor(options: { db: BetterSqlite3Helper.DBInstance }) {
    let { db } = options
    db.migrate({ migrations: [migrationSQL] })
    this.db = db
    this.proxy = createProxy({ db })

    this.select_word = db.prepare(/* sql */ `
      select symbols, frequency from word
      order by id asc
      `) as { all(): { symbols: string; frequency: number }[] }

    this.select_merge = db.prepare(/* sql */ `
      select a, b, frequency from merge
      order by id asc
      `) as { all(): { a: string; b: string; frequency: number }[] }

    this.count_merge = db
      .prepare(/* sql */ `select count(*) from merge`)
      .pluck() as { get(): number }

    this.saveModel = db.transaction(this.saveModel)
  }

  /** @description replace the stored vocabulary and merge list */
  saveModel(model: BPEModel) {
    let { proxy } = this
    proxy.word.length = 0
    proxy.merge.length = 0
    for (let word of model.table.values()) {
      proxy.word.push({
        symbols: wordKey(word.symbols),
        frequency: word.frequency,
      })
    }
    for (let merge of model.merges) {
      this.appendMerge(merge)
    }
  }

  /**
   * @description append a single merge, e.g. from `BPEModel.mergeUntil({ onMerge })`.
   * The stored vocabulary is not updated.
   */
  appendMerge(merge: MergeRule) {
    let [a, b] = merge.pair
    this.proxy.merge.push({ a, b, frequency: merge.frequency })
  }

  getMergeCount(): number {
    return this.count_merge.get()
  }

  toJSON(): BPEModelJSON {
    return {
      version: 1,
      end_of_word: END_OF_WORD,
      words: this.select_word
        .all()
        .map((word): [string, number] => [word.symbols, word.frequency]),
      merges: this.select_merge
        .all()
        .map((merge): CompactMerge => [merge.a, merge.b, merge.frequency]),
    }
  }

  loadModel(): BPEModel {
    let model = new BPEModel()
    model.fromJSON(this.toJSON())
    return model
  }
}

/** @description delete all words and merges from database */
export function resetBPEModelDB(db: BetterSqlite3Helper.DBInstance) {
  db.migrate({ migrations: [migrationSQL] })
  let proxy = createProxy({ db })
  proxy.merge.length = 0
  proxy.word.length = 0
}

export function connectDB(path: string) {
  return DB({
    path,
    migrate: false,
  })
}
