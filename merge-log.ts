import { appendFileSync, createReadStream, existsSync } from 'fs'
import { stream_lines } from '@beenotung/tslib/file-stream'
import type { MergeRule } from './core'
import { CompactMerge, compactMerge, isCompactMerge } from './model'

/** @description one json line per merge, e.g. ["l","o",5] */
export function appendMergeLog(file: string, merge: MergeRule) {
  let line = JSON.stringify(compactMerge(merge)) + '\n'
  appendFileSync(file, line)
}

export function parseMergeLine(line: string): CompactMerge {
  let json: unknown = JSON.parse(line)
  if (!isCompactMerge(json)) {
    throw new Error('invalid merge log line: ' + JSON.stringify(line))
  }
  return json
}

/** @description empty list if the merge log is not created yet */
export async function loadMergeLog(file: string): Promise<CompactMerge[]> {
  let merges: CompactMerge[] = []
  if (!existsSync(file)) return merges
  for await (let line of stream_lines(createReadStream(file))) {
    if (line) {
      merges.push(parseMergeLine(line))
    }
  }
  return merges
}
