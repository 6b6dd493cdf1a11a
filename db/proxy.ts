import { proxySchema, ProxySchemaOptions } from 'better-sqlite3-proxy'

export type Word = {
  id?: null | number
  /** @description symbols joined by space, e.g. "lo w </w>" */
  symbols: string
  frequency: number
}

export type Merge = {
  id?: null | number
  a: string
  b: string
  frequency: number
}

export type DBProxy = {
  word: Word[]
  merge: Merge[]
}

export let tableFields: ProxySchemaOptions<DBProxy>['tableFields'] = {
  word: [],
  merge: [],
}

export function createProxy(
  options: Omit<ProxySchemaOptions<DBProxy>, 'tableFields'>,
) {
  return proxySchema<DBProxy>({
    tableFields,
    ...options,
  })
}
