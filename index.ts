export * from './symbol'
export * from './core'
export * from './catalog'
export * from './tokenizer'
export * from './corpus'
export * from './model'
export * from './merge-log'
