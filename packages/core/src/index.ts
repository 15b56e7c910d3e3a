export * from './types'
export * from './schemas'
export * from './errors'
export * from './tokens'
export * from './logger'

export * from './diff/partition'
export * from './diff/lines'
export * from './plan/planner'
export * from './prompts'
export * from './response/schema'
export * from './engine'
export * from './chain'
export * from './aggregate'
export * from './render/md'
export * from './pipeline'
