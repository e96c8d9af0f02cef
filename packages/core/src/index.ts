export * from './types'
export * from './format'
export * from './errors'
export * from './bytes'
export * from './config'
export * from './bcd'
export * from './logger'
