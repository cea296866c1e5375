export * from './types'
export * from './operations'
export * from './metrics'
