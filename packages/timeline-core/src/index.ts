export * from './extract'
export * from './segment'
export * from './normalize'
export * from './outliers'
export * from './aggregate'
export * from './trend'
export * from './series'
export * from './tables'
export * from './pipeline'
