export * from './io'
export * from './history'
export * from './trend'
export * from './store'
export { printTrendSummary } from './print'
