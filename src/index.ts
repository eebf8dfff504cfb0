export * from './contracts'
export * from './project'
export * from './tree'
export * from './recipes'
export * from './results'
export * from './reconcile'
export { ConfigLoader } from './config/ConfigLoader'
export { Log, ConsoleLog, MemoryLog } from './logging'
