export { debugLog, isDebugEnabled } from './debugLog'
export { Log, LogEntry, LogLevel, ConsoleLog, MemoryLog } from './Log'
