import { debugLog } from './debugLog'

export interface Log {
  info(message: string): void
  warn(message: string, error?: Error): void
  error(message: string, error?: Error): void
  debug(message: string): void
}

export class ConsoleLog implements Log {
  info(message: string): void {
    console.log(message)
  }

  warn(message: string, error?: Error): void {
    console.error(`[WARN] ${message}`)
    if (error) {
      debugLog({ event: 'warn', message, error: error.message })
    }
  }

  error(message: string, error?: Error): void {
    console.error(`[ERROR] ${message}`)
    if (error) {
      debugLog({ event: 'error', message, error: error.message, stack: error.stack })
    }
  }

  debug(message: string): void {
    debugLog({ event: 'debug', message })
  }
}

export type LogLevel = 'info' | 'warn' | 'error' | 'debug'

export interface LogEntry {
  level: LogLevel
  message: string
  error?: Error
}

/**
 * Collects entries instead of printing them
 */
export class MemoryLog implements Log {
  readonly entries: LogEntry[] = []

  info(message: string): void {
    this.entries.push({ level: 'info', message })
  }

  warn(message: string, error?: Error): void {
    this.entries.push({ level: 'warn', message, error })
  }

  error(message: string, error?: Error): void {
    this.entries.push({ level: 'error', message, error })
  }

  debug(message: string): void {
    this.entries.push({ level: 'debug', message })
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter(entry => entry.level === level).map(entry => entry.message)
  }
}
