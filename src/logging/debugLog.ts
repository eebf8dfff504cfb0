import { appendFileSync, mkdirSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'

// Debug logging - only enabled when RECONCILE_DEBUG environment variable is set
export const isDebugEnabled = (): boolean =>
  process.env.RECONCILE_DEBUG === 'true' || process.env.RECONCILE_DEBUG === '1'

export const debugLog = (message: Record<string, unknown>): void => {
  if (!isDebugEnabled()) return

  const reconcileDir = join(homedir(), '.reconcile')
  const logPath = join(reconcileDir, 'debug.log')

  // Ensure directory exists
  mkdirSync(reconcileDir, { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}
