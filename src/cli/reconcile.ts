#!/usr/bin/env node

import { toError } from '../contracts'
import { debugLog } from '../logging'
import { run } from './run'

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let inputData = ''
    process.stdin.setEncoding('utf8')

    // Set a timeout to prevent hanging
    const timeout = setTimeout(() => {
      reject(new Error('timeout waiting for input on stdin'))
    }, 5000)

    process.stdin.on('data', (chunk) => {
      inputData += chunk
    })
    process.stdin.on('end', () => {
      clearTimeout(timeout)
      resolve(inputData)
    })
    process.stdin.on('error', (error) => {
      clearTimeout(timeout)
      reject(error)
    })

    // Start reading immediately
    process.stdin.resume()
  })
}

// Only run if this is the main module
if (require.main === module) {
  ;(async () => {
    try {
      const outcome = await run(process.argv.slice(2), { readStdin })
      console.log(outcome.output)
      for (const warning of outcome.warnings) {
        console.error(`reconcile: warning: ${warning}`)
      }
      process.exit(outcome.exitCode)
    } catch (error) {
      const err = toError(error)
      debugLog({ event: 'command_failed', error: err.message, stack: err.stack })
      console.error(`reconcile: ${err.message}`)
      process.exit(1)
    }
  })()
}
