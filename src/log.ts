// Tagged console logger.
//
// Every line goes to stderr so that stdout carries only what the operator
// needs to copy (peer id, key, saved path). Debug lines are dropped unless
// verbose output was switched on.

export interface Logger {
  debug(msg: string, ...args: unknown[]): void
  info(msg: string, ...args: unknown[]): void
  warn(msg: string, ...args: unknown[]): void
  error(msg: string, ...args: unknown[]): void
}

let verbose = false

export function setVerbose(on: boolean): void {
  verbose = on
}

export function isVerbose(): boolean {
  return verbose
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`
  return {
    debug(msg, ...args) {
      if (verbose) console.error(`${prefix} ${msg}`, ...args)
    },
    info(msg, ...args) {
      console.error(`${prefix} ${msg}`, ...args)
    },
    warn(msg, ...args) {
      console.warn(`${prefix} ${msg}`, ...args)
    },
    error(msg, ...args) {
      console.error(`${prefix} ${msg}`, ...args)
    }
  }
}
