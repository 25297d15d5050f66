export type LogData = Record<string, unknown>

export interface Logger {
  debug(message: string, data?: LogData): void
  info(message: string, data?: LogData): void
  warn(message: string, data?: LogData): void
}

function format(scope: string, message: string, data?: LogData): string {
  const tail = data && Object.keys(data).length ? ` ${JSON.stringify(data)}` : ''
  return `[brevity:${scope}] ${message}${tail}`
}

/**
 * Console logger with a scope prefix. Debug lines are printed only when
 * `debug` is on; the caller decides (CLI flag / env), not the logger.
 */
export function createLogger(scope: string, opts: { debug?: boolean } = {}): Logger {
  const debugOn = !!opts.debug
  return {
    debug(message, data) {
      if (debugOn) console.log(format(scope, message, data))
    },
    info(message, data) {
      console.log(format(scope, message, data))
    },
    warn(message, data) {
      console.warn(format(scope, message, data))
    },
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
}
