/**
 * CLI Logger
 *
 * Console reporting for the CLI. The library itself never logs.
 */

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  success: (msg: string) => void
  warn: (msg: string) => void
  error: (msg: string) => void
}

/** Where log lines go: stdout-like and stderr-like writers */
export interface LogSink {
  out: (line: string) => void
  err: (line: string) => void
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
}

/**
 * Status lines go to `out`; debug lines and problems go to `err`.
 */
export function createLogger(quiet: boolean, verbose: boolean, sink: LogSink = consoleSink): Logger {
  return {
    log: (msg: string) => {
      if (!quiet) sink.out(msg)
    },
    verbose: (msg: string) => {
      if (verbose) sink.err(`  [debug] ${msg}`)
    },
    success: (msg: string) => {
      if (!quiet) sink.out(`  ✓ ${msg}`)
    },
    warn: (msg: string) => {
      if (!quiet) sink.err(`  ! ${msg}`)
    },
    error: (msg: string) => {
      sink.err(`  ✗ ${msg}`)
    }
  }
}
