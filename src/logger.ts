import pino, { type DestinationStream, type Logger } from "pino"

export type { Logger } from "pino"

export interface LoggerOptions {
  debug: boolean
  logFile?: string
  destination?: DestinationStream
}

const REDACT_PATHS = [
  "vaultToken",
  "rootToken",
  "password",
  "*.vaultToken",
  "*.rootToken",
  "*.password",
]

// Console at info; under debug, console plus a truncated log file, both at debug.
export function createLogger(options: LoggerOptions): Logger {
  const level = options.debug ? "debug" : "info"
  const streams: pino.StreamEntry[] = [
    { level, stream: options.destination ?? process.stdout },
  ]

  if (options.debug && options.logFile) {
    streams.push({
      level: "debug",
      stream: pino.destination({ dest: options.logFile, append: false, mkdir: true, sync: true }),
    })
  }

  return pino(
    {
      level,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        paths: REDACT_PATHS,
        censor: "[redacted]",
      },
    },
    pino.multistream(streams),
  )
}

export function silentLogger(): Logger {
  return pino({ level: "silent" })
}
