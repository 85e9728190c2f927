import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"

// CHANGE: route Effect log output to stderr
// WHY: stdout carries only the JSON report so it can be piped
// REF: req-logging-1
// SOURCE: n/a
// FORMAT THEOREM: ∀msg: log(msg) writes to stderr only
// PURITY: SHELL
// EFFECT: Layer<never>
// INVARIANT: one line per log call, prefixed with the level label
// COMPLEXITY: O(1)

const formatMessage = (message: unknown): string =>
  Array.isArray(message) ? message.map((part) => String(part)).join(" ") : String(message)

export const stderrLogger = Logger.make(({ logLevel, message }) => {
  globalThis.console.error(`[${logLevel.label}] ${formatMessage(message)}`)
})

export const stderrLoggerLayer = Logger.replace(Logger.defaultLogger, stderrLogger)

export const levelFor = (options: { readonly silent: boolean; readonly verbose: boolean }): LogLevel.LogLevel => {
  if (options.silent) {
    return LogLevel.None
  }
  return options.verbose ? LogLevel.Debug : LogLevel.Info
}
