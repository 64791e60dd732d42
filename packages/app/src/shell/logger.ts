import * as Logger from "effect/Logger"

// CHANGE: route Effect logs to stderr in logfmt
// WHY: stdout carries the converted document only
// QUOTE(TZ): "Standard error: diagnostic messages on failure"
// REF: req-logging-1
// SOURCE: n/a
// FORMAT THEOREM: ∀log: log ∉ stdout
// PURITY: SHELL
// EFFECT: Layer<never>
// INVARIANT: minimum level stays Info unless --verbose lowers it
// COMPLEXITY: O(1)

export const StderrLogger = Logger.replace(
  Logger.defaultLogger,
  Logger.withConsoleError(Logger.logfmtLogger)
)
