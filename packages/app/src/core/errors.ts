import { Match } from "effect"

import type { Format } from "./format.js"
import { formatLabel } from "./format.js"

// CHANGE: unify error algebra for the conversion pipeline
// WHY: every failure maps to exit code 1 with a single diagnostic line
// QUOTE(TZ): "Exit codes: 0 success; 1 any failure"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: render(e) is a single line prefixed by its stage
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type IoError = {
  readonly _tag: "IoError"
  readonly operation: "read" | "write"
  readonly message: string
}
export type ParseError = {
  readonly _tag: "ParseError"
  readonly format: Format
  readonly message: string
}
export type SerializeError = {
  readonly _tag: "SerializeError"
  readonly format: Format
  readonly message: string
}

export type AppError = ConfigError | IoError | ParseError | SerializeError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const ioError = (operation: "read" | "write", message: string): IoError => ({
  _tag: "IoError",
  operation,
  message
})

export const parseError = (format: Format, message: string): ParseError => ({
  _tag: "ParseError",
  format,
  message
})

export const serializeError = (format: Format, message: string): SerializeError => ({
  _tag: "SerializeError",
  format,
  message
})

const oneLine = (message: string): string => {
  const first = message.split(/\r?\n/).find((line) => line.trim().length > 0)
  return (first ?? message).trim()
}

/**
 * Render an AppError as the diagnostic line written to stderr.
 *
 * @pure true
 * @invariant result contains no line breaks
 */
export const renderError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("ConfigError", (e) => `error: ${oneLine(e.message)}`),
    Match.tag("IoError", (e) =>
      e.operation === "read"
        ? `error: failed to read standard input: ${oneLine(e.message)}`
        : `error: failed to write standard output: ${oneLine(e.message)}`),
    Match.tag("ParseError", (e) => `${formatLabel(e.format)} parse error: ${oneLine(e.message)}`),
    Match.tag("SerializeError", (e) => `${formatLabel(e.format)} error: ${oneLine(e.message)}`),
    Match.exhaustive
  )

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
