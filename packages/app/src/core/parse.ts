import * as Either from "effect/Either"
import { Match } from "effect"
import { parse as parseTomlText, TomlError } from "smol-toml"
import { parseDocument as parseYamlDocument } from "yaml"

import type { ParseError } from "./errors.js"
import { errorMessage, parseError } from "./errors.js"
import type { Format } from "./format.js"
import { parseJsonText } from "./json.js"
import type { Value } from "./value.js"
import { fromNative } from "./value.js"

// CHANGE: parse stdin text into the generic value per input format
// WHY: one entrypoint dispatches to the format libraries and normalizes their failures
// QUOTE(TZ): "produce a Generic Value or fail with a ParseError"
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f,s: parse(f, s) = Right(v) → v ∈ Value
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: empty input is rejected for every format
// COMPLEXITY: O(n) where n = input length

export interface ParsedDocument {
  readonly value: Value
  readonly warnings: ReadonlyArray<string>
}

/**
 * Decode raw stdin bytes as UTF-8, rejecting malformed sequences.
 *
 * @pure true
 * @invariant a leading byte order mark is dropped
 */
export const decodeUtf8 = (bytes: Uint8Array, format: Format): Either.Either<string, ParseError> =>
  Either.try({
    try: () => new TextDecoder("utf-8", { fatal: true }).decode(bytes),
    catch: () => parseError(format, "input is not valid UTF-8")
  })

const parseJson = (text: string): Either.Either<unknown, string> => parseJsonText(text)

const tomlMessage = (error: unknown): string => {
  if (error instanceof TomlError) {
    const [first = error.message] = error.message.split("\n")
    return `${first} at line ${error.line}, column ${error.column}`
  }
  return errorMessage(error)
}

const parseToml = (text: string): Either.Either<unknown, string> =>
  Either.try({
    try: () => parseTomlText(text),
    catch: tomlMessage
  })

interface NativeDocument {
  readonly raw: unknown
  readonly warnings: ReadonlyArray<string>
}

const parseYaml = (text: string): Either.Either<NativeDocument, string> => {
  const document = parseYamlDocument(text)
  const [first] = document.errors
  if (first !== undefined) {
    return Either.left(first.message)
  }
  const warnings = document.warnings.map((warning) => warning.message)
  return Either.try({
    try: () => ({ raw: document.toJS({ mapAsMap: true }), warnings }),
    catch: errorMessage
  })
}

const withoutWarnings = (parsed: Either.Either<unknown, string>): Either.Either<NativeDocument, string> =>
  Either.map(parsed, (raw) => ({ raw, warnings: [] }))

const parseNative = (format: Format, text: string): Either.Either<NativeDocument, string> =>
  Match.value(format).pipe(
    Match.when("json", () => withoutWarnings(parseJson(text))),
    Match.when("toml", () => withoutWarnings(parseToml(text))),
    Match.when("yaml", () => parseYaml(text)),
    Match.exhaustive
  )

/**
 * Parse a complete document in the given format into a Value.
 *
 * @param format - Selected input format.
 * @param text - Entire decoded stdin contents.
 * @returns Either with the parsed document or a ParseError.
 *
 * @pure true
 * @invariant library diagnostics are carried verbatim in the error message
 * @complexity O(n)
 */
export const parseDocument = (
  format: Format,
  text: string
): Either.Either<ParsedDocument, ParseError> => {
  if (text.length === 0) {
    return Either.left(parseError(format, "empty document"))
  }
  const native = parseNative(format, text)
  if (Either.isLeft(native)) {
    return Either.left(parseError(format, native.left))
  }
  const value = fromNative(native.right.raw)
  if (Either.isLeft(value)) {
    return Either.left(parseError(format, value.left))
  }
  return Either.right({ value: value.right, warnings: native.right.warnings })
}
