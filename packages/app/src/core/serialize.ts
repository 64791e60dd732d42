import * as Either from "effect/Either"
import { Match } from "effect"
import * as Option from "effect/Option"
import { stringify as stringifyToml } from "smol-toml"
import { stringify as stringifyYaml } from "yaml"

import type { SerializeError } from "./errors.js"
import { errorMessage, serializeError } from "./errors.js"
import type { Format } from "./format.js"
import { renderJsonText } from "./json.js"
import type { Native, Value } from "./value.js"
import { describe, findNode, toNative } from "./value.js"

// CHANGE: serialize the generic value into the output format
// WHY: every serializer dispatches on value shape only, never on the source format
// QUOTE(TZ): "produce the canonical textual encoding for that format or fail with a SerializeError"
// REF: req-serialize-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f,v: serialize(f, v) = Right(s) → parse(f, s) ≡ v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unrepresentable values fail before the library is called
// COMPLEXITY: O(n) where n = number of nodes

const isNonFinite = (node: Value): boolean => node._tag === "Float" && !Number.isFinite(node.value)

const isNull = (node: Value): boolean => node._tag === "Null"

const attempt = (format: Format, render: () => string): Either.Either<string, SerializeError> =>
  Either.try({
    try: render,
    catch: (error) => serializeError(format, errorMessage(error))
  })

// Compact, without a trailing newline, keys in entry order.
const serializeJson = (value: Value): Either.Either<string, SerializeError> => {
  const nonFinite = findNode(value, isNonFinite)
  if (Option.isSome(nonFinite)) {
    return Either.left(
      serializeError("json", `non-finite number at ${nonFinite.value.path} cannot be represented in JSON`)
    )
  }
  return Either.right(renderJsonText(value))
}

const ensureTrailingNewline = (text: string): string =>
  text.length === 0 || text.endsWith("\n") ? text : `${text}\n`

const serializeToml = (value: Value): Either.Either<string, SerializeError> => {
  if (value._tag !== "Mapping") {
    return Either.left(
      serializeError("toml", `document root must be a table, found ${describe(value)}`)
    )
  }
  const nullNode = findNode(value, isNull)
  if (Option.isSome(nullNode)) {
    return Either.left(serializeError("toml", `null at ${nullNode.value.path} cannot be represented in TOML`))
  }
  const table = Object.fromEntries(value.entries.map(([key, item]): [string, Native] => [key, toNative(item)]))
  return Either.map(attempt("toml", () => stringifyToml(table)), ensureTrailingNewline)
}

const serializeYaml = (value: Value): Either.Either<string, SerializeError> =>
  attempt("yaml", () => stringifyYaml(toNative(value, "map")))

/**
 * Serialize a Value into the given output format.
 *
 * @param format - Selected output format.
 * @param value - Parsed document.
 * @returns Either with the encoded document or a SerializeError.
 *
 * @pure true
 * @invariant no implicit coercion between value kinds
 * @complexity O(n)
 */
export const serializeDocument = (
  format: Format,
  value: Value
): Either.Either<string, SerializeError> =>
  Match.value(format).pipe(
    Match.when("json", () => serializeJson(value)),
    Match.when("toml", () => serializeToml(value)),
    Match.when("yaml", () => serializeYaml(value)),
    Match.exhaustive
  )
