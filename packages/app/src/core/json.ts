import * as Either from "effect/Either"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"

import type { Value } from "./value.js"

// CHANGE: decode JSON text and emit JSON in mapping entry order
// WHY: keys such as "__proto__" must survive as own keys, and output keeps the order the value holds
// QUOTE(TZ): "message includes the underlying diagnostic"
// REF: req-io-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v finite: JSON.parse(renderJsonText(v)) has the keys of v in entry order, up to integer-like keys
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: decoding never rebuilds objects; shape checks happen in fromNative
// COMPLEXITY: O(n)

// parseJson() without a target schema hands back the JSON.parse result as is.
const decodeJsonText = Schema.decodeUnknownEither(Schema.parseJson())

const formatIssues = (error: ParseResult.ParseError): string =>
  ParseResult.ArrayFormatter.formatErrorSync(error)
    .map((issue) => issue.message)
    .join("; ")

export const parseJsonText = (text: string): Either.Either<unknown, string> =>
  Either.mapLeft(decodeJsonText(text), formatIssues)

/**
 * Render a value as compact JSON, writing mapping entries in their stored order.
 * Callers reject non-finite floats first; JSON.stringify would write them as null.
 */
export const renderJsonText = (value: Value): string => {
  switch (value._tag) {
    case "Null":
      return "null"
    case "Boolean":
    case "Integer":
    case "Float":
    case "String":
      return JSON.stringify(value.value)
    case "Sequence":
      return `[${value.items.map(renderJsonText).join(",")}]`
    case "Mapping":
      return `{${value.entries.map(([key, item]) => `${JSON.stringify(key)}:${renderJsonText(item)}`).join(",")}}`
  }
}
