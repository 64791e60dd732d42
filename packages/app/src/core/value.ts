import * as Either from "effect/Either"
import * as Option from "effect/Option"

// CHANGE: introduce a format-neutral document value
// WHY: any of the three formats is read into one model and any is written from it
// QUOTE(TZ): "null, boolean, integer, floating-point, string, sequence-of-Value, mapping-of-string-to-Value"
// REF: req-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ Value: fromNative(toNative(v)) ≡ v for finite, non-null-free trees
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: mapping keys are unique strings kept in insertion order
// COMPLEXITY: O(n) where n = number of nodes

export type NullValue = { readonly _tag: "Null" }
export type BooleanValue = { readonly _tag: "Boolean"; readonly value: boolean }
export type IntegerValue = { readonly _tag: "Integer"; readonly value: number }
export type FloatValue = { readonly _tag: "Float"; readonly value: number }
export type StringValue = { readonly _tag: "String"; readonly value: string }
export type SequenceValue = { readonly _tag: "Sequence"; readonly items: ReadonlyArray<Value> }
export type MappingValue = {
  readonly _tag: "Mapping"
  readonly entries: ReadonlyArray<readonly [string, Value]>
}

export type Value =
  | NullValue
  | BooleanValue
  | IntegerValue
  | FloatValue
  | StringValue
  | SequenceValue
  | MappingValue

export type Native =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Native>
  | { readonly [key: string]: Native }
  | ReadonlyMap<string, Native>

export const nullValue: NullValue = { _tag: "Null" }

export const boolean = (value: boolean): BooleanValue => ({ _tag: "Boolean", value })

export const integer = (value: number): IntegerValue => ({ _tag: "Integer", value })

export const float = (value: number): FloatValue => ({ _tag: "Float", value })

export const string = (value: string): StringValue => ({ _tag: "String", value })

export const sequence = (items: ReadonlyArray<Value>): SequenceValue => ({ _tag: "Sequence", items })

export const mapping = (entries: ReadonlyArray<readonly [string, Value]>): MappingValue => ({
  _tag: "Mapping",
  entries
})

/**
 * Classify a JS number: safe integers become Integer, everything else Float.
 */
export const number = (value: number): IntegerValue | FloatValue =>
  Number.isSafeInteger(value) ? integer(value) : float(value)

export const describe = (value: Value): string => value._tag.toLowerCase()

const simpleKey = /^[A-Za-z_][A-Za-z0-9_-]*$/

export const childPath = (path: string, key: string | number): string => {
  if (typeof key === "number") {
    return `${path}[${key}]`
  }
  return simpleKey.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`
}

const isPlainObject = (raw: object): boolean => {
  const proto: unknown = Object.getPrototypeOf(raw)
  return proto === Object.prototype || proto === null
}

const fromNativeAt = (raw: unknown, path: string): Either.Either<Value, string> => {
  if (raw === null) {
    return Either.right(nullValue)
  }
  if (typeof raw === "boolean") {
    return Either.right(boolean(raw))
  }
  if (typeof raw === "number") {
    return Either.right(number(raw))
  }
  if (typeof raw === "string") {
    return Either.right(string(raw))
  }
  if (typeof raw === "bigint") {
    return raw >= BigInt(Number.MIN_SAFE_INTEGER) && raw <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Either.right(integer(Number(raw)))
      : Either.left(`integer at ${path} is outside the safe integer range`)
  }
  if (raw instanceof Date) {
    return Either.left(`date-time value at ${path} is not supported`)
  }
  if (Array.isArray(raw)) {
    const source: ReadonlyArray<unknown> = raw
    const items: Array<Value> = []
    for (const [index, item] of source.entries()) {
      const decoded = fromNativeAt(item, childPath(path, index))
      if (Either.isLeft(decoded)) {
        return Either.left(decoded.left)
      }
      items.push(decoded.right)
    }
    return Either.right(sequence(items))
  }
  if (raw instanceof Map) {
    const source: ReadonlyMap<unknown, unknown> = raw
    const entries: Array<readonly [string, Value]> = []
    for (const [key, item] of source) {
      if (typeof key !== "string") {
        return Either.left(`mapping key ${String(key)} at ${path} is not a string`)
      }
      const decoded = fromNativeAt(item, childPath(path, key))
      if (Either.isLeft(decoded)) {
        return Either.left(decoded.left)
      }
      entries.push([key, decoded.right])
    }
    return Either.right(mapping(entries))
  }
  if (typeof raw === "object" && isPlainObject(raw)) {
    const source: ReadonlyArray<readonly [string, unknown]> = Object.entries(raw)
    const entries: Array<readonly [string, Value]> = []
    for (const [key, item] of source) {
      const decoded = fromNativeAt(item, childPath(path, key))
      if (Either.isLeft(decoded)) {
        return Either.left(decoded.left)
      }
      entries.push([key, decoded.right])
    }
    return Either.right(mapping(entries))
  }
  return Either.left(`unsupported ${typeof raw} value at ${path}`)
}

/**
 * Convert a value produced by a format library into a Value.
 *
 * @param raw - Parsed document as returned by JSON, YAML or TOML parsers.
 * @returns Either with the Value or a message naming the offending path.
 *
 * @pure true
 * @invariant Date, undefined, functions and non-string keys are rejected
 * @complexity O(n)
 */
export const fromNative = (raw: unknown): Either.Either<Value, string> => fromNativeAt(raw, "$")

export type MappingRepresentation = "object" | "map"

/**
 * Convert a Value back into plain JS data for a format library.
 *
 * `"map"` keeps insertion order for integer-like keys, which plain objects reorder.
 */
export const toNative = (value: Value, mappings: MappingRepresentation = "object"): Native => {
  switch (value._tag) {
    case "Null":
      return null
    case "Boolean":
    case "Integer":
    case "Float":
    case "String":
      return value.value
    case "Sequence":
      return value.items.map((item) => toNative(item, mappings))
    case "Mapping": {
      const entries = value.entries.map(([key, item]): [string, Native] => [key, toNative(item, mappings)])
      return mappings === "map" ? new Map(entries) : Object.fromEntries(entries)
    }
  }
}

const sameNumber = (left: number, right: number): boolean =>
  left === right || (Number.isNaN(left) && Number.isNaN(right))

/**
 * Structural equality; mapping comparison ignores key order.
 *
 * @pure true
 * @invariant equals(v, v) for every v, including Float(NaN)
 */
export const equals = (left: Value, right: Value): boolean => {
  switch (left._tag) {
    case "Null":
      return right._tag === "Null"
    case "Boolean":
      return right._tag === "Boolean" && right.value === left.value
    case "Integer":
      return right._tag === "Integer" && right.value === left.value
    case "Float":
      return right._tag === "Float" && sameNumber(left.value, right.value)
    case "String":
      return right._tag === "String" && right.value === left.value
    case "Sequence":
      return right._tag === "Sequence" &&
        right.items.length === left.items.length &&
        left.items.every((item, index) => {
          const other = right.items[index]
          return other !== undefined && equals(item, other)
        })
    case "Mapping": {
      if (right._tag !== "Mapping" || right.entries.length !== left.entries.length) {
        return false
      }
      const lookup = new Map(right.entries)
      return left.entries.every(([key, item]) => {
        const other = lookup.get(key)
        return other !== undefined && equals(item, other)
      })
    }
  }
}

export interface Located {
  readonly path: string
  readonly node: Value
}

/**
 * Depth-first search for the first node matching the predicate.
 */
export const findNode = (
  value: Value,
  predicate: (node: Value) => boolean,
  path = "$"
): Option.Option<Located> => {
  if (predicate(value)) {
    return Option.some({ path, node: value })
  }
  if (value._tag === "Sequence") {
    for (const [index, item] of value.items.entries()) {
      const found = findNode(item, predicate, childPath(path, index))
      if (Option.isSome(found)) {
        return found
      }
    }
  }
  if (value._tag === "Mapping") {
    for (const [key, item] of value.entries) {
      const found = findNode(item, predicate, childPath(path, key))
      if (Option.isSome(found)) {
        return found
      }
    }
  }
  return Option.none()
}
