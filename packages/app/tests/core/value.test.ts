import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import {
  boolean,
  equals,
  findNode,
  float,
  fromNative,
  integer,
  mapping,
  nullValue,
  sequence,
  string,
  toNative
} from "../../src/core/value.js"

const rightOf = Either.getOrUndefined

const leftOf = <A, E>(either: Either.Either<A, E>): E | undefined => Option.getOrUndefined(Either.getLeft(either))

describe("fromNative", () => {
  it.effect("maps plain data into tagged values", () =>
    Effect.sync(() => {
      const decoded = fromNative({ a: 1, b: [true, null], c: 1.5, d: "x" })
      expect(rightOf(decoded)).toEqual(
        mapping([
          ["a", integer(1)],
          ["b", sequence([boolean(true), nullValue])],
          ["c", float(1.5)],
          ["d", string("x")]
        ])
      )
    }))

  it.effect("classifies unsafe and non-finite numbers as floats", () =>
    Effect.sync(() => {
      expect(rightOf(fromNative(2 ** 60))).toEqual(float(2 ** 60))
      expect(rightOf(fromNative(Number.POSITIVE_INFINITY))).toEqual(float(Number.POSITIVE_INFINITY))
    }))

  it.effect("accepts bigint within the safe range", () =>
    Effect.sync(() => {
      expect(rightOf(fromNative(BigInt(42)))).toEqual(integer(42))
      expect(leftOf(fromNative(BigInt(2) ** BigInt(64)))).toBe("integer at $ is outside the safe integer range")
    }))

  it.effect("rejects date-time values with their path", () =>
    Effect.sync(() => {
      expect(leftOf(fromNative({ when: new Date(0) }))).toBe("date-time value at $.when is not supported")
    }))

  it.effect("rejects non-string map keys", () =>
    Effect.sync(() => {
      expect(leftOf(fromNative(new Map([[1, "a"]])))).toBe("mapping key 1 at $ is not a string")
    }))

  it.effect("quotes unusual keys in paths", () =>
    Effect.sync(() => {
      expect(leftOf(fromNative({ "a b": [undefined] }))).toBe("unsupported undefined value at $[\"a b\"][0]")
    }))

  it.effect("keeps Map entry order", () =>
    Effect.sync(() => {
      const decoded = fromNative(new Map<string, unknown>([["z", 1], ["a", 2]]))
      expect(rightOf(decoded)).toEqual(mapping([["z", integer(1)], ["a", integer(2)]]))
    }))
})

describe("toNative", () => {
  const value = mapping([["b", integer(1)], ["2", sequence([string("x"), nullValue])]])

  it.effect("builds plain objects by default", () =>
    Effect.sync(() => {
      expect(toNative(value)).toEqual({ b: 1, "2": ["x", null] })
    }))

  it.effect("keeps insertion order when building maps", () =>
    Effect.sync(() => {
      const native = toNative(value, "map")
      expect(native).toBeInstanceOf(Map)
      if (native instanceof Map) {
        expect([...native.keys()]).toEqual(["b", "2"])
      }
    }))

  it.effect("stores __proto__ as an own key", () =>
    Effect.sync(() => {
      const native = toNative(mapping([["__proto__", integer(1)]]))
      expect(Object.keys(native ?? {})).toEqual(["__proto__"])
    }))
})

describe("equals", () => {
  it.effect("ignores mapping key order", () =>
    Effect.sync(() => {
      const left = mapping([["a", integer(1)], ["b", string("x")]])
      const right = mapping([["b", string("x")], ["a", integer(1)]])
      expect(equals(left, right)).toBe(true)
    }))

  it.effect("distinguishes integers from floats", () =>
    Effect.sync(() => {
      expect(equals(integer(1), float(1))).toBe(false)
    }))

  it.effect("treats NaN as equal to itself", () =>
    Effect.sync(() => {
      expect(equals(float(Number.NaN), float(Number.NaN))).toBe(true)
    }))

  it.effect("compares sequences positionally", () =>
    Effect.sync(() => {
      expect(equals(sequence([integer(1), integer(2)]), sequence([integer(2), integer(1)]))).toBe(false)
      expect(equals(sequence([integer(1)]), sequence([integer(1), integer(1)]))).toBe(false)
    }))
})

describe("findNode", () => {
  it.effect("returns the path of the first match", () =>
    Effect.sync(() => {
      const value = mapping([["a", sequence([integer(1), nullValue])]])
      const found = findNode(value, (node) => node._tag === "Null")
      expect(Option.getOrUndefined(found)?.path).toBe("$.a[1]")
    }))

  it.effect("returns none when nothing matches", () =>
    Effect.sync(() => {
      expect(Option.isNone(findNode(string("x"), (node) => node._tag === "Null"))).toBe(true)
    }))
})
