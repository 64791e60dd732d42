import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as ConfigProvider from "effect/ConfigProvider"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { CliArgs } from "../../src/core/cli.js"
import type { EnvFormats } from "../../src/core/config.js"
import { loadEnvFormats, resolveFormats } from "../../src/core/config.js"
import { parseFormat } from "../../src/core/format.js"

const cli = (input: string | undefined, output: string | undefined): CliArgs => ({
  input,
  output,
  verbose: false,
  help: false,
  version: false
})

const env = (input?: string, output?: string): EnvFormats => ({
  input: Option.fromNullable(input),
  output: Option.fromNullable(output)
})

const leftMessage = <A>(either: Either.Either<A, { readonly message: string }>): string | undefined =>
  Option.getOrUndefined(Either.getLeft(either))?.message

describe("parseFormat", () => {
  it.effect("matches the allow-list case-insensitively", () =>
    Effect.sync(() => {
      expect(Option.getOrUndefined(parseFormat("JSON"))).toBe("json")
      expect(Option.getOrUndefined(parseFormat("Toml"))).toBe("toml")
      expect(Option.getOrUndefined(parseFormat("yaml"))).toBe("yaml")
    }))

  it.effect("rejects names outside the allow-list", () =>
    Effect.sync(() => {
      expect(Option.isNone(parseFormat("xml"))).toBe(true)
      expect(Option.isNone(parseFormat("yml"))).toBe(true)
      expect(Option.isNone(parseFormat(" json"))).toBe(true)
    }))
})

describe("resolveFormats", () => {
  it.effect("prefers flags over environment values", () =>
    Effect.sync(() => {
      const resolved = resolveFormats(cli("yaml", undefined), env("json", "TOML"))
      expect(Either.getOrUndefined(resolved)).toEqual({ input: "yaml", output: "toml" })
    }))

  it.effect("reports an invalid flag value verbatim", () =>
    Effect.sync(() => {
      expect(leftMessage(resolveFormats(cli("xml", "json"), env()))).toBe(
        "invalid value 'xml' for --input <FORMAT>; expected one of json, toml, yaml"
      )
    }))

  it.effect("does not echo an invalid environment value", () =>
    Effect.sync(() => {
      expect(leftMessage(resolveFormats(cli(undefined, "json"), env("test-secret")))).toBe(
        "invalid value in CYD_INPUT for --input <FORMAT>; expected one of json, toml, yaml"
      )
    }))

  it.effect("requires both formats", () =>
    Effect.sync(() => {
      expect(leftMessage(resolveFormats(cli("json", undefined), env()))).toBe(
        "missing required option --output <FORMAT> (or set CYD_OUTPUT)"
      )
    }))
})

describe("loadEnvFormats", () => {
  it.effect("reads both variables and treats empty values as unset", () =>
    Effect.gen(function*(_) {
      const provider = ConfigProvider.fromMap(new Map([["CYD_INPUT", "yaml"], ["CYD_OUTPUT", ""]]))
      const formats = yield* _(loadEnvFormats.pipe(Effect.withConfigProvider(provider)))
      expect(Option.getOrUndefined(formats.input)).toBe("yaml")
      expect(Option.isNone(formats.output)).toBe(true)
    }))
})
