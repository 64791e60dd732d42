import { describe, expect, it } from "@effect/vitest"
import { Effect, Exit } from "effect"
import { Readable, Writable } from "node:stream"

import type { StdioStreams } from "../../src/shell/stdio.js"
import { makeNodeStdio, Stdio } from "../../src/shell/stdio.js"

const collecting = (chunks: Array<string>): Writable =>
  new Writable({
    write(chunk: unknown, _encoding, callback) {
      chunks.push(String(chunk))
      callback()
    }
  })

const broken = (): Writable =>
  new Writable({
    write(_chunk: unknown, _encoding, callback) {
      callback(new Error("write EPIPE"))
    }
  })

const streams = (overrides: Partial<StdioStreams>): StdioStreams => ({
  stdin: () => Readable.from([]),
  stdout: () => collecting([]),
  stderr: () => collecting([]),
  ...overrides
})

describe("makeNodeStdio", () => {
  it.effect("reads every chunk of stdin", () =>
    Effect.gen(function*(_) {
      const stdio = yield* _(Stdio)
      const bytes = yield* _(stdio.readInput)
      expect(new TextDecoder().decode(bytes)).toBe("a: 1\nb: 2\n")
    }).pipe(
      Effect.provide(makeNodeStdio(streams({
        stdin: () => Readable.from([Buffer.from("a: 1\n"), Buffer.from("b: 2\n")])
      })))
    ))

  it.effect("writes text to stdout", () => {
    const chunks: Array<string> = []
    return Effect.gen(function*(_) {
      const stdio = yield* _(Stdio)
      yield* _(stdio.writeOutput("{\"a\":1}"))
      expect(chunks.join("")).toBe("{\"a\":1}")
    }).pipe(Effect.provide(makeNodeStdio(streams({ stdout: () => collecting(chunks) }))))
  })

  it.effect("fails with a write IoError when stdout errors", () =>
    Effect.gen(function*(_) {
      const stdio = yield* _(Stdio)
      const error = yield* _(Effect.flip(stdio.writeOutput("{}")))
      expect(error).toEqual({ _tag: "IoError", operation: "write", message: "write EPIPE" })
    }).pipe(Effect.provide(makeNodeStdio(streams({ stdout: broken })))))

  it.effect("keeps going when stderr errors", () =>
    Effect.gen(function*(_) {
      const stdio = yield* _(Stdio)
      const exit = yield* _(Effect.exit(stdio.writeError("error: x\n")))
      expect(Exit.isSuccess(exit)).toBe(true)
    }).pipe(Effect.provide(makeNodeStdio(streams({ stderr: broken })))))
})
