import * as NodeSink from "@effect/platform-node/NodeSink"
import * as NodeStream from "@effect/platform-node/NodeStream"
import * as Chunk from "effect/Chunk"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import type { LazyArg } from "effect/Function"
import * as Layer from "effect/Layer"
import * as Stream from "effect/Stream"
import type { Readable, Writable } from "node:stream"

import type { IoError } from "../core/errors.js"
import { errorMessage, ioError } from "../core/errors.js"

// CHANGE: expose standard streams as an Effect service
// WHY: the program reads stdin and writes stdout/stderr without touching process globals
// QUOTE(TZ): "read all of standard input → ... → write to standard output"
// REF: req-stdio-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: writeOutput(t) succeeds → t was handed to stdout as one chunk
// PURITY: SHELL
// EFFECT: Effect<Uint8Array, IoError> | Effect<void, IoError>
// INVARIANT: write failures, EPIPE included, are propagated as IoError
// COMPLEXITY: O(n)

export interface StdioService {
  readonly readInput: Effect.Effect<Uint8Array, IoError>
  readonly writeOutput: (text: string) => Effect.Effect<void, IoError>
  readonly writeError: (text: string) => Effect.Effect<void>
}

export const Stdio = Context.GenericTag<StdioService>("cyd/Stdio")

export interface StdioStreams {
  readonly stdin: LazyArg<Readable | NodeJS.ReadableStream>
  readonly stdout: LazyArg<Writable | NodeJS.WritableStream>
  readonly stderr: LazyArg<Writable | NodeJS.WritableStream>
}

const concatChunks = (chunks: Chunk.Chunk<Uint8Array>): Uint8Array =>
  Buffer.concat(Chunk.toReadonlyArray(chunks))

const readFrom = (stdin: StdioStreams["stdin"]): Effect.Effect<Uint8Array, IoError> =>
  NodeStream.fromReadable<IoError, Uint8Array>(
    stdin,
    (error) => ioError("read", errorMessage(error))
  ).pipe(
    Stream.runCollect,
    Effect.map(concatChunks)
  )

// The sink listens for 'error', so EPIPE fails the effect instead of the process.
const writeTo = <E>(
  writable: StdioStreams["stdout"],
  onError: (error: unknown) => E,
  text: string
): Effect.Effect<void, E> =>
  Stream.make(text).pipe(
    Stream.run(NodeSink.fromWritable(writable, onError, { endOnDone: false }))
  )

/**
 * Build the Stdio layer over the given streams.
 * The streams stay open after each write.
 */
export const makeNodeStdio = (streams: StdioStreams): Layer.Layer<StdioService> =>
  Layer.succeed(Stdio, {
    readInput: readFrom(streams.stdin),
    writeOutput: (text) => writeTo(streams.stdout, (error) => ioError("write", errorMessage(error)), text),
    writeError: (text) =>
      writeTo(streams.stderr, errorMessage, text).pipe(
        Effect.catchAll((message) => Effect.logWarning(`failed to write standard error: ${message}`))
      )
  })

export const NodeStdio: Layer.Layer<StdioService> = makeNodeStdio({
  stdin: () => process.stdin,
  stdout: () => process.stdout,
  stderr: () => process.stderr
})
