import { Effect } from "effect"
import type * as Either from "effect/Either"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs, renderUsage, renderVersion } from "../core/cli.js"
import type { ResolvedFormats } from "../core/config.js"
import { loadEnvFormats, resolveFormats } from "../core/config.js"
import { type AppError, renderError } from "../core/errors.js"
import { decodeUtf8, parseDocument } from "../core/parse.js"
import { serializeDocument } from "../core/serialize.js"
import { Stdio, type StdioService } from "../shell/stdio.js"

// CHANGE: orchestrate select → parse → serialize with a single exit-code policy
// WHY: every failure becomes one stderr line and exit code 1
// QUOTE(TZ): "Takes a document on STDIN, converts it to the desired format and outputs on STDOUT"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv).exitCode ∈ {0, 1}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, never, Stdio>
// INVARIANT: formats are resolved before stdin is read; stdout is written at most once
// COMPLEXITY: O(n) where n = input size

export interface ProgramResult {
  readonly exitCode: number
}

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const convert = (
  stdio: StdioService,
  formats: ResolvedFormats
): Effect.Effect<void, AppError> =>
  Effect.gen(function*(_) {
    const bytes = yield* _(stdio.readInput)
    yield* _(Effect.logDebug("read standard input").pipe(Effect.annotateLogs("bytes", bytes.length)))
    const text = yield* _(fromEither(decodeUtf8(bytes, formats.input)))
    const parsed = yield* _(fromEither(parseDocument(formats.input, text)))
    yield* _(Effect.forEach(parsed.warnings, (warning) => Effect.logWarning(warning), { discard: true }))
    yield* _(Effect.logDebug("parsed document").pipe(Effect.annotateLogs("root", parsed.value._tag)))
    const output = yield* _(fromEither(serializeDocument(formats.output, parsed.value)))
    yield* _(Effect.logDebug("serialized document").pipe(Effect.annotateLogs("length", output.length)))
    yield* _(stdio.writeOutput(output))
  })

const withVerbosity = (cli: CliArgs) => <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
  cli.verbose ? Logger.withMinimumLogLevel(effect, LogLevel.Debug) : effect

const execute = (
  stdio: StdioService,
  argv: ReadonlyArray<string>
): Effect.Effect<void, AppError> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    if (cli.help) {
      return yield* _(stdio.writeOutput(renderUsage()))
    }
    if (cli.version) {
      return yield* _(stdio.writeOutput(renderVersion()))
    }
    const env = yield* _(loadEnvFormats)
    const formats = yield* _(fromEither(resolveFormats(cli, env)))
    yield* _(
      convert(stdio, formats).pipe(
        Effect.annotateLogs({ input: formats.input, output: formats.output }),
        withVerbosity(cli)
      )
    )
  })

/**
 * Run the converter with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with exit code 0 on success and 1 on any failure.
 *
 * @pure false
 * @effect Stdio, ConfigProvider
 * @invariant a failure writes exactly one diagnostic line to stderr
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, never, StdioService> =>
  Effect.gen(function*(_) {
    const stdio = yield* _(Stdio)
    return yield* _(
      execute(stdio, argv).pipe(
        Effect.as<ProgramResult>({ exitCode: 0 }),
        Effect.catchAll((error) =>
          stdio.writeError(`${renderError(error)}\n`).pipe(Effect.as<ProgramResult>({ exitCode: 1 }))
        )
      )
    )
  })
