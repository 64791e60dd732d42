import * as Config from "effect/Config"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { CliArgs } from "./cli.js"
import { inputEnvVar, outputEnvVar } from "./cli.js"
import type { ConfigError } from "./errors.js"
import { configError } from "./errors.js"
import type { Format } from "./format.js"
import { formats, parseFormat } from "./format.js"

// CHANGE: define format selection rules and their sources
// WHY: flags override environment defaults, and both are validated before any IO
// QUOTE(TZ): "the flag taking precedence when both are present"
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k ∈ {input,output}: resolve(cli, env).k = parse(cli.k ?? env.k)
// PURITY: CORE
// EFFECT: Effect<EnvFormats, ConfigError> for loadEnvFormats only
// INVARIANT: environment values never appear in diagnostics
// COMPLEXITY: O(1)/O(1)

export interface EnvFormats {
  readonly input: Option.Option<string>
  readonly output: Option.Option<string>
}

export interface ResolvedFormats {
  readonly input: Format
  readonly output: Format
}

const expected = `expected one of ${formats.join(", ")}`

const nonEmpty = (value: string): boolean => value.length > 0

const envFormat = (name: string): Config.Config<Option.Option<string>> =>
  Config.string(name).pipe(
    Config.option,
    Config.map((value) => Option.filter(value, nonEmpty))
  )

export const loadEnvFormats: Effect.Effect<EnvFormats, ConfigError> = Config.all({
  input: envFormat(inputEnvVar),
  output: envFormat(outputEnvVar)
}).pipe(Effect.mapError((error) => configError(String(error))))

const resolveOne = (
  flag: string,
  envVar: string,
  flagValue: string | undefined,
  envValue: Option.Option<string>
): Either.Either<Format, ConfigError> => {
  if (flagValue !== undefined) {
    return Option.match(parseFormat(flagValue), {
      onNone: () => Either.left(configError(`invalid value '${flagValue}' for ${flag} <FORMAT>; ${expected}`)),
      onSome: (format) => Either.right(format)
    })
  }
  if (Option.isSome(envValue)) {
    return Option.match(parseFormat(envValue.value), {
      onNone: () => Either.left(configError(`invalid value in ${envVar} for ${flag} <FORMAT>; ${expected}`)),
      onSome: (format) => Either.right(format)
    })
  }
  return Either.left(configError(`missing required option ${flag} <FORMAT> (or set ${envVar})`))
}

/**
 * Resolve input and output formats from CLI flags and environment defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param env - Values of CYD_INPUT / CYD_OUTPUT.
 * @returns Either with both formats or the first ConfigError.
 *
 * @pure true
 * @invariant input is checked before output
 * @complexity O(1)
 */
export const resolveFormats = (
  cli: CliArgs,
  env: EnvFormats
): Either.Either<ResolvedFormats, ConfigError> => {
  const input = resolveOne("--input", inputEnvVar, cli.input, env.input)
  if (Either.isLeft(input)) {
    return Either.left(input.left)
  }
  const output = resolveOne("--output", outputEnvVar, cli.output, env.output)
  if (Either.isLeft(output)) {
    return Either.left(output.left)
  }
  return Either.right({ input: input.right, output: output.right })
}
