import * as Either from "effect/Either"

import type { ConfigError } from "./errors.js"
import { configError } from "./errors.js"
import { formats } from "./format.js"

// CHANGE: implement deterministic CLI parsing for cyd
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "--input/-i FORMAT ... --output/-o FORMAT"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args contains only known flags
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected
// COMPLEXITY: O(n) where n = argv length

export const cliName = "cyd"
export const cliVersion = "0.1.0"

export const inputEnvVar = "CYD_INPUT"
export const outputEnvVar = "CYD_OUTPUT"

export interface CliArgs {
  readonly input: string | undefined
  readonly output: string | undefined
  readonly verbose: boolean
  readonly help: boolean
  readonly version: boolean
}

interface FlagStep {
  readonly next: CliArgs
  readonly consumed: number
}

const isFlag = (value: string): boolean => value.startsWith("-") && value.length > 1

const defaultArgs: CliArgs = {
  input: undefined,
  output: undefined,
  verbose: false,
  help: false,
  version: false
}

const readFlagValue = (
  label: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, ConfigError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(configError(`missing value for ${label} <FORMAT>`))
  }
  return Either.right(nextValue)
}

const parseValueFlag = (
  label: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => CliArgs
): Either.Either<FlagStep, ConfigError> =>
  Either.map(readFlagValue(label, inlineValue, nextValue), (value) => ({
    next: update(current, value),
    consumed: inlineValue === undefined ? 2 : 1
  }))

const parseSwitch = (
  label: string,
  current: CliArgs,
  inlineValue: string | undefined,
  update: (args: CliArgs) => CliArgs
): Either.Either<FlagStep, ConfigError> =>
  inlineValue === undefined
    ? Either.right({ next: update(current), consumed: 1 })
    : Either.left(configError(`${label} does not take a value`))

type FlagParser = (
  label: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<FlagStep, ConfigError>

const flagParsers: Record<string, FlagParser> = {
  input: (label, current, inlineValue, nextValue) =>
    parseValueFlag(label, current, inlineValue, nextValue, (args, value) => ({ ...args, input: value })),
  output: (label, current, inlineValue, nextValue) =>
    parseValueFlag(label, current, inlineValue, nextValue, (args, value) => ({ ...args, output: value })),
  verbose: (label, current, inlineValue) => parseSwitch(label, current, inlineValue, (args) => ({ ...args, verbose: true })),
  help: (label, current, inlineValue) => parseSwitch(label, current, inlineValue, (args) => ({ ...args, help: true })),
  version: (label, current, inlineValue) => parseSwitch(label, current, inlineValue, (args) => ({ ...args, version: true }))
}

const shortFlags: Record<string, string> = {
  i: "input",
  o: "output",
  h: "help",
  V: "version"
}

interface FlagToken {
  readonly name: string
  readonly label: string
  readonly inlineValue: string | undefined
}

// --name, --name=value, -x, -xvalue
const splitFlag = (raw: string): Either.Either<FlagToken, ConfigError> => {
  if (raw.startsWith("--")) {
    const body = raw.slice(2)
    const separator = body.indexOf("=")
    const name = separator === -1 ? body : body.slice(0, separator)
    const inlineValue = separator === -1 ? undefined : body.slice(separator + 1)
    return Either.right({ name, label: `--${name}`, inlineValue })
  }
  const letter = raw.charAt(1)
  const name = shortFlags[letter]
  if (name === undefined) {
    return Either.left(configError(`unknown flag: -${letter}`))
  }
  const rest = raw.slice(2)
  return Either.right({ name, label: `-${letter}`, inlineValue: rest.length > 0 ? rest : undefined })
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<FlagStep, ConfigError> => {
  const token = splitFlag(raw)
  if (Either.isLeft(token)) {
    return Either.left(token.left)
  }
  const { inlineValue, label, name } = token.right
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(configError(`unknown flag: ${label}`))
  }
  return parser(label, current, inlineValue, nextValue)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or ConfigError.
 *
 * @pure true
 * @invariant format names are returned verbatim; validation happens in config
 * @complexity O(n)
 */
export const parseCliArgs = (argv: ReadonlyArray<string>): Either.Either<CliArgs, ConfigError> => {
  const rawArgs = argv.slice(2)
  let args = defaultArgs
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(configError("unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(configError(`unexpected argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const possibleValues = `[possible values: ${formats.join(", ")}]`

/**
 * Usage text. Environment variables are named, their values never shown.
 */
export const renderUsage = (): string =>
  [
    `${cliName} ${cliVersion}`,
    "Convert a document between JSON, TOML and YAML.",
    "Reads the document from standard input and writes the result to standard output.",
    "",
    "USAGE:",
    `    ${cliName} --input <FORMAT> --output <FORMAT>`,
    "",
    "OPTIONS:",
    `    -i, --input <FORMAT>     Specify format of input document [env: ${inputEnvVar}] ${possibleValues}`,
    `    -o, --output <FORMAT>    Specify format of output document [env: ${outputEnvVar}] ${possibleValues}`,
    "        --verbose            Log conversion steps to standard error",
    "    -h, --help               Print help information",
    "    -V, --version            Print version information",
    ""
  ].join("\n")

export const renderVersion = (): string => `${cliName} ${cliVersion}\n`
